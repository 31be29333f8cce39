/**
 * Test compatibility layer for node:test
 * Provides a Jest-like API for testing
 */

import assert from "node:assert/strict";
import { inspect, isDeepStrictEqual } from "node:util";

export { afterEach, beforeEach, describe, test } from "node:test";

type Impl = (...args: unknown[]) => unknown;

/**
 * Mock function type
 */
export interface MockFn {
  (...args: unknown[]): unknown;
  mock: { calls: unknown[][] };
  mockImplementation(impl: Impl): MockFn;
  mockClear(): void;
}

/**
 * Mock function that can put the original back
 */
export interface SpyFn extends MockFn {
  mockRestore(): void;
}

const isMockFn = (value: unknown): value is MockFn =>
  typeof value === "function" && "mock" in value;

/**
 * Create a mock function
 */
const fn = (impl: Impl = () => undefined): MockFn => {
  let implementation = impl;
  const calls: unknown[][] = [];

  const mockFn: MockFn = Object.assign(
    (...args: unknown[]): unknown => {
      calls.push(args);
      return implementation(...args);
    },
    {
      mock: { calls },
      mockImplementation: (next: Impl): MockFn => {
        implementation = next;
        return mockFn;
      },
      mockClear: (): void => {
        calls.length = 0;
      },
    },
  );

  return mockFn;
};

/**
 * Spy on an object's method
 * Calls through to the original unless an implementation is given
 */
export const spyOn = <T extends object>(
  obj: T,
  method: keyof T,
  impl?: Impl,
): SpyFn => {
  const original: unknown = obj[method];
  const mock = fn(impl ?? ((...args: unknown[]) =>
    typeof original === "function" ? Reflect.apply(original, obj, args) : undefined
  ));

  Object.defineProperty(obj, method, {
    value: mock,
    writable: true,
    configurable: true,
  });

  return Object.assign(mock, {
    mockRestore: (): void => {
      Object.defineProperty(obj, method, {
        value: original,
        writable: true,
        configurable: true,
      });
    },
  });
};

const show = (value: unknown): string => inspect(value, { depth: 4 });

const thrownBy = (run: () => unknown): unknown => {
  try {
    run();
  } catch (error) {
    return error;
  }
  return undefined;
};

class ExpectChain<T> {
  private isNot = false;

  constructor(private readonly actual: T) {}

  get not(): ExpectChain<T> {
    this.isNot = !this.isNot;
    return this;
  }

  private check(pass: boolean, message: string): void {
    assert.ok(this.isNot ? !pass : pass, this.isNot ? `Not: ${message}` : message);
  }

  private mockCalls(): unknown[][] {
    if (!isMockFn(this.actual)) {
      throw new TypeError(`Expected a mock function, got ${show(this.actual)}`);
    }
    return this.actual.mock.calls;
  }

  toBe(expected: T): void {
    this.check(
      Object.is(this.actual, expected),
      `Expected ${show(this.actual)} to be ${show(expected)}`,
    );
  }

  toEqual(expected: unknown): void {
    this.check(
      isDeepStrictEqual(this.actual, expected),
      `Expected ${show(this.actual)} to equal ${show(expected)}`,
    );
  }

  toBeUndefined(): void {
    this.check(
      this.actual === undefined,
      `Expected ${show(this.actual)} to be undefined`,
    );
  }

  toContain(expected: unknown): void {
    const { actual } = this;
    const found = typeof actual === "string"
      ? typeof expected === "string" && actual.includes(expected)
      : Array.isArray(actual) && actual.includes(expected);
    this.check(found, `Expected ${show(actual)} to contain ${show(expected)}`);
  }

  toHaveLength(expected: number): void {
    const { actual } = this;
    const length = typeof actual === "string" || Array.isArray(actual)
      ? actual.length
      : undefined;
    this.check(
      length === expected,
      `Expected length ${expected}, got ${show(length)}`,
    );
  }

  toMatch(expected: RegExp): void {
    const { actual } = this;
    this.check(
      typeof actual === "string" && expected.test(actual),
      `Expected ${show(actual)} to match ${expected}`,
    );
  }

  toBeInstanceOf(expected: abstract new (...args: never[]) => unknown): void {
    this.check(
      this.actual instanceof expected,
      `Expected ${show(this.actual)} to be instance of ${expected.name}`,
    );
  }

  toThrow(expected?: string | RegExp): void {
    const { actual } = this;
    if (typeof actual !== "function") {
      throw new TypeError(`Expected a function, got ${show(actual)}`);
    }
    const error = thrownBy(() => actual());
    const message = error instanceof Error ? error.message : undefined;
    const matches = message !== undefined &&
      (expected === undefined ||
        (typeof expected === "string"
          ? message.includes(expected)
          : expected.test(message)));
    this.check(
      matches,
      `Expected function to throw ${show(expected ?? "an error")}, got ${show(error)}`,
    );
  }

  toHaveBeenCalledTimes(count: number): void {
    const calls = this.mockCalls();
    this.check(
      calls.length === count,
      `Expected ${count} call(s), got ${calls.length}`,
    );
  }

  toHaveBeenCalledWith(...args: unknown[]): void {
    const calls = this.mockCalls();
    this.check(
      calls.some((call) => isDeepStrictEqual(call, args)),
      `Expected a call with ${show(args)}, got ${show(calls)}`,
    );
  }
}

/**
 * Jest-like expect API
 */
export const expect = <T>(actual: T): ExpectChain<T> => new ExpectChain(actual);
