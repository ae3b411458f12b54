/**
 * Constructor option validation with assertion signatures for type narrowing
 */

import { MAX_CAPACITY } from "@lookaround/circular-buffer";

import { InvalidPeekableConfigError } from "./errors.mjs";

import type { BaseLogger } from "@lookaround/logger";

export class OptionsValidator {
  constructor(private readonly componentName: string) {}

  /**
   * Validates that a value is a non-negative integer a buffer can be
   * allocated with
   * Throws InvalidPeekableConfigError if invalid
   */
  requireCapacity(field: string, value: unknown): asserts value is number {
    if (
      typeof value !== "number" ||
      !Number.isSafeInteger(value) ||
      value < 0
    ) {
      throw new InvalidPeekableConfigError(
        `[${this.componentName}] ${field} must be a non-negative integer, got ${String(value)}`,
        field,
        value,
      );
    }
    if (value > MAX_CAPACITY) {
      throw new InvalidPeekableConfigError(
        `[${this.componentName}] ${field} must not exceed ${MAX_CAPACITY}, got ${value}`,
        field,
        value,
      );
    }
  }

  /**
   * Validates that a value is a function
   * Throws InvalidPeekableConfigError if not
   */
  requireFunction(
    field: string,
    value: unknown,
  ): asserts value is (...args: never[]) => unknown {
    if (typeof value !== "function") {
      throw new InvalidPeekableConfigError(
        `[${this.componentName}] ${field} must be a function, got ${typeof value}`,
        field,
        value,
      );
    }
  }

  /**
   * Validates that every level method of a logger is present
   */
  requireLogger(field: string, value: unknown): asserts value is BaseLogger {
    const levels = ["trace", "debug", "info", "warn", "error", "fatal"];
    const missing =
      typeof value === "object" && value !== null
        ? levels.filter(
            (level) => typeof Reflect.get(value, level) !== "function",
          )
        : levels;

    if (missing.length > 0) {
      throw new InvalidPeekableConfigError(
        `[${this.componentName}] ${field} is missing level methods: ${missing.join(", ")}`,
        field,
        value,
      );
    }
  }
}
