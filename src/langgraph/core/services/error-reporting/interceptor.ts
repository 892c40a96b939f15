import { createLogger, type Logger } from "../logger.js";
import type { ErrorRecord, ErrorReporter, ErrorSource } from "./reporter.js";

export type ErrorClass = abstract new (...args: never[]) => Error;

// Extractors see the raw call arguments and narrow them themselves.
export type ArgumentExtractor<T> = (args: readonly unknown[]) => T;

export interface InterceptOptions {
  source: ErrorSource;
  functionName: string;
  reporter: ErrorReporter;
  /** Only these error classes are reported; defaults to every error. */
  errorTypes?: ReadonlyArray<ErrorClass>;
  extractUserId?: ArgumentExtractor<string | null | undefined>;
  extractContext?: ArgumentExtractor<Record<string, unknown>>;
  snapshotInput?: ArgumentExtractor<unknown>;
  logger?: Logger;
}

const fallbackLogger = createLogger("interceptor");

// Errors already reported by an inner wrapper; outer wrappers only rethrow them.
const reportedErrors = new WeakSet<object>();

function claimReport(error: unknown, errorTypes: ReadonlyArray<ErrorClass> | undefined): boolean {
  if (errorTypes && errorTypes.length > 0 && !errorTypes.some((type) => error instanceof type)) return false;
  if (typeof error !== "object" || error === null) return true;
  if (reportedErrors.has(error)) return false;
  reportedErrors.add(error);
  return true;
}

function describeError(error: unknown): { type: string; message: string; stack: string | null } {
  if (error instanceof Error) return { type: error.name || error.constructor.name, message: error.message, stack: error.stack ?? null };
  return { type: typeof error, message: String(error), stack: null };
}

function safely<T>(fn: () => T, fallback: T, logger: Logger): T {
  try {
    return fn();
  } catch (extractError) {
    logger.warn({ err: extractError }, "error context extraction failed");
    return fallback;
  }
}

export function buildErrorRecord(error: unknown, args: readonly unknown[], options: InterceptOptions): ErrorRecord {
  const logger = options.logger ?? fallbackLogger;
  const { type, message, stack } = describeError(error);
  const context = options.extractContext ? safely(() => options.extractContext?.(args) ?? {}, {}, logger) : {};
  const contextSource = Object.fromEntries(
    Object.entries(context).map(([key, value]) => [key, typeof value === "string" ? value : JSON.stringify(value)])
  );
  const userId = options.extractUserId ? safely(() => options.extractUserId?.(args), null, logger) : null;
  return {
    source: { ...options.source, ...contextSource, function: options.functionName },
    function_name: options.functionName,
    error_type: type,
    error_message: message,
    stack,
    user_id: userId || "unknown",
    input: options.snapshotInput ? safely(() => options.snapshotInput?.(args), null, logger) : args,
    context,
  };
}

async function reportSafely(error: unknown, args: readonly unknown[], options: InterceptOptions): Promise<void> {
  const logger = options.logger ?? fallbackLogger;
  try {
    const record = buildErrorRecord(error, args, options);
    await options.reporter.report(record);
  } catch (reportError) {
    logger.error({ err: reportError, functionName: options.functionName }, "error reporting failed");
  }
}

/**
 * Wraps a callable so that thrown errors are reported before they propagate.
 * Async callables await the report and then reject with the original error;
 * sync callables start the report and rethrow at once. Successful results,
 * errors outside `errorTypes` and errors an inner wrapper already reported
 * pass through untouched.
 */
export function intercept<A extends unknown[], R>(
  fn: (...args: A) => Promise<R>,
  options: InterceptOptions
): (...args: A) => Promise<R>;
export function intercept<A extends unknown[], R>(fn: (...args: A) => R, options: InterceptOptions): (...args: A) => R;
export function intercept<A extends unknown[]>(fn: (...args: A) => unknown, options: InterceptOptions): (...args: A) => unknown {
  return (...args: A) => {
    let result: unknown;
    try {
      result = fn(...args);
    } catch (error) {
      if (claimReport(error, options.errorTypes)) void reportSafely(error, args, options);
      throw error;
    }
    if (result instanceof Promise) {
      return result.catch(async (error: unknown) => {
        if (claimReport(error, options.errorTypes)) await reportSafely(error, args, options);
        throw error;
      });
    }
    return result;
  };
}
