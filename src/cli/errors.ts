import type { ErrorContext } from "./error-logger.js";

/**
 * Base error class for all CLI errors with context support
 */
export class CliError extends Error {
  public readonly context?: ErrorContext;
  public readonly isUserError: boolean;

  constructor(
    message: string,
    context?: ErrorContext,
    options?: { isUserError?: boolean }
  ) {
    super(message);
    this.name = this.constructor.name;
    this.context = context;
    this.isUserError = options?.isUserError ?? false;

    // Maintains proper stack trace for where error was thrown
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Invalid command-line input
 */
export class ValidationError extends CliError {
  constructor(message: string, context?: ErrorContext) {
    super(message, context, { isUserError: true });
  }
}

/**
 * Settings that cannot be used: malformed files, duplicate targets in a group
 */
export class ConfigurationError extends CliError {
  constructor(message: string, context?: ErrorContext) {
    super(message, context, { isUserError: true });
  }
}

/**
 * Framework version or roots could not be determined. Fatal to the run.
 */
export class DetectionError extends CliError {
  public readonly webrootDir?: string;

  constructor(
    message: string,
    options?: { webrootDir?: string; context?: ErrorContext }
  ) {
    super(
      message,
      { ...options?.context, webrootDir: options?.webrootDir },
      { isUserError: true }
    );
    this.webrootDir = options?.webrootDir;
  }
}

/**
 * A discovered resource maps outside the root it was found under
 */
export class ResolutionError extends CliError {
  public readonly resourcePath: string;
  public readonly root: string;

  constructor(
    message: string,
    options: { resourcePath: string; root: string; context?: ErrorContext }
  ) {
    super(message, {
      ...options.context,
      resourcePath: options.resourcePath,
      root: options.root
    });
    this.resourcePath = options.resourcePath;
    this.root = options.root;
  }
}

export type MutationAction = "check" | "apply" | "revert";

/**
 * A single check, apply or revert failed
 */
export class MutationError extends CliError {
  public readonly action: MutationAction;
  public readonly kind: string;
  public readonly targetPath: string;

  constructor(
    message: string,
    options: {
      action: MutationAction;
      kind: string;
      targetPath: string;
      cause?: unknown;
      context?: ErrorContext;
    }
  ) {
    super(message, {
      ...options.context,
      operation: options.action,
      instrumentation: options.kind,
      filePath: options.targetPath
    });
    this.action = options.action;
    this.kind = options.kind;
    this.targetPath = options.targetPath;
    if (options.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

/**
 * Helper to determine if an error should be shown to users
 */
export function isUserFacingError(error: unknown): boolean {
  return error instanceof CliError && error.isUserError;
}

/**
 * Helper to extract error context from any error
 */
export function extractErrorContext(error: unknown): ErrorContext | undefined {
  if (error instanceof CliError) {
    return error.context;
  }
  return undefined;
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error ?? "Unknown error");
}
