import chalk from "chalk";
import type { LoggerFn } from "./types.js";
import type { ErrorLogger, ErrorContext } from "./error-logger.js";

export interface LoggerContext {
  dryRun?: boolean;
  verbose?: boolean;
  scope?: string;
}

export interface ScopedLogger {
  readonly context: Required<Pick<LoggerContext, "dryRun" | "verbose">> &
    Pick<LoggerContext, "scope">;
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  logException(error: Error, operation: string, context?: ErrorContext): void;
  dryRun(message: string): void;
  verbose(message: string): void;
  child(context: Partial<LoggerContext>): ScopedLogger;
}

export interface LoggerFactory {
  base: LoggerFn;
  readonly errorLogger: ErrorLogger | undefined;
  create(context?: LoggerContext): ScopedLogger;
  setErrorLogger(errorLogger: ErrorLogger): void;
}

const defaultEmitter: LoggerFn = (message) => {
  console.log(message);
};

export function createLoggerFactory(
  emitter: LoggerFn = defaultEmitter
): LoggerFactory {
  let errorLogger: ErrorLogger | undefined;

  const create = (context: LoggerContext = {}): ScopedLogger => {
    const dryRun = context.dryRun ?? false;
    const verbose = context.verbose ?? false;
    const scope = context.scope;
    const formatMessage = (message: string): string =>
      scope ? `[${scope}] ${message}` : message;

    const scoped: ScopedLogger = {
      context: { dryRun, verbose, scope },
      info(message) {
        emitter(formatMessage(message));
      },
      success(message) {
        emitter(chalk.green(formatMessage(message)));
      },
      warn(message) {
        emitter(chalk.yellow(formatMessage(message)));
      },
      error(message) {
        emitter(chalk.red(formatMessage(message)));
      },
      logException(error, operation, errorContext) {
        emitter(
          chalk.red(formatMessage(`Error during ${operation}: ${error.message}`))
        );
        errorLogger?.logErrorWithStackTrace(error, operation, {
          ...errorContext,
          component: scope
        });
      },
      dryRun(message) {
        emitter(chalk.dim(formatMessage(message)));
      },
      verbose(message) {
        if (!verbose) {
          return;
        }
        emitter(chalk.dim(formatMessage(message)));
      },
      child(next) {
        return create({
          dryRun: next.dryRun ?? dryRun,
          verbose: next.verbose ?? verbose,
          scope: next.scope ?? scope
        });
      }
    };

    return scoped;
  };

  return {
    base: emitter,
    get errorLogger() {
      return errorLogger;
    },
    create,
    setErrorLogger(logger: ErrorLogger) {
      errorLogger = logger;
    }
  };
}
