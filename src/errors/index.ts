import type { Logger } from "../log/logger.js";

export type ErrorSeverity = "info" | "warning" | "error" | "critical";

export type ErrorCategory = "configuration" | "extension" | "resource" | "state" | "system";

export type ErrorDetails = Record<string, unknown>;

export interface PipelineErrorInfo {
  message: string;
  severity: ErrorSeverity;
  category: ErrorCategory;
  context: string; // dotted path, e.g. extension.shell.cleanup
  details?: ErrorDetails;
}

export interface PipelineErrorOptions {
  details?: ErrorDetails;
  severity?: ErrorSeverity;
  cause?: unknown;
}

export class PipelineError extends Error {
  readonly info: PipelineErrorInfo;

  constructor(message: string, category: ErrorCategory, context: string, opts: PipelineErrorOptions = {}) {
    super(message, opts.cause === undefined ? undefined : { cause: opts.cause });
    this.name = "PipelineError";
    this.info = {
      message,
      severity: opts.severity ?? "error",
      category,
      context,
      details: opts.details
    };
  }
}

export class ConfigurationError extends PipelineError {
  constructor(message: string, opts: PipelineErrorOptions = {}) {
    super(message, "configuration", "configuration", opts);
    this.name = "ConfigurationError";
  }
}

export class ExtensionNotFoundError extends PipelineError {
  constructor(extensionName: string, opts: PipelineErrorOptions = {}) {
    super(`Extension not found: ${extensionName}`, "extension", `extension.${extensionName}`, opts);
    this.name = "ExtensionNotFoundError";
  }
}

export class ExtensionLoadError extends PipelineError {
  constructor(message: string, extensionName: string, opts: PipelineErrorOptions = {}) {
    super(message, "extension", `extension.${extensionName}`, opts);
    this.name = "ExtensionLoadError";
  }
}

export class ExtensionValidationError extends PipelineError {
  constructor(message: string, extensionName: string, opts: PipelineErrorOptions = {}) {
    super(message, "extension", `extension.${extensionName}`, opts);
    this.name = "ExtensionValidationError";
  }
}

/** Raised (or wrapped) when extension code fails during execute. */
export class ExtensionExecutionError extends PipelineError {
  constructor(message: string, extensionName: string, opts: PipelineErrorOptions = {}) {
    super(message, "extension", `extension.${extensionName}`, opts);
    this.name = "ExtensionExecutionError";
  }
}

export class ResourceError extends PipelineError {
  constructor(message: string, opts: PipelineErrorOptions = {}) {
    super(message, "resource", "resource", opts);
    this.name = "ResourceError";
  }
}

export class StateError extends PipelineError {
  constructor(message: string, opts: PipelineErrorOptions = {}) {
    super(message, "state", "state", opts);
    this.name = "StateError";
  }
}

export class SystemError extends PipelineError {
  constructor(message: string, context: string, opts: PipelineErrorOptions = {}) {
    super(message, "system", context, opts);
    this.name = "SystemError";
  }
}

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message;
  return String(e);
}

/** Any thrown value as a PipelineError; foreign errors become SystemError. */
export function toPipelineError(e: unknown, context: string): PipelineError {
  if (e instanceof PipelineError) return e;
  return new SystemError(errorMessage(e), context, { cause: e });
}

export type Result<T> =
  | { ok: true; value: T }
  | { ok: false; error: PipelineError };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail<T = never>(error: PipelineError): Result<T> {
  return { ok: false, error };
}

/**
 * Runs `fn` and captures a throw as a failed Result. `wrap` maps foreign
 * errors; PipelineErrors pass through untouched unless `wrapAll` is set.
 */
export async function attempt<T>(
  fn: () => T | Promise<T>,
  wrap: (e: unknown) => PipelineError,
  wrapAll = false
): Promise<Result<T>> {
  try {
    return ok(await fn());
  } catch (e) {
    if (!wrapAll && e instanceof PipelineError) return fail(e);
    return fail(wrap(e));
  }
}

export function shouldPropagate(info: PipelineErrorInfo): boolean {
  if (info.severity === "critical") return true;
  if (info.severity === "error") return info.category !== "extension";
  return false;
}

export class ErrorHandler {
  constructor(private readonly logger: Logger) {}

  /** Logs the error; rethrows it when the propagation policy says so. */
  handle(error: unknown, context: string): void {
    const pe = error instanceof PipelineError ? error : new SystemError(errorMessage(error), context, { cause: error });
    const info = pe.info;

    let msg = `Error in ${info.context}: ${info.message}`;
    if (info.details) msg += ` Details: ${JSON.stringify(info.details)}`;

    switch (info.severity) {
      case "critical":
        this.logger.critical(msg, { error: pe });
        break;
      case "error":
        this.logger.error(msg, { error: pe });
        break;
      case "warning":
        this.logger.warn(msg);
        break;
      default:
        this.logger.info(msg);
    }

    if (shouldPropagate(info)) throw pe;
  }
}
