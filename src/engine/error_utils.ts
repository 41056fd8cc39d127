import type { Logger } from "pino";

export interface ErrorContext {
  readonly location: string;
  readonly product?: string;
  readonly mentionId?: string;
  readonly metadata?: Record<string, unknown>;
}

export interface NormalisedError {
  readonly name: string;
  readonly message: string;
  /** Driver or system code such as `ECONNREFUSED`, when the error carries one. */
  readonly code?: string;
  readonly stack?: string;
  readonly cause?: unknown;
}

function codeOf(error: Error): string | undefined {
  return "code" in error && typeof error.code === "string" ? error.code : undefined;
}

export function normaliseError(error: unknown): NormalisedError {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      code: codeOf(error),
      stack: error.stack,
      cause: error.cause,
    };
  }

  if (typeof error === "string") {
    return { name: "Error", message: error };
  }

  const serialised = JSON.stringify(error, (_key, value: unknown) => (typeof value === "bigint" ? value.toString() : value));
  return { name: "UnknownError", message: serialised ?? String(error) };
}

export function errorMessage(error: unknown): string {
  return normaliseError(error).message;
}

export function logRecoverableError(logger: Logger, error: unknown, context: ErrorContext, message: string): void {
  logger.error({ error: normaliseError(error), context }, message);
}

/** Logs at fatal level and rethrows; start-up paths let the process die on it. */
export function logFatalError(logger: Logger, error: unknown, context: ErrorContext, message: string): never {
  logger.fatal({ error: normaliseError(error), context }, message);
  throw error instanceof Error ? error : new Error(message);
}
