export type ErrorKind = "config" | "connection" | "translation" | "synthesis" | "request";

export class AppError extends Error {
  constructor(
    readonly kind: ErrorKind,
    message: string,
    readonly status: number = 500,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Missing or invalid connection/credential configuration. Fatal to session init. */
export class ConfigError extends AppError {
  constructor(message: string) {
    super("config", message, 503);
  }
}

/** Data source unreachable or auth rejected. Fatal to session init. */
export class ConnectionError extends AppError {
  constructor(message: string, cause?: unknown) {
    super("connection", message, 503, { cause });
  }
}

export class TranslationError extends AppError {
  constructor(message: string, cause?: unknown) {
    super("translation", message, 502, { cause });
  }
}

export class SynthesisError extends AppError {
  constructor(message: string, cause?: unknown) {
    super("synthesis", message, 502, { cause });
  }
}

export class RequestError extends AppError {
  constructor(message: string, status = 400) {
    super("request", message, status);
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error && err.message) return err.message;
  if (typeof err === "string" && err) return err;
  return "Unknown error";
}
