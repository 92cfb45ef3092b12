import { z } from "zod";

export class ValidationError extends Error {
  readonly issues: z.ZodError["issues"];

  constructor(message: string, issues: z.ZodError["issues"] = []) {
    super(message);
    this.name = "ValidationError";
    this.issues = issues;
  }

  static fromZod(error: z.ZodError) {
    return new ValidationError("Request failed schema validation.", error.issues);
  }
}

export type UpstreamErrorKind =
  | "auth"
  | "rate_limited"
  | "unavailable"
  | "bad_status"
  | "timeout"
  | "cancelled"
  | "network"
  | "malformed_response";

const RETRYABLE_KINDS: ReadonlySet<UpstreamErrorKind> = new Set([
  "rate_limited",
  "unavailable",
  "timeout",
  "network",
]);

export class UpstreamError extends Error {
  readonly kind: UpstreamErrorKind;
  readonly status?: number;

  constructor(kind: UpstreamErrorKind, message: string, status?: number) {
    super(message);
    this.name = "UpstreamError";
    this.kind = kind;
    this.status = status;
  }

  get retryable() {
    return RETRYABLE_KINDS.has(this.kind);
  }
}

// Raised when the normalizer is handed something other than model text.
export class SchemaError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SchemaError";
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}
