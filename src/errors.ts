import type { ZodIssue } from "zod";

/**
 * Base class for every error raised by feedmap.
 */
export abstract class FeedMapError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

/**
 * Thrown when XML input is malformed, references an undeclared entity,
 * or does not carry the payload the caller expected.
 */
export class ParseError extends FeedMapError {
  readonly line: number | null;
  readonly column: number | null;

  constructor(
    message: string,
    position?: { line: number; column: number },
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.line = position?.line ?? null;
    this.column = position?.column ?? null;
  }
}

/**
 * Thrown when a property map cannot be rendered as XML.
 */
export class SerializationError extends FeedMapError {
  constructor(
    message: string,
    readonly path: string | null = null,
  ) {
    super(message);
  }
}

/**
 * Thrown when an entry map lacks a required key, or the key holds the wrong shape.
 */
export class ValidationError extends FeedMapError {
  constructor(
    message: string,
    readonly key: string,
  ) {
    super(message);
  }
}

/**
 * Wraps a failure raised by the feed transport. The original error is kept as `cause`.
 */
export class ClientError extends FeedMapError {
  constructor(
    message: string,
    readonly url: string,
    cause: unknown,
  ) {
    super(message, { cause });
  }
}

/**
 * Thrown by the HTTP transport when the server answers with a non-2xx status.
 */
export class TransportError extends FeedMapError {
  constructor(
    readonly url: string,
    readonly status: number,
    statusText: string,
  ) {
    super(`HTTP ${status}: ${statusText} (${url})`);
  }
}

/**
 * Thrown when the configuration file is missing, is not YAML, or fails validation.
 */
export class ConfigError extends FeedMapError {
  constructor(
    message: string,
    readonly configPath: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
  }
}

/**
 * One `  - path: message` line per issue; issues about the value itself
 * are reported under `(root)`.
 */
export function formatIssues(issues: ReadonlyArray<ZodIssue>): string {
  return issues
    .map((issue) => `  - ${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("\n");
}
