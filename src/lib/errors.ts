export type CliErrorKind = "validation" | "not_found" | "dependency" | "runtime";

export type CacheErrorKind =
  | "source_unavailable"
  | "already_running"
  | "not_running"
  | "invalid_interval"
  | "refresh_in_progress";

interface CliErrorOptions {
  kind: CliErrorKind;
  message: string;
  hint?: string;
  detail?: string;
  exitCode?: number;
}

export class CliError extends Error {
  readonly kind: CliErrorKind;
  readonly hint?: string;
  readonly detail?: string;
  readonly exitCode: number;

  constructor(options: CliErrorOptions) {
    super(options.message);
    this.name = "CliError";
    this.kind = options.kind;
    this.hint = options.hint;
    this.detail = options.detail;
    this.exitCode = options.exitCode ?? 1;
  }
}

interface CacheErrorOptions {
  kind: CacheErrorKind;
  message: string;
  detail?: string;
  cause?: unknown;
}

/**
 * Failure raised by the cache core. Fetch failures never escape a refresh cycle as
 * exceptions; they travel inside a `RefreshOutcome` and on the failure channel.
 */
export class CacheError extends Error {
  readonly kind: CacheErrorKind;
  readonly detail?: string;

  constructor(options: CacheErrorOptions) {
    super(options.message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "CacheError";
    this.kind = options.kind;
    this.detail = options.detail;
  }
}

export function toSourceError(error: unknown, operation: string): CacheError {
  if (error instanceof CacheError) {
    return error;
  }

  const reason = error instanceof Error ? error.message : String(error);
  return new CacheError({
    kind: "source_unavailable",
    message: `Snapshot source failed during ${operation}: ${reason}`,
    cause: error
  });
}

export function toCliError(error: unknown): CliError {
  if (error instanceof CliError) {
    return error;
  }

  if (error instanceof CacheError) {
    return new CliError({
      kind: cliKindFor(error.kind),
      message: error.message,
      hint: cliHintFor(error.kind),
      detail: error.detail
    });
  }

  if (error instanceof Error) {
    return new CliError({
      kind: "runtime",
      message: error.message
    });
  }

  return new CliError({
    kind: "runtime",
    message: String(error)
  });
}

export function renderCliError(error: CliError): string {
  const lines = [error.message];
  if (error.hint) {
    lines.push(`Hint: ${error.hint}`);
  }
  if (error.detail) {
    lines.push(error.detail);
  }
  return lines.join("\n");
}

function cliKindFor(kind: CacheErrorKind): CliErrorKind {
  switch (kind) {
    case "invalid_interval":
      return "validation";
    case "source_unavailable":
      return "dependency";
    default:
      return "runtime";
  }
}

function cliHintFor(kind: CacheErrorKind): string | undefined {
  switch (kind) {
    case "invalid_interval":
      return "Pass the interval in milliseconds as a positive integer.";
    case "source_unavailable":
      return "Check that the snapshot file exists and contains valid JSON.";
    case "refresh_in_progress":
      return "Wait for the current refresh to finish and retry.";
    default:
      return undefined;
  }
}
