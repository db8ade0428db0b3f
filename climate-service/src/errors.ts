import type { ErrorPayload, PipelineStage } from "@climate-delta/types";

export type ClimateDeltaErrorCode =
  | "not_found"
  | "ambiguous_input"
  | "no_station"
  | "upstream_unavailable"
  | "unit_mismatch"
  | "period_mismatch"
  | "timeout";

type ErrorContext = {
  stage?: PipelineStage;
  location?: string;
};

export class ClimateDeltaError extends Error {
  readonly code: ClimateDeltaErrorCode;
  readonly retryable: boolean;
  stage?: PipelineStage;
  location?: string;

  constructor(code: ClimateDeltaErrorCode, message: string, options?: ErrorContext & { retryable?: boolean; cause?: unknown }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.code = code;
    this.retryable = options?.retryable ?? false;
    this.stage = options?.stage;
    this.location = options?.location;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /** Fills in stage and location without overwriting context set closer to the failure. */
  withContext(context: ErrorContext): this {
    this.stage ??= context.stage;
    this.location ??= context.location;
    return this;
  }
}

export class NotFoundError extends ClimateDeltaError {
  constructor(message: string, context?: ErrorContext) {
    super("not_found", message, context);
  }
}

export class AmbiguousInputError extends ClimateDeltaError {
  constructor(message: string, context?: ErrorContext) {
    super("ambiguous_input", message, context);
  }
}

export class NoStationError extends ClimateDeltaError {
  constructor(message: string, context?: ErrorContext) {
    super("no_station", message, context);
  }
}

export class UpstreamUnavailableError extends ClimateDeltaError {
  readonly status: number | null;

  constructor(message: string, options?: ErrorContext & { status?: number | null; retryable?: boolean; cause?: unknown }) {
    const { status = null, ...rest } = options ?? {};
    super("upstream_unavailable", message, { retryable: true, ...rest });
    this.status = status;
  }
}

export class UnitMismatchError extends ClimateDeltaError {
  constructor(readonly metric: string, readonly currentUnit: string, readonly historicalUnit: string) {
    super("unit_mismatch", `Metric ${metric} has unit ${currentUnit} in current data but ${historicalUnit} in historical data`);
  }
}

export class PeriodMismatchError extends ClimateDeltaError {
  constructor(message: string) {
    super("period_mismatch", message);
  }
}

export class TimeoutError extends ClimateDeltaError {
  constructor(readonly timeoutMs: number, context?: ErrorContext) {
    super("timeout", `Request exceeded ${timeoutMs}ms`, context);
  }
}

export function isRetryable(err: unknown): boolean {
  return err instanceof ClimateDeltaError && err.retryable;
}

function messageFrom(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === "object" && err !== null && "message" in err && typeof err.message === "string") {
    return err.message;
  }
  return String(err);
}

export function toErrorPayload(err: unknown): ErrorPayload {
  if (err instanceof ClimateDeltaError) {
    const payload: ErrorPayload = { error: err.code, message: err.message };
    if (err.stage) payload.stage = err.stage;
    if (err.location !== undefined) payload.location = err.location;
    return payload;
  }
  return { error: "unexpected_error", message: messageFrom(err) };
}
