import type { Coordinates, DeltaResult, LocationQuery, PipelineStage } from "@climate-delta/types";
import { computeDelta } from "./deltaEngine.js";
import { ClimateDeltaError, TimeoutError } from "./errors.js";
import { describeQuery, parseLocationQuery } from "./locationQuery.js";
import type { Logger } from "./logger.js";
import { withDeadline, withRetry, type Sleep } from "./retry.js";
import type { ClimateDataSource } from "./types.js";

export type QueryOrchestratorOptions = {
  resolver: { resolve(query: LocationQuery): Promise<Coordinates> };
  dataSource: ClimateDataSource;
  logger: Logger;
  retryAttempts: number;
  retryBaseDelayMs: number;
  requestTimeoutMs: number;
  /** Country assumed for free-form postal codes. */
  country?: string;
  sleep?: Sleep;
};

type Progress = {
  stage: PipelineStage;
  location: string;
};

/**
 * One request/response cycle: resolve, fetch current, fetch the matching
 * baseline, compute the delta. Either a complete result or an error; never both.
 */
export class QueryOrchestrator {
  private readonly options: QueryOrchestratorOptions;
  private readonly logger: Logger;

  constructor(options: QueryOrchestratorOptions) {
    this.options = options;
    this.logger = options.logger;
  }

  async handle(input: LocationQuery | string): Promise<DeltaResult> {
    const progress: Progress = {
      stage: "resolve",
      location: typeof input === "string" ? input.trim() : describeQuery(input)
    };
    const timeoutMs = this.options.requestTimeoutMs;
    const started = Date.now();

    try {
      const result = await withDeadline(
        (signal) => this.run(input, progress, signal),
        timeoutMs,
        () => new TimeoutError(timeoutMs, { stage: progress.stage, location: progress.location })
      );
      this.logger.info({ location: progress.location, placeId: result.location.placeId, ms: Date.now() - started }, "Climate delta computed");
      return result;
    }
    catch (err) {
      if (err instanceof ClimateDeltaError) {
        err.withContext({ stage: progress.stage, location: progress.location });
      }
      this.logger.error({ err, stage: progress.stage, location: progress.location }, "Climate delta query failed");
      throw err;
    }
  }

  private async run(input: LocationQuery | string, progress: Progress, signal: AbortSignal): Promise<DeltaResult> {
    const { dataSource } = this.options;

    const query = typeof input === "string" ? parseLocationQuery(input, this.options.country) : input;
    const coords = await this.options.resolver.resolve(query);
    this.logger.debug({ location: progress.location, coords }, "Location resolved");

    this.enter(progress, "fetchCurrent", signal);
    const current = await this.retrying(progress, signal, () => dataSource.fetchCurrent(coords));

    this.enter(progress, "fetchHistorical", signal);
    const historical = await this.retrying(progress, signal, () => dataSource.fetchHistorical(coords, current.reference.window));

    this.enter(progress, "computeDelta", signal);
    const comparison = computeDelta(current, historical);
    return { location: coords, ...comparison };
  }

  private enter(progress: Progress, stage: PipelineStage, signal: AbortSignal) {
    signal.throwIfAborted();
    progress.stage = stage;
    this.logger.debug({ location: progress.location, stage }, "Entering stage");
  }

  private retrying<T>(progress: Progress, signal: AbortSignal, task: () => Promise<T>): Promise<T> {
    return withRetry(task, {
      attempts: this.options.retryAttempts,
      baseDelayMs: this.options.retryBaseDelayMs,
      signal,
      sleep: this.options.sleep,
      onRetry: (err, attempt, delayMs) => {
        this.logger.warn(
          { err, stage: progress.stage, location: progress.location, attempt, delayMs },
          "Upstream unavailable, retrying"
        );
      }
    });
  }
}
