import type {
  CalendarWindow,
  Coordinates,
  CurrentObservationSet,
  HistoricalObservationSet,
  MetricName,
  MetricUnit,
  ObservationMetric
} from "@climate-delta/types";
import { windowKey } from "./calendar.js";
import { coordinateKey } from "./geo.js";
import type { Logger } from "./logger.js";
import type { CurrentConditions, WeatherGovClient } from "./weatherGovClient.js";
import type { DailyNormals, NoaaNormalsClient, StationNormals } from "./noaaNormalsClient.js";
import type { TtlCache } from "./ttlCache.js";
import type { ClimateDataSource } from "./types.js";

type MetricSource<T> = {
  unit: MetricUnit;
  value: (input: T) => number | null;
  stdDev?: (input: T) => number | null;
};

const CURRENT_METRICS: Partial<Record<MetricName, MetricSource<CurrentConditions>>> = {
  temperature: { unit: "degF", value: (c) => c.temperatureF },
  temperatureHigh: { unit: "degF", value: (c) => c.highF },
  temperatureLow: { unit: "degF", value: (c) => c.lowF },
  windSpeed: { unit: "mph", value: (c) => c.windSpeedMph },
  relativeHumidity: { unit: "percent", value: (c) => c.relativeHumidity }
};

const HISTORICAL_METRICS: Partial<Record<MetricName, MetricSource<DailyNormals>>> = {
  temperature: { unit: "degF", value: (n) => n.averageF },
  temperatureHigh: { unit: "degF", value: (n) => n.highF, stdDev: (n) => n.highStdDevF },
  temperatureLow: { unit: "degF", value: (n) => n.lowF, stdDev: (n) => n.lowStdDevF }
};

function collectMetrics<T>(
  input: T,
  sources: Partial<Record<MetricName, MetricSource<T>>>,
  wanted: readonly MetricName[]
): ObservationMetric[] {
  const metrics: ObservationMetric[] = [];
  for (const name of wanted) {
    const source = sources[name];
    if (!source) continue;
    const value = source.value(input);
    if (value === null) continue;
    const metric: ObservationMetric = { name, value, unit: source.unit };
    const stdDev = source.stdDev?.(input) ?? null;
    if (stdDev !== null) metric.stdDev = stdDev;
    metrics.push(metric);
  }
  return metrics;
}

export function buildCurrentSet(conditions: CurrentConditions, metrics: readonly MetricName[]): CurrentObservationSet {
  return {
    metrics: collectMetrics(conditions, CURRENT_METRICS, metrics),
    reference: {
      kind: "current",
      observedAt: conditions.observedAt,
      window: conditions.window,
      timeZone: conditions.timeZone,
      description: conditions.description,
      nearestPlace: conditions.nearestPlace
    },
    station: conditions.station
  };
}

export function buildHistoricalSet(
  found: StationNormals,
  window: CalendarWindow,
  baseline: string,
  metrics: readonly MetricName[]
): HistoricalObservationSet {
  return {
    metrics: collectMetrics(found.normals, HISTORICAL_METRICS, metrics),
    reference: {
      kind: "historical",
      window,
      baseline
    },
    station: found.station
  };
}

export type NoaaClimateDataSourceOptions = {
  currentClient: Pick<WeatherGovClient, "getCurrentConditions">;
  normalsClient: Pick<NoaaNormalsClient, "findNormals">;
  metrics: readonly MetricName[];
  baseline: string;
  currentCache?: TtlCache<CurrentObservationSet>;
  historicalCache?: TtlCache<HistoricalObservationSet>;
  logger?: Logger;
};

/** Current conditions from weather.gov and daily normals from NCEI, both in US customary units. */
export class NoaaClimateDataSource implements ClimateDataSource {
  private readonly options: NoaaClimateDataSourceOptions;

  constructor(options: NoaaClimateDataSourceOptions) {
    this.options = options;
  }

  async fetchCurrent(coords: Coordinates): Promise<CurrentObservationSet> {
    const key = coordinateKey(coords.latitude, coords.longitude);
    const load = async () => {
      this.options.logger?.debug({ key }, "Fetching current conditions");
      const conditions = await this.options.currentClient.getCurrentConditions(coords.latitude, coords.longitude);
      return buildCurrentSet(conditions, this.options.metrics);
    };
    return this.options.currentCache ? this.options.currentCache.getOrLoad(key, load) : load();
  }

  async fetchHistorical(coords: Coordinates, window: CalendarWindow): Promise<HistoricalObservationSet> {
    const key = `${coordinateKey(coords.latitude, coords.longitude)}|${windowKey(window)}`;
    const load = async () => {
      this.options.logger?.debug({ key }, "Fetching climate normals");
      const found = await this.options.normalsClient.findNormals(coords.latitude, coords.longitude, window);
      return buildHistoricalSet(found, window, this.options.baseline, this.options.metrics);
    };
    return this.options.historicalCache ? this.options.historicalCache.getOrLoad(key, load) : load();
  }
}
