import type {
  CurrentObservationSet,
  DeltaComparison,
  DeltaDirection,
  DeltaEntry,
  DeltaMetrics,
  HistoricalObservationSet,
  MetricName,
  MetricUnit,
  ObservationMetric
} from "@climate-delta/types";
import { sameWindow, windowKey } from "./calendar.js";
import { PeriodMismatchError, UnitMismatchError } from "./errors.js";

const UNIT_SUFFIX: Record<MetricUnit, string> = {
  degF: "°F",
  mph: " mph",
  percent: "%"
};

function indexByName(metrics: ObservationMetric[]): Map<MetricName, ObservationMetric> {
  const index = new Map<MetricName, ObservationMetric>();
  for (const metric of metrics) {
    if (!index.has(metric.name)) index.set(metric.name, metric);
  }
  return index;
}

function directionOf(delta: number): DeltaDirection {
  if (delta > 0) return "above";
  if (delta < 0) return "below";
  return "unchanged";
}

function compareEntry(current: ObservationMetric, historical: ObservationMetric): DeltaEntry {
  if (current.unit !== historical.unit) {
    throw new UnitMismatchError(current.name, current.unit, historical.unit);
  }
  const delta = current.value - historical.value;
  return {
    metric: current.name,
    unit: current.unit,
    currentValue: current.value,
    historicalValue: historical.value,
    delta,
    percentChange: historical.value === 0 ? "undefined" : delta / historical.value,
    unavailable: false,
    direction: directionOf(delta),
    withinNormalRange: historical.stdDev === undefined ? null : Math.abs(delta) <= historical.stdDev
  };
}

function unavailableEntry(current: ObservationMetric | undefined, historical: ObservationMetric | undefined): DeltaEntry | null {
  const present = current ?? historical;
  if (!present) return null;
  return {
    metric: present.name,
    unit: present.unit,
    currentValue: current?.value ?? null,
    historicalValue: historical?.value ?? null,
    delta: null,
    percentChange: null,
    unavailable: true,
    direction: null,
    withinNormalRange: null
  };
}

/**
 * Compares a current observation set against the historical baseline for the
 * same calendar day. Pure: no I/O, and equal inputs give deep-equal output.
 */
export function computeDelta(current: CurrentObservationSet, historical: HistoricalObservationSet): DeltaComparison {
  const window = current.reference.window;
  if (!sameWindow(window, historical.reference.window)) {
    throw new PeriodMismatchError(
      `Current data covers ${windowKey(window)} but the baseline covers ${windowKey(historical.reference.window)}`
    );
  }

  const currentByName = indexByName(current.metrics);
  const historicalByName = indexByName(historical.metrics);
  const names = [...new Set<MetricName>([...currentByName.keys(), ...historicalByName.keys()])].sort();

  const metrics: DeltaMetrics = {};
  for (const name of names) {
    const currentMetric = currentByName.get(name);
    const historicalMetric = historicalByName.get(name);
    const entry = currentMetric && historicalMetric
      ? compareEntry(currentMetric, historicalMetric)
      : unavailableEntry(currentMetric, historicalMetric);
    if (entry) metrics[name] = entry;
  }

  return {
    window: { ...window },
    baseline: historical.reference.baseline,
    metrics,
    current: {
      ...current.station,
      observedAt: current.reference.observedAt,
      timeZone: current.reference.timeZone,
      description: current.reference.description,
      nearestPlace: current.reference.nearestPlace
    },
    historical: { ...historical.station }
  };
}

/** Short human phrase for one entry, e.g. "7.0°F warmer" or "no data". */
export function describeDelta(entry: DeltaEntry): string {
  if (entry.unavailable || entry.delta === null) return "no data";
  if (entry.delta === 0) return "no change";
  const magnitude = `${Math.abs(entry.delta).toFixed(1)}${UNIT_SUFFIX[entry.unit]}`;
  if (entry.unit === "degF") {
    return `${magnitude} ${entry.delta > 0 ? "warmer" : "cooler"}`;
  }
  return `${magnitude} ${entry.delta > 0 ? "higher" : "lower"}`;
}
