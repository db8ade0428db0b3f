import type { CurrentStation, DeltaEntry, DeltaResult, MetricName } from "@climate-delta/types";
import { describeDelta } from "./deltaEngine.js";

const METRIC_LABELS: Record<MetricName, string> = {
  temperature: "Current temperature",
  temperatureHigh: "Today's high",
  temperatureLow: "Today's low",
  windSpeed: "Wind speed",
  relativeHumidity: "Relative humidity"
};

function rangeSentence(high: DeltaEntry, low: DeltaEntry): string | null {
  if (high.withinNormalRange === null || low.withinNormalRange === null) return null;
  if (high.withinNormalRange && low.withinNormalRange) {
    return "Both today's high and low sit within one standard deviation of normal.";
  }
  if (high.withinNormalRange) return "The high is within one standard deviation of normal; the low is not.";
  if (low.withinNormalRange) return "The low is within one standard deviation of normal; the high is not.";
  return "Both today's high and low lie outside one standard deviation of normal.";
}

function conditionsSentence(current: CurrentStation): string | null {
  if (!current.description) return null;
  return `Conditions near ${current.nearestPlace ?? current.name}: ${current.description}.`;
}

/** Plain-text lines describing a result: reported conditions, then highs and lows, then the rest. */
export function summarizeDelta(result: DeltaResult): string[] {
  const { metrics } = result;
  const lines: string[] = [];
  const handled = new Set<MetricName>();

  const conditions = conditionsSentence(result.current);
  if (conditions) lines.push(conditions);

  const high = metrics.temperatureHigh;
  const low = metrics.temperatureLow;
  if (high && low) {
    lines.push(
      `Today's high is ${describeDelta(high)} and today's low is ${describeDelta(low)} versus the ${result.baseline} normals.`
    );
    const range = rangeSentence(high, low);
    if (range) lines.push(range);
    handled.add("temperatureHigh").add("temperatureLow");
  }

  for (const entry of Object.values(metrics)) {
    if (!entry || handled.has(entry.metric)) continue;
    lines.push(`${METRIC_LABELS[entry.metric]}: ${describeDelta(entry)}.`);
  }
  return lines;
}
