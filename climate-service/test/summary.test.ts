import { describe, expect, it } from "vitest";
import { computeDelta } from "../src/deltaEngine.js";
import { summarizeDelta } from "../src/summary.js";
import { atlanta, currentSet, historicalSet } from "./fixtures/observations.js";

describe("summarizeDelta", () => {
  it("leads with conditions, then highs and lows, then the rest", () => {
    const comparison = computeDelta(
      currentSet([
        { name: "temperatureHigh", value: 85, unit: "degF" },
        { name: "temperatureLow", value: 70, unit: "degF" },
        { name: "temperature", value: 80.5, unit: "degF" },
        { name: "windSpeed", value: 9.2, unit: "mph" }
      ]),
      historicalSet([
        { name: "temperatureHigh", value: 78, unit: "degF", stdDev: 5.2 },
        { name: "temperatureLow", value: 70.2, unit: "degF", stdDev: 3 },
        { name: "temperature", value: 80, unit: "degF" }
      ])
    );

    expect(summarizeDelta({ location: atlanta, ...comparison })).toEqual([
      "Conditions near Druid Hills, GA: Partly Cloudy.",
      "Today's high is 7.0°F warmer and today's low is 0.2°F cooler versus the 1981-2010 normals.",
      "The low is within one standard deviation of normal; the high is not.",
      "Current temperature: 0.5°F warmer.",
      "Wind speed: no data."
    ]);
  });

  it("skips the range sentence without standard deviations", () => {
    const comparison = computeDelta(
      currentSet([
        { name: "temperatureHigh", value: 80, unit: "degF" },
        { name: "temperatureLow", value: 60, unit: "degF" }
      ]),
      historicalSet([
        { name: "temperatureHigh", value: 78, unit: "degF" },
        { name: "temperatureLow", value: 62, unit: "degF" }
      ])
    );

    expect(summarizeDelta({ location: atlanta, ...comparison })).toEqual([
      "Conditions near Druid Hills, GA: Partly Cloudy.",
      "Today's high is 2.0°F warmer and today's low is 2.0°F cooler versus the 1981-2010 normals."
    ]);
  });

  it("names the station when the provider gives no nearby place", () => {
    const comparison = computeDelta(
      currentSet([], undefined, { nearestPlace: null, description: "Light Rain" }),
      historicalSet([])
    );

    expect(summarizeDelta({ location: atlanta, ...comparison })).toEqual([
      "Conditions near Atlanta, DeKalb-Peachtree Airport: Light Rain."
    ]);
  });

  it("leaves out conditions that were not reported", () => {
    const comparison = computeDelta(
      currentSet([{ name: "temperature", value: 80, unit: "degF" }], undefined, { description: null }),
      historicalSet([{ name: "temperature", value: 80, unit: "degF" }])
    );

    expect(summarizeDelta({ location: atlanta, ...comparison })).toEqual(["Current temperature: no change."]);
  });
});
