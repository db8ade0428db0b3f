export type LocationQuery =
  | {
    kind: "postal";
    country: string;
    postalCode: string;
  }
  | {
    kind: "place";
    country: string;
    city: string;
    state?: string;
  };

export type Coordinates = {
  latitude: number;
  longitude: number;
  /** Canonical label, e.g. "Decatur, GA". */
  label: string;
  /** `<COUNTRY>-<postal code>` of the place the query resolved to. */
  placeId: string;
};

export type CalendarWindow = {
  month: number;
  day: number;
};

export type MetricUnit = "degF" | "mph" | "percent";

export type MetricName =
  | "temperature"
  | "temperatureHigh"
  | "temperatureLow"
  | "windSpeed"
  | "relativeHumidity";

export type ObservationMetric = {
  name: MetricName;
  value: number;
  unit: MetricUnit;
  stdDev?: number;
};

export type CurrentReference = {
  kind: "current";
  observedAt: string;
  window: CalendarWindow;
  /** IANA zone the window was taken in. */
  timeZone: string;
  /** Reported conditions, e.g. "Partly Cloudy". */
  description: string | null;
  /** "City, ST" the provider places nearest the point. */
  nearestPlace: string | null;
};

export type HistoricalReference = {
  kind: "historical";
  window: CalendarWindow;
  baseline: string;
};

export type StationInfo = {
  id: string;
  name: string;
  latitude: number;
  longitude: number;
  distanceKm: number;
};

export type ObservationSet<R extends CurrentReference | HistoricalReference = CurrentReference | HistoricalReference> = {
  metrics: ObservationMetric[];
  reference: R;
  station: StationInfo;
};

export type CurrentObservationSet = ObservationSet<CurrentReference>;
export type HistoricalObservationSet = ObservationSet<HistoricalReference>;

export type DeltaDirection = "above" | "below" | "unchanged";

export type DeltaEntry = {
  metric: MetricName;
  unit: MetricUnit;
  currentValue: number | null;
  historicalValue: number | null;
  delta: number | null;
  percentChange: number | "undefined" | null;
  unavailable: boolean;
  direction: DeltaDirection | null;
  withinNormalRange: boolean | null;
};

export type DeltaMetrics = Partial<Record<MetricName, DeltaEntry>>;

/** The observing station plus what it reported. */
export type CurrentStation = StationInfo & Omit<CurrentReference, "kind" | "window">;

export type DeltaResult = {
  location: Coordinates;
  window: CalendarWindow;
  baseline: string;
  metrics: DeltaMetrics;
  current: CurrentStation;
  historical: StationInfo;
};

/** What the delta computation alone produces; the orchestrator adds the resolved location. */
export type DeltaComparison = Omit<DeltaResult, "location">;

export type PipelineStage = "resolve" | "fetchCurrent" | "fetchHistorical" | "computeDelta";

export type ErrorPayload = {
  error: string;
  message: string;
  stage?: PipelineStage;
  location?: string;
};
