import type { CalendarWindow, StationInfo } from "@climate-delta/types";
import { localDateString, windowFromDateString } from "./calendar.js";
import { NoStationError } from "./errors.js";
import { celsiusToFahrenheit, haversineKm, kmhToMph, metersPerSecondToMph, roundTo } from "./geo.js";
import { fetchJson, type UpstreamRequest } from "./http.js";

type Quantity = {
  value: number | null;
  unitCode?: string;
};

type PointResponse = {
  properties?: {
    forecast?: string;
    observationStations?: string;
    timeZone?: string;
    relativeLocation?: {
      properties?: {
        city?: string;
        state?: string;
      };
    };
  };
};

type StationsResponse = {
  features?: Array<{
    geometry?: { coordinates?: [number, number] };
    properties?: {
      stationIdentifier?: string;
      name?: string;
    };
  }>;
};

type ObservationResponse = {
  properties?: {
    timestamp?: string;
    textDescription?: string;
    temperature?: Quantity;
    maxTemperatureLast24Hours?: Quantity;
    minTemperatureLast24Hours?: Quantity;
    windSpeed?: Quantity;
    relativeHumidity?: Quantity;
  };
};

type ForecastResponse = {
  properties?: {
    periods?: Array<{
      startTime: string;
      temperature: number | null;
      temperatureUnit?: string;
    }>;
  };
};

export type WeatherGovClientOptions = {
  baseUrl: string;
  userAgent: string;
  stationRadiusKm: number;
  timeoutMs?: number;
};

export type CurrentConditions = {
  station: StationInfo;
  observedAt: string;
  timeZone: string;
  window: CalendarWindow;
  description: string | null;
  nearestPlace: string | null;
  temperatureF: number | null;
  highF: number | null;
  lowF: number | null;
  windSpeedMph: number | null;
  relativeHumidity: number | null;
};

function toFahrenheit(quantity: Quantity | undefined): number | null {
  if (!quantity || quantity.value === null || !Number.isFinite(quantity.value)) return null;
  const unit = quantity.unitCode ?? "";
  if (unit.endsWith("degC")) return roundTo(celsiusToFahrenheit(quantity.value), 1);
  if (unit.endsWith("degF")) return roundTo(quantity.value, 1);
  return null;
}

function toMph(quantity: Quantity | undefined): number | null {
  if (!quantity || quantity.value === null || !Number.isFinite(quantity.value)) return null;
  const unit = quantity.unitCode ?? "";
  if (unit.endsWith("km_h-1")) return roundTo(kmhToMph(quantity.value), 1);
  if (unit.endsWith("m_s-1")) return roundTo(metersPerSecondToMph(quantity.value), 1);
  return null;
}

function toPercent(quantity: Quantity | undefined): number | null {
  if (!quantity || quantity.value === null || !Number.isFinite(quantity.value)) return null;
  return (quantity.unitCode ?? "").endsWith("percent") ? roundTo(quantity.value, 1) : null;
}

function placeLabel(point: PointResponse): string | null {
  const place = point.properties?.relativeLocation?.properties;
  if (!place?.city || !place.state) return null;
  return `${place.city}, ${place.state}`;
}

function pickExtreme(values: Array<number | null>, pick: (...values: number[]) => number): number | null {
  const present = values.filter((value): value is number => value !== null);
  return present.length ? pick(...present) : null;
}

/** api.weather.gov: nearest observation station, latest observation and today's forecast extremes. */
export class WeatherGovClient {
  private readonly options: WeatherGovClientOptions;

  constructor(options: WeatherGovClientOptions) {
    this.options = options;
  }

  private request(): UpstreamRequest {
    return {
      upstream: "weather.gov",
      headers: {
        "User-Agent": this.options.userAgent,
        Accept: "application/geo+json"
      },
      timeoutMs: this.options.timeoutMs
    };
  }

  private url(path: string): string {
    return `${this.options.baseUrl.replace(/\/+$/, "")}${path}`;
  }

  async getCurrentConditions(latitude: number, longitude: number): Promise<CurrentConditions> {
    const point = await fetchJson<PointResponse>(
      this.url(`/points/${latitude.toFixed(4)},${longitude.toFixed(4)}`),
      this.request()
    );
    const stationsUrl = point?.properties?.observationStations;
    if (!point?.properties || !stationsUrl) {
      throw new NoStationError(`weather.gov has no coverage at ${latitude.toFixed(4)},${longitude.toFixed(4)}`);
    }

    const station = await this.nearestStation(stationsUrl, latitude, longitude);
    const observation = await fetchJson<ObservationResponse>(
      this.url(`/stations/${encodeURIComponent(station.id)}/observations/latest`),
      this.request()
    );
    const props = observation?.properties;
    if (!props?.timestamp) {
      throw new NoStationError(`Station ${station.id} has no recent observations`);
    }

    const timeZone = point.properties.timeZone ?? "UTC";
    const localDate = localDateString(new Date(props.timestamp), timeZone);
    const forecastTemps = point.properties.forecast
      ? await this.forecastTemperatures(point.properties.forecast, localDate)
      : [];

    const temperatureF = toFahrenheit(props.temperature);
    const max24 = toFahrenheit(props.maxTemperatureLast24Hours) ?? temperatureF;
    const min24 = toFahrenheit(props.minTemperatureLast24Hours) ?? temperatureF;

    return {
      station,
      observedAt: new Date(props.timestamp).toISOString(),
      timeZone,
      window: windowFromDateString(localDate),
      description: props.textDescription?.trim() || null,
      nearestPlace: placeLabel(point),
      temperatureF,
      highF: pickExtreme([...forecastTemps, max24], Math.max),
      lowF: pickExtreme([...forecastTemps, min24], Math.min),
      windSpeedMph: toMph(props.windSpeed),
      relativeHumidity: toPercent(props.relativeHumidity)
    };
  }

  private async nearestStation(stationsUrl: string, latitude: number, longitude: number): Promise<StationInfo> {
    const data = await fetchJson<StationsResponse>(stationsUrl, this.request());
    const stations: StationInfo[] = [];
    for (const feature of data?.features ?? []) {
      const id = feature.properties?.stationIdentifier;
      const coords = feature.geometry?.coordinates;
      if (!id || !coords) continue;
      const [stationLon, stationLat] = coords;
      stations.push({
        id,
        name: feature.properties?.name ?? id,
        latitude: stationLat,
        longitude: stationLon,
        distanceKm: roundTo(haversineKm(latitude, longitude, stationLat, stationLon), 1)
      });
    }

    const nearest = stations
      .filter((station) => station.distanceKm <= this.options.stationRadiusKm)
      .sort((a, b) => a.distanceKm - b.distanceKm || a.id.localeCompare(b.id))[0];
    if (!nearest) {
      throw new NoStationError(`No observation station within ${this.options.stationRadiusKm} km`);
    }
    return nearest;
  }

  private async forecastTemperatures(forecastUrl: string, localDate: string): Promise<number[]> {
    const data = await fetchJson<ForecastResponse>(forecastUrl, this.request());
    const temps: number[] = [];
    for (const period of data?.properties?.periods ?? []) {
      if (period.startTime.slice(0, 10) !== localDate) continue;
      if (period.temperature === null || !Number.isFinite(period.temperature)) continue;
      temps.push(period.temperatureUnit === "C" ? roundTo(celsiusToFahrenheit(period.temperature), 1) : period.temperature);
    }
    return temps;
  }
}
