import type { CalendarWindow, StationInfo } from "@climate-delta/types";
import { windowKey } from "./calendar.js";
import { parseCsvRecords } from "./csv.js";
import { NoStationError } from "./errors.js";
import { haversineKm, roundTo } from "./geo.js";
import { fetchJson, fetchText, type UpstreamRequest } from "./http.js";

const NORMALS_DATASET = "NORMAL_DLY";
const REQUIRED_COLUMN = "DLY-TMAX-NORMAL";
// Values at or below this are NCEI missing/suppressed flags (-7777, -8888, -9999)
const MISSING_SENTINEL = -7777;

type NceiStation = {
  id: string;
  name: string;
  latitude: number;
  longitude: number;
};

type NceiStationsResponse = {
  results?: NceiStation[];
};

export type DailyNormals = {
  highF: number | null;
  highStdDevF: number | null;
  lowF: number | null;
  lowStdDevF: number | null;
  averageF: number | null;
};

export type StationNormals = {
  station: StationInfo;
  normals: DailyNormals;
};

export type NoaaNormalsClientOptions = {
  apiUrl: string;
  normalsUrl: string;
  token: string;
  stationRadiusKm: number;
  timeoutMs?: number;
  /** Half-width in degrees of the station search box. */
  searchDegrees?: number;
};

/** Normals files store tenths of a degree Fahrenheit. */
function tenthsToDegrees(raw: string | undefined): number | null {
  if (raw === undefined) return null;
  const trimmed = raw.trim();
  if (!trimmed) return null;
  const value = Number(trimmed);
  if (!Number.isFinite(value) || value <= MISSING_SENTINEL) return null;
  return value / 10;
}

function csvFileName(stationId: string): string {
  const [, code] = stationId.split(":");
  return `${code ?? stationId}.csv`;
}

export function parseDailyNormals(csv: string, window: CalendarWindow): DailyNormals | null {
  const { header, records } = parseCsvRecords(csv);
  if (!header.includes(REQUIRED_COLUMN)) return null;

  const key = windowKey(window);
  const row = records.find((record) => {
    const date = (record.DATE ?? "").trim();
    return date === key || date.endsWith(`-${key}`);
  });
  if (!row) return null;

  return {
    highF: tenthsToDegrees(row["DLY-TMAX-NORMAL"]),
    highStdDevF: tenthsToDegrees(row["DLY-TMAX-STDDEV"]),
    lowF: tenthsToDegrees(row["DLY-TMIN-NORMAL"]),
    lowStdDevF: tenthsToDegrees(row["DLY-TMIN-STDDEV"]),
    averageF: tenthsToDegrees(row["DLY-TAVG-NORMAL"])
  };
}

/** NCEI Climate Data Online: stations carrying daily normals, and their per-station CSV files. */
export class NoaaNormalsClient {
  private readonly options: NoaaNormalsClientOptions;

  constructor(options: NoaaNormalsClientOptions) {
    this.options = options;
  }

  private request(withToken: boolean): UpstreamRequest {
    return {
      upstream: "NCEI",
      headers: withToken ? { token: this.options.token } : undefined,
      timeoutMs: this.options.timeoutMs
    };
  }

  async findStations(latitude: number, longitude: number): Promise<StationInfo[]> {
    const box = this.options.searchDegrees ?? 1;
    const params = new URLSearchParams({
      datasetid: NORMALS_DATASET,
      extent: [latitude - box, longitude - box, latitude + box, longitude + box].map((value) => value.toFixed(4)).join(","),
      limit: "100"
    });
    const data = await fetchJson<NceiStationsResponse>(
      `${this.options.apiUrl.replace(/\/+$/, "")}/stations?${params}`,
      this.request(true)
    );

    return (data?.results ?? [])
      .filter((station) => Number.isFinite(station.latitude) && Number.isFinite(station.longitude))
      .map((station) => ({
        id: station.id,
        name: station.name,
        latitude: station.latitude,
        longitude: station.longitude,
        distanceKm: roundTo(haversineKm(latitude, longitude, station.latitude, station.longitude), 1)
      }))
      .filter((station) => station.distanceKm <= this.options.stationRadiusKm)
      .sort((a, b) => a.distanceKm - b.distanceKm || a.id.localeCompare(b.id));
  }

  async getDailyNormals(stationId: string, window: CalendarWindow): Promise<DailyNormals | null> {
    const csv = await fetchText(
      `${this.options.normalsUrl.replace(/\/+$/, "")}/${csvFileName(stationId)}`,
      this.request(false)
    );
    return csv === null ? null : parseDailyNormals(csv, window);
  }

  /** Nearest station within the radius whose normals file covers the window. */
  async findNormals(latitude: number, longitude: number, window: CalendarWindow): Promise<StationNormals> {
    const stations = await this.findStations(latitude, longitude);
    for (const station of stations) {
      const normals = await this.getDailyNormals(station.id, window);
      if (normals) return { station, normals };
    }
    throw new NoStationError(
      `No climate normals station within ${this.options.stationRadiusKm} km of ${latitude.toFixed(4)},${longitude.toFixed(4)}`
    );
  }
}
