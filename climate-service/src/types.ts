import type {
  CalendarWindow,
  Coordinates,
  CurrentObservationSet,
  HistoricalObservationSet
} from "@climate-delta/types";

export type GeoPlace = {
  country: string;
  postalCode: string;
  city: string;
  state: string;
  latitude: number;
  longitude: number;
  population?: number;
  /** Position in the backend's own result order; lower ranks first. */
  rank?: number;
};

/** Lookup backend behind GeoResolver. Implementations may be offline tables or remote APIs. */
export interface GeoLookup {
  byPostalCode(country: string, postalCode: string): Promise<GeoPlace | null>;
  byCity(country: string, city: string, state?: string): Promise<GeoPlace[]>;
}

export interface ClimateDataSource {
  fetchCurrent(coords: Coordinates): Promise<CurrentObservationSet>;
  fetchHistorical(coords: Coordinates, window: CalendarWindow): Promise<HistoricalObservationSet>;
}
