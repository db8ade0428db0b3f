import { AmbiguousInputError } from "./errors.js";
import { fetchJson } from "./http.js";
import type { GeoLookup, GeoPlace } from "./types.js";

type ZippopotamPostalResponse = {
  "post code": string;
  "country abbreviation": string;
  places?: Array<{
    "place name": string;
    "state abbreviation": string;
    latitude: string;
    longitude: string;
  }>;
};

type ZippopotamCityResponse = {
  "country abbreviation": string;
  "state abbreviation": string;
  places?: Array<{
    "place name": string;
    "post code": string;
    latitude: string;
    longitude: string;
  }>;
};

function toPlace(place: Omit<GeoPlace, "latitude" | "longitude"> & { latitude: string; longitude: string }): GeoPlace | null {
  const latitude = Number.parseFloat(place.latitude);
  const longitude = Number.parseFloat(place.longitude);
  if (Number.isNaN(latitude) || Number.isNaN(longitude)) return null;
  return { ...place, latitude, longitude };
}

/** Remote GeoLookup backed by zippopotam.us. */
export class ZippopotamGeoLookup implements GeoLookup {
  constructor(private readonly baseUrl: string) {}

  private url(...segments: string[]): string {
    const path = segments.map((segment) => encodeURIComponent(segment.toLowerCase())).join("/");
    return `${this.baseUrl.replace(/\/+$/, "")}/${path}`;
  }

  async byPostalCode(country: string, postalCode: string): Promise<GeoPlace | null> {
    const data = await fetchJson<ZippopotamPostalResponse>(this.url(country, postalCode), { upstream: "Zippopotam" });
    const first = data?.places?.[0];
    if (!data || !first) return null;
    return toPlace({
      country,
      postalCode: data["post code"],
      city: first["place name"],
      state: first["state abbreviation"].toUpperCase(),
      latitude: first.latitude,
      longitude: first.longitude
    });
  }

  async byCity(country: string, city: string, state?: string): Promise<GeoPlace[]> {
    if (!state) {
      throw new AmbiguousInputError(`A state is required to look up "${city}"`, { location: city });
    }
    const data = await fetchJson<ZippopotamCityResponse>(this.url(country, state, city), { upstream: "Zippopotam" });
    const places = data?.places ?? [];
    return places
      .map((place, rank) => toPlace({
        country,
        postalCode: place["post code"],
        city: place["place name"],
        state,
        rank,
        latitude: place.latitude,
        longitude: place.longitude
      }))
      .filter((place): place is GeoPlace => place !== null);
  }
}
