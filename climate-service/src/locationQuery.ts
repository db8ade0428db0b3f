import type { LocationQuery } from "@climate-delta/types";
import { AmbiguousInputError } from "./errors.js";

// Digit counts accepted per country; only numeric postal systems are listed.
const POSTAL_CODE_LENGTHS: Record<string, readonly number[]> = {
  US: [5, 9],
  DE: [5],
  ES: [5],
  FR: [5],
  IT: [5],
  MX: [5],
  AU: [4],
  IN: [6]
};

const POSTAL_INPUT = /^[\d\s-]+$/;

function normalizeCountry(country: string): string {
  return country.trim().toUpperCase();
}

function normalizePostalCode(country: string, postalCode: string, raw: string): string {
  const lengths = POSTAL_CODE_LENGTHS[country];
  if (!lengths) {
    throw new AmbiguousInputError(`Postal codes for country ${country || "(none)"} are not supported`, { location: raw });
  }
  const digits = postalCode.replace(/\D/g, "");
  if (!lengths.includes(digits.length)) {
    throw new AmbiguousInputError(
      `Postal code "${raw}" must have ${lengths.join(" or ")} digits for ${country}`,
      { location: raw }
    );
  }
  // ZIP+4 resolves by its five-digit prefix
  return country === "US" && digits.length === 9 ? digits.slice(0, 5) : digits;
}

export function normalizeLocationQuery(query: LocationQuery): LocationQuery {
  const country = normalizeCountry(query.country);
  if (query.kind === "postal") {
    return {
      kind: "postal",
      country,
      postalCode: normalizePostalCode(country, query.postalCode, query.postalCode.trim())
    };
  }

  const city = query.city.trim().replace(/\s+/g, " ");
  if (!city) {
    throw new AmbiguousInputError("City name is required", { location: describeQuery(query) });
  }
  const state = query.state?.trim().toUpperCase();
  return state ? { kind: "place", country, city, state } : { kind: "place", country, city };
}

export function parseLocationQuery(raw: string, country = "US"): LocationQuery {
  const input = raw.trim();
  if (!input) {
    throw new AmbiguousInputError("A ZIP code or \"City, ST\" is required", { location: raw });
  }

  if (POSTAL_INPUT.test(input)) {
    return normalizeLocationQuery({ kind: "postal", country, postalCode: input });
  }

  const parts = input.split(",");
  if (parts.length > 2) {
    throw new AmbiguousInputError(`Expected "City, ST" but got "${input}"`, { location: raw });
  }
  const [city, state] = parts;
  return normalizeLocationQuery({ kind: "place", country, city, state });
}

/** Stable key for a normalized query; used by the geocoding cache. */
export function queryKey(query: LocationQuery): string {
  if (query.kind === "postal") {
    return `postal:${query.country}:${query.postalCode}`;
  }
  const city = query.city.toLowerCase().replace(/\s+/g, "_");
  return `place:${query.country}:${query.state ?? ""}:${city}`;
}

export function describeQuery(query: LocationQuery): string {
  if (query.kind === "postal") return query.postalCode.trim();
  const city = query.city.trim();
  return query.state?.trim() ? `${city}, ${query.state.trim()}` : city;
}
