import type { Coordinates, LocationQuery } from "@climate-delta/types";
import { NotFoundError } from "./errors.js";
import { isValidLatitude, isValidLongitude } from "./geo.js";
import { describeQuery, normalizeLocationQuery, queryKey } from "./locationQuery.js";
import type { Logger } from "./logger.js";
import type { TtlCache } from "./ttlCache.js";
import type { GeoLookup, GeoPlace } from "./types.js";

export type GeoResolverOptions = {
  /** Keyed by the normalized query; worth enabling only for remote backends. */
  cache?: TtlCache<Coordinates>;
  logger?: Logger;
};

function labelFor(place: GeoPlace): string {
  return `${place.city}, ${place.state}`;
}

/**
 * Candidate order for ambiguous city names: highest population, then the
 * backend's own rank, then canonical label, then postal code.
 */
export function compareCandidates(a: GeoPlace, b: GeoPlace): number {
  const popA = a.population ?? 0;
  const popB = b.population ?? 0;
  if (popA !== popB) return popB - popA;

  const rankA = a.rank ?? Number.MAX_SAFE_INTEGER;
  const rankB = b.rank ?? Number.MAX_SAFE_INTEGER;
  if (rankA !== rankB) return rankA - rankB;

  const labelA = labelFor(a);
  const labelB = labelFor(b);
  if (labelA !== labelB) return labelA < labelB ? -1 : 1;

  if (a.postalCode === b.postalCode) return 0;
  return a.postalCode < b.postalCode ? -1 : 1;
}

export function pickCandidate(candidates: GeoPlace[]): GeoPlace | null {
  if (!candidates.length) return null;
  return [...candidates].sort(compareCandidates)[0];
}

export function toCoordinates(place: GeoPlace): Coordinates {
  if (!isValidLatitude(place.latitude) || !isValidLongitude(place.longitude)) {
    throw new NotFoundError(`${labelFor(place)} has no usable coordinates`, { location: place.postalCode });
  }
  return {
    latitude: place.latitude,
    longitude: place.longitude,
    label: labelFor(place),
    placeId: `${place.country}-${place.postalCode}`
  };
}

export class GeoResolver {
  private readonly lookup: GeoLookup;
  private readonly cache?: TtlCache<Coordinates>;
  private readonly logger?: Logger;

  constructor(lookup: GeoLookup, options: GeoResolverOptions = {}) {
    this.lookup = lookup;
    this.cache = options.cache;
    this.logger = options.logger;
  }

  async resolve(query: LocationQuery): Promise<Coordinates> {
    const normalized = normalizeLocationQuery(query);
    if (!this.cache) return this.lookupCoordinates(normalized);
    return this.cache.getOrLoad(queryKey(normalized), () => this.lookupCoordinates(normalized));
  }

  private async lookupCoordinates(query: LocationQuery): Promise<Coordinates> {
    const location = describeQuery(query);

    if (query.kind === "postal") {
      const place = await this.lookup.byPostalCode(query.country, query.postalCode);
      if (!place) {
        throw new NotFoundError(`Postal code ${query.postalCode} was not found`, { location });
      }
      return toCoordinates(place);
    }

    const candidates = await this.lookup.byCity(query.country, query.city, query.state);
    const place = pickCandidate(candidates);
    if (!place) {
      throw new NotFoundError(`No place named "${location}" was found`, { location });
    }
    if (candidates.length > 1) {
      this.logger?.debug({ location, candidates: candidates.length, chosen: place.postalCode }, "Resolved ambiguous place name");
    }
    return toCoordinates(place);
  }
}
