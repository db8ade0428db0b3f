import type { Coordinates, CurrentObservationSet, HistoricalObservationSet } from "@climate-delta/types";
import { NoaaClimateDataSource } from "./climateDataSource.js";
import type { ServiceConfig } from "./config.js";
import { GeoResolver } from "./geoResolver.js";
import { OfflineGeoTable } from "./geoTable.js";
import type { Logger } from "./logger.js";
import { NoaaNormalsClient } from "./noaaNormalsClient.js";
import { QueryOrchestrator } from "./orchestrator.js";
import { TtlCache } from "./ttlCache.js";
import type { GeoLookup } from "./types.js";
import { WeatherGovClient } from "./weatherGovClient.js";
import { ZippopotamGeoLookup } from "./zippopotamLookup.js";

const MINUTE_MS = 60_000;
const HOUR_MS = 60 * MINUTE_MS;

export type Pipeline = {
  orchestrator: QueryOrchestrator;
  resolver: GeoResolver;
  dataSource: NoaaClimateDataSource;
};

/** Per-call share of the request budget, so a timed-out attempt leaves room to retry. */
export function upstreamTimeoutMs(config: Pick<ServiceConfig, "REQUEST_TIMEOUT_MS" | "RETRY_ATTEMPTS">): number {
  return Math.max(1, Math.floor(config.REQUEST_TIMEOUT_MS / config.RETRY_ATTEMPTS));
}

async function createGeoLookup(config: ServiceConfig, logger: Logger): Promise<GeoLookup> {
  if (config.GEO_BACKEND === "remote") {
    return new ZippopotamGeoLookup(config.ZIPPOPOTAM_API_URL);
  }
  const table = await OfflineGeoTable.load(config.GEO_TABLE_PATH);
  logger.info({ path: config.GEO_TABLE_PATH, entries: table.size }, "Loaded offline geocoding table");
  return table;
}

/** Builds the long-lived parts once at startup; each `orchestrator.handle` call is one request. */
export async function createPipeline(config: ServiceConfig, logger: Logger): Promise<Pipeline> {
  const lookup = await createGeoLookup(config, logger);
  const resolver = new GeoResolver(lookup, {
    logger,
    cache: config.GEO_BACKEND === "remote"
      ? new TtlCache<Coordinates>({ ttlMs: config.GEO_CACHE_TTL_HOURS * HOUR_MS })
      : undefined
  });

  const timeoutMs = upstreamTimeoutMs(config);
  const dataSource = new NoaaClimateDataSource({
    currentClient: new WeatherGovClient({
      baseUrl: config.WEATHER_GOV_API_URL,
      userAgent: config.USER_AGENT,
      stationRadiusKm: config.STATION_RADIUS_KM,
      timeoutMs
    }),
    normalsClient: new NoaaNormalsClient({
      apiUrl: config.NCEI_API_URL,
      normalsUrl: config.NCEI_NORMALS_URL,
      token: config.NOAA_TOKEN,
      stationRadiusKm: config.STATION_RADIUS_KM,
      timeoutMs
    }),
    metrics: config.METRICS,
    baseline: config.NORMALS_BASELINE,
    currentCache: new TtlCache<CurrentObservationSet>({ ttlMs: config.CURRENT_CACHE_TTL_MINUTES * MINUTE_MS }),
    historicalCache: new TtlCache<HistoricalObservationSet>({ ttlMs: config.HISTORICAL_CACHE_TTL_HOURS * HOUR_MS }),
    logger
  });

  const orchestrator = new QueryOrchestrator({
    resolver,
    dataSource,
    logger,
    retryAttempts: config.RETRY_ATTEMPTS,
    retryBaseDelayMs: config.RETRY_BASE_DELAY_MS,
    requestTimeoutMs: config.REQUEST_TIMEOUT_MS,
    country: config.POSTAL_COUNTRY
  });

  return { orchestrator, resolver, dataSource };
}
