export { loadConfig, KNOWN_METRICS, type ServiceConfig } from "./config.js";
export { createLogger, type Logger } from "./logger.js";
export * from "./errors.js";
export { parseLocationQuery, normalizeLocationQuery } from "./locationQuery.js";
export { GeoResolver, compareCandidates } from "./geoResolver.js";
export { OfflineGeoTable, type GeoRecord } from "./geoTable.js";
export { ZippopotamGeoLookup } from "./zippopotamLookup.js";
export { NoaaClimateDataSource } from "./climateDataSource.js";
export { WeatherGovClient } from "./weatherGovClient.js";
export { NoaaNormalsClient } from "./noaaNormalsClient.js";
export { computeDelta, describeDelta } from "./deltaEngine.js";
export { QueryOrchestrator } from "./orchestrator.js";
export { TtlCache } from "./ttlCache.js";
export { createPipeline, upstreamTimeoutMs, type Pipeline } from "./pipeline.js";
export { summarizeDelta } from "./summary.js";
export type { ClimateDataSource, GeoLookup, GeoPlace } from "./types.js";
