import { fileURLToPath } from "node:url";
import { z } from "zod";
import type { MetricName } from "@climate-delta/types";

export const KNOWN_METRICS = [
  "temperature",
  "temperatureHigh",
  "temperatureLow",
  "windSpeed",
  "relativeHumidity"
] as const satisfies readonly MetricName[];

const DEFAULT_GEO_TABLE_PATH = fileURLToPath(new URL("../data/postal-codes.json", import.meta.url));

const metricList = z
  .string()
  .transform((value) => value.split(",").map((token) => token.trim()).filter(Boolean))
  .pipe(z.array(z.enum(KNOWN_METRICS)).min(1));

const envSchema = z.object({
  NOAA_TOKEN: z.string().min(1),
  USER_AGENT: z.string().min(1).default("climate-delta/0.1 (ops@example.com)"),
  WEATHER_GOV_API_URL: z.string().url().default("https://api.weather.gov"),
  NCEI_API_URL: z.string().url().default("https://www.ncei.noaa.gov/cdo-web/api/v2"),
  NCEI_NORMALS_URL: z.string().url().default("https://www.ncei.noaa.gov/data/normals-daily/1981-2010/access"),
  ZIPPOPOTAM_API_URL: z.string().url().default("https://api.zippopotam.us"),
  GEO_BACKEND: z.enum(["offline", "remote"]).default("offline"),
  GEO_TABLE_PATH: z.string().min(1).default(DEFAULT_GEO_TABLE_PATH),
  GEO_CACHE_TTL_HOURS: z.coerce.number().positive().default(24),
  POSTAL_COUNTRY: z.string().length(2).transform((value) => value.toUpperCase()).default("US"),
  STATION_RADIUS_KM: z.coerce.number().positive().default(50),
  METRICS: metricList.default("temperature,temperatureHigh,temperatureLow"),
  NORMALS_BASELINE: z.string().min(1).default("1981-2010"),
  CURRENT_CACHE_TTL_MINUTES: z.coerce.number().nonnegative().default(10),
  HISTORICAL_CACHE_TTL_HOURS: z.coerce.number().nonnegative().default(72),
  RETRY_ATTEMPTS: z.coerce.number().int().min(1).default(3),
  RETRY_BASE_DELAY_MS: z.coerce.number().nonnegative().default(500),
  REQUEST_TIMEOUT_MS: z.coerce.number().positive().default(20_000),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info")
});

export type ServiceConfig = z.infer<typeof envSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
  return envSchema.parse({
    ...env,
    NOAA_TOKEN: env.NOAA_TOKEN ?? env.NCEI_TOKEN
  });
}
