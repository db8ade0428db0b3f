import { promises as fs } from "node:fs";
import { z } from "zod";
import type { GeoLookup, GeoPlace } from "./types.js";

const geoRecordSchema = z.object({
  country: z.string().length(2).transform((value) => value.toUpperCase()),
  postalCode: z.string().min(1),
  city: z.string().min(1),
  state: z.string().min(1).transform((value) => value.toUpperCase()),
  latitude: z.number().min(-90).max(90),
  longitude: z.number().min(-180).max(180),
  population: z.number().int().nonnegative().optional()
});

const geoTableSchema = z.array(geoRecordSchema);

export type GeoRecord = z.input<typeof geoRecordSchema>;

function cityKey(country: string, city: string): string {
  return `${country}|${city.trim().toLowerCase().replace(/\s+/g, " ")}`;
}

/**
 * In-memory postal code table. Built once at startup and read-only afterwards,
 * so it can be shared by concurrent requests.
 */
export class OfflineGeoTable implements GeoLookup {
  private readonly byPostal = new Map<string, GeoPlace>();
  private readonly byCityName = new Map<string, GeoPlace[]>();

  private constructor(places: GeoPlace[]) {
    places.forEach((place, idx) => {
      const ranked = { ...place, rank: idx };
      this.byPostal.set(`${place.country}|${place.postalCode}`, ranked);
      const key = cityKey(place.country, place.city);
      const bucket = this.byCityName.get(key);
      if (bucket) bucket.push(ranked);
      else this.byCityName.set(key, [ranked]);
    });
  }

  static fromRecords(records: GeoRecord[]): OfflineGeoTable {
    return new OfflineGeoTable(geoTableSchema.parse(records));
  }

  static async load(filePath: string): Promise<OfflineGeoTable> {
    const raw = await fs.readFile(filePath, "utf8");
    const parsed = geoTableSchema.safeParse(JSON.parse(raw));
    if (!parsed.success) {
      throw new Error(`Invalid geocoding table ${filePath}: ${parsed.error.message}`);
    }
    return new OfflineGeoTable(parsed.data);
  }

  get size(): number {
    return this.byPostal.size;
  }

  async byPostalCode(country: string, postalCode: string): Promise<GeoPlace | null> {
    return this.byPostal.get(`${country}|${postalCode}`) ?? null;
  }

  async byCity(country: string, city: string, state?: string): Promise<GeoPlace[]> {
    const candidates = this.byCityName.get(cityKey(country, city)) ?? [];
    return state ? candidates.filter((place) => place.state === state) : [...candidates];
  }
}
