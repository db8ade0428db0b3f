import { fileURLToPath } from "node:url";
import { describe, expect, it, vi } from "vitest";
import type { Coordinates } from "@climate-delta/types";
import { NotFoundError } from "../src/errors.js";
import { GeoResolver, compareCandidates, pickCandidate } from "../src/geoResolver.js";
import { OfflineGeoTable } from "../src/geoTable.js";
import { TtlCache } from "../src/ttlCache.js";
import type { GeoLookup, GeoPlace } from "../src/types.js";

const TABLE_PATH = fileURLToPath(new URL("../data/postal-codes.json", import.meta.url));

function place(overrides: Partial<GeoPlace>): GeoPlace {
  return {
    country: "US",
    postalCode: "00000",
    city: "Springfield",
    state: "IL",
    latitude: 39.8,
    longitude: -89.6495,
    ...overrides
  };
}

function fakeLookup(places: GeoPlace[]) {
  const lookup = {
    byPostalCode: vi.fn(async (_country: string, postalCode: string) => places.find((p) => p.postalCode === postalCode) ?? null),
    byCity: vi.fn(async (_country: string, city: string) => places.filter((p) => p.city === city))
  } satisfies GeoLookup;
  return lookup;
}

describe("GeoResolver", () => {
  it("resolves a ZIP code from the offline table", async () => {
    const resolver = new GeoResolver(await OfflineGeoTable.load(TABLE_PATH));

    const coords = await resolver.resolve({ kind: "postal", country: "US", postalCode: "30306" });

    expect(coords.latitude).toBeCloseTo(33.78, 1);
    expect(coords.longitude).toBeCloseTo(-84.32, 1);
    expect(coords.label).toBe("Atlanta, GA");
    expect(coords.placeId).toBe("US-30306");
  });

  it("fails without touching the network for unknown postal codes", async () => {
    const fetchMock = vi.fn();
    vi.stubGlobal("fetch", fetchMock);
    const resolver = new GeoResolver(await OfflineGeoTable.load(TABLE_PATH));

    const pending = resolver.resolve({ kind: "postal", country: "US", postalCode: "99999" });

    await expect(pending).rejects.toThrow(NotFoundError);
    await expect(pending).rejects.toMatchObject({
      code: "not_found",
      message: "Postal code 99999 was not found",
      location: "99999"
    });
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("picks the most populous place for an ambiguous city name", async () => {
    const resolver = new GeoResolver(await OfflineGeoTable.load(TABLE_PATH));

    const coords = await resolver.resolve({ kind: "place", country: "US", city: "Springfield" });
    expect(coords.placeId).toBe("US-97477");

    const qualified = await resolver.resolve({ kind: "place", country: "US", city: "springfield", state: "ma" });
    expect(qualified.label).toBe("Springfield, MA");
  });

  it("returns the same answer every time", async () => {
    const resolver = new GeoResolver(await OfflineGeoTable.load(TABLE_PATH));
    const query = { kind: "place", country: "US", city: "Decatur" } as const;

    const answers: Coordinates[] = [];
    for (let idx = 0; idx < 5; idx++) {
      answers.push(await resolver.resolve(query));
    }

    expect(new Set(answers.map((answer) => answer.placeId))).toEqual(new Set(["US-30030"]));
  });

  it("reports unknown city names", async () => {
    const resolver = new GeoResolver(fakeLookup([]));

    await expect(resolver.resolve({ kind: "place", country: "US", city: "Atlantis", state: "GA" }))
      .rejects.toThrow("No place named \"Atlantis, GA\" was found");
  });

  it("rejects places without usable coordinates", async () => {
    const resolver = new GeoResolver(fakeLookup([place({ postalCode: "62701", latitude: Number.NaN })]));

    await expect(resolver.resolve({ kind: "postal", country: "US", postalCode: "62701" }))
      .rejects.toThrow("Springfield, IL has no usable coordinates");
  });

  it("caches resolutions by normalized query", async () => {
    const lookup = fakeLookup([place({ postalCode: "62701" })]);
    const resolver = new GeoResolver(lookup, { cache: new TtlCache<Coordinates>({ ttlMs: 60_000 }) });

    await resolver.resolve({ kind: "postal", country: "US", postalCode: "62701" });
    await resolver.resolve({ kind: "postal", country: "us", postalCode: "62701-0001" });

    expect(lookup.byPostalCode).toHaveBeenCalledTimes(1);
  });
});

describe("compareCandidates", () => {
  it("breaks population ties by rank, then label, then postal code", () => {
    const candidates = [
      place({ postalCode: "65807", state: "MO", population: 100 }),
      place({ postalCode: "62702", state: "IL", population: 100 }),
      place({ postalCode: "62701", state: "IL", population: 100 }),
      place({ postalCode: "01103", state: "MA", population: 100, rank: 5 }),
      place({ postalCode: "97477", state: "OR", population: 200 })
    ];

    expect([...candidates].sort(compareCandidates).map((p) => p.postalCode))
      .toEqual(["97477", "01103", "62701", "62702", "65807"]);
  });

  it("is independent of input order", () => {
    const a = place({ postalCode: "62701", state: "IL" });
    const b = place({ postalCode: "65806", state: "MO" });

    expect(pickCandidate([a, b])).toBe(a);
    expect(pickCandidate([b, a])).toBe(a);
    expect(pickCandidate([])).toBeNull();
  });
});
