import { describe, expect, it } from "vitest";
import { AmbiguousInputError } from "../src/errors.js";
import { ZippopotamGeoLookup } from "../src/zippopotamLookup.js";
import { jsonResponse, stubFetch } from "./fixtures/http.js";

const BASE = "https://zip.test";

describe("ZippopotamGeoLookup", () => {
  it("looks up a postal code", async () => {
    const fetchMock = stubFetch((url) => (url === `${BASE}/us/30306`
      ? jsonResponse({
        "post code": "30306",
        "country abbreviation": "US",
        places: [{ "place name": "Atlanta", "state abbreviation": "GA", latitude: "33.7866", longitude: "-84.3499" }]
      })
      : undefined));

    const place = await new ZippopotamGeoLookup(`${BASE}/`).byPostalCode("US", "30306");

    expect(place).toEqual({
      country: "US",
      postalCode: "30306",
      city: "Atlanta",
      state: "GA",
      latitude: 33.7866,
      longitude: -84.3499
    });
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("returns null for unknown postal codes", async () => {
    stubFetch(() => undefined);

    await expect(new ZippopotamGeoLookup(BASE).byPostalCode("US", "99999")).resolves.toBeNull();
  });

  it("ranks city results in response order", async () => {
    stubFetch((url) => (url === `${BASE}/us/mo/springfield`
      ? jsonResponse({
        "country abbreviation": "US",
        "state abbreviation": "MO",
        places: [
          { "place name": "Springfield", "post code": "65806", latitude: "37.2033", longitude: "-93.2977" },
          { "place name": "Springfield", "post code": "65807", latitude: "37.1661", longitude: "-93.3087" },
          { "place name": "Springfield", "post code": "65899", latitude: "n/a", longitude: "n/a" }
        ]
      })
      : undefined));

    const places = await new ZippopotamGeoLookup(BASE).byCity("US", "Springfield", "MO");

    expect(places.map((place) => [place.postalCode, place.rank])).toEqual([["65806", 0], ["65807", 1]]);
    expect(places[0]?.state).toBe("MO");
  });

  it("needs a state to search by city", async () => {
    await expect(new ZippopotamGeoLookup(BASE).byCity("US", "Springfield")).rejects.toThrow(AmbiguousInputError);
  });
});
