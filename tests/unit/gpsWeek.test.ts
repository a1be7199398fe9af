/**
 * Unit tests for GPS week conversion
 */

import { describe, it, expect } from "vitest";
import { fromGpsWeek, gpsWeekRange, toGpsWeek } from "@/time";
import { utc } from "../helpers/products";

describe("toGpsWeek", () => {
  it("should start week 0 at the GPS epoch", () => {
    expect(toGpsWeek(utc("1980-01-06T00:00"))).toBe(0);
    expect(toGpsWeek(utc("1980-01-05T23:59"))).toBe(-1);
  });

  it("should change week at Sunday midnight", () => {
    expect(toGpsWeek(utc("2025-04-05T23:59:59"))).toBe(2360);
    expect(toGpsWeek(utc("2025-04-06T00:00"))).toBe(2361);
  });

  it("should place a mid-year instant in its week", () => {
    expect(toGpsWeek(utc("2025-07-05T23:59:30"))).toBe(2373);
  });
});

describe("fromGpsWeek", () => {
  it("should return the Sunday starting the week", () => {
    expect(fromGpsWeek(2361).toISO()).toBe("2025-04-06T00:00:00.000Z");
  });
});

describe("gpsWeekRange", () => {
  it("should list every week touched by the window", () => {
    expect(
      gpsWeekRange({ start: utc("2025-04-05T00:00"), end: utc("2025-04-13T00:00") }),
    ).toEqual([2360, 2361, 2362]);
  });

  it("should return one week for a window inside a week", () => {
    expect(
      gpsWeekRange({ start: utc("2025-04-06T00:00"), end: utc("2025-04-06T00:00") }),
    ).toEqual([2361]);
  });
});
