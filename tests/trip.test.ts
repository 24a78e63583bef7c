import { InvalidInputError } from "@/lib/errors";
import {
  BUDGET_LEVEL_LABEL,
  BUDGET_LEVELS,
  formatLongDate,
  parseIsoDate,
  parseTripRequest,
  seasonOf,
  tripDays,
  tripLengthDays,
} from "@/lib/trip";

function invalid(raw: unknown): InvalidInputError {
  try {
    parseTripRequest(raw);
  } catch (e) {
    if (e instanceof InvalidInputError) return e;
    throw e;
  }
  throw new Error("expected InvalidInputError");
}

describe("parseTripRequest", () => {
  it("trims and fills defaults", () => {
    const trip = parseTripRequest({ destination: "  Lisbon ", startDate: "2026-03-04", endDate: "2026-03-06" });
    expect(trip).toEqual({
      destination: "Lisbon",
      startDate: "2026-03-04",
      endDate: "2026-03-06",
      currency: "USD",
      budgetLevel: "mid-range",
      travelers: 1,
      preferences: [],
    });
  });

  it("accepts a same-day trip", () => {
    const trip = parseTripRequest({ destination: "Porto", startDate: "2026-05-01", endDate: "2026-05-01" });
    expect(tripLengthDays(trip)).toBe(1);
  });

  it("rejects an empty destination", () => {
    const err = invalid({ destination: "", startDate: "2026-03-04", endDate: "2026-03-06" });
    expect(err.message).toBe("Destination is required");
    expect(err.issues).toEqual(["destination: Destination is required"]);
  });

  it("rejects a missing destination", () => {
    const err = invalid({ startDate: "2026-03-04", endDate: "2026-03-06" });
    expect(err.issues).toEqual(["destination: Destination is required"]);
  });

  it("rejects a start date after the end date", () => {
    const err = invalid({ destination: "Lisbon", startDate: "2026-03-07", endDate: "2026-03-06" });
    expect(err.issues).toEqual(["endDate: End date must be on or after the start date"]);
  });

  it("rejects dates that do not exist", () => {
    const err = invalid({ destination: "Lisbon", startDate: "2026-02-30", endDate: "2026-03-06" });
    expect(err.issues).toEqual(["startDate: Start date must be a calendar date (YYYY-MM-DD)"]);
  });

  it("rejects a negative budget", () => {
    const err = invalid({ destination: "Lisbon", startDate: "2026-03-04", endDate: "2026-03-06", budget: -5 });
    expect(err.issues).toEqual(["budget: Budget must be zero or more"]);
  });

  it("accepts a zero budget", () => {
    const trip = parseTripRequest({ destination: "Lisbon", startDate: "2026-03-04", endDate: "2026-03-06", budget: 0 });
    expect(trip.budget).toBe(0);
  });

  it("caps the trip length at 30 days", () => {
    const err = invalid({ destination: "Lisbon", startDate: "2026-01-01", endDate: "2026-01-31" });
    expect(err.issues).toEqual(["endDate: Trip length must be 30 days or less"]);
    expect(() =>
      parseTripRequest({ destination: "Lisbon", startDate: "2026-01-01", endDate: "2026-01-30" })
    ).not.toThrow();
  });

  it("de-duplicates preferences and upper-cases the currency", () => {
    const trip = parseTripRequest({
      destination: "Lisbon",
      startDate: "2026-03-04",
      endDate: "2026-03-06",
      preferences: ["food", "culture", "food"],
      currency: "eur",
    });
    expect(trip.preferences).toEqual(["food", "culture"]);
    expect(trip.currency).toBe("EUR");
  });

  it("rejects non-objects", () => {
    expect(invalid(null).message).toBe("Trip request must be an object");
    expect(invalid(["Lisbon"]).message).toBe("Trip request must be an object");
  });
});

describe("dates", () => {
  it("parses only strict calendar dates", () => {
    expect(parseIsoDate("2026-03-04")).toBe(Date.UTC(2026, 2, 4));
    expect(parseIsoDate("2026-3-4")).toBeNull();
    expect(parseIsoDate("2025-02-29")).toBeNull();
    expect(parseIsoDate("2024-02-29")).toBe(Date.UTC(2024, 1, 29));
  });

  it("lists each day of the trip with its weekday", () => {
    expect(tripDays({ startDate: "2026-03-04", endDate: "2026-03-06" })).toEqual([
      { day: 1, date: "2026-03-04", weekday: "Wednesday" },
      { day: 2, date: "2026-03-05", weekday: "Thursday" },
      { day: 3, date: "2026-03-06", weekday: "Friday" },
    ]);
  });

  it("labels every budget level", () => {
    expect(BUDGET_LEVELS.map((l) => BUDGET_LEVEL_LABEL[l])).toEqual(["Budget", "Mid-range", "Luxury"]);
  });

  it("derives the season from the start month", () => {
    expect(seasonOf("2026-12-05")).toBe("winter");
    expect(seasonOf("2026-02-10")).toBe("winter");
    expect(seasonOf("2026-03-01")).toBe("spring");
    expect(seasonOf("2026-08-31")).toBe("summer");
    expect(seasonOf("2026-11-01")).toBe("fall");
  });

  it("formats long dates", () => {
    expect(formatLongDate("2026-03-04")).toBe("March 4, 2026");
  });
});
