import { buildExport, buildShareText, exportFileName, tripDateRange } from "@/lib/share";
import { parseTripRequest } from "@/lib/trip";
import type { DayHeading } from "@/lib/outline";
import { validTrip } from "./fakes";

const heading = (day: number, title: string): DayHeading => ({ day, title, anchor: `day-${day}` });

describe("buildShareText", () => {
  it("lists the trip and the first five day titles", () => {
    const trip = parseTripRequest({
      ...validTrip,
      origin: "Porto",
      travelers: 2,
      budgetLevel: "luxury",
      preferences: ["food", "culture"],
    });
    const outline = [
      heading(1, "Old Town"),
      heading(2, ""),
      heading(3, "Sintra"),
      heading(4, "Cascais"),
      heading(5, "Markets"),
      heading(6, "Departure"),
    ];

    expect(buildShareText(trip, outline)).toBe(
      [
        "Trip to Lisbon",
        "Dates: March 4, 2026 - March 6, 2026 (3 days)",
        "From: Porto",
        "Travelers: 2",
        "Budget: Luxury",
        "Interests: food, culture",
        "",
        "Daily highlights:",
        "Day 1: Old Town",
        "Day 2: Explore",
        "Day 3: Sintra",
        "Day 4: Cascais",
        "Day 5: Markets",
      ].join("\n")
    );
  });

  it("leaves out optional lines", () => {
    const trip = parseTripRequest({ ...validTrip, endDate: "2026-03-04" });

    expect(buildShareText(trip, [])).toBe(
      "Trip to Lisbon\nDates: March 4, 2026 - March 4, 2026 (1 day)\nTravelers: 1\nBudget: Mid-range"
    );
  });
});

describe("exportFileName", () => {
  const today = new Date("2026-10-18T09:00:00Z");

  it("slugs origin and destination", () => {
    const trip = parseTripRequest({ ...validTrip, origin: "New York" });
    expect(exportFileName(trip, today)).toBe("trip_new-york_lisbon_20261018.json");
  });

  it("uses a placeholder when there is no origin", () => {
    expect(exportFileName(parseTripRequest(validTrip), today)).toBe("trip_anywhere_lisbon_20261018.json");
  });
});

describe("buildExport", () => {
  it("stamps the export time", () => {
    const trip = parseTripRequest(validTrip);
    const exported = buildExport(trip, "## Day 1", "test-model", new Date("2026-10-18T09:00:00Z"));

    expect(exported).toEqual({
      trip,
      itinerary: "## Day 1",
      model: "test-model",
      exportedAt: "2026-10-18T09:00:00.000Z",
    });
    expect(tripDateRange(trip)).toBe("March 4, 2026 - March 6, 2026");
  });
});
