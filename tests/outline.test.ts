import { outlineDays, splitAtDays } from "@/lib/outline";

const ITINERARY = [
  "Intro line",
  "## Day 1 — 2026-03-04 — Old Town",
  "- walk",
  "**Day 2:** Beach day",
  "- swim",
  "Day 2 again",
  "### Day 3",
  "end",
].join("\n");

describe("outlineDays", () => {
  it("finds day headings in Markdown and bold forms", () => {
    expect(outlineDays(ITINERARY)).toEqual([
      { day: 1, title: "2026-03-04 — Old Town", anchor: "day-1" },
      { day: 2, title: "Beach day", anchor: "day-2" },
      { day: 3, title: "", anchor: "day-3" },
    ]);
  });

  it("ignores words that only contain 'day'", () => {
    expect(outlineDays("Holiday 2 plans\nDaytrip 3\nToday 4")).toEqual([]);
  });

  it("handles CRLF text and two-digit days", () => {
    expect(outlineDays("Day 10: Coast\r\nDay 1: Start\r\n")).toEqual([
      { day: 10, title: "Coast", anchor: "day-10" },
      { day: 1, title: "Start", anchor: "day-1" },
    ]);
  });

  it("returns nothing for free-form text", () => {
    expect(outlineDays("Just enjoy the city.")).toEqual([]);
    expect(outlineDays("")).toEqual([]);
  });
});

describe("splitAtDays", () => {
  it("splits before each outlined day and keeps the text intact", () => {
    const blocks = splitAtDays(ITINERARY);

    expect(blocks).toEqual([
      { text: "Intro line" },
      { text: "## Day 1 — 2026-03-04 — Old Town\n- walk", anchor: "day-1" },
      { text: "**Day 2:** Beach day\n- swim\nDay 2 again", anchor: "day-2" },
      { text: "### Day 3\nend", anchor: "day-3" },
    ]);
    expect(blocks.map((b) => b.text).join("\n")).toBe(ITINERARY);
  });

  it("anchors the first block when the text opens with a day", () => {
    expect(splitAtDays("Day 1: Arrive\nCheck in")).toEqual([
      { text: "Day 1: Arrive\nCheck in", anchor: "day-1" },
    ]);
  });

  it("keeps text without headings as one block", () => {
    expect(splitAtDays("line one\nline two")).toEqual([{ text: "line one\nline two" }]);
  });
});
