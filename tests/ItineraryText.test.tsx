/** @jest-environment jsdom */
import React from "react";
import { fireEvent, render, screen, within } from "@testing-library/react";
import "@testing-library/jest-dom";
import ItineraryText from "@/components/ItineraryText";
import { tripDays } from "@/lib/trip";

const ITINERARY = "Intro line\n## Day 1: Old Town\n- walk\n**Day 2:** Beach day\n- swim";

describe("ItineraryText", () => {
  it("links each day heading to its place in the text", () => {
    const { container } = render(<ItineraryText text={ITINERARY} />);

    const nav = screen.getByRole("navigation", { name: "Day navigator" });
    expect(within(nav).getByRole("link", { name: "Day 1" })).toHaveAttribute("href", "#day-1");
    expect(within(nav).getByRole("link", { name: "Day 2" })).toHaveAttribute("href", "#day-2");
    expect(container.querySelector("#day-2")?.textContent).toBe("**Day 2:** Beach day\n- swim");
  });

  it("dates the navigator links from the trip calendar", () => {
    const days = tripDays({ startDate: "2026-03-04", endDate: "2026-03-05" });
    render(<ItineraryText text={ITINERARY} days={days} />);

    const nav = screen.getByRole("navigation", { name: "Day navigator" });
    expect(within(nav).getByRole("link", { name: "Day 1 · Wed March 4" })).toHaveAttribute("href", "#day-1");
    expect(within(nav).getByRole("link", { name: "Day 2 · Thu March 5" })).toHaveAttribute("href", "#day-2");
  });

  it("shows the text unchanged, one block per day", () => {
    const { container } = render(<ItineraryText text={ITINERARY} />);
    const blocks = Array.from(container.querySelectorAll("article > div"), (d) => d.textContent);
    expect(blocks).toEqual(["Intro line", "## Day 1: Old Town\n- walk", "**Day 2:** Beach day\n- swim"]);
    expect(blocks.join("\n")).toBe(ITINERARY);
  });

  it("has no navigator for free-form text", () => {
    render(<ItineraryText text="Wander the old quarter." />);
    expect(screen.queryByRole("navigation")).not.toBeInTheDocument();
    expect(screen.getByText("Wander the old quarter.")).toBeInTheDocument();
  });

  it("copies the text to the clipboard", async () => {
    const writeText = jest.fn().mockResolvedValue(undefined);
    Object.defineProperty(navigator, "clipboard", { value: { writeText }, configurable: true });
    render(<ItineraryText text={ITINERARY} />);

    fireEvent.click(screen.getByRole("button", { name: "Copy text" }));

    expect(await screen.findByRole("button", { name: "Copied!" })).toBeInTheDocument();
    expect(writeText).toHaveBeenCalledWith(ITINERARY);
  });
});
