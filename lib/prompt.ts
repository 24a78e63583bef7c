// lib/prompt.ts
import { BUDGET_LEVEL_LABEL, formatLongDate, seasonOf, tripLengthDays, type TripRequest } from "./trip";

export const ITINERARY_SYSTEM_PROMPT =
  "You are a professional travel planner creating detailed, realistic itineraries with specific recommendations.";

export const GUIDE_SYSTEM_PROMPT =
  "You are an expert travel guide. Output strict machine-parseable JSON matching the requested shape. No commentary or Markdown.";

function budgetLine(trip: TripRequest): string {
  const level = BUDGET_LEVEL_LABEL[trip.budgetLevel];
  if (trip.budget === undefined) return `${level} (no fixed amount)`;
  return `${level}, about ${trip.budget} ${trip.currency} in total for the group`;
}

function preferencesLine(trip: TripRequest): string {
  return trip.preferences.length ? trip.preferences.join(", ") : "general sightseeing";
}

// Only fields of the request go in: no clock, no randomness, same input → same bytes
export function buildItineraryPrompt(trip: TripRequest): string {
  const days = tripLengthDays(trip);
  const origin = trip.origin ?? "not specified";
  const notes = trip.notes ? trip.notes.replace(/\s+/g, " ") : "none";

  return `
Create a detailed ${days}-day itinerary for ${trip.destination}.

TRIP DETAILS
- Destination: ${trip.destination}
- Starting from: ${origin}
- Dates: ${trip.startDate} to ${trip.endDate} (${formatLongDate(trip.startDate)} – ${formatLongDate(trip.endDate)})
- Length: ${days} day${days === 1 ? "" : "s"}
- Travelers: ${trip.travelers}
- Budget: ${budgetLine(trip)}
- Preferences: ${preferencesLine(trip)}
- Notes: ${notes}

FORMAT
- Markdown only. One section per day, headed "## Day N — <date> — <theme>".
- Under each day use "### Morning", "### Afternoon" and "### Evening" with bullet points.
- Each bullet: time, activity, a 1–2 sentence description, neighborhood, rough cost, and a practical tip.
- End each day with a one-line "Getting around" note.

RULES
- Day 1 should include arrival${trip.origin ? ` from ${trip.origin}` : ""}; the last day should account for departure logistics.
- Use real places, realistic timing, and costs that fit the budget.
- Avoid exact opening hours and exact prices; say "about" or give a range.
`.trim();
}

// ---------------- guide prompts ----------------
export function buildInsightsPrompt(destination: string): string {
  return `
Provide detailed travel insights for ${destination} as a JSON object:
{
  "description": "2-3 sentence overview of what makes this destination special",
  "bestTimeToVisit": "months and reasons",
  "averageDailyBudget": { "budget": 60, "midRange": 150, "luxury": 400 },
  "topAttractions": [{ "name": "string", "description": "why visit", "timeNeeded": "2-3 hours", "cost": 15 }],
  "localCuisine": [{ "dish": "string", "description": "brief", "where": "type of place" }],
  "culturalTips": ["string"],
  "safety": { "rating": 8, "notes": "specific safety tips" },
  "transportation": { "gettingAround": "string", "fromAirport": "string" },
  "languageTips": ["useful phrase"],
  "currency": "currency name and exchange tips",
  "neighborhoods": [{ "name": "string", "vibe": "string", "bestFor": "string" }]
}
Be thorough and practical. Costs are numbers in USD.
`.trim();
}

export function buildBudgetPrompt(trip: TripRequest): string {
  const days = tripLengthDays(trip);
  const nights = Math.max(0, days - 1);
  const target =
    trip.budget === undefined ? "" : `\nThe travelers plan to spend about ${trip.budget} ${trip.currency} in total.`;
  return `
Create a budget breakdown for ${trip.travelers} traveler(s) in ${trip.destination} for ${days} day(s) (${trip.budgetLevel} level).${target}
Return a JSON object; all amounts are numbers in ${trip.currency}:
{
  "accommodation": { "perNight": 0, "nights": ${nights}, "total": 0, "notes": "type of accommodation" },
  "food": { "breakfastAvg": 0, "lunchAvg": 0, "dinnerAvg": 0, "dailyTotal": 0, "total": 0 },
  "transportation": { "airportTransfer": 0, "dailyLocal": 0, "total": 0, "notes": "what's included" },
  "activities": { "dailyAvg": 0, "total": 0, "notes": "typical costs" },
  "shopping": { "total": 0, "notes": "souvenirs and extras" },
  "emergencyFund": 0,
  "totalPerPerson": 0,
  "totalAllTravelers": 0,
  "dailyAverage": 0,
  "savingsTips": ["string"]
}
`.trim();
}

export function buildPackingPrompt(trip: TripRequest): string {
  const days = tripLengthDays(trip);
  const activities = trip.preferences.length ? trip.preferences.join(", ") : "general sightseeing";
  return `
Create a packing list for ${trip.destination} in ${seasonOf(trip.startDate)}, ${days} day(s).
Activities: ${activities}
Return a JSON object whose values are arrays of strings:
{
  "documents": [], "clothing": [], "footwear": [], "toiletries": [], "electronics": [],
  "medications": [], "accessories": [], "activitySpecific": [], "optional": []
}
Be specific about quantities and reasons (e.g. "Light rain jacket - afternoon showers common").
`.trim();
}
