import llmOutputSchema, { RawActivity, RawDayPlan } from "./llmOutput";

export interface Activity {
  activity?: string;
  cost?: string;
  duration?: string;
}

export interface DayPlan {
  theme?: string;
  morning?: Activity;
  afternoon?: Activity;
  evening?: Activity;
}

/**
 * A normalized itinerary, stored exactly as it is returned to the client.
 * Field names follow the JSON shape the model is prompted with so that a
 * stored itinerary can be fed back through {@link normalizeItinerary}.
 */
export interface Itinerary {
  itinerary_title?: string;
  total_budget?: string;
  budget_breakdown: Record<string, string>;
  travel_tips: string[];
  daily_itinerary: Record<string, DayPlan>;
}

export interface HistoryEntry {
  date: string;
  destination: string;
  itinerary: Itinerary;
}

export const TIME_SLOTS = ["morning", "afternoon", "evening"] as const;
export type TimeSlot = (typeof TIME_SLOTS)[number];

function toActivity(raw: RawActivity): Activity {
  const activity: Activity = {};
  if (raw.activity !== undefined) activity.activity = raw.activity;
  if (raw.cost !== undefined) activity.cost = raw.cost;
  if (raw.duration !== undefined) activity.duration = raw.duration;
  return activity;
}

function toDayPlan(raw: RawDayPlan): DayPlan {
  const day: DayPlan = {};
  if (raw.theme !== undefined) day.theme = raw.theme;
  for (const slot of TIME_SLOTS) {
    const activity = raw[slot];
    // absent slots stay absent, display defaults are not stored
    if (activity !== undefined) {
      day[slot] = toActivity(activity);
    }
  }
  return day;
}

/**
 * Maps any parsed JSON value onto an {@link Itinerary}.
 * Returns null when the value is not a JSON object.
 */
export function normalizeItinerary(value: unknown): Itinerary | null {
  const parsed = llmOutputSchema.safeParse(value);
  if (!parsed.success) {
    return null;
  }
  const raw = parsed.data;

  const dailyItinerary: Record<string, DayPlan> = {};
  for (const [label, day] of Object.entries(raw.daily_itinerary)) {
    dailyItinerary[label] = toDayPlan(day);
  }

  const itinerary: Itinerary = {
    budget_breakdown: raw.budget_breakdown,
    travel_tips: raw.travel_tips,
    daily_itinerary: dailyItinerary,
  };
  if (raw.itinerary_title !== undefined) {
    itinerary.itinerary_title = raw.itinerary_title;
  }
  if (raw.total_budget !== undefined) {
    itinerary.total_budget = raw.total_budget;
  }
  return itinerary;
}
