import {
  Activity,
  DayPlan,
  HistoryEntry,
  Itinerary,
  TIME_SLOTS,
  TimeSlot,
} from "../schemas/itinerarySchema";
import { titleCase } from "./util";

// Display-time fallbacks. Stored itineraries never contain these.
export const DISPLAY_DEFAULTS = {
  title: "Your Personalized Travel Plan",
  totalBudget: "N/A",
  theme: "Daily Activities",
  activity: "Activity",
  cost: "Free",
  duration: "2-3 hours",
} as const;

const SLOT_HEADINGS: Record<TimeSlot, string> = {
  morning: "Morning",
  afternoon: "Afternoon",
  evening: "Evening",
};

export interface ActivityView {
  activity: string;
  cost: string;
  duration: string;
}

export interface SlotView {
  slot: TimeSlot;
  heading: string;
  /** Missing when the model planned nothing for this part of the day. */
  details?: ActivityView;
}

export interface DayView {
  label: string;
  theme: string;
  slots: SlotView[];
}

export interface ItineraryView {
  title: string;
  totalBudget: string;
  budgetBreakdown: { category: string; amount: string }[];
  days: DayView[];
  tips: string[];
}

function toActivityView(activity: Activity): ActivityView {
  return {
    activity: activity.activity || DISPLAY_DEFAULTS.activity,
    cost: activity.cost || DISPLAY_DEFAULTS.cost,
    duration: activity.duration || DISPLAY_DEFAULTS.duration,
  };
}

function toDayView(label: string, day: DayPlan): DayView {
  return {
    label,
    theme: day.theme || DISPLAY_DEFAULTS.theme,
    slots: TIME_SLOTS.map((slot) => {
      const activity = day[slot];
      return activity && Object.keys(activity).length > 0
        ? { slot, heading: SLOT_HEADINGS[slot], details: toActivityView(activity) }
        : { slot, heading: SLOT_HEADINGS[slot] };
    }),
  };
}

export function toItineraryView(itinerary: Itinerary): ItineraryView {
  return {
    title: itinerary.itinerary_title || DISPLAY_DEFAULTS.title,
    totalBudget: itinerary.total_budget || DISPLAY_DEFAULTS.totalBudget,
    budgetBreakdown: Object.entries(itinerary.budget_breakdown).map(
      ([category, amount]) => ({ category: titleCase(category), amount })
    ),
    days: Object.entries(itinerary.daily_itinerary).map(([label, day]) =>
      toDayView(label, day)
    ),
    tips: itinerary.travel_tips.map((tip, index) => `${index + 1}. ${tip}`),
  };
}

function renderEntry(entry: HistoryEntry): string[] {
  const view = toItineraryView(entry.itinerary);
  const lines = [
    `## ${entry.destination} - ${entry.date}`,
    "",
    `### ${view.title}`,
    "",
    `**Total Budget:** ${view.totalBudget}`,
  ];

  if (view.budgetBreakdown.length > 0) {
    lines.push("", "##### Budget Breakdown");
    for (const { category, amount } of view.budgetBreakdown) {
      lines.push(`- ${category}: ${amount}`);
    }
  }

  if (view.days.length > 0) {
    lines.push("", "##### Daily Itinerary");
    for (const day of view.days) {
      lines.push(`**${day.label}: ${day.theme}**`);
      for (const { heading, details } of day.slots) {
        if (details) {
          lines.push(`- **${heading}:** ${details.activity} (${details.cost})`);
        }
      }
    }
  }

  if (entry.itinerary.travel_tips.length > 0) {
    lines.push("", "##### Travel Tips");
    for (const tip of entry.itinerary.travel_tips) {
      lines.push(`- ${tip}`);
    }
  }
  return lines;
}

/**
 * Markdown for the "My Trips" page, newest entry first.
 */
export function renderHistoryMarkdown(entries: HistoryEntry[]): string {
  if (entries.length === 0) {
    return [
      "### No travel plans yet",
      "",
      "Your amazing travel itineraries will appear here!",
      "",
    ].join("\n");
  }
  return entries.map((entry) => renderEntry(entry).join("\n")).join("\n\n") + "\n";
}
