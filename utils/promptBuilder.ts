import { UserPreferences } from "../schemas/userInput";
import { ITINERARY_PROMPT, PACKING_LIST_PROMPT } from "./prompts";

export type PromptValues = Record<string, string | number>;

const PLACEHOLDER = /\{([a-z_]+)\}/g;

/**
 * Replaces every `{name}` placeholder in the template. Only lowercase
 * identifiers count as placeholders, so the JSON example braces in the
 * itinerary prompt are left alone.
 */
export function renderTemplate(template: string, values: PromptValues): string {
  return template.replace(PLACEHOLDER, (_match, name: string) => {
    const value = values[name];
    if (value === undefined) {
      throw new Error(`Missing prompt value for {${name}}`);
    }
    return String(value);
  });
}

function toPromptValues(preferences: UserPreferences): PromptValues {
  return {
    destination: preferences.destination,
    duration: preferences.duration,
    budget: preferences.budget,
    travel_style: preferences.travel_style,
    interests: preferences.interests.join(", "),
    season: preferences.season,
    group_size: preferences.group_size,
    additional_notes: preferences.additional_notes || "None",
  };
}

export function buildItineraryPrompt(preferences: UserPreferences): string {
  return renderTemplate(ITINERARY_PROMPT, toPromptValues(preferences));
}

export function buildPackingListPrompt(preferences: UserPreferences): string {
  return renderTemplate(PACKING_LIST_PROMPT, toPromptValues(preferences));
}
