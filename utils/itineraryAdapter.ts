import { Itinerary, normalizeItinerary } from "../schemas/itinerarySchema";
import { UserPreferences } from "../schemas/userInput";
import {
  GENERATION_TEMPERATURE,
  MAX_GENERATED_TOKENS,
} from "./configuration";
import {
  collectStream,
  COMMUNICATION_ERROR,
  GenerationEndpoint,
  GenerationOutcome,
  MALFORMED_RESPONSE,
} from "./generation";
import { buildItineraryPrompt } from "./promptBuilder";
import { ITINERARY_SYSTEM_PROMPT } from "./prompts";

/**
 * Cuts the JSON candidate out of model output: everything from the first
 * "{" through the last "}". Models tend to wrap the object in prose even when
 * told not to. Returns "" when there is no "{" or no "}" after it.
 */
export function extractJsonCandidate(text: string): string {
  const start = text.indexOf("{");
  if (start === -1) {
    return "";
  }
  const end = text.lastIndexOf("}");
  if (end < start) {
    return "";
  }
  return text.slice(start, end + 1);
}

/**
 * Parses accumulated model output into an Itinerary, or null if no JSON
 * object can be recovered from it.
 */
export function parseItinerary(text: string): Itinerary | null {
  const candidate = extractJsonCandidate(text);
  let value: unknown;
  try {
    value = JSON.parse(candidate);
  } catch {
    return null;
  }
  return normalizeItinerary(value);
}

/**
 * Runs one itinerary generation. Never throws for model or transport
 * problems: those come back as a failed outcome.
 */
export async function generateItinerary(
  endpoint: GenerationEndpoint,
  preferences: UserPreferences
): Promise<GenerationOutcome<Itinerary>> {
  console.log("[FLOW] Generating itinerary for:", preferences.destination);

  const text = await collectStream(endpoint, {
    system: ITINERARY_SYSTEM_PROMPT,
    prompt: buildItineraryPrompt(preferences),
    maxTokens: MAX_GENERATED_TOKENS,
    temperature: GENERATION_TEMPERATURE,
  });
  if (text === null) {
    return { ok: false, failure: COMMUNICATION_ERROR };
  }

  const itinerary = parseItinerary(text);
  if (!itinerary) {
    console.log(
      `[FLOW] Model output had no usable JSON object (${text.length} chars)`
    );
    return { ok: false, failure: MALFORMED_RESPONSE };
  }

  console.log(
    `[FLOW] Itinerary ready with ${Object.keys(itinerary.daily_itinerary).length} day(s)`
  );
  return { ok: true, value: itinerary };
}
