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
} from "./generation";
import { buildPackingListPrompt } from "./promptBuilder";
import { PACKING_LIST_SYSTEM_PROMPT } from "./prompts";

// Separate call from the itinerary so that its failure never touches an
// itinerary that already succeeded
export async function generatePackingList(
  endpoint: GenerationEndpoint,
  preferences: UserPreferences
): Promise<GenerationOutcome<string>> {
  const text = await collectStream(endpoint, {
    system: PACKING_LIST_SYSTEM_PROMPT,
    prompt: buildPackingListPrompt(preferences),
    maxTokens: MAX_GENERATED_TOKENS,
    temperature: GENERATION_TEMPERATURE,
  });
  if (text === null) {
    return { ok: false, failure: COMMUNICATION_ERROR };
  }

  const packingList = text.trim();
  if (!packingList) {
    return {
      ok: false,
      failure: {
        kind: "malformed_response",
        reason: "failed to generate packing list",
      },
    };
  }
  return { ok: true, value: packingList };
}
