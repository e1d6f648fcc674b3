import { HumanMessage, SystemMessage } from "@langchain/core/messages";
import { BaseChatModel } from "@langchain/core/language_models/chat_models";
import { loadChatModel } from "./configuration";
import { getTextContent } from "./util";

export interface GenerationRequest {
  system: string;
  prompt: string;
  maxTokens: number;
  temperature: number;
}

/**
 * A streaming text-completion service. Fragments are yielded in delivery
 * order; transport or quota problems surface as a rejected iteration.
 */
export interface GenerationEndpoint {
  stream(request: GenerationRequest): AsyncIterable<string>;
}

export interface GenerationFailure {
  kind: "communication_error" | "malformed_response";
  reason: string;
}

export type GenerationOutcome<T> =
  | { ok: true; value: T }
  | { ok: false; failure: GenerationFailure };

export const COMMUNICATION_ERROR: GenerationFailure = Object.freeze({
  kind: "communication_error",
  reason: "communication error",
});

export const MALFORMED_RESPONSE: GenerationFailure = Object.freeze({
  kind: "malformed_response",
  reason: "failed to generate itinerary",
});

/**
 * Drains the endpoint into a single string. Returns null if the stream
 * fails at any point; text received before the failure is dropped.
 */
export async function collectStream(
  endpoint: GenerationEndpoint,
  request: GenerationRequest
): Promise<string | null> {
  let text = "";
  try {
    for await (const fragment of endpoint.stream(request)) {
      text += fragment;
    }
  } catch (error) {
    console.error("[FLOW] Generation stream failed:", error);
    return null;
  }
  return text;
}

export type ChatModelFactory = (
  request: GenerationRequest
) => Promise<BaseChatModel>;

/**
 * GenerationEndpoint backed by a LangChain chat model.
 */
export class ChatModelEndpoint implements GenerationEndpoint {
  constructor(private readonly createModel: ChatModelFactory) {}

  async *stream(request: GenerationRequest): AsyncGenerator<string> {
    const model = await this.createModel(request);
    const chunks = await model.stream([
      new SystemMessage(request.system),
      new HumanMessage(request.prompt),
    ]);
    for await (const chunk of chunks) {
      const text = getTextContent(chunk.content);
      if (text) {
        yield text;
      }
    }
  }
}

export function createChatModelEndpoint(modelName: string): ChatModelEndpoint {
  return new ChatModelEndpoint((request) =>
    loadChatModel(modelName, {
      streaming: true,
      temperature: request.temperature,
      maxTokens: request.maxTokens,
    })
  );
}
