import { once } from "node:events";
import { Express } from "express";
import { Itinerary } from "../../schemas/itinerarySchema";
import { UserPreferences } from "../../schemas/userInput";
import { GenerationEndpoint, GenerationRequest } from "../../utils/generation";

export const goaPreferences: UserPreferences = {
  destination: "Goa",
  duration: 3,
  budget: "Budget (₹10k - ₹25k)",
  travel_style: "Backpacker",
  interests: ["Beaches", "Food & Dining"],
  season: "Winter",
  group_size: "Friends (3-5)",
  additional_notes: "",
};

export const goaItinerary: Itinerary = {
  itinerary_title: "Goa on a Shoestring",
  total_budget: "₹18,000",
  budget_breakdown: { accommodation: "₹6,000", food: "₹4,500" },
  travel_tips: ["Rent a scooter", "Carry cash for shacks"],
  daily_itinerary: {
    "Day 1": {
      theme: "North Goa beaches",
      morning: { activity: "Walk along Baga Beach", cost: "Free", duration: "2 hours" },
      evening: { activity: "Saturday night market", cost: "₹500", duration: "3 hours" },
    },
    "Day 2": {
      theme: "Old Goa heritage",
      afternoon: { activity: "Basilica of Bom Jesus" },
    },
  },
};

export interface ScriptedResponse {
  fragments: string[];
  /** Throw instead of yielding the fragment at this index. */
  failAt?: number;
}

/**
 * Endpoint that plays back one scripted response per call, in order.
 */
export class ScriptedEndpoint implements GenerationEndpoint {
  readonly requests: GenerationRequest[] = [];
  private readonly responses: ScriptedResponse[];

  constructor(...responses: ScriptedResponse[]) {
    this.responses = responses;
  }

  async *stream(request: GenerationRequest): AsyncGenerator<string> {
    this.requests.push(request);
    const response = this.responses.shift();
    if (!response) {
      throw new Error("No scripted response left");
    }
    for (const [index, fragment] of response.fragments.entries()) {
      if (index === response.failAt) {
        throw new Error("Rate limit reached for model");
      }
      await Promise.resolve();
      yield fragment;
    }
    if (response.failAt !== undefined && response.failAt >= response.fragments.length) {
      throw new Error("Connection reset by peer");
    }
  }
}

export interface RunningServer {
  baseUrl: string;
  close(): Promise<void>;
}

export async function listen(app: Express): Promise<RunningServer> {
  const server = app.listen(0, "127.0.0.1");
  await once(server, "listening");
  const address = server.address();
  if (address === null || typeof address === "string") {
    throw new Error("Expected a TCP address");
  }
  return {
    baseUrl: `http://127.0.0.1:${address.port}`,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
      }),
  };
}
