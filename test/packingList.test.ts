import { describe, expect, it, vi } from "vitest";
import { generatePackingList } from "../utils/packingList";
import { PACKING_LIST_SYSTEM_PROMPT } from "../utils/prompts";
import { goaPreferences, ScriptedEndpoint } from "./support/fixtures";

vi.spyOn(console, "error").mockImplementation(() => {});

describe("generatePackingList", () => {
  it("returns the trimmed model text", async () => {
    const endpoint = new ScriptedEndpoint({
      fragments: ["\n- Sunscreen\n", "- Flip-flops\n", "- Light cotton shirts\n\n"],
    });

    const outcome = await generatePackingList(endpoint, goaPreferences);

    expect(outcome).toEqual({
      ok: true,
      value: "- Sunscreen\n- Flip-flops\n- Light cotton shirts",
    });
    expect(endpoint.requests[0].system).toBe(PACKING_LIST_SYSTEM_PROMPT);
    expect(endpoint.requests[0].prompt).toContain("- Destination: Goa\n");
  });

  it("fails on an empty reply", async () => {
    const endpoint = new ScriptedEndpoint({ fragments: [" ", "\n"] });

    expect(await generatePackingList(endpoint, goaPreferences)).toEqual({
      ok: false,
      failure: { kind: "malformed_response", reason: "failed to generate packing list" },
    });
  });

  it("fails when the stream breaks", async () => {
    const endpoint = new ScriptedEndpoint({ fragments: ["- Sunscreen\n"], failAt: 0 });

    expect(await generatePackingList(endpoint, goaPreferences)).toEqual({
      ok: false,
      failure: { kind: "communication_error", reason: "communication error" },
    });
  });
});
