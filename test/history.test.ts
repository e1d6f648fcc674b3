import { beforeEach, describe, expect, it } from "vitest";
import { appendHistory, createHistoryEntry } from "../utils/history";
import { UnknownUserError } from "../utils/errors";
import { MemoryCredentialStore } from "../utils/userStore";
import { goaItinerary } from "./support/fixtures";

describe("createHistoryEntry", () => {
  it("stamps the entry with the local wall-clock time", () => {
    const entry = createHistoryEntry("Goa", goaItinerary, new Date(2026, 0, 2, 9, 5, 7));

    expect(entry).toEqual({
      date: "2026-01-02 09:05:07",
      destination: "Goa",
      itinerary: goaItinerary,
    });
  });
});

describe("appendHistory", () => {
  let store: MemoryCredentialStore;

  beforeEach(async () => {
    store = new MemoryCredentialStore();
    await store.insert("asha", "digest");
  });

  it("puts the newest entry first", async () => {
    await appendHistory(store, "asha", "Goa", goaItinerary);
    await appendHistory(store, "asha", "Jaipur", goaItinerary);

    const user = await store.find("asha");
    expect(user?.travel_history.map((entry) => entry.destination)).toEqual([
      "Jaipur",
      "Goa",
    ]);
  });

  it("uses the injected clock", async () => {
    const entry = await appendHistory(
      store,
      "asha",
      "Goa",
      goaItinerary,
      () => new Date(2026, 10, 30, 23, 59, 0)
    );

    expect(entry.date).toBe("2026-11-30 23:59:00");
  });

  it("keeps duplicate entries", async () => {
    await appendHistory(store, "asha", "Goa", goaItinerary);
    await appendHistory(store, "asha", "Goa", goaItinerary);

    const user = await store.find("asha");
    expect(user?.travel_history).toHaveLength(2);
  });

  it("loses no entry under concurrent appends", async () => {
    await appendHistory(store, "asha", "Goa", goaItinerary);

    const destinations = Array.from({ length: 25 }, (_, index) => `Stop ${index}`);
    await Promise.all(
      destinations.map((destination) =>
        appendHistory(store, "asha", destination, goaItinerary)
      )
    );

    const user = await store.find("asha");
    expect(user?.travel_history).toHaveLength(26);
    expect(new Set(user?.travel_history.map((entry) => entry.destination))).toEqual(
      new Set(["Goa", ...destinations])
    );
  });

  it("fails for a user without a record", async () => {
    await expect(appendHistory(store, "ravi", "Goa", goaItinerary)).rejects.toBeInstanceOf(
      UnknownUserError
    );
  });
});
