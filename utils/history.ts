import { format } from "date-fns";
import { HistoryEntry, Itinerary } from "../schemas/itinerarySchema";
import { CredentialStore } from "./userStore";

export const HISTORY_DATE_FORMAT = "yyyy-MM-dd HH:mm:ss";

export function createHistoryEntry(
  destination: string,
  itinerary: Itinerary,
  now: Date = new Date()
): HistoryEntry {
  return {
    date: format(now, HISTORY_DATE_FORMAT),
    destination,
    itinerary,
  };
}

/**
 * Records a generated itinerary at the front of the user's history.
 * Entries are never merged or capped; ordering under concurrent requests is
 * the store's atomic prepend.
 */
export async function appendHistory(
  store: CredentialStore,
  username: string,
  destination: string,
  itinerary: Itinerary,
  now: () => Date = () => new Date()
): Promise<HistoryEntry> {
  const entry = createHistoryEntry(destination, itinerary, now());
  await store.prependHistory(username, entry);
  return entry;
}
