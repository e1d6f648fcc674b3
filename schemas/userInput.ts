import { z } from "zod";

export const BUDGET_RANGES = [
  "Budget (₹10k - ₹25k)",
  "Moderate (₹25k - ₹75k)",
  "Luxury (₹75k+)",
] as const;

export const TRAVEL_STYLES = [
  "Backpacker",
  "Cultural Explorer",
  "Foodie",
  "Adventure Seeker",
  "Relaxation",
  "City Breaker",
] as const;

export const INTERESTS = [
  "History & Culture",
  "Food & Dining",
  "Nature & Hiking",
  "Art & Museums",
  "Shopping",
  "Nightlife",
  "Beaches",
  "Photography",
  "Local Markets",
] as const;

export const SEASONS = ["Spring", "Summer", "Fall", "Winter"] as const;

export const GROUP_SIZES = [
  "Solo Travel",
  "Couple",
  "Friends (3-5)",
  "Family",
  "Group (6+)",
] as const;

export const DEFAULT_INTERESTS: Interest[] = ["History & Culture", "Food & Dining"];

const userPreferencesSchema = z.object({
  destination: z
    .string()
    .trim()
    .min(1, "Please enter a destination to continue"),
  duration: z.number().int().min(1).max(30).default(5),
  budget: z.enum(BUDGET_RANGES),
  travel_style: z.enum(TRAVEL_STYLES),
  // Treated as a set: repeated tags collapse, first occurrence wins
  interests: z
    .array(z.enum(INTERESTS))
    .default(DEFAULT_INTERESTS)
    .transform((tags) => [...new Set(tags)]),
  season: z.enum(SEASONS),
  group_size: z.enum(GROUP_SIZES),
  additional_notes: z.string().trim().default(""),
});

export type BudgetRange = (typeof BUDGET_RANGES)[number];
export type TravelStyle = (typeof TRAVEL_STYLES)[number];
export type Interest = (typeof INTERESTS)[number];
export type Season = (typeof SEASONS)[number];
export type GroupSize = (typeof GROUP_SIZES)[number];

export type UserPreferences = z.infer<typeof userPreferencesSchema>;
export type UserPreferencesInput = z.input<typeof userPreferencesSchema>;

export default userPreferencesSchema;
