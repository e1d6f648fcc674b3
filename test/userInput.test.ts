import { describe, expect, it } from "vitest";
import userPreferencesSchema, {
  BUDGET_RANGES,
  GROUP_SIZES,
  INTERESTS,
  SEASONS,
  TRAVEL_STYLES,
  UserPreferencesInput,
} from "../schemas/userInput";

const form: UserPreferencesInput = {
  destination: "  Manali ",
  budget: "Moderate (₹25k - ₹75k)",
  travel_style: "Adventure Seeker",
  season: "Summer",
  group_size: "Couple",
};

describe("userPreferencesSchema", () => {
  it("applies the form defaults", () => {
    expect(userPreferencesSchema.parse(form)).toEqual({
      destination: "Manali",
      duration: 5,
      budget: "Moderate (₹25k - ₹75k)",
      travel_style: "Adventure Seeker",
      interests: ["History & Culture", "Food & Dining"],
      season: "Summer",
      group_size: "Couple",
      additional_notes: "",
    });
  });

  it("collapses repeated interests", () => {
    const preferences = userPreferencesSchema.parse({
      ...form,
      interests: ["Nature & Hiking", "Photography", "Nature & Hiking"],
    });

    expect(preferences.interests).toEqual(["Nature & Hiking", "Photography"]);
  });

  it("requires a destination", () => {
    const result = userPreferencesSchema.safeParse({ ...form, destination: "   " });

    expect(result.success).toBe(false);
    expect(!result.success && result.error.issues[0].message).toBe(
      "Please enter a destination to continue"
    );
  });

  it.each([0, 31, 2.5])("rejects a duration of %s days", (duration) => {
    expect(userPreferencesSchema.safeParse({ ...form, duration }).success).toBe(false);
  });

  it.each([
    ["budget", "Unlimited"],
    ["travel_style", "Sightseer"],
    ["season", "Monsoon"],
    ["group_size", "Team"],
  ])("rejects %s outside its enumeration", (field, value) => {
    expect(userPreferencesSchema.safeParse({ ...form, [field]: value }).success).toBe(false);
  });

  it("rejects unknown interests", () => {
    expect(
      userPreferencesSchema.safeParse({ ...form, interests: ["Skiing"] }).success
    ).toBe(false);
  });

  it("only produces values from the declared enumerations", () => {
    expect(BUDGET_RANGES).toHaveLength(3);
    expect(TRAVEL_STYLES).toHaveLength(6);
    expect(SEASONS).toHaveLength(4);
    expect(GROUP_SIZES).toHaveLength(5);

    for (const budget of BUDGET_RANGES) {
      for (const travel_style of TRAVEL_STYLES) {
        for (const season of SEASONS) {
          for (const group_size of GROUP_SIZES) {
            const preferences = userPreferencesSchema.parse({
              ...form,
              budget,
              travel_style,
              season,
              group_size,
              interests: [...INTERESTS],
            });
            expect(BUDGET_RANGES).toContain(preferences.budget);
            expect(TRAVEL_STYLES).toContain(preferences.travel_style);
            expect(SEASONS).toContain(preferences.season);
            expect(GROUP_SIZES).toContain(preferences.group_size);
          }
        }
      }
    }
  });
});
