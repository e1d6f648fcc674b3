import { z } from "zod";

/*
 * Loose reading of the itinerary JSON the model is asked to produce.
 * Every field is optional and every field that has the wrong type falls back
 * to "absent" (or an empty container) instead of failing the whole parse.
 * Only a value that is not a JSON object at all is rejected.
 */

// Models regularly emit costs and durations as bare numbers
const text = z
  .union([z.string(), z.number(), z.boolean()])
  .transform((value) => String(value));

const optionalText = text.optional().catch(undefined);

function keepParsed<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  values: unknown[]
): T[] {
  return values.flatMap((value) => {
    const parsed = schema.safeParse(value);
    return parsed.success ? [parsed.data] : [];
  });
}

function keepParsedEntries<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  entries: Record<string, unknown>
): Record<string, T> {
  const result: Record<string, T> = {};
  for (const [key, value] of Object.entries(entries)) {
    const parsed = schema.safeParse(value);
    if (parsed.success) {
      result[key] = parsed.data;
    }
  }
  return result;
}

export const rawActivitySchema = z.object({
  activity: optionalText,
  cost: optionalText,
  duration: optionalText,
});

const rawSlotSchema = rawActivitySchema.optional().catch(undefined);

export const rawDayPlanSchema = z
  .object({
    theme: optionalText,
    morning: rawSlotSchema,
    afternoon: rawSlotSchema,
    evening: rawSlotSchema,
  })
  // a day the model wrote as prose still keeps its key
  .catch({});

const llmOutputSchema = z.object({
  itinerary_title: optionalText,
  total_budget: optionalText,
  budget_breakdown: z
    .record(z.unknown())
    .catch({})
    .transform((entries) => keepParsedEntries(text, entries)),
  travel_tips: z
    .array(z.unknown())
    .catch([])
    .transform((tips) => keepParsed(text, tips)),
  daily_itinerary: z
    .record(z.unknown())
    .catch({})
    .transform((days) => keepParsedEntries(rawDayPlanSchema, days)),
});

export type RawActivity = z.infer<typeof rawActivitySchema>;
export type RawDayPlan = z.infer<typeof rawDayPlanSchema>;
export type LLMOutput = z.infer<typeof llmOutputSchema>;

export default llmOutputSchema;
