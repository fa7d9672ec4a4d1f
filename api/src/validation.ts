// Request validation with zod
import { z } from "zod";
import { GENERATION_STRATEGIES } from "./config.js";

const Rating = z.number().min(1).max(5);

export const ConditionInputSchema = z.object({
  sleep: Rating.nullish(),
  fatigue: Rating.nullish(),
  stress: Rating.nullish(),
  soreness: Rating.nullish(),
  motivation: Rating.nullish(),
});

export const GenerateRoutineSchema = z.object({
  weekday: z.number().int().min(0).max(7).nullish(),
  week: z.number().int().min(1).max(52).nullish(),
  condition: ConditionInputSchema.nullish(),
  goal: z.string().max(500).nullish(),
  equipment: z.array(z.string().min(1).max(50)).max(30).nullish(),
  strategy: z.enum(GENERATION_STRATEGIES).optional(),
});

export const LiftSubmissionSchema = z.object({
  lift: z.string().min(1).max(50),
  weight: z.union([z.number(), z.string()]),
  reps: z.union([z.number(), z.string()]),
});

export const EvaluateTestSchema = z.object({
  testId: z.string().max(100).nullish(),
  results: z.array(LiftSubmissionSchema).max(20),
});

export const ProgramParamsSchema = z.object({
  tier: z.enum(["beginner", "intermediate", "advanced"]),
  week: z.coerce.number().int().min(1),
  weekday: z.coerce.number().int().min(0).max(7),
});

export const UserIdSchema = z.string().trim().min(1).max(100);

export function validate<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown
): { success: true; data: T } | { success: false; error: string } {
  const parsed = schema.safeParse(data);
  if (parsed.success) return { success: true, data: parsed.data };
  return {
    success: false,
    error: parsed.error.errors.map((e) => `${e.path.join(".")}: ${e.message}`).join("; "),
  };
}
