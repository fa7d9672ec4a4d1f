// api/src/routineParser.ts
// Pulls the routine JSON object out of free model text and validates its shape.

import { z } from "zod";

const NumberLike = z.union([z.number(), z.string()]).nullish();

export const ModelExerciseSchema = z
  .object({
    id: z.string().nullish(),
    exercise_id: z.string().nullish(),
    name: z.string().trim().min(1),
    target_muscle: z.string().nullish(),
    sets: NumberLike,
    reps: NumberLike,
    rest_seconds: NumberLike,
    work_seconds: NumberLike,
    instructions: z.string().nullish(),
    weight_guide: z.string().nullish(),
    equipment: z.string().nullish(),
  })
  .passthrough();

export const ModelRoutineSchema = z
  .object({
    routine_name: z.string().nullish(),
    training_focus: z.string().nullish(),
    estimated_duration: NumberLike,
    exercises: z.array(ModelExerciseSchema).min(1),
    warmup_notes: z.string().nullish(),
    cooldown_notes: z.string().nullish(),
    coach_message: z.string().nullish(),
  })
  .passthrough();

export type ModelExerciseJson = z.infer<typeof ModelExerciseSchema>;
export type ModelRoutineJson = z.infer<typeof ModelRoutineSchema>;

export type ParseOutcome =
  | { ok: true; routine: ModelRoutineJson; extractedFrom: "fence" | "braces" }
  | { ok: false; reason: "no_json" | "invalid_json" | "missing_exercises" | "invalid_shape"; detail?: string };

const FENCED_JSON = /```(?:json)?\s*(\{[\s\S]*?\})\s*```/i;

/** Fenced block first, else first "{" through last "}". */
export function extractJsonObject(text: string): { json: string; from: "fence" | "braces" } | null {
  const raw = String(text ?? "");
  const fenced = FENCED_JSON.exec(raw);
  if (fenced?.[1]) return { json: fenced[1], from: "fence" };

  const start = raw.indexOf("{");
  const end = raw.lastIndexOf("}");
  if (start === -1 || end <= start) return null;
  return { json: raw.slice(start, end + 1), from: "braces" };
}

export function parseRoutineResponse(text: string): ParseOutcome {
  const extracted = extractJsonObject(text);
  if (!extracted) return { ok: false, reason: "no_json" };

  let data: unknown;
  try {
    data = JSON.parse(extracted.json);
  } catch (err) {
    return { ok: false, reason: "invalid_json", detail: err instanceof Error ? err.message : String(err) };
  }

  if (typeof data !== "object" || data === null || Array.isArray(data)) {
    return { ok: false, reason: "invalid_shape", detail: "top-level value is not an object" };
  }
  if (!("exercises" in data) || !Array.isArray(data.exercises) || data.exercises.length === 0) {
    return { ok: false, reason: "missing_exercises" };
  }

  const parsed = ModelRoutineSchema.safeParse(data);
  if (!parsed.success) {
    const detail = parsed.error.errors.map((e) => `${e.path.join(".")}: ${e.message}`).join("; ");
    return { ok: false, reason: "invalid_shape", detail };
  }
  return { ok: true, routine: parsed.data, extractedFrom: extracted.from };
}

// ----------------------------------------------------------------------------
// Numeric coercion for loosely typed model fields
// ----------------------------------------------------------------------------

/** First integer in a number or string ("3", "8-12", "45s"); null when none. */
export function firstInt(value: unknown): number | null {
  if (typeof value === "number") return Number.isFinite(value) ? Math.round(value) : null;
  if (typeof value !== "string") return null;
  const m = /-?\d+(?:\.\d+)?/.exec(value);
  return m ? Math.round(Number(m[0])) : null;
}

export function positiveIntOr(value: unknown, fallback: number, max = 1000): number {
  const n = firstInt(value);
  if (n === null || n <= 0) return fallback;
  return Math.min(n, max);
}
