// api/src/programCatalog.ts
// ============================================================================
// STRUCTURED PROGRAMS
//
// Tables live in data/programs.json and are validated once at load.
// Lookup is keyed by (tier, week, weekday); weeks wrap around the tier's
// cycle and weekdays fold onto Mon..Fri.
// ============================================================================

import { z } from "zod";
import programsJson from "./data/programs.json";
import type { Tier } from "./progressionModel.js";
import { normalizeWeekday, type Weekday } from "./trainingGuidelines.js";

export const TRAINING_TYPES = [
  "strength",
  "strength_power",
  "muscular_endurance",
  "sustainability",
  "cardiovascular",
  "form_practice",
  "dropset",
] as const;
export type TrainingType = (typeof TRAINING_TYPES)[number];

export type Rom = "full" | "medium" | "short";

const TrainingTypeSchema = z.enum(TRAINING_TYPES);

const ExerciseTemplateSchema = z.object({
  name: z.string().min(1),
  target: z.string().min(1),
  sets: z.number().int().positive().nullable(),
  reps: z.union([z.number().int().positive(), z.string().min(1)]).nullable(),
  weight: z.string().nullable(),
  bpm: z.number().int().positive().nullable(),
  rom: z.enum(["full", "medium", "short"]).nullable(),
  howTo: z.string().optional(),
  workSeconds: z.number().int().positive().optional(),
  trainingType: TrainingTypeSchema.optional(),
});

const DaySchema = z.object({
  trainingType: TrainingTypeSchema,
  purpose: z.string().optional(),
  exercises: z.array(ExerciseTemplateSchema).min(1),
});

const ProgramSchema = z.object({
  levels: z.array(z.number().int().min(1).max(8)).min(1),
  weeks: z.number().int().positive(),
  program: z.record(z.string(), z.record(z.string(), DaySchema)),
});

const ProgramsFileSchema = z.object({
  version: z.number().int().positive(),
  trainingTypes: z.record(
    TrainingTypeSchema,
    z.object({ label: z.string(), description: z.string(), restSeconds: z.number().int().nonnegative() })
  ),
  programs: z.object({
    beginner: ProgramSchema,
    intermediate: ProgramSchema,
    advanced: ProgramSchema,
  }),
});

export type ProgramsFile = z.infer<typeof ProgramsFileSchema>;
type RawTemplate = z.infer<typeof ExerciseTemplateSchema>;

export type ExerciseTemplate = {
  name: string;
  target: string;
  /** null together with reps >= 100 means "accumulate total reps" */
  sets: number | null;
  reps: number | string | null;
  weightHint: string | null;
  bpm: number | null;
  rom: Rom | null;
  restSeconds: number;
  trainingType: TrainingType;
  howTo: string | null;
  workSeconds: number | null;
};

export type ProgramDay = {
  tier: Tier;
  week: number;
  weekday: Weekday;
  trainingType: TrainingType;
  trainingTypeLabel: string;
  purpose: string | null;
  exercises: ExerciseTemplate[];
};

/** Validates a programs document. Cross-checks that every declared week has days 1..5. */
export function parsePrograms(raw: unknown): ProgramsFile {
  const parsed = ProgramsFileSchema.parse(raw);
  for (const tier of ["beginner", "intermediate", "advanced"] as const) {
    const p = parsed.programs[tier];
    for (let week = 1; week <= p.weeks; week++) {
      const days = p.program[String(week)];
      if (!days) throw new Error(`programs.${tier}: week ${week} is missing`);
      for (let day = 1; day <= 5; day++) {
        if (!days[String(day)]) throw new Error(`programs.${tier}: week ${week} day ${day} is missing`);
      }
    }
  }
  return parsed;
}

const PROGRAMS: ProgramsFile = parsePrograms(programsJson);

export function programsVersion(): number {
  return PROGRAMS.version;
}

export function cycleLength(tier: Tier): number {
  return PROGRAMS.programs[tier].weeks;
}

/** 1-based week index wrapped onto the tier's cycle. */
export function wrapWeek(week: unknown, weeks: number): number {
  const n = typeof week === "number" ? week : typeof week === "string" ? Number(week) : NaN;
  const w = Number.isFinite(n) && n >= 1 ? Math.trunc(n) : 1;
  return ((w - 1) % weeks) + 1;
}

/** The requested week wrapped into the tier's cycle. */
export function cycleWeek(tier: Tier, week: unknown, doc: ProgramsFile = PROGRAMS): number {
  return wrapWeek(week, doc.programs[tier].weeks);
}

export function isFillToTotal(t: Pick<ExerciseTemplate, "sets" | "reps">): boolean {
  return t.sets === null && typeof t.reps === "number" && t.reps >= 100;
}

function resolveTemplate(raw: RawTemplate, dayType: TrainingType, doc: ProgramsFile): ExerciseTemplate {
  const trainingType = raw.trainingType ?? dayType;
  return {
    name: raw.name,
    target: raw.target,
    sets: raw.sets,
    reps: raw.reps,
    weightHint: raw.weight,
    bpm: raw.bpm,
    rom: raw.rom,
    restSeconds: doc.trainingTypes[trainingType]?.restSeconds ?? 60,
    trainingType,
    howTo: raw.howTo ?? null,
    workSeconds: raw.workSeconds ?? null,
  };
}

export function workoutFor(
  tier: Tier,
  week: unknown,
  weekday: unknown,
  doc: ProgramsFile = PROGRAMS
): ProgramDay | null {
  const program = doc.programs[tier];
  const w = wrapWeek(week, program.weeks);
  const d = normalizeWeekday(weekday);
  const day = program.program[String(w)]?.[String(d)];
  if (!day) return null;

  return {
    tier,
    week: w,
    weekday: d,
    trainingType: day.trainingType,
    trainingTypeLabel: doc.trainingTypes[day.trainingType]?.label ?? day.trainingType,
    purpose: day.purpose ?? null,
    exercises: day.exercises.map((e) => resolveTemplate(e, day.trainingType, doc)),
  };
}
