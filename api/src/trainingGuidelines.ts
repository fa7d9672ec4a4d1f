// api/src/trainingGuidelines.ts
// Weekly structure, fitness factors and per-tier training variables.

import type { Tier } from "./progressionModel.js";

export type Weekday = 1 | 2 | 3 | 4 | 5;

export type FitnessFactor =
  | "strength"
  | "muscular_endurance"
  | "sustainability"
  | "power"
  | "cardiovascular";

export type TrainingMethod =
  | "fixed_sets_reps"
  | "total_reps_fill"
  | "max_sets_at_fixed_reps"
  | "explosive"
  | "tabata";

export const FITNESS_FACTORS: Record<
  FitnessFactor,
  { label: string; description: string; method: TrainingMethod; typicalBpm: number | null; typicalRest: number }
> = {
  strength: { label: "Strength", description: "Maximum force production", method: "fixed_sets_reps", typicalBpm: 30, typicalRest: 60 },
  muscular_endurance: { label: "Muscular endurance", description: "Sustained muscle performance", method: "total_reps_fill", typicalBpm: 30, typicalRest: 30 },
  sustainability: { label: "Sustainability", description: "Continuous performance capacity", method: "max_sets_at_fixed_reps", typicalBpm: 30, typicalRest: 45 },
  power: { label: "Power", description: "Explosive force production", method: "explosive", typicalBpm: null, typicalRest: 90 },
  cardiovascular: { label: "Cardiovascular", description: "Heart and lung capacity", method: "tabata", typicalBpm: null, typicalRest: 10 },
};

export const WEEKLY_STRUCTURE: Record<Weekday, { day: string; factor: FitnessFactor }> = {
  1: { day: "Monday", factor: "strength" },
  2: { day: "Tuesday", factor: "muscular_endurance" },
  3: { day: "Wednesday", factor: "sustainability" },
  4: { day: "Thursday", factor: "strength" },
  5: { day: "Friday", factor: "cardiovascular" },
};

/**
 * Folds any day number onto a training day (Mon..Fri).
 * 0 (Sunday) maps to Monday; 6 and 7 map to Friday.
 */
export function normalizeWeekday(day: unknown): Weekday {
  const n = typeof day === "number" ? day : typeof day === "string" ? Number(day) : NaN;
  if (!Number.isFinite(n)) return 1;
  const d = Math.trunc(n);
  switch (d) {
    case 2:
      return 2;
    case 3:
      return 3;
    case 4:
      return 4;
    default:
      if (d >= 5) return 5;
      return 1;
  }
}

export type Range = { min: number; max: number };

export type VariableGuideline = {
  setsPerExercise: Range;
  repsRange: Range;
  rpeRange: Range;
  restSeconds: Range;
  totalSets: Range;
  exercisesCount: Range;
  tempo: string;
  rom: string;
  progression: string;
  weightGuide: string;
  notes: string;
};

export const VARIABLE_GUIDELINES: Record<Tier, VariableGuideline> = {
  beginner: {
    setsPerExercise: { min: 2, max: 3 },
    repsRange: { min: 10, max: 15 },
    rpeRange: { min: 5, max: 7 },
    restSeconds: { min: 90, max: 120 },
    totalSets: { min: 12, max: 16 },
    exercisesCount: { min: 4, max: 5 },
    tempo: "2-0-2",
    rom: "full",
    progression: "+2.5% or +1-2 reps per week",
    weightGuide: "Bodyweight or light load (keep RPE 5-7)",
    notes: "Form first, learn the movement with light loads",
  },
  intermediate: {
    setsPerExercise: { min: 3, max: 4 },
    repsRange: { min: 8, max: 12 },
    rpeRange: { min: 7, max: 8 },
    restSeconds: { min: 60, max: 90 },
    totalSets: { min: 16, max: 20 },
    exercisesCount: { min: 5, max: 6 },
    tempo: "2-1-2",
    rom: "full_with_stretch",
    progression: "+2.5-5% per week, deload every 4 weeks",
    weightGuide: "65-75% of 1RM or RPE 7-8",
    notes: "Progressive overload, mind-muscle connection",
  },
  advanced: {
    setsPerExercise: { min: 4, max: 5 },
    repsRange: { min: 6, max: 10 },
    rpeRange: { min: 8, max: 9 },
    restSeconds: { min: 60, max: 120 },
    totalSets: { min: 20, max: 25 },
    exercisesCount: { min: 5, max: 6 },
    tempo: "3-1-2",
    rom: "varied",
    progression: "Non-linear periodization, 3 weeks up + 1 week deload",
    weightGuide: "75-85% of 1RM or RPE 8-9",
    notes: "High-intensity techniques, volume periodization",
  },
};

// used when the model omits rest for an exercise
export const DEFAULT_REST_SECONDS: Record<Tier, number> = {
  beginner: 90,
  intermediate: 75,
  advanced: 90,
};

export const BASELINE_SETS = 3;
export const BASELINE_REPS = 10;

export function formatRange(r: Range): string {
  return r.min === r.max ? String(r.min) : `${r.min}-${r.max}`;
}
