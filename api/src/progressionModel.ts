// api/src/progressionModel.ts
// ============================================================================
// LEVELS, TIERS, GRADES
//
// Numeric level 1..8 is the only stored value; everything else is derived.
// Lookups never throw: out-of-range input clamps to 1 or 8.
// ============================================================================

export type Tier = "beginner" | "intermediate" | "advanced";
export type Grade = "normal" | "healthy" | "athletic";
export type Level = 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8;

export const MIN_LEVEL: Level = 1;
export const MAX_LEVEL: Level = 8;
export const TIERS: readonly Tier[] = ["beginner", "intermediate", "advanced"];

type LevelInfo = { tier: Tier; weightMultiplier: number };

export const LEVELS: Record<Level, LevelInfo> = {
  1: { tier: "beginner", weightMultiplier: 0.5 },
  2: { tier: "beginner", weightMultiplier: 0.6 },
  3: { tier: "intermediate", weightMultiplier: 0.7 },
  4: { tier: "intermediate", weightMultiplier: 0.8 },
  5: { tier: "intermediate", weightMultiplier: 0.9 },
  6: { tier: "advanced", weightMultiplier: 1.0 },
  7: { tier: "advanced", weightMultiplier: 1.1 },
  8: { tier: "advanced", weightMultiplier: 1.2 },
};

const GRADE_RANGES: Array<{ grade: Grade; min: Level; max: Level }> = [
  { grade: "normal", min: 1, max: 3 },
  { grade: "healthy", min: 4, max: 5 },
  { grade: "athletic", min: 6, max: 8 },
];

export function isLevel(n: number): n is Level {
  return Number.isInteger(n) && n >= MIN_LEVEL && n <= MAX_LEVEL;
}

export function clampLevel(level: unknown): Level {
  const n = typeof level === "number" ? level : typeof level === "string" ? Number(level) : NaN;
  if (!Number.isFinite(n)) return MIN_LEVEL;
  const rounded = Math.round(n);
  if (rounded <= MIN_LEVEL) return MIN_LEVEL;
  if (rounded >= MAX_LEVEL) return MAX_LEVEL;
  return isLevel(rounded) ? rounded : MIN_LEVEL;
}

export function tierFor(level: unknown): Tier {
  return LEVELS[clampLevel(level)].tier;
}

export function weightMultiplier(level: unknown): number {
  return LEVELS[clampLevel(level)].weightMultiplier;
}

export function gradeFor(level: unknown): Grade {
  const l = clampLevel(level);
  const match = GRADE_RANGES.find((r) => l >= r.min && l <= r.max);
  return match ? match.grade : "normal";
}

export function levelsInTier(tier: Tier): Level[] {
  const out: Level[] = [];
  for (let l: number = MIN_LEVEL; l <= MAX_LEVEL; l++) {
    if (isLevel(l) && LEVELS[l].tier === tier) out.push(l);
  }
  return out;
}

export function parseTier(value: unknown): Tier | null {
  const v = String(value ?? "").trim().toLowerCase();
  return TIERS.find((t) => t === v) ?? null;
}

// ----------------------------------------------------------------------------
// Load formulas
// ----------------------------------------------------------------------------

export type MainLift = "bench" | "squat" | "deadlift";
export const MAIN_LIFTS: readonly MainLift[] = ["bench", "squat", "deadlift"];

export const DEFAULT_HEIGHT_CM = 170;

/** Height-based base load: bench h-100, squat h-80, deadlift h-60 (kg). */
export function baseLoad(lift: MainLift, heightCm: number | null | undefined): number {
  const h = typeof heightCm === "number" && Number.isFinite(heightCm) && heightCm > 0 ? heightCm : DEFAULT_HEIGHT_CM;
  switch (lift) {
    case "bench":
      return h - 100;
    case "squat":
      return h - 80;
    case "deadlift":
      return h - 60;
  }
}

export function roundTo(value: number, digits: number): number {
  const f = 10 ** digits;
  return Math.round(value * f) / f;
}

/** Working barbell load for a level, used as a guide in prompts. */
export function calculateTargetWeight(lift: MainLift, heightCm: number | null | undefined, level: unknown): number {
  return roundTo(baseLoad(lift, heightCm) * weightMultiplier(level), 2);
}
