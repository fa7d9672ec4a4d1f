// api/src/exercisePool.ts
// ============================================================================
// EXERCISE POOL
//
// Every exercise source (static catalog, program template, repository row,
// model output) is normalized into ExercisePoolEntry by its own adapter.
// Downstream code never looks at source-specific shapes.
// ============================================================================

import catalogJson from "./data/exerciseCatalog.json";
import { z } from "zod";
import type { Tier } from "./progressionModel.js";
import type { ExerciseTemplate } from "./programCatalog.js";
import { errorMessage } from "./middleware/errorHandler.js";

// ============================================================================
// TYPES
// ============================================================================

export const MUSCLE_GROUPS = ["chest", "back", "legs", "shoulders", "arms", "core", "cardio"] as const;
export type MuscleGroup = (typeof MUSCLE_GROUPS)[number];

export type Difficulty = 1 | 2 | 3 | 4;
export type PoolSource = "catalog" | "program" | "repository" | "model";

export type ExercisePoolEntry = {
  id: string;
  name: string;
  targetMuscle: string;
  equipment: string;
  difficulty: Difficulty;
  description: string | null;
  formTips: string | null;
  videoUrl: string | null;
  source: PoolSource;
};

export type ExerciseFilter = {
  muscles?: string[];
  maxDifficulty?: Difficulty;
  equipment?: string[];
  limit?: number;
};

export interface ExerciseRepository {
  query(filter: ExerciseFilter): Promise<ExercisePoolEntry[]>;
  findById(id: string): Promise<ExercisePoolEntry | null>;
  searchByName(name: string, limit?: number): Promise<ExercisePoolEntry[]>;
  createIfMissing(entry: ExercisePoolEntry): Promise<ExercisePoolEntry>;
}

export const DIFFICULTY_CEILING: Record<Tier, Difficulty> = {
  beginner: 2,
  intermediate: 3,
  advanced: 4,
};

export const BODYWEIGHT_EQUIPMENT = ["none", "bodyweight"];

export const FULL_BODY_MUSCLES: MuscleGroup[] = ["chest", "back", "legs"];

// ============================================================================
// NORMALIZATION HELPERS
// ============================================================================

export function clampDifficulty(value: unknown, fallback: Difficulty = 2): Difficulty {
  const n = typeof value === "number" ? value : typeof value === "string" ? Number(value) : NaN;
  if (!Number.isFinite(n)) return fallback;
  const r = Math.round(n);
  if (r <= 1) return 1;
  if (r === 2) return 2;
  if (r === 3) return 3;
  return 4;
}

const MUSCLE_ALIASES: Record<string, MuscleGroup> = {
  chest: "chest",
  pecs: "chest",
  back: "back",
  lats: "back",
  legs: "legs",
  leg: "legs",
  lower_body: "legs",
  quads: "legs",
  hamstrings: "legs",
  glutes: "legs",
  shoulders: "shoulders",
  shoulder: "shoulders",
  delts: "shoulders",
  arms: "arms",
  biceps: "arms",
  triceps: "arms",
  core: "core",
  abs: "core",
  cardio: "cardio",
};

export function normalizeMuscle(value: unknown): string {
  const key = String(value ?? "").trim().toLowerCase().replace(/[\s-]+/g, "_");
  if (!key) return "full_body";
  return MUSCLE_ALIASES[key] ?? key;
}

export function normalizeName(name: string): string {
  return name
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, " ")
    .trim();
}

export function slugify(name: string): string {
  return normalizeName(name).replace(/\s+/g, "_").toUpperCase();
}

function nonEmpty(value: unknown): string | null {
  if (typeof value !== "string") return null;
  const s = value.trim();
  return s ? s : null;
}

// ============================================================================
// ADAPTERS
// ============================================================================

export type CatalogItem = { id: string; name: string; equipment: string; difficulty: number };

export function fromCatalog(group: MuscleGroup, item: CatalogItem): ExercisePoolEntry {
  return {
    id: item.id,
    name: item.name,
    targetMuscle: group,
    equipment: item.equipment,
    difficulty: clampDifficulty(item.difficulty),
    description: null,
    formTips: null,
    videoUrl: null,
    source: "catalog",
  };
}

export function fromProgramTemplate(t: ExerciseTemplate, tier: Tier): ExercisePoolEntry {
  return {
    id: `PRG_${slugify(t.name)}`,
    name: t.name,
    targetMuscle: normalizeMuscle(t.target),
    equipment: "none",
    difficulty: DIFFICULTY_CEILING[tier],
    description: t.howTo,
    formTips: t.weightHint,
    videoUrl: null,
    source: "program",
  };
}

export type ExerciseRow = {
  id: string;
  name: string;
  muscle_group: string;
  equipment: string | null;
  difficulty: number | string | null;
  description: string | null;
  form_tips: string | null;
  video_url: string | null;
};

export function fromRepositoryRow(row: ExerciseRow): ExercisePoolEntry {
  return {
    id: String(row.id),
    name: row.name,
    targetMuscle: normalizeMuscle(row.muscle_group),
    equipment: nonEmpty(row.equipment) ?? "none",
    // repository allows 5; the pool ordinal stops at 4
    difficulty: clampDifficulty(row.difficulty),
    description: nonEmpty(row.description),
    formTips: nonEmpty(row.form_tips),
    videoUrl: nonEmpty(row.video_url),
    source: "repository",
  };
}

export type ModelExercise = {
  name: string;
  targetMuscle?: string | null;
  equipment?: string | null;
  instructions?: string | null;
};

export function fromModel(e: ModelExercise): ExercisePoolEntry {
  return {
    id: `AI_${slugify(e.name)}`,
    name: e.name.trim(),
    targetMuscle: normalizeMuscle(e.targetMuscle),
    equipment: nonEmpty(e.equipment) ?? "none",
    difficulty: 2,
    description: nonEmpty(e.instructions),
    formTips: null,
    videoUrl: null,
    source: "model",
  };
}

// ============================================================================
// STATIC CATALOG
// ============================================================================

const CatalogFileSchema = z.object({
  version: z.number().int(),
  groups: z.record(
    z.enum(MUSCLE_GROUPS),
    z.array(
      z.object({
        id: z.string().min(1),
        name: z.string().min(1),
        equipment: z.string().min(1),
        difficulty: z.number().int().min(1).max(5),
      })
    )
  ),
});

function loadCatalog(raw: unknown): ExercisePoolEntry[] {
  const parsed = CatalogFileSchema.parse(raw);
  const out: ExercisePoolEntry[] = [];
  for (const group of MUSCLE_GROUPS) {
    for (const item of parsed.groups[group] ?? []) out.push(fromCatalog(group, item));
  }
  return out;
}

export const EXERCISE_CATALOG: readonly ExercisePoolEntry[] = loadCatalog(catalogJson);

export function matchesFilter(e: ExercisePoolEntry, filter: ExerciseFilter): boolean {
  if (filter.muscles?.length && !filter.muscles.map(normalizeMuscle).includes(e.targetMuscle)) return false;
  if (filter.maxDifficulty && e.difficulty > filter.maxDifficulty) return false;
  if (filter.equipment) {
    const allowed = new Set([...filter.equipment.map((x) => x.toLowerCase()), ...BODYWEIGHT_EQUIPMENT]);
    if (!allowed.has(e.equipment.toLowerCase())) return false;
  }
  return true;
}

/** In-memory repository over the static catalog plus anything created at runtime. */
export class CatalogExerciseRepository implements ExerciseRepository {
  private entries: ExercisePoolEntry[];

  constructor(seed: readonly ExercisePoolEntry[] = EXERCISE_CATALOG) {
    this.entries = [...seed];
  }

  async query(filter: ExerciseFilter): Promise<ExercisePoolEntry[]> {
    const rows = this.entries.filter((e) => matchesFilter(e, filter));
    return filter.limit ? rows.slice(0, filter.limit) : rows;
  }

  async findById(id: string): Promise<ExercisePoolEntry | null> {
    return this.entries.find((e) => e.id === id) ?? null;
  }

  async searchByName(name: string, limit = 5): Promise<ExercisePoolEntry[]> {
    const match = findByFuzzyName(this.entries, name);
    const needle = normalizeName(name);
    const rest = this.entries.filter((e) => e !== match && needle && normalizeName(e.name).includes(needle));
    return (match ? [match, ...rest] : rest).slice(0, limit);
  }

  async createIfMissing(entry: ExercisePoolEntry): Promise<ExercisePoolEntry> {
    const existing = this.entries.find((e) => normalizeName(e.name) === normalizeName(entry.name));
    if (existing) return existing;
    this.entries.push(entry);
    return entry;
  }
}

// ============================================================================
// GOAL → MUSCLES
// ============================================================================

export type GoalTarget = MuscleGroup | "full_body";

// Order matters: matched groups are returned in this order.
export const GOAL_MUSCLE_KEYWORDS: ReadonlyArray<{ group: GoalTarget; keywords: string[] }> = [
  { group: "back", keywords: ["back", "lat", "lats"] },
  { group: "chest", keywords: ["chest", "pec"] },
  { group: "shoulders", keywords: ["shoulder", "deltoid", "delt"] },
  { group: "arms", keywords: ["arm", "bicep", "tricep"] },
  { group: "legs", keywords: ["leg", "quad", "hamstring", "thigh", "glute"] },
  { group: "core", keywords: ["core", "abs", "abdominal"] },
  { group: "full_body", keywords: ["full body", "full-body", "whole body"] },
];

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Every group with at least one keyword hit is returned (groups are not
 * mutually exclusive). A keyword matches at a word start, so "arm" hits
 * "arms" but not "warm". Specific groups win over "full_body".
 */
export function extractTargetMuscles(goal: string | null | undefined): GoalTarget[] {
  const text = String(goal ?? "").toLowerCase();
  if (!text.trim()) return [];

  const hits: GoalTarget[] = [];
  for (const { group, keywords } of GOAL_MUSCLE_KEYWORDS) {
    const hit = keywords.some((kw) => new RegExp(`(^|[^a-z])${escapeRegExp(kw)}`).test(text));
    if (hit) hits.push(group);
  }
  const specific = hits.filter((g) => g !== "full_body");
  if (specific.length) return specific;
  return hits;
}

export type MuscleSource = "goal" | "weekday" | "full_body";

export function resolveMuscles(args: {
  targetMuscles?: string[] | null;
  goal?: string | null;
}): { muscles: string[]; source: MuscleSource } {
  const fromGoal = extractTargetMuscles(args.goal);
  if (fromGoal.length && !fromGoal.includes("full_body")) {
    return { muscles: fromGoal, source: "goal" };
  }
  if (fromGoal.includes("full_body")) {
    return { muscles: [...FULL_BODY_MUSCLES], source: "full_body" };
  }
  const weekday = Array.from(new Set((args.targetMuscles ?? []).map(normalizeMuscle))).filter(
    (m) => m !== "full_body"
  );
  if (weekday.length) return { muscles: weekday, source: "weekday" };
  return { muscles: [...FULL_BODY_MUSCLES], source: "full_body" };
}

// ============================================================================
// POOL BUILDING
// ============================================================================

export const RELAXED_POOL_SIZE = 3;

/** Difficulty + equipment filter; zero survivors relaxes to the first 3 unfiltered candidates. */
export function selectPool(
  candidates: readonly ExercisePoolEntry[],
  opts: { tier: Tier; equipment?: string[] | null }
): { entries: ExercisePoolEntry[]; relaxed: boolean } {
  const filtered = candidates.filter((e) =>
    matchesFilter(e, {
      maxDifficulty: DIFFICULTY_CEILING[opts.tier],
      equipment: opts.equipment ?? undefined,
    })
  );
  if (filtered.length > 0) return { entries: filtered, relaxed: false };
  return { entries: candidates.slice(0, RELAXED_POOL_SIZE), relaxed: candidates.length > 0 };
}

export type PoolRequest = {
  tier: Tier;
  targetMuscles?: string[] | null;
  goal?: string | null;
  equipment?: string[] | null;
  recentExerciseNames?: string[];
};

export type PoolResult = {
  entries: ExercisePoolEntry[];
  muscles: string[];
  muscleSource: MuscleSource;
  relaxed: boolean;
};

/** Moves exercises done recently to the back so fresh ones come first. */
export function rotateRecent(entries: ExercisePoolEntry[], recentNames: readonly string[]): ExercisePoolEntry[] {
  if (!recentNames.length) return entries;
  const recent = new Set(recentNames.map(normalizeName));
  const fresh = entries.filter((e) => !recent.has(normalizeName(e.name)));
  const stale = entries.filter((e) => recent.has(normalizeName(e.name)));
  return [...fresh, ...stale];
}

async function loadCandidates(repo: ExerciseRepository, muscles: string[]): Promise<ExercisePoolEntry[]> {
  const byMuscle = await repo.query({ muscles });
  if (byMuscle.length) return byMuscle;
  // nothing tagged with these muscles: widen to the whole source
  return repo.query({});
}

export async function buildPool(repo: ExerciseRepository, req: PoolRequest): Promise<PoolResult> {
  const { muscles, source } = resolveMuscles(req);

  let candidates: ExercisePoolEntry[];
  try {
    candidates = await loadCandidates(repo, muscles);
  } catch (err) {
    console.warn("[POOL] repository query failed, using built-in catalog:", errorMessage(err));
    candidates = EXERCISE_CATALOG.filter((e) => matchesFilter(e, { muscles }));
  }

  const { entries, relaxed } = selectPool(candidates, { tier: req.tier, equipment: req.equipment });
  if (relaxed) {
    console.warn(`[POOL] filters left nothing for ${req.tier} (${muscles.join(", ")}), relaxed to ${entries.length}`);
  }
  return {
    entries: rotateRecent(entries, req.recentExerciseNames ?? []),
    muscles,
    muscleSource: source,
    relaxed,
  };
}

// ============================================================================
// NAME MATCHING
// ============================================================================

function tokens(s: string): string[] {
  return normalizeName(s).split(" ").filter(Boolean);
}

/** Exact normalized name, then containment, then token overlap of at least one half. */
export function findByFuzzyName<T extends { name: string }>(entries: readonly T[], name: string): T | null {
  const needle = normalizeName(name);
  if (!needle) return null;

  const exact = entries.find((e) => normalizeName(e.name) === needle);
  if (exact) return exact;

  const contained = entries.find((e) => {
    const n = normalizeName(e.name);
    return n !== "" && (n.includes(needle) || needle.includes(n));
  });
  if (contained) return contained;

  const needleTokens = new Set(tokens(name));
  let best: T | null = null;
  let bestScore = 0;
  for (const e of entries) {
    const t = tokens(e.name);
    const union = new Set([...t, ...needleTokens]);
    const shared = t.filter((x) => needleTokens.has(x)).length;
    const score = union.size ? shared / union.size : 0;
    if (score > bestScore) {
      best = e;
      bestScore = score;
    }
  }
  return bestScore >= 0.5 ? best : null;
}
