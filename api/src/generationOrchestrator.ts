// api/src/generationOrchestrator.ts
// ============================================================================
// ROUTINE GENERATION
//
// BUILD_CONTEXT → ASSEMBLE_PROMPT → INVOKE → VALIDATE → PARSE | FALLBACK
//   → ENRICH → DONE
//
// One orchestrator, three strategies:
//   catalog  - today's program template resolved through the exercise pool
//   creative - a single model call over the pool
//   tool     - the model reads the pool through tools (toolLoop.ts)
// generate() always returns a usable routine.
// ============================================================================

import { randomBytes } from "node:crypto";
import { config, type GenerationStrategy } from "./config.js";
import { assessCondition, type ConditionInput, type ConditionSnapshot } from "./conditionScorer.js";
import {
  buildPool,
  EXERCISE_CATALOG,
  findByFuzzyName,
  fromModel,
  fromProgramTemplate,
  normalizeName,
  slugify,
  type ExercisePoolEntry,
  type ExerciseRepository,
  type PoolResult,
  type PoolSource,
} from "./exercisePool.js";
import {
  gatherPromptKnowledge,
  knowledgePromptBlock,
  type KnowledgeRetriever,
  type PromptKnowledge,
  type VideoReference,
} from "./knowledgeRetriever.js";
import type { GenerativeBackend } from "./llm.js";
import { errorMessage } from "./middleware/errorHandler.js";
import { cycleWeek, isFillToTotal, workoutFor, type ExerciseTemplate, type ProgramDay, type Rom } from "./programCatalog.js";
import { MIN_LEVEL, tierFor, type Level, type Tier } from "./progressionModel.js";
import { buildRoutinePrompt, buildSystemPrompt } from "./routinePrompt.js";
import { parseRoutineResponse, positiveIntOr, type ModelExerciseJson, type ModelRoutineJson } from "./routineParser.js";
import type { HistoryRepository, ProfileStore, RoutineStore, UserProfile } from "./stores.js";
import { executeTool, runToolLoop, type ToolContext, type ToolTraceEntry } from "./toolLoop.js";
import {
  BASELINE_REPS,
  BASELINE_SETS,
  DEFAULT_REST_SECONDS,
  FITNESS_FACTORS,
  normalizeWeekday,
  WEEKLY_STRUCTURE,
  type Weekday,
} from "./trainingGuidelines.js";

// ============================================================================
// TYPES
// ============================================================================

export type RoutineExercise = {
  id: string;
  name: string;
  targetMuscle: string;
  equipment: string;
  sets: number | null;
  reps: number | string | null;
  /** fill-to-total mode: total reps to accumulate across sets */
  targetTotalReps: number | null;
  workSeconds: number | null;
  restSeconds: number;
  bpm: number | null;
  rom: Rom | null;
  instructions: string | null;
  weightGuide: string | null;
  source: PoolSource;
  tips: string[];
  videoReferences: VideoReference[];
};

export type GenerationMethod = GenerationStrategy | "fallback";

export type GeneratedRoutine = {
  routineId: string;
  generatedAt: string;
  userId: string;
  level: Level;
  tier: Tier;
  day: Weekday;
  week: number;
  routineName: string;
  trainingFocus: string;
  exercises: RoutineExercise[];
  estimatedDuration: number;
  condition: ConditionSnapshot;
  notes: { warmup: string | null; cooldown: string | null; coach: string | null };
  creative: boolean;
  generationMethod: GenerationMethod;
  fallbackReason: string | null;
  knowledgeSources: PromptKnowledge["sources"];
  toolTrace: ToolTraceEntry[];
  persistenceError: string | null;
};

export type GenerateRoutineRequest = {
  userId: string;
  /** 0..7; defaults to today */
  weekday?: number | null;
  week?: number | null;
  condition?: ConditionInput | null;
  /** overrides the profile's fitness goal */
  goal?: string | null;
  equipment?: string[] | null;
  strategy?: GenerationStrategy;
};

export type OrchestratorDeps = {
  exercises: ExerciseRepository;
  llm: GenerativeBackend;
  profiles: ProfileStore;
  history: HistoryRepository;
  knowledge?: KnowledgeRetriever | null;
  routines?: RoutineStore | null;
  strategy?: GenerationStrategy;
  now?: () => Date;
  randomHex?: () => string;
};

type GenerationContext = {
  userId: string;
  level: Level;
  tier: Tier;
  weekday: Weekday;
  week: number;
  heightCm: number | null;
  goal: string | null;
  condition: ConditionSnapshot;
  template: ProgramDay | null;
  pool: PoolResult;
  recentExercises: string[];
  equipment: string[] | null;
};

type FallbackBase = Pick<GenerationContext, "userId" | "level" | "tier" | "weekday" | "week" | "condition">;

// ============================================================================
// CONSTANTS
// ============================================================================

export const RECENT_EXERCISE_LIMIT = 10;
export const DEFAULT_WORK_SECONDS = 30;
export const FALLBACK_DURATION_MINUTES = 45;
const WARMUP_MINUTES = 10;

export const TIME_BASED_KEYWORDS = ["plank", "hold", "wall sit", "dead hang", "carry"];

const FALLBACK_EXERCISES: ReadonlyArray<{
  name: string;
  targetMuscle: string;
  sets: number;
  reps: number | null;
  workSeconds: number | null;
  restSeconds: number;
  instructions: string;
}> = [
  {
    name: "Push-up",
    targetMuscle: "chest",
    sets: 3,
    reps: 10,
    workSeconds: null,
    restSeconds: 60,
    instructions: "Hands under shoulders, body in one line, lower the chest to just above the floor.",
  },
  {
    name: "Bodyweight Squat",
    targetMuscle: "legs",
    sets: 3,
    reps: 10,
    workSeconds: null,
    restSeconds: 60,
    instructions: "Feet shoulder-width apart, sit back and down, knees track over the toes.",
  },
  {
    name: "Plank",
    targetMuscle: "core",
    sets: 3,
    reps: null,
    workSeconds: 30,
    restSeconds: 45,
    instructions: "Forearms under shoulders, squeeze the glutes, keep the hips level.",
  },
];

// ============================================================================
// HELPERS
// ============================================================================

export function isTimeBased(name: string): boolean {
  const n = normalizeName(name);
  return TIME_BASED_KEYWORDS.some((kw) => new RegExp(`(^|\\s)${normalizeName(kw)}`).test(n));
}

export function makeRoutineId(level: Level, day: Weekday, now: Date, hex: string): string {
  return `RT-${level}-D${day}-${Math.floor(now.getTime() / 1000)}-${hex}`;
}

export function makeFallbackRoutineId(level: Level, now: Date, hex: string): string {
  return `RT-FALLBACK-${level}-${Math.floor(now.getTime() / 1000)}-${hex}`;
}

/** Rough session length: work + rest per set, plus warm-up. */
export function estimateDuration(exercises: readonly RoutineExercise[]): number {
  let seconds = 0;
  for (const e of exercises) {
    const repsPerSet = e.targetTotalReps ? 20 : typeof e.reps === "number" ? e.reps : BASELINE_REPS;
    const sets = e.sets ?? (e.targetTotalReps ? Math.ceil(e.targetTotalReps / repsPerSet) : BASELINE_SETS);
    const work = e.workSeconds ?? repsPerSet * 3;
    seconds += sets * (work + e.restSeconds);
  }
  return Math.round(seconds / 60) + WARMUP_MINUTES;
}

function entryToExercise(entry: ExercisePoolEntry): Omit<RoutineExercise, "sets" | "reps" | "targetTotalReps" | "workSeconds" | "restSeconds" | "instructions" | "weightGuide"> {
  return {
    id: entry.id,
    name: entry.name,
    targetMuscle: entry.targetMuscle,
    equipment: entry.equipment,
    bpm: null,
    rom: null,
    source: entry.source,
    tips: [],
    videoReferences: [],
  };
}

export function exerciseFromModel(entry: ExercisePoolEntry, e: ModelExerciseJson, tier: Tier): RoutineExercise {
  const timed = isTimeBased(entry.name) || isTimeBased(e.name);
  return {
    ...entryToExercise(entry),
    sets: positiveIntOr(e.sets, BASELINE_SETS, 20),
    reps: timed ? null : positiveIntOr(e.reps, BASELINE_REPS),
    targetTotalReps: null,
    workSeconds: timed ? positiveIntOr(e.work_seconds, DEFAULT_WORK_SECONDS, 600) : null,
    restSeconds: positiveIntOr(e.rest_seconds, DEFAULT_REST_SECONDS[tier], 600),
    instructions: e.instructions?.trim() || entry.description || entry.formTips,
    weightGuide: e.weight_guide?.trim() || null,
  };
}

/** Template values are kept as written; numeric sets and total reps scale with condition volume. */
export function exerciseFromTemplate(
  entry: ExercisePoolEntry,
  t: ExerciseTemplate,
  condition: Pick<ConditionSnapshot, "volumeModifier">
): RoutineExercise {
  const vm = condition.volumeModifier;
  const fill = isFillToTotal(t);
  return {
    ...entryToExercise(entry),
    sets: t.sets === null ? null : Math.max(1, Math.round(t.sets * vm)),
    reps: t.reps,
    targetTotalReps: fill && typeof t.reps === "number" ? Math.round(t.reps * vm) : null,
    workSeconds: t.workSeconds ?? (isTimeBased(t.name) ? DEFAULT_WORK_SECONDS : null),
    restSeconds: t.restSeconds,
    bpm: t.bpm,
    rom: t.rom,
    instructions: t.howTo ?? entry.description,
    weightGuide: t.weightHint,
  };
}

export function fallbackExercises(): RoutineExercise[] {
  return FALLBACK_EXERCISES.map((f) => {
    const known = EXERCISE_CATALOG.find((e) => e.name === f.name);
    return {
      id: known?.id ?? `FB_${slugify(f.name)}`,
      name: f.name,
      targetMuscle: f.targetMuscle,
      equipment: "none",
      sets: f.sets,
      reps: f.reps,
      targetTotalReps: null,
      workSeconds: f.workSeconds,
      restSeconds: f.restSeconds,
      bpm: null,
      rom: null,
      instructions: f.instructions,
      weightGuide: "Bodyweight",
      source: "catalog",
      tips: [],
      videoReferences: [],
    };
  });
}

// ============================================================================
// ORCHESTRATOR
// ============================================================================

export class GenerationOrchestrator {
  private readonly now: () => Date;
  private readonly randomHex: () => string;

  constructor(private readonly deps: OrchestratorDeps) {
    this.now = deps.now ?? (() => new Date());
    this.randomHex = deps.randomHex ?? (() => randomBytes(4).toString("hex"));
  }

  async generate(req: GenerateRoutineRequest): Promise<GeneratedRoutine> {
    const now = this.now();
    const strategy = req.strategy ?? this.deps.strategy ?? config.generationStrategy;
    const condition = assessCondition(req.condition);

    const profile = await this.loadProfile(req.userId);
    const level = profile?.level ?? MIN_LEVEL;
    const tier = tierFor(level);
    const base: FallbackBase = {
      userId: req.userId,
      level,
      tier,
      weekday: normalizeWeekday(req.weekday ?? now.getDay()),
      week: cycleWeek(tier, req.week ?? 1),
      condition,
    };

    let routine: GeneratedRoutine;
    try {
      const ctx = await this.buildContext(req, base, profile);
      routine = strategy === "catalog" ? await this.fromCatalog(ctx, now) : await this.fromModel(ctx, strategy, now);
    } catch (err) {
      console.error(`[ROUTINE] generation failed for ${req.userId}, using fallback:`, errorMessage(err));
      routine = this.fallback(base, "internal_error", now);
    }

    if (this.deps.knowledge) {
      routine.exercises = await this.deps.knowledge.enrichExercises(routine.exercises, routine.tier);
    }

    routine.persistenceError = await this.persist(routine);
    console.log(
      `[ROUTINE] ${routine.routineId} user=${routine.userId} strategy=${strategy} method=${routine.generationMethod} exercises=${routine.exercises.length}`
    );
    return routine;
  }

  // --------------------------------------------------------------------------
  // BUILD_CONTEXT
  // --------------------------------------------------------------------------

  private async loadProfile(userId: string): Promise<UserProfile | null> {
    let profile: UserProfile | null = null;
    try {
      profile = await this.deps.profiles.getProfile(userId);
    } catch (err) {
      console.warn(`[ROUTINE] profile read failed for ${userId}:`, errorMessage(err));
    }
    if (!profile) console.warn(`[ROUTINE] no profile for ${userId}, assuming level ${MIN_LEVEL}`);
    return profile;
  }

  private async buildContext(
    req: GenerateRoutineRequest,
    base: FallbackBase,
    profile: UserProfile | null
  ): Promise<GenerationContext> {
    const { tier, weekday } = base;
    const template = workoutFor(tier, base.week, weekday);
    const goal = req.goal?.trim() || profile?.fitnessGoal || null;

    let recentExercises: string[] = [];
    try {
      recentExercises = await this.deps.history.recentExerciseNames(req.userId, RECENT_EXERCISE_LIMIT);
    } catch (err) {
      console.warn(`[ROUTINE] history read failed for ${req.userId}:`, errorMessage(err));
    }

    const pool = await buildPool(this.deps.exercises, {
      tier,
      targetMuscles: template?.exercises.map((e) => e.target) ?? [],
      goal,
      equipment: req.equipment,
      recentExerciseNames: recentExercises,
    });

    return {
      ...base,
      heightCm: profile?.heightCm ?? null,
      goal,
      template,
      pool,
      recentExercises,
      equipment: req.equipment ?? null,
    };
  }

  // --------------------------------------------------------------------------
  // catalog strategy
  // --------------------------------------------------------------------------

  private async fromCatalog(ctx: GenerationContext, now: Date): Promise<GeneratedRoutine> {
    const template = ctx.template;
    if (!template) return this.fallback(ctx, "no_template", now);

    const exercises: RoutineExercise[] = [];
    for (const t of template.exercises) {
      const entry = await this.resolveTemplateExercise(t, ctx);
      exercises.push(exerciseFromTemplate(entry, t, ctx.condition));
    }

    return {
      ...this.base(ctx, now),
      routineName: `${WEEKLY_STRUCTURE[ctx.weekday].day} ${template.trainingTypeLabel}`,
      trainingFocus: template.trainingTypeLabel,
      exercises,
      estimatedDuration: estimateDuration(exercises),
      notes: { warmup: null, cooldown: null, coach: template.purpose },
      creative: false,
      generationMethod: "catalog",
    };
  }

  // exact names only: "Squat" must not turn into "Pole Squat"
  private async resolveTemplateExercise(t: ExerciseTemplate, ctx: GenerationContext): Promise<ExercisePoolEntry> {
    const key = normalizeName(t.name);
    const inPool = ctx.pool.entries.find((e) => normalizeName(e.name) === key);
    if (inPool) return inPool;
    try {
      const found = await this.deps.exercises.searchByName(t.name, 5);
      const exact = found.find((e) => normalizeName(e.name) === key);
      if (exact) return exact;
    } catch (err) {
      console.warn(`[ROUTINE] exercise lookup failed for "${t.name}":`, errorMessage(err));
    }
    return fromProgramTemplate(t, ctx.tier);
  }

  // --------------------------------------------------------------------------
  // creative / tool strategies
  // --------------------------------------------------------------------------

  private async fromModel(
    ctx: GenerationContext,
    strategy: Exclude<GenerationStrategy, "catalog">,
    now: Date
  ): Promise<GeneratedRoutine> {
    const knowledge = await this.promptKnowledge(ctx);
    const withTools = strategy === "tool" && this.deps.llm.supportsTools;

    const system = buildSystemPrompt(withTools);
    const prompt = buildRoutinePrompt({
      level: ctx.level,
      tier: ctx.tier,
      weekday: ctx.weekday,
      heightCm: ctx.heightCm,
      goal: ctx.goal,
      condition: ctx.condition,
      template: ctx.template,
      pool: ctx.pool.entries,
      muscles: ctx.pool.muscles,
      recentExercises: ctx.recentExercises,
      knowledgeBlock: knowledgePromptBlock(knowledge),
      withTools,
    });

    let text: string | null;
    let toolTrace: ToolTraceEntry[] = [];
    const extra = { knowledgeSources: knowledge.sources };

    if (withTools) {
      const toolCtx: ToolContext = {
        pool: ctx.pool.entries,
        muscles: ctx.pool.muscles,
        tier: ctx.tier,
        factor: WEEKLY_STRUCTURE[ctx.weekday].factor,
        condition: ctx.condition,
        equipment: ctx.equipment,
        repository: this.deps.exercises,
      };
      const loop = await runToolLoop(this.deps.llm, { prompt, system, execute: (call) => executeTool(toolCtx, call) });
      toolTrace = loop.trace;
      if (loop.error) {
        console.warn(`[ROUTINE] tool loop failed after ${loop.calls} calls: ${loop.error}`);
        return this.fallback(ctx, "llm_error", now, { ...extra, toolTrace });
      }
      text = loop.text;
    } else {
      const res = await this.deps.llm.generate({ prompt, system, json: true });
      if (!res.success) {
        console.warn(`[ROUTINE] model call failed: ${res.error}`);
        return this.fallback(ctx, "llm_error", now, extra);
      }
      text = res.text;
    }

    if (!text) return this.fallback(ctx, "empty_response", now, { ...extra, toolTrace });

    const parsed = parseRoutineResponse(text);
    if (!parsed.ok) {
      console.warn(`[ROUTINE] model output rejected (${parsed.reason})${parsed.detail ? `: ${parsed.detail}` : ""}`);
      return this.fallback(ctx, parsed.reason, now, { ...extra, toolTrace });
    }

    const exercises = await this.resolveExercises(parsed.routine, ctx);
    const factor = FITNESS_FACTORS[WEEKLY_STRUCTURE[ctx.weekday].factor];

    return {
      ...this.base(ctx, now),
      routineName: parsed.routine.routine_name?.trim() || `${WEEKLY_STRUCTURE[ctx.weekday].day} workout`,
      trainingFocus: parsed.routine.training_focus?.trim() || factor.label,
      exercises,
      estimatedDuration: positiveIntOr(parsed.routine.estimated_duration, estimateDuration(exercises), 180),
      notes: {
        warmup: parsed.routine.warmup_notes ?? null,
        cooldown: parsed.routine.cooldown_notes ?? null,
        coach: parsed.routine.coach_message ?? null,
      },
      creative: true,
      generationMethod: withTools ? "tool" : "creative",
      knowledgeSources: knowledge.sources,
      toolTrace,
    };
  }

  private async promptKnowledge(ctx: GenerationContext): Promise<PromptKnowledge> {
    const empty: PromptKnowledge = { programs: [], techniques: [], sources: [] };
    if (!this.deps.knowledge) return empty;
    const factor = FITNESS_FACTORS[WEEKLY_STRUCTURE[ctx.weekday].factor];
    const query = [ctx.goal ?? "", factor.label, ...ctx.pool.muscles].join(" ").trim();
    return gatherPromptKnowledge(this.deps.knowledge, {
      userId: ctx.userId,
      query,
      tier: ctx.tier,
      muscles: [...ctx.pool.muscles],
    });
  }

  private async resolveExercises(routine: ModelRoutineJson, ctx: GenerationContext): Promise<RoutineExercise[]> {
    const out: RoutineExercise[] = [];
    const seen = new Set<string>();
    for (const e of routine.exercises) {
      const entry = await this.resolveModelExercise(e, ctx);
      if (seen.has(entry.id)) continue;
      seen.add(entry.id);
      out.push(exerciseFromModel(entry, e, ctx.tier));
    }
    return out;
  }

  // id → fuzzy name → create-if-missing
  private async resolveModelExercise(e: ModelExerciseJson, ctx: GenerationContext): Promise<ExercisePoolEntry> {
    const id = e.exercise_id?.trim() || e.id?.trim() || null;
    if (id) {
      const inPool = ctx.pool.entries.find((p) => p.id === id);
      if (inPool) return inPool;
      try {
        const found = await this.deps.exercises.findById(id);
        if (found) return found;
      } catch (err) {
        console.warn(`[ROUTINE] exercise lookup by id ${id} failed:`, errorMessage(err));
      }
    }

    const fuzzy = findByFuzzyName(ctx.pool.entries, e.name);
    if (fuzzy) return fuzzy;

    const candidate = fromModel({
      name: e.name,
      targetMuscle: e.target_muscle,
      equipment: e.equipment,
      instructions: e.instructions,
    });
    try {
      const created = await this.deps.exercises.createIfMissing(candidate);
      if (created.id === candidate.id) console.log(`[ROUTINE] added model exercise "${candidate.name}"`);
      return created;
    } catch (err) {
      console.warn(`[ROUTINE] could not store model exercise "${candidate.name}":`, errorMessage(err));
      return candidate;
    }
  }

  // --------------------------------------------------------------------------
  // FALLBACK / persistence
  // --------------------------------------------------------------------------

  private base(ctx: FallbackBase, now: Date, routineId = makeRoutineId(ctx.level, ctx.weekday, now, this.randomHex())) {
    return {
      routineId,
      generatedAt: now.toISOString(),
      userId: ctx.userId,
      level: ctx.level,
      tier: ctx.tier,
      day: ctx.weekday,
      week: ctx.week,
      condition: ctx.condition,
      fallbackReason: null,
      knowledgeSources: [],
      toolTrace: [],
      persistenceError: null,
    };
  }

  private fallback(
    ctx: FallbackBase,
    reason: string,
    now: Date,
    extra: { knowledgeSources?: PromptKnowledge["sources"]; toolTrace?: ToolTraceEntry[] } = {}
  ): GeneratedRoutine {
    console.warn(`[ROUTINE] fallback routine for ${ctx.userId} (${reason})`);
    return {
      ...this.base(ctx, now, makeFallbackRoutineId(ctx.level, now, this.randomHex())),
      routineName: "Bodyweight basics",
      trainingFocus: "General conditioning",
      exercises: fallbackExercises(),
      estimatedDuration: FALLBACK_DURATION_MINUTES,
      notes: {
        warmup: "5 minutes of easy cardio and joint circles.",
        cooldown: "5 minutes of light stretching.",
        coach: "A simple bodyweight session today. Keep the form clean and the pace steady.",
      },
      creative: false,
      generationMethod: "fallback",
      fallbackReason: reason,
      knowledgeSources: extra.knowledgeSources ?? [],
      toolTrace: extra.toolTrace ?? [],
    };
  }

  private async persist(routine: GeneratedRoutine): Promise<string | null> {
    if (!this.deps.routines) return null;
    try {
      await this.deps.routines.saveRoutine(routine);
      return null;
    } catch (err) {
      const message = errorMessage(err);
      console.error(`[ROUTINE] failed to save ${routine.routineId}:`, message);
      return message;
    }
  }
}
