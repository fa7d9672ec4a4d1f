// api/src/toolLoop.ts
// ============================================================================
// TOOL LOOP
//
// The model may look up pool data through three read-only tools before it
// answers. At most MAX_TOOL_ITERATIONS tool calls are served; after that, or
// when a turn carries neither text nor a tool call, one last call is made
// with tools disabled. Total backend calls never exceed MAX + 1.
// ============================================================================

import type { ConditionSnapshot } from "./conditionScorer.js";
import { conditionDirective } from "./conditionScorer.js";
import {
  DIFFICULTY_CEILING,
  normalizeMuscle,
  normalizeName,
  type ExercisePoolEntry,
  type ExerciseRepository,
} from "./exercisePool.js";
import type { ChatTurn, GenerativeBackend, ToolCall, ToolSpec } from "./llm.js";
import { errorMessage } from "./middleware/errorHandler.js";
import type { Tier } from "./progressionModel.js";
import { FITNESS_FACTORS, VARIABLE_GUIDELINES, type FitnessFactor } from "./trainingGuidelines.js";

export const MAX_TOOL_ITERATIONS = 10;

export const RESPOND_NOW =
  "Stop calling tools. Respond now with the final routine as a single JSON object that follows the schema.";

export const TOOL_SPECS: ToolSpec[] = [
  {
    name: "get_exercise_pool",
    description: "Returns every exercise available for today's routine with id, name, target muscle, equipment and difficulty.",
    parameters: { type: "object", properties: {} },
  },
  {
    name: "search_exercises",
    description: "Finds exercises for one muscle group, optionally narrowed by movement type.",
    parameters: {
      type: "object",
      properties: {
        muscle: { type: "string", description: "chest, back, legs, shoulders, arms, core or cardio" },
        movement_type: { type: "string", enum: ["compound", "isolation", "push", "pull"] },
        limit: { type: "integer", minimum: 1, maximum: 20 },
      },
      required: ["muscle"],
    },
  },
  {
    name: "get_training_variables",
    description: "Returns sets, reps, RPE, rest, tempo and volume guidelines for the user's tier.",
    parameters: {
      type: "object",
      properties: {
        include_condition_adjustment: { type: "boolean" },
      },
    },
  },
];

// ----------------------------------------------------------------------------
// Movement-type filters
// ----------------------------------------------------------------------------

export type MovementType = "compound" | "isolation" | "push" | "pull";

const MOVEMENT_KEYWORDS: Record<MovementType, string[]> = {
  compound: ["press", "squat", "deadlift", "row", "pull up", "pull-up", "chin", "lunge", "dip", "push up", "push-up", "clean", "burpee"],
  isolation: ["curl", "extension", "raise", "fly", "kickback", "crunch", "calf"],
  push: ["press", "push", "dip", "fly", "extension", "raise"],
  pull: ["pull", "row", "curl", "deadlift", "pulldown", "chin"],
};

export function parseMovementType(value: unknown): MovementType | null {
  const v = String(value ?? "").trim().toLowerCase();
  switch (v) {
    case "compound":
    case "isolation":
    case "push":
    case "pull":
      return v;
    default:
      return null;
  }
}

export function matchesMovement(name: string, type: MovementType): boolean {
  const n = name.toLowerCase();
  const plain = normalizeName(name);
  return MOVEMENT_KEYWORDS[type].some((kw) => n.includes(kw) || plain.includes(normalizeName(kw)));
}

// ----------------------------------------------------------------------------
// Executor
// ----------------------------------------------------------------------------

export type ToolContext = {
  pool: readonly ExercisePoolEntry[];
  muscles: readonly string[];
  tier: Tier;
  factor: FitnessFactor;
  condition: ConditionSnapshot;
  equipment?: string[] | null;
  repository?: ExerciseRepository | null;
};

export type ToolResult = { ok: boolean; content: string };

function poolRow(e: ExercisePoolEntry) {
  return { id: e.id, name: e.name, target_muscle: e.targetMuscle, equipment: e.equipment, difficulty: e.difficulty };
}

function clampLimit(value: unknown): number {
  const n = typeof value === "number" ? value : Number(value);
  if (!Number.isFinite(n)) return 10;
  return Math.max(1, Math.min(20, Math.trunc(n)));
}

async function searchExercises(ctx: ToolContext, input: Record<string, unknown>): Promise<ToolResult> {
  if (typeof input.muscle !== "string" || !input.muscle.trim()) {
    return { ok: false, content: JSON.stringify({ error: "muscle is required" }) };
  }
  const muscle = normalizeMuscle(input.muscle);
  const movement = parseMovementType(input.movement_type);
  const limit = clampLimit(input.limit);

  let candidates = ctx.pool.filter((e) => e.targetMuscle === muscle);
  if (ctx.repository) {
    try {
      const fromRepo = await ctx.repository.query({
        muscles: [muscle],
        maxDifficulty: DIFFICULTY_CEILING[ctx.tier],
        equipment: ctx.equipment ?? undefined,
      });
      const seen = new Set(candidates.map((e) => e.id));
      candidates = [...candidates, ...fromRepo.filter((e) => !seen.has(e.id))];
    } catch (err) {
      console.warn("[TOOLS] repository search failed, using pool only:", errorMessage(err));
    }
  }
  if (movement) candidates = candidates.filter((e) => matchesMovement(e.name, movement));

  const exercises = candidates.slice(0, limit).map(poolRow);
  return { ok: true, content: JSON.stringify({ muscle, movement_type: movement, count: exercises.length, exercises }) };
}

function trainingVariables(ctx: ToolContext, input: Record<string, unknown>): ToolResult {
  const g = VARIABLE_GUIDELINES[ctx.tier];
  const factor = FITNESS_FACTORS[ctx.factor];
  const payload: Record<string, unknown> = {
    tier: ctx.tier,
    fitness_factor: ctx.factor,
    method: factor.method,
    typical_bpm: factor.typicalBpm,
    typical_rest_seconds: factor.typicalRest,
    sets_per_exercise: g.setsPerExercise,
    reps_range: g.repsRange,
    rpe_range: g.rpeRange,
    rest_seconds: g.restSeconds,
    total_sets: g.totalSets,
    exercises_count: g.exercisesCount,
    tempo: g.tempo,
    rom: g.rom,
    progression: g.progression,
    weight_guide: g.weightGuide,
    notes: g.notes,
  };
  if (input.include_condition_adjustment === true) {
    payload.condition = {
      score: ctx.condition.score,
      band: ctx.condition.band,
      volume_modifier: ctx.condition.volumeModifier,
      intensity_modifier: ctx.condition.intensityModifier,
      directive: conditionDirective(ctx.condition),
    };
  }
  return { ok: true, content: JSON.stringify(payload) };
}

export async function executeTool(ctx: ToolContext, call: Pick<ToolCall, "name" | "input">): Promise<ToolResult> {
  switch (call.name) {
    case "get_exercise_pool":
      return {
        ok: true,
        content: JSON.stringify({ muscles: ctx.muscles, count: ctx.pool.length, exercises: ctx.pool.map(poolRow) }),
      };
    case "search_exercises":
      return searchExercises(ctx, call.input);
    case "get_training_variables":
      return trainingVariables(ctx, call.input);
    default:
      return { ok: false, content: JSON.stringify({ error: `unknown tool: ${call.name}` }) };
  }
}

// ----------------------------------------------------------------------------
// Loop
// ----------------------------------------------------------------------------

export type ToolTraceEntry = {
  iteration: number;
  tool: string;
  input: Record<string, unknown>;
  ok: boolean;
};

export type ToolLoopResult = {
  text: string | null;
  error: string | null;
  trace: ToolTraceEntry[];
  /** backend calls made, including the forced final one */
  calls: number;
  forced: boolean;
};

export async function runToolLoop(
  llm: GenerativeBackend,
  args: {
    prompt: string;
    system?: string;
    execute: (call: ToolCall) => Promise<ToolResult>;
    maxIterations?: number;
  }
): Promise<ToolLoopResult> {
  const maxIterations = Math.max(0, args.maxIterations ?? MAX_TOOL_ITERATIONS);
  const history: ChatTurn[] = [];
  const trace: ToolTraceEntry[] = [];
  let calls = 0;

  for (let iteration = 1; iteration <= maxIterations; iteration++) {
    calls++;
    const res = await llm.generate({ prompt: args.prompt, system: args.system, tools: TOOL_SPECS, history });
    if (!res.success) {
      return { text: null, error: res.error, trace, calls, forced: false };
    }
    if (res.toolCall) {
      const call = res.toolCall;
      let result: ToolResult;
      try {
        result = await args.execute(call);
      } catch (err) {
        result = { ok: false, content: JSON.stringify({ error: errorMessage(err) }) };
      }
      trace.push({ iteration, tool: call.name, input: call.input, ok: result.ok });
      history.push({ role: "assistant", content: res.text, toolCall: call });
      history.push({ role: "tool", toolCallId: call.id, content: result.content });
      continue;
    }
    if (res.text) {
      return { text: res.text, error: null, trace, calls, forced: false };
    }
    console.warn(`[TOOLS] model stalled at iteration ${iteration}, forcing a final answer`);
    break;
  }

  calls++;
  const final = await llm.generate({
    prompt: args.prompt,
    system: args.system,
    history: [...history, { role: "user", content: RESPOND_NOW }],
    json: true,
  });
  if (!final.success) return { text: null, error: final.error, trace, calls, forced: true };
  return { text: final.text, error: null, trace, calls, forced: true };
}
