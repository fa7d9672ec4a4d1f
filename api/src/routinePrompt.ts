// api/src/routinePrompt.ts
// System and user prompts for routine generation.

import { conditionDirective, type ConditionSnapshot } from "./conditionScorer.js";
import type { ExercisePoolEntry } from "./exercisePool.js";
import type { ProgramDay } from "./programCatalog.js";
import { calculateTargetWeight, gradeFor, MAIN_LIFTS, type Level, type Tier } from "./progressionModel.js";
import {
  FITNESS_FACTORS,
  formatRange,
  VARIABLE_GUIDELINES,
  WEEKLY_STRUCTURE,
  type Weekday,
} from "./trainingGuidelines.js";

export type RoutinePromptInput = {
  level: Level;
  tier: Tier;
  weekday: Weekday;
  heightCm: number | null;
  goal: string | null;
  condition: ConditionSnapshot;
  template: ProgramDay | null;
  pool: readonly ExercisePoolEntry[];
  muscles: readonly string[];
  recentExercises: readonly string[];
  knowledgeBlock: string;
  /** the tool loop lets the model fetch the pool itself */
  withTools?: boolean;
};

export const ROUTINE_JSON_SCHEMA = `{
  "routine_name": string,
  "training_focus": string,
  "estimated_duration": number (minutes),
  "exercises": [
    {
      "exercise_id": string (id from the pool),
      "name": string,
      "target_muscle": string,
      "sets": number,
      "reps": number | null,
      "work_seconds": number | null (only for timed holds),
      "rest_seconds": number,
      "instructions": string,
      "weight_guide": string
    }
  ],
  "warmup_notes": string,
  "cooldown_notes": string,
  "coach_message": string
}`;

const LIFT_LABELS = { bench: "Bench press", squat: "Squat", deadlift: "Deadlift" } as const;

export function buildSystemPrompt(withTools = false): string {
  return [
    "You are an experienced strength coach who writes one workout for today.",
    "Be concrete and safe. Plain language, no hype.",
    "",
    "Rules:",
    "- Use ONLY exercises from the provided exercise pool. Copy their id into exercise_id.",
    "- Choose 4 to 6 exercises.",
    "- Respect the tier guidelines and the condition adjustment.",
    "- Timed holds (plank, wall sit, dead hang, carries) use work_seconds and reps null.",
    withTools
      ? "- Call the tools to read the pool and training variables, then answer."
      : "- Everything you need is in the message.",
    "- Answer with a single JSON object only. No markdown, no text around it.",
  ].join("\n");
}

function poolLines(pool: readonly ExercisePoolEntry[]): string[] {
  return pool.map((e) => `- ${e.id} | ${e.name} | ${e.targetMuscle} | ${e.equipment} | difficulty ${e.difficulty}`);
}

export function buildRoutinePrompt(input: RoutinePromptInput): string {
  const g = VARIABLE_GUIDELINES[input.tier];
  const day = WEEKLY_STRUCTURE[input.weekday];
  const factor = FITNESS_FACTORS[day.factor];

  const lines: string[] = [
    "TASK: create today's workout.",
    "",
    "## Athlete",
    `- Level: ${input.level} (${input.tier}, ${gradeFor(input.level)})`,
    `- Goal: ${input.goal?.trim() || "general fitness"}`,
    `- Target muscles: ${input.muscles.join(", ")}`,
    "",
    "## Today",
    `- Day: ${day.day}, fitness factor ${factor.label} (${factor.description}), method ${factor.method}`,
  ];

  if (input.template) {
    lines.push(
      `- Program template: ${input.template.trainingTypeLabel}${input.template.purpose ? `, ${input.template.purpose}` : ""}`,
      `- Template exercises: ${input.template.exercises.map((e) => e.name).join(", ")}`
    );
  }

  lines.push(
    "",
    "## Condition",
    `- Score ${input.condition.score.toFixed(2)} (${input.condition.band})`,
    `- ${conditionDirective(input.condition)}`,
    "",
    "## Barbell load guide (kg, working weight)",
    ...MAIN_LIFTS.map((lift) => `- ${LIFT_LABELS[lift]}: ${calculateTargetWeight(lift, input.heightCm, input.level)}`),
    "",
    `## ${input.tier} guidelines`,
    `- Sets per exercise ${formatRange(g.setsPerExercise)}, reps ${formatRange(g.repsRange)}, RPE ${formatRange(g.rpeRange)}`,
    `- Rest ${formatRange(g.restSeconds)} s, total sets ${formatRange(g.totalSets)}, tempo ${g.tempo}, ROM ${g.rom}`,
    `- Load: ${g.weightGuide}`,
    `- ${g.notes}`
  );

  if (input.recentExercises.length) {
    lines.push("", "## Done recently (prefer other exercises)", input.recentExercises.join(", "));
  }

  if (input.withTools) {
    lines.push("", `## Exercise pool`, `${input.pool.length} exercises available. Use get_exercise_pool or search_exercises.`);
  } else {
    lines.push("", "## Exercise pool (id | name | muscle | equipment | difficulty)", ...poolLines(input.pool));
  }

  if (input.knowledgeBlock) lines.push("", input.knowledgeBlock);

  lines.push("", "Return STRICTLY JSON in this format:", ROUTINE_JSON_SCHEMA);
  return lines.join("\n");
}
