// toolLoop.test.ts
import { assessCondition } from "./conditionScorer.js";
import { CatalogExerciseRepository, EXERCISE_CATALOG } from "./exercisePool.js";
import type { GenerateRequest, GenerateResult, GenerativeBackend, ToolCall } from "./llm.js";
import {
  executeTool,
  matchesMovement,
  MAX_TOOL_ITERATIONS,
  parseMovementType,
  RESPOND_NOW,
  runToolLoop,
  type ToolContext,
} from "./toolLoop.js";

class ScriptedBackend implements GenerativeBackend {
  readonly supportsTools = true;
  readonly requests: GenerateRequest[] = [];

  constructor(private readonly reply: (req: GenerateRequest, n: number) => GenerateResult) {}

  async generate(req: GenerateRequest): Promise<GenerateResult> {
    this.requests.push(req);
    return this.reply(req, this.requests.length);
  }
}

function toolCall(n: number, name = "get_exercise_pool", input: Record<string, unknown> = {}): ToolCall {
  return { id: `call_${n}`, name, input };
}

const okResult = async () => ({ ok: true, content: "{}" });

describe("runToolLoop", () => {
  beforeEach(() => {
    jest.spyOn(console, "warn").mockImplementation(() => undefined);
  });
  afterEach(() => jest.restoreAllMocks());

  it("stops a model that never stops calling tools", async () => {
    const llm = new ScriptedBackend((req, n) =>
      req.tools
        ? { success: true, text: null, toolCall: toolCall(n) }
        : { success: true, text: '{"exercises":[]}', toolCall: null }
    );
    const execute = jest.fn(okResult);

    const out = await runToolLoop(llm, { prompt: "plan", execute });

    expect(out.calls).toBe(MAX_TOOL_ITERATIONS + 1);
    expect(llm.requests).toHaveLength(11);
    expect(execute).toHaveBeenCalledTimes(10);
    expect(out.forced).toBe(true);
    expect(out.text).toBe('{"exercises":[]}');
    expect(out.trace).toHaveLength(10);

    const last = llm.requests[10];
    expect(last.tools).toBeUndefined();
    expect(last.json).toBe(true);
    expect(last.history).toHaveLength(21);
    expect(last.history?.[20]).toEqual({ role: "user", content: RESPOND_NOW });
  });

  it("returns the first text answer without forcing", async () => {
    const llm = new ScriptedBackend(() => ({ success: true, text: "{}", toolCall: null }));
    const out = await runToolLoop(llm, { prompt: "plan", execute: okResult });
    expect(out).toEqual({ text: "{}", error: null, trace: [], calls: 1, forced: false });
  });

  it("feeds tool results back before the answer", async () => {
    const llm = new ScriptedBackend((_req, n) =>
      n === 1
        ? { success: true, text: null, toolCall: toolCall(1, "search_exercises", { muscle: "chest" }) }
        : { success: true, text: "done", toolCall: null }
    );
    const execute = jest.fn(async () => ({ ok: true, content: '{"count":0}' }));

    const out = await runToolLoop(llm, { prompt: "plan", system: "sys", execute, maxIterations: 3 });

    expect(execute).toHaveBeenCalledWith(toolCall(1, "search_exercises", { muscle: "chest" }));
    expect(out.trace).toEqual([{ iteration: 1, tool: "search_exercises", input: { muscle: "chest" }, ok: true }]);
    expect(out.calls).toBe(2);
    expect(llm.requests[1].system).toBe("sys");
    expect(llm.requests[1].history).toEqual([
      { role: "assistant", content: null, toolCall: toolCall(1, "search_exercises", { muscle: "chest" }) },
      { role: "tool", toolCallId: "call_1", content: '{"count":0}' },
    ]);
  });

  it("reports a throwing executor as a failed tool", async () => {
    const llm = new ScriptedBackend((_req, n) =>
      n === 1 ? { success: true, text: null, toolCall: toolCall(1) } : { success: true, text: "done", toolCall: null }
    );
    const out = await runToolLoop(llm, {
      prompt: "plan",
      execute: async () => {
        throw new Error("kaput");
      },
    });
    expect(out.trace[0].ok).toBe(false);
    expect(llm.requests[1].history?.[1]).toEqual({ role: "tool", toolCallId: "call_1", content: '{"error":"kaput"}' });
  });

  it("forces a final answer when a turn is empty", async () => {
    const llm = new ScriptedBackend((req) =>
      req.tools ? { success: true, text: null, toolCall: null } : { success: true, text: "final", toolCall: null }
    );
    const out = await runToolLoop(llm, { prompt: "plan", execute: okResult });
    expect(out).toMatchObject({ text: "final", calls: 2, forced: true });
    expect(console.warn).toHaveBeenCalled();
  });

  it("stops on a backend error", async () => {
    const llm = new ScriptedBackend(() => ({ success: false, error: "boom" }));
    const out = await runToolLoop(llm, { prompt: "plan", execute: okResult });
    expect(out).toEqual({ text: null, error: "boom", trace: [], calls: 1, forced: false });
  });
});

describe("executeTool", () => {
  const pool = EXERCISE_CATALOG.filter((e) => e.targetMuscle === "chest" || e.targetMuscle === "arms");
  const ctx: ToolContext = {
    pool,
    muscles: ["chest", "arms"],
    tier: "beginner",
    factor: "strength",
    condition: assessCondition({}),
  };

  function parse(content: string): Record<string, unknown> {
    const v: unknown = JSON.parse(content);
    if (typeof v !== "object" || v === null || Array.isArray(v)) throw new Error("not an object");
    return Object.fromEntries(Object.entries(v));
  }

  it("lists the pool", async () => {
    const res = await executeTool(ctx, { name: "get_exercise_pool", input: {} });
    const body = parse(res.content);
    expect(res.ok).toBe(true);
    expect(body.count).toBe(11);
    expect(body.muscles).toEqual(["chest", "arms"]);
    expect(Array.isArray(body.exercises) && body.exercises[0]).toEqual({
      id: "EX_CH01",
      name: "Push-up",
      target_muscle: "chest",
      equipment: "none",
      difficulty: 1,
    });
  });

  it("searches the pool by muscle and movement type", async () => {
    const res = await executeTool(ctx, { name: "search_exercises", input: { muscle: "Triceps", movement_type: "push" } });
    const body = parse(res.content);
    expect(body.muscle).toBe("arms");
    expect(body.movement_type).toBe("push");
    expect(body.count).toBe(1);

    const limited = parse((await executeTool(ctx, { name: "search_exercises", input: { muscle: "chest", limit: 2 } })).content);
    expect(limited.count).toBe(2);
  });

  it("adds repository matches within the tier ceiling", async () => {
    const res = await executeTool(
      { ...ctx, repository: new CatalogExerciseRepository() },
      { name: "search_exercises", input: { muscle: "legs" } }
    );
    const body = parse(res.content);
    const ids = Array.isArray(body.exercises) ? body.exercises.map((e: { id: string }) => e.id) : [];
    expect(ids).toEqual(["EX_LG01", "EX_LG02", "EX_LG04", "EX_LG05", "EX_LG06", "EX_LG07"]);
  });

  it("rejects bad calls without throwing", async () => {
    expect(await executeTool(ctx, { name: "search_exercises", input: {} })).toEqual({
      ok: false,
      content: '{"error":"muscle is required"}',
    });
    expect(await executeTool(ctx, { name: "lift_weights", input: {} })).toEqual({
      ok: false,
      content: '{"error":"unknown tool: lift_weights"}',
    });
  });

  test.each(["beginner", "intermediate", "advanced"] as const)(
    "%s exercise count stays within four to six",
    async (tier) => {
      const body = parse((await executeTool({ ...ctx, tier }, { name: "get_training_variables", input: {} })).content);
      expect(body.exercises_count).toEqual(
        tier === "beginner" ? { min: 4, max: 5 } : { min: 5, max: 6 }
      );
    }
  );

  it("includes the condition adjustment only on request", async () => {
    const plain = parse((await executeTool(ctx, { name: "get_training_variables", input: {} })).content);
    expect(plain.tier).toBe("beginner");
    expect(plain.method).toBe("fixed_sets_reps");
    expect(plain.condition).toBeUndefined();

    const adjusted = parse(
      (await executeTool(ctx, { name: "get_training_variables", input: { include_condition_adjustment: true } })).content
    );
    expect(adjusted.condition).toMatchObject({ score: 3, band: "good", volume_modifier: 1, intensity_modifier: 1 });
  });
});

describe("movement types", () => {
  it("parses known types only", () => {
    expect(parseMovementType(" PUSH ")).toBe("push");
    expect(parseMovementType("diagonal")).toBeNull();
  });

  it("matches by name keywords", () => {
    expect(matchesMovement("Lat Pulldown", "pull")).toBe(true);
    expect(matchesMovement("Lateral Raise", "pull")).toBe(false);
    expect(matchesMovement("Hammer Curl", "isolation")).toBe(true);
  });
});
