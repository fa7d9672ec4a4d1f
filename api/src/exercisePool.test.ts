// exercisePool.test.ts
import {
  buildPool,
  CatalogExerciseRepository,
  clampDifficulty,
  EXERCISE_CATALOG,
  extractTargetMuscles,
  findByFuzzyName,
  fromModel,
  fromRepositoryRow,
  MUSCLE_GROUPS,
  resolveMuscles,
  type ExercisePoolEntry,
  type ExerciseRepository,
} from "./exercisePool.js";
import { TIERS } from "./progressionModel.js";

function byName(name: string): ExercisePoolEntry {
  const e = EXERCISE_CATALOG.find((x) => x.name === name);
  if (!e) throw new Error(`missing catalog entry ${name}`);
  return e;
}

describe("extractTargetMuscles", () => {
  test.each([
    ["bigger chest and arms", ["chest", "arms"]],
    ["stronger lats and back", ["back"]],
    ["full body strength", ["full_body"]],
    ["full body, but mostly legs", ["legs"]],
    ["warm up properly", []],
    ["", []],
  ])("%p", (goal, expected) => {
    expect(extractTargetMuscles(goal)).toEqual(expected);
  });
});

describe("resolveMuscles", () => {
  it("prefers goal muscles over the weekday default", () => {
    expect(resolveMuscles({ goal: "chest day", targetMuscles: ["legs"] })).toEqual({ muscles: ["chest"], source: "goal" });
  });

  it("uses normalized weekday muscles without a goal", () => {
    expect(resolveMuscles({ targetMuscles: ["Legs", "quads", "core"] })).toEqual({
      muscles: ["legs", "core"],
      source: "weekday",
    });
  });

  it("falls back to full body", () => {
    expect(resolveMuscles({})).toEqual({ muscles: ["chest", "back", "legs"], source: "full_body" });
    expect(resolveMuscles({ goal: "whole body fitness", targetMuscles: ["core"] })).toEqual({
      muscles: ["chest", "back", "legs"],
      source: "full_body",
    });
  });
});

describe("buildPool", () => {
  beforeEach(() => {
    jest.spyOn(console, "warn").mockImplementation(() => undefined);
  });
  afterEach(() => jest.restoreAllMocks());

  it("applies the tier difficulty ceiling", async () => {
    const pool = await buildPool(new CatalogExerciseRepository(), { tier: "beginner", goal: "chest" });
    expect(pool.entries.map((e) => e.id)).toEqual(["EX_CH01", "EX_CH02", "EX_CH03", "EX_CH06"]);
    expect(pool.relaxed).toBe(false);
    expect(pool.muscleSource).toBe("goal");
  });

  it("filters by equipment but always allows bodyweight", async () => {
    const pool = await buildPool(new CatalogExerciseRepository(), {
      tier: "beginner",
      goal: "chest",
      equipment: ["dumbbell"],
    });
    expect(pool.entries.map((e) => e.id)).toEqual(["EX_CH01", "EX_CH06"]);
  });

  it("relaxes to the first candidates when filters leave nothing", async () => {
    const repo = new CatalogExerciseRepository([byName("Bench Press"), byName("Dips")]);
    const pool = await buildPool(repo, { tier: "beginner", goal: "chest" });
    expect(pool.relaxed).toBe(true);
    expect(pool.entries.map((e) => e.name)).toEqual(["Bench Press", "Dips"]);
  });

  it("widens to the whole source when no exercise matches the muscles", async () => {
    const repo = new CatalogExerciseRepository([byName("Hammer Curl")]);
    const pool = await buildPool(repo, { tier: "advanced", goal: "chest" });
    expect(pool.entries.map((e) => e.name)).toEqual(["Hammer Curl"]);
  });

  it("is never empty for a non-empty catalog", async () => {
    for (const tier of TIERS) {
      for (const muscle of MUSCLE_GROUPS) {
        const pool = await buildPool(new CatalogExerciseRepository(), {
          tier,
          targetMuscles: [muscle],
          equipment: ["kettlebell"],
        });
        expect(pool.entries.length).toBeGreaterThan(0);
      }
    }
  });

  it("moves recent exercises to the back", async () => {
    const pool = await buildPool(new CatalogExerciseRepository(), {
      tier: "beginner",
      goal: "chest",
      recentExerciseNames: ["push-up"],
    });
    expect(pool.entries.map((e) => e.id)).toEqual(["EX_CH02", "EX_CH03", "EX_CH06", "EX_CH01"]);
  });

  it("uses the built-in catalog when the repository fails", async () => {
    const broken: ExerciseRepository = {
      query: async () => {
        throw new Error("connection refused");
      },
      findById: async () => null,
      searchByName: async () => [],
      createIfMissing: async (e) => e,
    };
    const pool = await buildPool(broken, { tier: "beginner", goal: "chest" });
    expect(pool.entries.map((e) => e.id)).toEqual(["EX_CH01", "EX_CH02", "EX_CH03", "EX_CH06"]);
    expect(console.warn).toHaveBeenCalled();
  });
});

describe("adapters", () => {
  it("normalizes repository rows", () => {
    const entry = fromRepositoryRow({
      id: "db-1",
      name: "Front Squat",
      muscle_group: "Quads",
      equipment: null,
      difficulty: 5,
      description: "  ",
      form_tips: "Elbows high",
      video_url: null,
    });
    expect(entry).toEqual({
      id: "db-1",
      name: "Front Squat",
      targetMuscle: "legs",
      equipment: "none",
      difficulty: 4,
      description: null,
      formTips: "Elbows high",
      videoUrl: null,
      source: "repository",
    });
  });

  it("gives model exercises a stable id and difficulty 2", () => {
    const entry = fromModel({ name: " Bulgarian Split Squat ", targetMuscle: "glutes", equipment: "dumbbell" });
    expect(entry).toMatchObject({
      id: "AI_BULGARIAN_SPLIT_SQUAT",
      name: "Bulgarian Split Squat",
      targetMuscle: "legs",
      equipment: "dumbbell",
      difficulty: 2,
      source: "model",
    });
    expect(fromModel({ name: "Mystery move" }).targetMuscle).toBe("full_body");
  });

  test.each([
    [5, 4],
    ["3", 3],
    [0, 1],
    ["x", 2],
  ])("clampDifficulty(%p) = %p", (input, expected) => {
    expect(clampDifficulty(input)).toBe(expected);
  });
});

describe("findByFuzzyName", () => {
  it("prefers exact matches", () => {
    expect(findByFuzzyName(EXERCISE_CATALOG, "bench press")?.id).toBe("EX_CH04");
  });

  it("falls back to containment", () => {
    expect(findByFuzzyName(EXERCISE_CATALOG, "Incline Bench")?.id).toBe("EX_CH05");
  });

  it("falls back to token overlap", () => {
    expect(findByFuzzyName(EXERCISE_CATALOG, "Barbell bent over row")?.id).toBe("EX_BK05");
  });

  it("returns null when nothing is close", () => {
    expect(findByFuzzyName(EXERCISE_CATALOG, "zumba")).toBeNull();
    expect(findByFuzzyName(EXERCISE_CATALOG, "  ")).toBeNull();
  });
});
