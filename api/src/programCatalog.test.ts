// programCatalog.test.ts
import { cycleLength, isFillToTotal, parsePrograms, programsVersion, workoutFor, wrapWeek } from "./programCatalog.js";

describe("workoutFor", () => {
  it("returns the beginner Monday template for week 1", () => {
    const day = workoutFor("beginner", 1, 1);
    expect(day).not.toBeNull();
    expect(day?.trainingType).toBe("strength");
    expect(day?.trainingTypeLabel).toBe("Strength");
    expect(day?.purpose).toBeNull();
    expect(day?.exercises.map((e) => e.name)).toEqual(["BPM Push-up", "BPM Rack Pull-up", "BPM Pole Squat", "Abs"]);
    expect(day?.exercises[0]).toMatchObject({
      target: "chest",
      sets: 3,
      reps: 10,
      bpm: 30,
      rom: "full",
      restSeconds: 60,
      trainingType: "strength",
      weightHint: "notch allowing 10 reps",
    });
  });

  it("keeps fill-to-total entries with null sets", () => {
    const abs = workoutFor("beginner", 1, 1)?.exercises[3];
    expect(abs?.sets).toBeNull();
    expect(abs?.reps).toBe(100);
    expect(abs && isFillToTotal(abs)).toBe(true);
  });

  it("resolves the intermediate Monday entry", () => {
    const day = workoutFor("intermediate", 1, 1);
    expect(day?.trainingType).toBe("strength_power");
    expect(day?.exercises[0]).toMatchObject({ name: "Bench Press", sets: null, reps: 10, restSeconds: 90 });
  });

  it("keeps string rep schemes as written", () => {
    const bench = workoutFor("advanced", 1, 2)?.exercises[0];
    expect(bench?.name).toBe("Bench Press");
    expect(bench?.reps).toBe("30,60,90");
    expect(bench?.restSeconds).toBe(30);
  });

  it("uses the per-exercise training type when one is set", () => {
    const deadlift = workoutFor("beginner", 2, 1)?.exercises.find((e) => e.name === "Deadlift");
    expect(deadlift?.trainingType).toBe("form_practice");
    expect(deadlift?.restSeconds).toBe(60);
  });

  it("wraps weeks around the tier cycle", () => {
    expect(cycleLength("beginner")).toBe(4);
    expect(workoutFor("beginner", 5, 1)?.week).toBe(1);
    expect(workoutFor("beginner", 6, 1)?.week).toBe(2);
    expect(workoutFor("intermediate", 3, 1)?.week).toBe(1);
    expect(workoutFor("beginner", 0, 1)?.week).toBe(1);
  });

  test.each([
    [0, 1],
    [1, 1],
    [4, 4],
    [5, 5],
    [6, 5],
    [7, 5],
    [-1, 1],
  ])("weekday %d folds to %d", (input, expected) => {
    expect(workoutFor("beginner", 1, input)?.weekday).toBe(expected);
  });
});

describe("wrapWeek", () => {
  it("handles junk input", () => {
    expect(wrapWeek("3", 4)).toBe(3);
    expect(wrapWeek(Number.NaN, 4)).toBe(1);
    expect(wrapWeek(8, 4)).toBe(4);
    expect(wrapWeek(9, 4)).toBe(1);
  });
});

describe("parsePrograms", () => {
  it("loads the bundled tables", () => {
    expect(programsVersion()).toBe(3);
  });

  it("rejects a program with a missing day", () => {
    const day = {
      trainingType: "strength",
      exercises: [{ name: "Push-up", target: "chest", sets: 3, reps: 10, weight: null, bpm: null, rom: null }],
    };
    const fullWeek = { "1": day, "2": day, "3": day, "4": day, "5": day };
    const partialWeek = { "1": day, "2": day, "3": day, "4": day };
    const doc = {
      version: 1,
      trainingTypes: {},
      programs: {
        beginner: { levels: [1, 2], weeks: 1, program: { "1": fullWeek } },
        intermediate: { levels: [3], weeks: 1, program: { "1": partialWeek } },
        advanced: { levels: [6], weeks: 1, program: { "1": fullWeek } },
      },
    };
    expect(() => parsePrograms(doc)).toThrow("programs.intermediate: week 1 day 5 is missing");
  });
});
