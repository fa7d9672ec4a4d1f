// conditionScorer.test.ts
import { assessCondition, bandFor, conditionDirective, normalizeInputs, scoreCondition } from "./conditionScorer.js";

describe("scoreCondition", () => {
  it("all neutral inputs score 3.0 in the good band", () => {
    const c = assessCondition({ sleep: 3, fatigue: 3, stress: 3, soreness: 3, motivation: 3 });
    expect(c.score).toBe(3);
    expect(c.band).toBe("good");
    expect(c.volumeModifier).toBe(1.0);
    expect(c.intensityModifier).toBe(1.0);
  });

  it("inverts fatigue, stress and soreness", () => {
    expect(scoreCondition({ sleep: 5, fatigue: 1, stress: 1, soreness: 1, motivation: 5 })).toBe(5);
    expect(scoreCondition({ sleep: 1, fatigue: 5, stress: 5, soreness: 5, motivation: 1 })).toBe(1);
  });

  it("treats missing inputs as 3", () => {
    expect(scoreCondition({})).toBe(3);
    expect(scoreCondition(null)).toBe(3);
    expect(scoreCondition({ sleep: null })).toBe(3);
  });

  it("clamps inputs into 1..5", () => {
    expect(normalizeInputs({ sleep: 10, fatigue: -4 })).toEqual({
      sleep: 5,
      fatigue: 1,
      stress: 3,
      soreness: 3,
      motivation: 3,
    });
    // sleep 5 (×0.3) with everything else neutral
    expect(scoreCondition({ sleep: 10 })).toBeCloseTo(3.6, 2);
  });

  it("stays within [1, 5] for every combination", () => {
    const values = [1, 2, 3, 4, 5];
    for (const sleep of values)
      for (const fatigue of values)
        for (const stress of values) {
          const score = scoreCondition({ sleep, fatigue, stress, soreness: 6 - sleep, motivation: fatigue });
          expect(score).toBeGreaterThanOrEqual(1);
          expect(score).toBeLessThanOrEqual(5);
        }
  });
});

describe("bandFor", () => {
  test.each([
    [5.0, "excellent"],
    [4.0, "excellent"],
    [3.99, "good"],
    [3.0, "good"],
    [2.99, "moderate"],
    [2.0, "moderate"],
    [1.99, "poor"],
    [1.0, "poor"],
    [7, "excellent"],
    [-2, "poor"],
    [Number.NaN, "good"],
  ])("%p → %s", (score, band) => {
    expect(bandFor(score).name).toBe(band);
  });

  it("carries the band modifiers", () => {
    expect(bandFor(2.5)).toMatchObject({ volumeModifier: 0.85, intensityModifier: 0.9 });
    expect(bandFor(1.5)).toMatchObject({ volumeModifier: 0.7, intensityModifier: 0.75 });
    expect(bandFor(4.5)).toMatchObject({ volumeModifier: 1.1, intensityModifier: 1.1 });
  });
});

describe("conditionDirective", () => {
  it("describes the adjustment for the band", () => {
    expect(conditionDirective(assessCondition({}))).toBe("Condition is good: keep normal volume and intensity.");
    expect(conditionDirective(assessCondition({ sleep: 1, fatigue: 5, stress: 5, soreness: 5, motivation: 1 }))).toMatch(
      /^Condition is poor/
    );
  });
});
