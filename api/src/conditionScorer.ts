// api/src/conditionScorer.ts
// Daily readiness from five self-reported 1..5 inputs.

import { roundTo } from "./progressionModel.js";

export type ConditionKey = "sleep" | "fatigue" | "stress" | "soreness" | "motivation";

export type ConditionInput = Partial<Record<ConditionKey, number | null>>;

export type BandName = "excellent" | "good" | "moderate" | "poor";

export type ConditionBand = {
  name: BandName;
  min: number;
  max: number;
  volumeModifier: number;
  intensityModifier: number;
};

export type ConditionSnapshot = {
  score: number;
  band: BandName;
  volumeModifier: number;
  intensityModifier: number;
  inputs: Record<ConditionKey, number>;
};

export const NEUTRAL_INPUT = 3;

// higher raw value = worse condition for the inverted ones
export const CONDITION_INPUTS: ReadonlyArray<{ key: ConditionKey; weight: number; inverted: boolean }> = [
  { key: "sleep", weight: 0.3, inverted: false },
  { key: "fatigue", weight: 0.25, inverted: true },
  { key: "stress", weight: 0.2, inverted: true },
  { key: "soreness", weight: 0.15, inverted: true },
  { key: "motivation", weight: 0.1, inverted: false },
];

// Ordered top-down. Each band is [min, max) except excellent, which is closed at 5.
export const CONDITION_BANDS: readonly ConditionBand[] = [
  { name: "excellent", min: 4.0, max: 5.0, volumeModifier: 1.1, intensityModifier: 1.1 },
  { name: "good", min: 3.0, max: 4.0, volumeModifier: 1.0, intensityModifier: 1.0 },
  { name: "moderate", min: 2.0, max: 3.0, volumeModifier: 0.85, intensityModifier: 0.9 },
  { name: "poor", min: 1.0, max: 2.0, volumeModifier: 0.7, intensityModifier: 0.75 },
];

function normalizeInput(value: number | null | undefined): number {
  if (typeof value !== "number" || !Number.isFinite(value)) return NEUTRAL_INPUT;
  return Math.max(1, Math.min(5, value));
}

export function normalizeInputs(inputs: ConditionInput | null | undefined): Record<ConditionKey, number> {
  return {
    sleep: normalizeInput(inputs?.sleep),
    fatigue: normalizeInput(inputs?.fatigue),
    stress: normalizeInput(inputs?.stress),
    soreness: normalizeInput(inputs?.soreness),
    motivation: normalizeInput(inputs?.motivation),
  };
}

export function scoreCondition(inputs: ConditionInput | null | undefined): number {
  const values = normalizeInputs(inputs);
  let weightedSum = 0;
  let totalWeight = 0;
  for (const { key, weight, inverted } of CONDITION_INPUTS) {
    const raw = values[key];
    weightedSum += (inverted ? 6 - raw : raw) * weight;
    totalWeight += weight;
  }
  // rounded so the band always agrees with the reported score
  return roundTo(weightedSum / totalWeight, 2);
}

export function bandFor(score: number): ConditionBand {
  const s = Number.isFinite(score) ? Math.max(1, Math.min(5, score)) : NEUTRAL_INPUT;
  for (const band of CONDITION_BANDS) {
    const upperOk = band.name === "excellent" ? s <= band.max : s < band.max;
    if (s >= band.min && upperOk) return band;
  }
  // unreachable after clamping; bands cover [1,5]
  return CONDITION_BANDS[1];
}

export function assessCondition(inputs: ConditionInput | null | undefined): ConditionSnapshot {
  const score = scoreCondition(inputs);
  const band = bandFor(score);
  return {
    score,
    band: band.name,
    volumeModifier: band.volumeModifier,
    intensityModifier: band.intensityModifier,
    inputs: normalizeInputs(inputs),
  };
}

/** One-line volume/intensity directive for prompts. */
export function conditionDirective(snapshot: ConditionSnapshot): string {
  switch (snapshot.band) {
    case "excellent":
      return "Condition is excellent: volume and intensity may go about 10% above normal.";
    case "good":
      return "Condition is good: keep normal volume and intensity.";
    case "moderate":
      return "Condition is moderate: cut volume by about 15% and intensity by about 10%.";
    case "poor":
      return "Condition is poor: cut volume by about 30% and intensity by about 25%, favour easy technique work.";
  }
}
