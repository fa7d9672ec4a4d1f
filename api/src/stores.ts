// api/src/stores.ts
// ============================================================================
// PROFILE / HISTORY / ROUTINE STORES
//
// Interfaces the engine depends on, plus in-memory versions used when
// DATABASE_URL is not set and in tests. Postgres versions live in *Db.ts.
// ============================================================================

import type { Level } from "./progressionModel.js";

export type UserProfile = {
  userId: string;
  level: Level;
  heightCm: number | null;
  fitnessGoal: string | null;
  lastLevelTestAt: Date | null;
};

export type CompletedSet = {
  exerciseName: string;
  weight: number | null;
  reps: number | null;
  completedAt: Date;
};

export type LevelTestRecord = {
  testId: string;
  userId: string;
  currentLevel: Level;
  targetLevel: Level;
  /** level the profile holds once the record is written */
  newLevel: Level;
  passed: boolean;
  takenAt: Date;
  result: unknown;
};

export interface ProfileStore {
  getProfile(userId: string): Promise<UserProfile | null>;
  /** stores the outcome, the new level and the test date together, or none of them */
  recordLevelTest(record: LevelTestRecord): Promise<void>;
}

export interface HistoryRepository {
  /** distinct names, most recent first */
  recentExerciseNames(userId: string, limit: number): Promise<string[]>;
  /** completed sessions, optionally only those finished after `since` */
  completedWorkoutCount(userId: string, since?: Date | null): Promise<number>;
  recentSets(userId: string, since: Date): Promise<CompletedSet[]>;
}

export type StoredRoutine = {
  routineId: string;
  userId: string;
  level: Level;
  day: number;
  creative: boolean;
  generationMethod: string;
};

export interface RoutineStore {
  saveRoutine<T extends StoredRoutine>(routine: T): Promise<void>;
}

// ============================================================================
// IN-MEMORY
// ============================================================================

export class InMemoryProfileStore implements ProfileStore {
  private readonly profiles = new Map<string, UserProfile>();
  readonly tests: LevelTestRecord[] = [];

  constructor(seed: UserProfile[] = []) {
    for (const p of seed) this.profiles.set(p.userId, { ...p });
  }

  async getProfile(userId: string): Promise<UserProfile | null> {
    const p = this.profiles.get(userId);
    return p ? { ...p } : null;
  }

  async recordLevelTest(record: LevelTestRecord): Promise<void> {
    this.tests.push(record);
    const p = this.profiles.get(record.userId);
    if (!p) return;
    p.level = record.newLevel;
    p.lastLevelTestAt = record.takenAt;
  }
}

export type InMemorySession = {
  userId: string;
  completedAt: Date | null;
  sets: Array<{ exerciseName: string; weight: number | null; reps: number | null }>;
};

export class InMemoryHistoryRepository implements HistoryRepository {
  constructor(private readonly sessions: InMemorySession[] = []) {}

  add(session: InMemorySession): void {
    this.sessions.push(session);
  }

  private completed(userId: string): Array<InMemorySession & { completedAt: Date }> {
    const out: Array<InMemorySession & { completedAt: Date }> = [];
    for (const s of this.sessions) {
      if (s.userId === userId && s.completedAt) out.push({ ...s, completedAt: s.completedAt });
    }
    return out.sort((a, b) => b.completedAt.getTime() - a.completedAt.getTime());
  }

  async recentExerciseNames(userId: string, limit: number): Promise<string[]> {
    const names: string[] = [];
    for (const s of this.completed(userId).slice(0, 5)) {
      for (const set of s.sets) {
        if (!names.includes(set.exerciseName)) names.push(set.exerciseName);
      }
    }
    return names.slice(0, limit);
  }

  async completedWorkoutCount(userId: string, since?: Date | null): Promise<number> {
    return this.completed(userId).filter((s) => !since || s.completedAt > since).length;
  }

  async recentSets(userId: string, since: Date): Promise<CompletedSet[]> {
    return this.completed(userId)
      .filter((s) => s.completedAt >= since)
      .flatMap((s) => s.sets.map((set) => ({ ...set, completedAt: s.completedAt })));
  }
}

export class InMemoryRoutineStore implements RoutineStore {
  readonly saved: StoredRoutine[] = [];

  async saveRoutine<T extends StoredRoutine>(routine: T): Promise<void> {
    this.saved.push(routine);
  }
}
