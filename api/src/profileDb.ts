// api/src/profileDb.ts
import { q, withTransaction } from "./db.js";
import { clampLevel } from "./progressionModel.js";
import type { LevelTestRecord, ProfileStore, UserProfile } from "./stores.js";

type ProfileRow = {
  user_id: string;
  numeric_level: number | string;
  height_cm: number | string | null;
  fitness_goal: string | null;
  last_level_test_at: Date | null;
};

function toProfile(row: ProfileRow): UserProfile {
  const height = row.height_cm === null ? null : Number(row.height_cm);
  return {
    userId: row.user_id,
    level: clampLevel(row.numeric_level),
    heightCm: height !== null && Number.isFinite(height) && height > 0 ? height : null,
    fitnessGoal: row.fitness_goal,
    lastLevelTestAt: row.last_level_test_at,
  };
}

export class PgProfileStore implements ProfileStore {
  async getProfile(userId: string): Promise<UserProfile | null> {
    const rows = await q<ProfileRow>(
      `SELECT user_id, numeric_level, height_cm, fitness_goal, last_level_test_at
         FROM user_profiles WHERE user_id = $1`,
      [userId]
    );
    return rows[0] ? toProfile(rows[0]) : null;
  }

  async recordLevelTest(record: LevelTestRecord): Promise<void> {
    await withTransaction(async () => {
      await q(
        `INSERT INTO level_test_results (user_id, test_id, current_level, target_level, passed, result, created_at)
         VALUES ($1, $2, $3, $4, $5, $6::jsonb, $7)`,
        [
          record.userId,
          record.testId,
          record.currentLevel,
          record.targetLevel,
          record.passed,
          JSON.stringify(record.result),
          record.takenAt,
        ]
      );
      await q(
        `UPDATE user_profiles SET numeric_level = $2, last_level_test_at = $3, updated_at = now() WHERE user_id = $1`,
        [record.userId, record.newLevel, record.takenAt]
      );
    });
  }
}
