// api/src/historyDb.ts
import { q } from "./db.js";
import type { CompletedSet, HistoryRepository } from "./stores.js";

const RECENT_SESSIONS = 5;

export class PgHistoryRepository implements HistoryRepository {
  async recentExerciseNames(userId: string, limit: number): Promise<string[]> {
    const rows = await q<{ exercise_name: string }>(
      `WITH recent AS (
         SELECT id, completed_at FROM workout_sessions
          WHERE user_id = $1 AND completed_at IS NOT NULL
          ORDER BY completed_at DESC
          LIMIT $2
       )
       SELECT ws.exercise_name, max(r.completed_at) AS last_done
         FROM workout_sets ws
         JOIN recent r ON r.id = ws.session_id
        GROUP BY ws.exercise_name
        ORDER BY last_done DESC
        LIMIT $3`,
      [userId, RECENT_SESSIONS, limit]
    );
    return rows.map((r) => r.exercise_name);
  }

  async completedWorkoutCount(userId: string, since?: Date | null): Promise<number> {
    const rows = await q<{ n: string | number }>(
      `SELECT count(*) AS n FROM workout_sessions
        WHERE user_id = $1 AND completed_at IS NOT NULL
          AND ($2::timestamptz IS NULL OR completed_at > $2)`,
      [userId, since ?? null]
    );
    return Number(rows[0]?.n ?? 0);
  }

  async recentSets(userId: string, since: Date): Promise<CompletedSet[]> {
    const rows = await q<{ exercise_name: string; weight: string | number | null; reps: number | null; completed_at: Date }>(
      `SELECT ws.exercise_name, ws.weight, ws.reps, s.completed_at
         FROM workout_sets ws
         JOIN workout_sessions s ON s.id = ws.session_id
        WHERE s.user_id = $1 AND s.completed_at IS NOT NULL AND s.completed_at >= $2
        ORDER BY s.completed_at DESC`,
      [userId, since]
    );
    return rows.map((r) => ({
      exerciseName: r.exercise_name,
      // NUMERIC comes back as a string
      weight: r.weight === null ? null : Number(r.weight),
      reps: r.reps,
      completedAt: r.completed_at,
    }));
  }
}
