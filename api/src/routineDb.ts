// api/src/routineDb.ts
import { q } from "./db.js";
import type { RoutineStore, StoredRoutine } from "./stores.js";

export class PgRoutineStore implements RoutineStore {
  async saveRoutine<T extends StoredRoutine>(routine: T): Promise<void> {
    await q(
      `INSERT INTO workout_routines (routine_id, user_id, level, day_of_week, creative, generation_method, routine)
       VALUES ($1, $2, $3, $4, $5, $6, $7::jsonb)
       ON CONFLICT (routine_id) DO NOTHING`,
      [
        routine.routineId,
        routine.userId,
        routine.level,
        routine.day,
        routine.creative,
        routine.generationMethod,
        JSON.stringify(routine),
      ]
    );
  }
}
