// api/src/exerciseDb.ts
import { q } from "./db.js";
import {
  BODYWEIGHT_EQUIPMENT,
  findByFuzzyName,
  fromRepositoryRow,
  normalizeMuscle,
  type ExerciseFilter,
  type ExercisePoolEntry,
  type ExerciseRepository,
  type ExerciseRow,
} from "./exercisePool.js";

const COLUMNS = `id, name, muscle_group, equipment, difficulty, description, form_tips, video_url`;

export class PgExerciseRepository implements ExerciseRepository {
  async query(filter: ExerciseFilter): Promise<ExercisePoolEntry[]> {
    const where: string[] = ["active = true"];
    const params: unknown[] = [];

    if (filter.muscles?.length) {
      params.push(filter.muscles.map(normalizeMuscle));
      where.push(`muscle_group = ANY($${params.length}::text[])`);
    }
    if (filter.maxDifficulty) {
      // rows store 1..5; 5 clamps to 4 and only passes an advanced ceiling
      params.push(filter.maxDifficulty === 4 ? 5 : filter.maxDifficulty);
      where.push(`difficulty <= $${params.length}`);
    }
    if (filter.equipment) {
      params.push([...filter.equipment.map((e) => e.toLowerCase()), ...BODYWEIGHT_EQUIPMENT]);
      where.push(`lower(equipment) = ANY($${params.length}::text[])`);
    }

    let sql = `SELECT ${COLUMNS} FROM exercises WHERE ${where.join(" AND ")} ORDER BY difficulty, name`;
    if (filter.limit) {
      params.push(filter.limit);
      sql += ` LIMIT $${params.length}`;
    }
    const rows = await q<ExerciseRow>(sql, params);
    return rows.map(fromRepositoryRow);
  }

  async findById(id: string): Promise<ExercisePoolEntry | null> {
    const rows = await q<ExerciseRow>(`SELECT ${COLUMNS} FROM exercises WHERE id = $1 LIMIT 1`, [id]);
    return rows[0] ? fromRepositoryRow(rows[0]) : null;
  }

  async searchByName(name: string, limit = 5): Promise<ExercisePoolEntry[]> {
    const needle = name.trim();
    if (!needle) return [];
    const rows = await q<ExerciseRow>(
      `SELECT ${COLUMNS} FROM exercises
        WHERE active = true AND (lower(name) = lower($1) OR name ILIKE '%' || $1 || '%')
        ORDER BY (lower(name) = lower($1)) DESC, length(name)
        LIMIT $2`,
      [needle, limit]
    );
    const entries = rows.map(fromRepositoryRow);
    const best = findByFuzzyName(entries, needle);
    return best ? [best, ...entries.filter((e) => e !== best)] : entries;
  }

  async createIfMissing(entry: ExercisePoolEntry): Promise<ExercisePoolEntry> {
    const inserted = await q<ExerciseRow>(
      `INSERT INTO exercises (id, name, muscle_group, equipment, difficulty, description, form_tips, video_url, ai_generated)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
       ON CONFLICT DO NOTHING
       RETURNING ${COLUMNS}`,
      [
        entry.id,
        entry.name,
        entry.targetMuscle,
        entry.equipment,
        entry.difficulty,
        entry.description,
        entry.formTips,
        entry.videoUrl,
        entry.source === "model",
      ]
    );
    if (inserted[0]) return { ...fromRepositoryRow(inserted[0]), source: entry.source };

    const existing = await q<ExerciseRow>(`SELECT ${COLUMNS} FROM exercises WHERE lower(name) = lower($1) LIMIT 1`, [
      entry.name,
    ]);
    return existing[0] ? fromRepositoryRow(existing[0]) : entry;
  }
}
