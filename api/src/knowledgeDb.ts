// api/src/knowledgeDb.ts
// Postgres knowledge repository (pgvector for semantic search) and novelty store.

import { q } from "./db.js";
import {
  KNOWLEDGE_TYPES,
  type ContextualQuery,
  type DifficultyBand,
  type KnowledgeChunk,
  type KnowledgeQuery,
  type KnowledgeRepository,
  type KnowledgeType,
  type NoveltyStore,
} from "./knowledgeRetriever.js";
import { parseTier } from "./progressionModel.js";

type KnowledgeRow = {
  id: string | number;
  knowledge_type: string;
  content: string;
  summary: string | null;
  exercise_name: string | null;
  muscle_group: string | null;
  difficulty_level: string | null;
  source_title: string | null;
  source_url: string | null;
  source_channel: string | null;
};

const COLUMNS = `id, knowledge_type, content, summary, exercise_name, muscle_group, difficulty_level,
  source_title, source_url, source_channel`;

function toKnowledgeType(value: string): KnowledgeType | null {
  return KNOWLEDGE_TYPES.find((t) => t === value) ?? null;
}

function toChunk(row: KnowledgeRow): KnowledgeChunk | null {
  const knowledgeType = toKnowledgeType(row.knowledge_type);
  if (!knowledgeType) return null;
  const difficultyLevel: DifficultyBand = parseTier(row.difficulty_level) ?? "all";
  const hasSource = row.source_title || row.source_url || row.source_channel;
  return {
    id: Number(row.id),
    knowledgeType,
    content: row.content,
    summary: row.summary,
    exerciseName: row.exercise_name,
    muscleGroup: row.muscle_group,
    difficultyLevel,
    source: hasSource ? { title: row.source_title, url: row.source_url, channel: row.source_channel } : null,
  };
}

function toChunks(rows: KnowledgeRow[]): KnowledgeChunk[] {
  const out: KnowledgeChunk[] = [];
  for (const row of rows) {
    const chunk = toChunk(row);
    if (chunk) out.push(chunk);
  }
  return out;
}

function likePatterns(words: string[]): string[] {
  return words.map((w) => `%${w.replace(/[\\%_]/g, "\\$&")}%`);
}

/** Shared WHERE prefix: type, level band, novelty exclusion. Appends its three params. */
function scope(query: KnowledgeQuery, params: unknown[]): string {
  params.push(query.knowledgeType, query.tier, query.excludeIds);
  const n = params.length;
  return `knowledge_type = $${n - 2}
    AND difficulty_level IN ($${n - 1}, 'all')
    AND NOT (id = ANY($${n}::bigint[]))`;
}

export class PgKnowledgeRepository implements KnowledgeRepository {
  constructor(private readonly vectorEnabled: boolean) {}

  async semanticSearch(vector: number[], query: KnowledgeQuery): Promise<KnowledgeChunk[]> {
    if (!this.vectorEnabled) return [];
    const params: unknown[] = [`[${vector.join(",")}]`];
    const where = scope(query, params);
    params.push(query.limit);
    const rows = await q<KnowledgeRow>(
      `SELECT ${COLUMNS} FROM knowledge_chunks
        WHERE ${where} AND embedding IS NOT NULL
        ORDER BY embedding <=> $1::vector
        LIMIT $${params.length}`,
      params
    );
    return toChunks(rows);
  }

  async keywordSearch(keywords: string[], query: KnowledgeQuery & { muscles?: string[] }): Promise<KnowledgeChunk[]> {
    if (!keywords.length) return [];
    const params: unknown[] = [];
    const where = [scope(query, params)];

    params.push(likePatterns(keywords));
    const kw = params.length;
    where.push(`(content ILIKE ANY($${kw}::text[]) OR summary ILIKE ANY($${kw}::text[]))`);

    if (query.muscles?.length) {
      params.push(likePatterns(query.muscles));
      const m = params.length;
      where.push(
        `(muscle_group ILIKE ANY($${m}::text[]) OR exercise_name ILIKE ANY($${m}::text[]) OR content ILIKE ANY($${m}::text[]))`
      );
    }

    params.push(query.limit);
    const rows = await q<KnowledgeRow>(
      `SELECT ${COLUMNS} FROM knowledge_chunks WHERE ${where.join(" AND ")} ORDER BY id LIMIT $${params.length}`,
      params
    );
    return toChunks(rows);
  }

  async muscleGroupSearch(muscles: string[], query: KnowledgeQuery): Promise<KnowledgeChunk[]> {
    if (!muscles.length) return [];
    const params: unknown[] = [];
    const where = scope(query, params);
    params.push(likePatterns(muscles));
    const m = params.length;
    params.push(query.limit);
    const rows = await q<KnowledgeRow>(
      `SELECT ${COLUMNS} FROM knowledge_chunks
        WHERE ${where} AND muscle_group ILIKE ANY($${m}::text[])
        ORDER BY id LIMIT $${params.length}`,
      params
    );
    return toChunks(rows);
  }

  async contextualSearch(query: ContextualQuery): Promise<KnowledgeChunk[]> {
    const rows = await q<KnowledgeRow>(
      `SELECT ${COLUMNS} FROM knowledge_chunks
        WHERE knowledge_type = ANY($1::text[])
          AND difficulty_level IN ($2, 'all')
          AND (
            EXISTS (
              SELECT 1 FROM unnest(string_to_array(lower(coalesce(exercise_name, '')), ',')) AS n(name)
               WHERE trim(n.name) = ANY($3::text[])
            )
            OR lower(muscle_group) = ANY($4::text[])
          )
        ORDER BY id
        LIMIT $5`,
      [
        query.knowledgeTypes,
        query.tier,
        query.exerciseNames.map((n) => n.trim().toLowerCase()),
        query.muscles.map((m) => m.trim().toLowerCase()),
        query.limit,
      ]
    );
    return toChunks(rows);
  }
}

export class PgNoveltyStore implements NoveltyStore {
  async get(userId: string): Promise<number[]> {
    const rows = await q<{ chunk_ids: Array<string | number> }>(
      `SELECT chunk_ids FROM knowledge_novelty WHERE user_id = $1 AND expires_at > now()`,
      [userId]
    );
    return (rows[0]?.chunk_ids ?? []).map(Number).filter(Number.isFinite);
  }

  async set(userId: string, ids: number[], ttlMs: number): Promise<void> {
    await q(
      `INSERT INTO knowledge_novelty (user_id, chunk_ids, expires_at)
       VALUES ($1, $2::bigint[], $3)
       ON CONFLICT (user_id) DO UPDATE SET chunk_ids = EXCLUDED.chunk_ids, expires_at = EXCLUDED.expires_at`,
      [userId, ids, new Date(Date.now() + ttlMs)]
    );
  }
}
