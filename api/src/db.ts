// api/src/db.ts
import pg from "pg";
import { parse as parsePg } from "pg-connection-string";
import { AsyncLocalStorage } from "node:async_hooks";
import { config } from "./config.js";
import { AppError, errorMessage } from "./middleware/errorHandler.js";

const { Pool } = pg;

let pool: pg.Pool | null = null;
const txStorage = new AsyncLocalStorage<pg.PoolClient>();

function createPool(databaseUrl: string): pg.Pool {
  // parse DATABASE_URL explicitly so PG* env vars can't override it
  const cn = parsePg(databaseUrl);
  const resolvedHost = cn.host || "127.0.0.1";
  const isLocalHost =
    resolvedHost === "127.0.0.1" || resolvedHost === "localhost" || resolvedHost === "::1";

  const created = new Pool({
    host: resolvedHost,
    port: cn.port ? Number(cn.port) : 5432,
    user: cn.user ?? undefined,
    password: cn.password ?? undefined,
    database: cn.database ?? undefined,
    // managed Postgres requires SSL; local dev usually doesn't
    ssl: isLocalHost ? false : { rejectUnauthorized: false },
    max: 20,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 10_000,
  });

  created.on("connect", () => {
    if (config.nodeEnv !== "production") console.log("DB: connected");
  });
  created.on("error", (err) => {
    console.error("DB: unexpected error", err);
  });
  return created;
}

export function getPool(): pg.Pool {
  if (pool) return pool;
  if (!config.databaseUrl) {
    throw new AppError("DATABASE_URL is not set", 503, { code: "db_unconfigured" });
  }
  pool = createPool(config.databaseUrl);
  return pool;
}

function pgErrorFields(err: unknown): { code: string; constraint: string } {
  if (typeof err !== "object" || err === null) return { code: "", constraint: "" };
  return {
    code: "code" in err && err.code ? String(err.code) : "",
    constraint: "constraint" in err && err.constraint ? String(err.constraint) : "",
  };
}

/** Generic SQL helper; runs inside the current transaction when there is one. */
export async function q<T extends pg.QueryResultRow = pg.QueryResultRow>(
  text: string,
  params: unknown[] = []
): Promise<T[]> {
  const t0 = Date.now();
  try {
    const client = txStorage.getStore();
    const res = client ? await client.query<T>(text, params) : await getPool().query<T>(text, params);
    if (config.nodeEnv === "development") {
      console.log(`SQL ok (${Date.now() - t0}ms, rows=${res.rowCount}) ::`, text, params);
    }
    return res.rows;
  } catch (err) {
    if (err instanceof AppError) throw err;
    const message = errorMessage(err);
    console.error("DB ERROR:", message, { text, params });
    const { code, constraint } = pgErrorFields(err);
    throw new AppError("Database operation failed", 500, {
      code: "db_error",
      details: { causeMessage: message, causeCode: code, causeConstraint: constraint },
      cause: err,
    });
  }
}

export async function withTransaction<T>(fn: () => Promise<T>): Promise<T> {
  const client = await getPool().connect();
  try {
    await client.query("BEGIN");
    const result = await txStorage.run(client, async () => fn());
    await client.query("COMMIT");
    return result;
  } catch (err) {
    try {
      await client.query("ROLLBACK");
    } catch (rollbackErr) {
      console.error("DB: rollback failed", errorMessage(rollbackErr));
    }
    throw err;
  } finally {
    client.release();
  }
}

export async function closePool(): Promise<void> {
  if (!pool) return;
  await pool.end();
  pool = null;
  if (config.nodeEnv !== "production") console.log("DB: pool closed");
}

// ============================================================================
// SCHEMA
// ============================================================================

const BASE_SCHEMA = `
  CREATE TABLE IF NOT EXISTS user_profiles (
    user_id TEXT PRIMARY KEY,
    numeric_level INT NOT NULL DEFAULT 1 CHECK (numeric_level BETWEEN 1 AND 8),
    height_cm NUMERIC,
    fitness_goal TEXT,
    last_level_test_at TIMESTAMPTZ,
    created_at TIMESTAMPTZ NOT NULL DEFAULT now(),
    updated_at TIMESTAMPTZ NOT NULL DEFAULT now()
  );

  CREATE TABLE IF NOT EXISTS level_test_results (
    id BIGSERIAL PRIMARY KEY,
    user_id TEXT NOT NULL REFERENCES user_profiles(user_id) ON DELETE CASCADE,
    test_id TEXT NOT NULL,
    current_level INT NOT NULL,
    target_level INT NOT NULL,
    passed BOOLEAN NOT NULL,
    result JSONB NOT NULL,
    created_at TIMESTAMPTZ NOT NULL DEFAULT now()
  );

  CREATE TABLE IF NOT EXISTS exercises (
    id TEXT PRIMARY KEY,
    name TEXT NOT NULL,
    muscle_group TEXT NOT NULL,
    equipment TEXT NOT NULL DEFAULT 'none',
    difficulty INT NOT NULL DEFAULT 2,
    min_level INT NOT NULL DEFAULT 1,
    description TEXT,
    form_tips TEXT,
    video_url TEXT,
    ai_generated BOOLEAN NOT NULL DEFAULT false,
    active BOOLEAN NOT NULL DEFAULT true,
    created_at TIMESTAMPTZ NOT NULL DEFAULT now()
  );
  CREATE UNIQUE INDEX IF NOT EXISTS idx_exercises_name_lower ON exercises (lower(name));

  CREATE TABLE IF NOT EXISTS workout_sessions (
    id BIGSERIAL PRIMARY KEY,
    user_id TEXT NOT NULL,
    started_at TIMESTAMPTZ NOT NULL DEFAULT now(),
    completed_at TIMESTAMPTZ
  );
  CREATE INDEX IF NOT EXISTS idx_workout_sessions_user
    ON workout_sessions (user_id, started_at DESC);

  CREATE TABLE IF NOT EXISTS workout_sets (
    id BIGSERIAL PRIMARY KEY,
    session_id BIGINT NOT NULL REFERENCES workout_sessions(id) ON DELETE CASCADE,
    exercise_name TEXT NOT NULL,
    weight NUMERIC,
    reps INT,
    created_at TIMESTAMPTZ NOT NULL DEFAULT now()
  );

  CREATE TABLE IF NOT EXISTS workout_routines (
    routine_id TEXT PRIMARY KEY,
    user_id TEXT NOT NULL,
    level INT NOT NULL,
    day_of_week INT NOT NULL,
    creative BOOLEAN NOT NULL,
    generation_method TEXT NOT NULL,
    routine JSONB NOT NULL,
    created_at TIMESTAMPTZ NOT NULL DEFAULT now()
  );

  CREATE TABLE IF NOT EXISTS knowledge_chunks (
    id BIGSERIAL PRIMARY KEY,
    knowledge_type TEXT NOT NULL,
    content TEXT NOT NULL,
    summary TEXT,
    exercise_name TEXT,
    muscle_group TEXT,
    difficulty_level TEXT NOT NULL DEFAULT 'all',
    source_title TEXT,
    source_url TEXT,
    source_channel TEXT,
    created_at TIMESTAMPTZ NOT NULL DEFAULT now()
  );
  CREATE INDEX IF NOT EXISTS idx_knowledge_type_level
    ON knowledge_chunks (knowledge_type, difficulty_level);

  CREATE TABLE IF NOT EXISTS knowledge_novelty (
    user_id TEXT PRIMARY KEY,
    chunk_ids BIGINT[] NOT NULL DEFAULT '{}',
    expires_at TIMESTAMPTZ NOT NULL
  );
`;

const VECTOR_SCHEMA = `
  CREATE EXTENSION IF NOT EXISTS vector;
  ALTER TABLE knowledge_chunks ADD COLUMN IF NOT EXISTS embedding vector(1536);
`;

/** Creates missing tables. pgvector is optional; without it semantic search stays off. */
export async function ensureSchema(): Promise<{ vector: boolean }> {
  console.log("DB: checking schema...");
  await getPool().query(BASE_SCHEMA);
  try {
    await getPool().query(VECTOR_SCHEMA);
    console.log("DB: schema ready (pgvector enabled)");
    return { vector: true };
  } catch (err) {
    console.warn("DB: pgvector unavailable, semantic search disabled:", errorMessage(err));
    return { vector: false };
  }
}
