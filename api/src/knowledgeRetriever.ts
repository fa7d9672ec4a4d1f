// api/src/knowledgeRetriever.ts
// ============================================================================
// KNOWLEDGE RETRIEVAL
//
// semantic → keyword → muscle-group, first non-empty tier wins.
// Retrieval is an enrichment: every tier failure counts as zero results,
// and nothing here throws to the caller.
// ============================================================================

import type { Tier } from "./progressionModel.js";
import { errorMessage } from "./middleware/errorHandler.js";

// ============================================================================
// TYPES
// ============================================================================

export const KNOWLEDGE_TYPES = ["exercise_technique", "routine_design", "nutrition_recovery", "form_check"] as const;
export type KnowledgeType = (typeof KNOWLEDGE_TYPES)[number];

export type DifficultyBand = Tier | "all";

export type SourceReference = {
  title: string | null;
  url: string | null;
  channel: string | null;
};

export type KnowledgeChunk = {
  id: number;
  knowledgeType: KnowledgeType;
  content: string;
  summary: string | null;
  /** may hold several names separated by commas */
  exerciseName: string | null;
  muscleGroup: string | null;
  difficultyLevel: DifficultyBand;
  embedding?: number[] | null;
  source: SourceReference | null;
};

export type KnowledgeQuery = {
  knowledgeType: KnowledgeType;
  tier: Tier;
  excludeIds: number[];
  limit: number;
};

export type ContextualQuery = {
  exerciseNames: string[];
  muscles: string[];
  knowledgeTypes: KnowledgeType[];
  tier: Tier;
  limit: number;
};

export interface KnowledgeRepository {
  semanticSearch(vector: number[], q: KnowledgeQuery): Promise<KnowledgeChunk[]>;
  keywordSearch(keywords: string[], q: KnowledgeQuery & { muscles?: string[] }): Promise<KnowledgeChunk[]>;
  muscleGroupSearch(muscles: string[], q: KnowledgeQuery): Promise<KnowledgeChunk[]>;
  contextualSearch(q: ContextualQuery): Promise<KnowledgeChunk[]>;
}

export interface EmbeddingBackend {
  isConfigured(): boolean;
  embed(text: string): Promise<number[] | null>;
}

export interface NoveltyStore {
  get(userId: string): Promise<number[]>;
  set(userId: string, ids: number[], ttlMs: number): Promise<void>;
}

export type RetrievalTier = "semantic" | "keyword" | "muscle" | "none";

export type RetrievalResult = {
  chunks: KnowledgeChunk[];
  tier: RetrievalTier;
};

export const NOVELTY_CAP = 50;
export const NOVELTY_TTL_MS = 7 * 24 * 60 * 60 * 1000;
export const MIN_KEYWORD_LENGTH = 2;

// ============================================================================
// NOVELTY STORE
// ============================================================================

/** Per-user id list with expiry. Inject one per process (or per test). */
export class InMemoryNoveltyStore implements NoveltyStore {
  private readonly entries = new Map<string, { ids: number[]; expiresAt: number }>();

  constructor(private readonly now: () => number = () => Date.now()) {}

  async get(userId: string): Promise<number[]> {
    const entry = this.entries.get(userId);
    if (!entry) return [];
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(userId);
      return [];
    }
    return [...entry.ids];
  }

  async set(userId: string, ids: number[], ttlMs: number): Promise<void> {
    this.entries.set(userId, { ids: [...ids], expiresAt: this.now() + ttlMs });
  }
}

/** existing ++ fresh, first occurrence kept, last `cap` retained. */
export function mergeNovelty(existing: readonly number[], fresh: readonly number[], cap = NOVELTY_CAP): number[] {
  const seen = new Set<number>();
  const merged: number[] = [];
  for (const id of [...existing, ...fresh]) {
    if (seen.has(id)) continue;
    seen.add(id);
    merged.push(id);
  }
  return merged.slice(-cap);
}

// ============================================================================
// MATCHING HELPERS (shared with the in-memory repository)
// ============================================================================

export function tokenize(query: string): string[] {
  return query
    .split(/\s+/)
    .map((t) => t.trim())
    .filter((t) => t.length >= MIN_KEYWORD_LENGTH);
}

export function inLevelBand(chunk: Pick<KnowledgeChunk, "difficultyLevel">, tier: Tier): boolean {
  return chunk.difficultyLevel === "all" || chunk.difficultyLevel === tier;
}

function icontains(haystack: string | null | undefined, needle: string): boolean {
  return !!haystack && haystack.toLowerCase().includes(needle.toLowerCase());
}

export function matchesKeywords(chunk: KnowledgeChunk, keywords: string[]): boolean {
  return keywords.some((kw) => icontains(chunk.content, kw) || icontains(chunk.summary, kw));
}

export function matchesMuscleText(chunk: KnowledgeChunk, muscles: string[]): boolean {
  return muscles.some(
    (m) => icontains(chunk.muscleGroup, m) || icontains(chunk.exerciseName, m) || icontains(chunk.content, m)
  );
}

export function cosineDistance(a: readonly number[], b: readonly number[]): number {
  if (a.length === 0 || a.length !== b.length) return 1;
  let dot = 0;
  let na = 0;
  let nb = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    na += a[i] * a[i];
    nb += b[i] * b[i];
  }
  if (na === 0 || nb === 0) return 1;
  return 1 - dot / (Math.sqrt(na) * Math.sqrt(nb));
}

export function exerciseNamesOf(chunk: Pick<KnowledgeChunk, "exerciseName">): string[] {
  return (chunk.exerciseName ?? "")
    .split(",")
    .map((s) => s.trim().toLowerCase())
    .filter(Boolean);
}

// ============================================================================
// IN-MEMORY REPOSITORY
// ============================================================================

/** Array-backed repository; used when no database is configured and in tests. */
export class InMemoryKnowledgeRepository implements KnowledgeRepository {
  constructor(private readonly chunks: KnowledgeChunk[] = []) {}

  private scoped(q: KnowledgeQuery): KnowledgeChunk[] {
    const excluded = new Set(q.excludeIds);
    return this.chunks.filter(
      (c) => c.knowledgeType === q.knowledgeType && inLevelBand(c, q.tier) && !excluded.has(c.id)
    );
  }

  async semanticSearch(vector: number[], q: KnowledgeQuery): Promise<KnowledgeChunk[]> {
    return this.scoped(q)
      .filter((c): c is KnowledgeChunk & { embedding: number[] } => Array.isArray(c.embedding))
      .map((c) => ({ c, d: cosineDistance(vector, c.embedding) }))
      .sort((x, y) => x.d - y.d)
      .slice(0, q.limit)
      .map((x) => x.c);
  }

  async keywordSearch(keywords: string[], q: KnowledgeQuery & { muscles?: string[] }): Promise<KnowledgeChunk[]> {
    const muscles = q.muscles ?? [];
    return this.scoped(q)
      .filter((c) => (muscles.length ? matchesMuscleText(c, muscles) : true))
      .filter((c) => matchesKeywords(c, keywords))
      .slice(0, q.limit);
  }

  async muscleGroupSearch(muscles: string[], q: KnowledgeQuery): Promise<KnowledgeChunk[]> {
    return this.scoped(q)
      .filter((c) => muscles.some((m) => icontains(c.muscleGroup, m)))
      .slice(0, q.limit);
  }

  async contextualSearch(q: ContextualQuery): Promise<KnowledgeChunk[]> {
    const names = q.exerciseNames.map((n) => n.toLowerCase());
    const muscles = q.muscles.map((m) => m.toLowerCase());
    return this.chunks
      .filter((c) => q.knowledgeTypes.includes(c.knowledgeType) && inLevelBand(c, q.tier))
      .filter(
        (c) =>
          exerciseNamesOf(c).some((n) => names.includes(n)) ||
          (c.muscleGroup !== null && muscles.includes(c.muscleGroup.toLowerCase()))
      )
      .slice(0, q.limit);
  }
}

// ============================================================================
// RETRIEVER
// ============================================================================

export type RetrieveRequest = {
  userId: string;
  query: string;
  knowledgeType: KnowledgeType;
  tier: Tier;
  muscles?: string[];
  limit?: number;
};

export type KnowledgeRetrieverDeps = {
  repository: KnowledgeRepository;
  novelty: NoveltyStore;
  embeddings?: EmbeddingBackend | null;
};

export class KnowledgeRetriever {
  constructor(private readonly deps: KnowledgeRetrieverDeps) {}

  async retrieve(req: RetrieveRequest): Promise<RetrievalResult> {
    const limit = Math.max(1, Math.min(50, req.limit ?? 5));
    const muscles = req.muscles ?? [];

    let excludeIds: number[] = [];
    try {
      excludeIds = await this.deps.novelty.get(req.userId);
    } catch (err) {
      console.warn("[KNOWLEDGE] novelty read failed:", errorMessage(err));
    }

    const q: KnowledgeQuery = { knowledgeType: req.knowledgeType, tier: req.tier, excludeIds, limit };

    let result: RetrievalResult = { chunks: [], tier: "none" };

    const semantic = await this.attempt("semantic", () => this.semantic(req.query, q));
    if (semantic.length) {
      result = { chunks: semantic, tier: "semantic" };
    } else {
      const keywords = tokenize(req.query);
      const keywordMuscles = req.knowledgeType === "exercise_technique" ? muscles : [];
      const keyword = keywords.length
        ? await this.attempt("keyword", () =>
            this.deps.repository.keywordSearch(keywords, { ...q, muscles: keywordMuscles })
          )
        : [];
      if (keyword.length) {
        result = { chunks: keyword, tier: "keyword" };
      } else if (muscles.length) {
        const byMuscle = await this.attempt("muscle", () => this.deps.repository.muscleGroupSearch(muscles, q));
        if (byMuscle.length) result = { chunks: byMuscle, tier: "muscle" };
      }
    }

    result.chunks = result.chunks.slice(0, limit);
    await this.track(req.userId, result.chunks);
    return result;
  }

  private async semantic(query: string, q: KnowledgeQuery): Promise<KnowledgeChunk[]> {
    const backend = this.deps.embeddings;
    if (!backend || !backend.isConfigured() || !query.trim()) return [];
    const vector = await backend.embed(query);
    if (!vector || vector.length === 0) return [];
    return this.deps.repository.semanticSearch(vector, q);
  }

  private async attempt(tier: RetrievalTier, fn: () => Promise<KnowledgeChunk[]>): Promise<KnowledgeChunk[]> {
    try {
      return await fn();
    } catch (err) {
      console.warn(`[KNOWLEDGE] ${tier} search failed, treating as empty:`, errorMessage(err));
      return [];
    }
  }

  private async track(userId: string, chunks: KnowledgeChunk[]): Promise<void> {
    if (!chunks.length) return;
    try {
      const existing = await this.deps.novelty.get(userId);
      const merged = mergeNovelty(
        existing,
        chunks.map((c) => c.id)
      );
      await this.deps.novelty.set(userId, merged, NOVELTY_TTL_MS);
    } catch (err) {
      console.warn("[KNOWLEDGE] novelty update failed:", errorMessage(err));
    }
  }

  // --------------------------------------------------------------------------
  // Enrichment
  // --------------------------------------------------------------------------

  async enrichExercises<T extends EnrichTarget>(exercises: T[], tier: Tier): Promise<T[]> {
    if (!exercises.length) return exercises;
    try {
      const knowledgeTypes: KnowledgeType[] = ["exercise_technique", "form_check"];
      const byName = await this.deps.repository.contextualSearch({
        exerciseNames: exercises.map((e) => e.name),
        muscles: [],
        knowledgeTypes,
        tier,
        limit: Math.floor(ENRICH_LIMIT / 2),
      });

      // muscle-group tips only for exercises no chunk names
      const named = new Set(byName.flatMap(exerciseNamesOf));
      const muscles = Array.from(
        new Set(exercises.filter((e) => !named.has(e.name.trim().toLowerCase())).map((e) => e.targetMuscle))
      );
      const byMuscle = muscles.length
        ? await this.deps.repository.contextualSearch({
            exerciseNames: [],
            muscles,
            knowledgeTypes,
            tier,
            limit: Math.floor(ENRICH_LIMIT / 3),
          })
        : [];

      const chunks = [...byName];
      for (const c of byMuscle) {
        if (!chunks.some((x) => x.id === c.id)) chunks.push(c);
      }
      if (!chunks.length) return exercises;
      return exercises.map((e) => attachKnowledge(e, chunks));
    } catch (err) {
      console.warn("[KNOWLEDGE] enrichment failed, returning exercises as is:", errorMessage(err));
      return exercises;
    }
  }
}

// ============================================================================
// ENRICHMENT HELPERS
// ============================================================================

export type VideoReference = { title: string; url: string; channel: string | null };

export type EnrichTarget = {
  name: string;
  targetMuscle: string;
  tips: string[];
  videoReferences: VideoReference[];
};

export const MAX_TIPS = 2;
/** chunk budget per enrichment; half goes to name matches, a third to muscle fallbacks */
export const ENRICH_LIMIT = 20;
export const MAX_VIDEOS = 2;

function truncate(s: string, max: number): string {
  return s.length <= max ? s : `${s.slice(0, max - 3)}...`;
}

/** Summary when it is 10..100 chars, else the first sentence of 20..150 chars. */
export function extractTip(content: string, summary: string | null): string | null {
  if (summary && summary.length >= 10 && summary.length <= 100) return summary;
  const sentence = content
    .split(/[.!?]/)
    .map((s) => s.trim())
    .find((s) => s.length >= 20 && s.length <= 150);
  if (sentence) return sentence;
  return summary ? truncate(summary, 100) : null;
}

/** Chunks naming the exercise win; muscle-group equality is only a fallback. */
export function relevantChunks(
  exercise: Pick<EnrichTarget, "name" | "targetMuscle">,
  chunks: readonly KnowledgeChunk[]
): KnowledgeChunk[] {
  const name = exercise.name.trim().toLowerCase();
  const byName = chunks.filter((c) => exerciseNamesOf(c).includes(name));
  if (byName.length) return byName;
  const muscle = exercise.targetMuscle.trim().toLowerCase();
  return chunks.filter((c) => !!c.muscleGroup && c.muscleGroup.trim().toLowerCase() === muscle);
}

export function attachKnowledge<T extends EnrichTarget>(exercise: T, chunks: readonly KnowledgeChunk[]): T {
  const relevant = relevantChunks(exercise, chunks);
  if (!relevant.length) return exercise;

  const tips = [...exercise.tips];
  const videos = [...exercise.videoReferences];
  for (const chunk of relevant) {
    const tip = extractTip(chunk.content, chunk.summary);
    if (tip && tips.length < MAX_TIPS && !tips.includes(tip)) tips.push(tip);

    const url = chunk.source?.url;
    if (url && videos.length < MAX_VIDEOS && !videos.some((v) => v.url === url)) {
      videos.push({
        title: chunk.summary ?? chunk.source?.title ?? exercise.name,
        url,
        channel: chunk.source?.channel ?? null,
      });
    }
  }
  return { ...exercise, tips, videoReferences: videos };
}

// ============================================================================
// PROMPT CONTEXT
// ============================================================================

export type PromptKnowledge = {
  programs: KnowledgeChunk[];
  techniques: KnowledgeChunk[];
  sources: Array<{ id: number; type: KnowledgeType; tier: RetrievalTier }>;
};

export async function gatherPromptKnowledge(
  retriever: KnowledgeRetriever,
  args: { userId: string; query: string; tier: Tier; muscles: string[] }
): Promise<PromptKnowledge> {
  const programs = await retriever.retrieve({ ...args, knowledgeType: "routine_design", limit: 5 });
  const techniques = await retriever.retrieve({ ...args, knowledgeType: "exercise_technique", limit: 5 });
  return {
    programs: programs.chunks,
    techniques: techniques.chunks,
    sources: [
      ...programs.chunks.map((c) => ({ id: c.id, type: c.knowledgeType, tier: programs.tier })),
      ...techniques.chunks.map((c) => ({ id: c.id, type: c.knowledgeType, tier: techniques.tier })),
    ],
  };
}

export function knowledgePromptBlock(k: PromptKnowledge): string {
  const lines: string[] = [];
  if (k.programs.length) {
    lines.push("## Reference program patterns (use as inspiration, do not copy)");
    for (const c of k.programs) lines.push(`- ${c.summary ?? "pattern"}: ${truncate(c.content, 200)}`);
  }
  if (k.techniques.length) {
    if (lines.length) lines.push("");
    lines.push("## Exercise knowledge (use as tips)");
    for (const c of k.techniques) lines.push(`- ${c.exerciseName ?? c.summary ?? "tip"}: ${truncate(c.content, 150)}`);
  }
  return lines.join("\n");
}
