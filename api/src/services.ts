// api/src/services.ts
// Wires repositories and backends: Postgres when DATABASE_URL is set, in-memory otherwise.

import { config, type Config } from "./config.js";
import { ensureSchema } from "./db.js";
import { OpenAIEmbeddingBackend } from "./embeddings.js";
import { PgExerciseRepository } from "./exerciseDb.js";
import { CatalogExerciseRepository } from "./exercisePool.js";
import { GenerationOrchestrator } from "./generationOrchestrator.js";
import { PgHistoryRepository } from "./historyDb.js";
import { PgKnowledgeRepository, PgNoveltyStore } from "./knowledgeDb.js";
import { InMemoryKnowledgeRepository, InMemoryNoveltyStore, KnowledgeRetriever } from "./knowledgeRetriever.js";
import { LevelTestService } from "./levelTest.js";
import { createOpenAIClient, OpenAIGenerativeBackend } from "./llm.js";
import { PgProfileStore } from "./profileDb.js";
import { PgRoutineStore } from "./routineDb.js";
import { InMemoryHistoryRepository, InMemoryProfileStore, InMemoryRoutineStore } from "./stores.js";

export type Services = {
  orchestrator: GenerationOrchestrator;
  levelTests: LevelTestService;
};

export async function createServices(cfg: Config = config): Promise<Services> {
  const client = createOpenAIClient(cfg.openaiApiKey);
  if (!client) console.warn("[LLM] OPENAI_API_KEY not set: routines fall back, semantic search is off");
  const llm = new OpenAIGenerativeBackend(client, cfg.llmModel);
  const embeddings = new OpenAIEmbeddingBackend(client, cfg.embeddingModel);

  if (cfg.databaseUrl) {
    const { vector } = await ensureSchema();
    const profiles = new PgProfileStore();
    const history = new PgHistoryRepository();
    const knowledge = new KnowledgeRetriever({
      repository: new PgKnowledgeRepository(vector),
      novelty: new PgNoveltyStore(),
      embeddings,
    });
    return {
      orchestrator: new GenerationOrchestrator({
        exercises: new PgExerciseRepository(),
        llm,
        profiles,
        history,
        knowledge,
        routines: new PgRoutineStore(),
        strategy: cfg.generationStrategy,
      }),
      levelTests: new LevelTestService({ profiles, history }),
    };
  }

  console.warn("DB: DATABASE_URL not set, using in-memory stores");
  const profiles = new InMemoryProfileStore();
  const history = new InMemoryHistoryRepository();
  const knowledge = new KnowledgeRetriever({
    repository: new InMemoryKnowledgeRepository(),
    novelty: new InMemoryNoveltyStore(),
    embeddings,
  });
  return {
    orchestrator: new GenerationOrchestrator({
      exercises: new CatalogExerciseRepository(),
      llm,
      profiles,
      history,
      knowledge,
      routines: new InMemoryRoutineStore(),
      strategy: cfg.generationStrategy,
    }),
    levelTests: new LevelTestService({ profiles, history }),
  };
}
