/**
 * Application entry point.
 *
 * 1. Read the environment configuration.
 * 2. Initialize the embedding service (sentence model, or hashing when
 *    EMBEDDING_PROVIDER=hashing) eagerly so the first tool call is fast.
 * 3. Open the document store; a snapshot that cannot be opened degrades to an
 *    in-memory store instead of failing startup.
 * 4. Build the RAG pipeline around the store and the generative model (Gemini
 *    when GEMINI_API_KEY is set, fallback answers otherwise).
 * 5. Ingest MATERIALS_DIR, if configured.
 * 6. Serve the MCP tools over stdio (default) or streamable HTTP
 *    (MCP_TRANSPORT=http|streamable-http, which also exposes GET /health).
 *
 * README.md lists every environment variable.
 */
import path from "node:path";
import { configureModelCache } from "./cache";
import { getConfig, type Config } from "./config";
import type { EmbeddingService } from "./embeddings";
import { HashingEmbeddings } from "./hashing-embeddings";
import { TransformersEmbeddings } from "./transformers-embeddings";
import { MaterialsLoader } from "./ingest/materials-loader";
import { GeminiModel } from "./llm/gemini";
import type { GenerativeModel } from "./llm/types";
import { RagPipeline } from "./rag/pipeline";
import { StatusManager } from "./status";
import { createDocumentStore } from "./store/factory";
import { createServer } from "./tools";
import { startHttpTransport } from "./transport/http";
import { startStdioTransport } from "./transport/stdio";

const config: Config = getConfig();
const status = new StatusManager();

async function createEmbeddings(cfg: Config): Promise<EmbeddingService> {
  if (cfg.EMBEDDING_PROVIDER === "hashing") return new HashingEmbeddings(cfg.HASH_EMBEDDING_DIM);
  await configureModelCache({ dir: cfg.TRANSFORMERS_CACHE, allowRemote: cfg.ALLOW_REMOTE_MODELS });
  const embeddings = new TransformersEmbeddings(cfg.MODEL_NAME);
  await embeddings.init();
  return embeddings;
}

function createModel(cfg: Config): GenerativeModel | null {
  if (!cfg.GEMINI_API_KEY) {
    console.error("[RAG] GEMINI_API_KEY not set; answers and grades use the retrieval-only fallback.");
    return null;
  }
  return new GeminiModel({
    apiKey: cfg.GEMINI_API_KEY,
    model: cfg.GEMINI_MODEL,
    temperature: cfg.GENERATION_TEMPERATURE,
  });
}

const embeddings = await createEmbeddings(config);
console.error(
  `[RAG] Embeddings ready: ${embeddings.getModelName()} (dim ${embeddings.getDimension() ?? "unknown"})`,
);
const model = createModel(config);

const { store, degraded } = await createDocumentStore({
  kind: config.VECTOR_STORE,
  embeddings,
  storePath: config.INDEX_STORE_PATH,
  timeouts: { embedMs: config.EMBED_TIMEOUT_MS, queryMs: config.STORE_TIMEOUT_MS },
  verbose: config.VERBOSE,
});
status.setStoreBackend(store.backend.kind, degraded);
status.setModels(embeddings.getModelName(), model?.name);

const pipeline = new RagPipeline({
  store,
  model,
  topK: config.RETRIEVAL_TOP_K,
  gradingRetrieval: config.ENABLE_RAG_RETRIEVAL,
  generationTimeoutMs: config.GENERATION_TIMEOUT_MS,
  verbose: config.VERBOSE,
});

if (config.MATERIALS_DIR) {
  const loader = new MaterialsLoader({
    root: config.MATERIALS_DIR,
    allowedExt: config.MATERIALS_EXT,
    excludedFolders: config.EXCLUDED_FOLDERS,
    pipeline,
    embeddings,
    chunkSize: config.CHUNK_SIZE,
    chunkOverlap: config.CHUNK_OVERLAP,
    defaultDifficulty: config.DEFAULT_DIFFICULTY,
    pdfCacheDir: config.VECTOR_STORE === "file" ? path.dirname(config.INDEX_STORE_PATH) : undefined,
    status,
    verbose: config.VERBOSE,
  });
  await loader.load();
}

const counts = await pipeline.countDocuments();
console.error(`[RAG] Store holds ${counts.materials} materials and ${counts.questions} questions.`);
status.markReady();

const serverFactory = () => createServer(pipeline);
const useHttp = config.MCP_TRANSPORT === "http" || config.MCP_TRANSPORT === "streamable-http";

if (useHttp) {
  status.markTransport("http");
  await startHttpTransport({ createServer: serverFactory, status });
} else {
  status.markTransport("stdio");
  await startStdioTransport(serverFactory);
}
