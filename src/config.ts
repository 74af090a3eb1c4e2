import dotenv from "dotenv";
import fsSync from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import type { VectorStoreKind } from "./store/factory";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);
const PROJECT_ROOT = path.resolve(__dirname, "..");

// Centralized single dotenv.config() call: prefer the project root .env, else
// whatever dotenv finds from the working directory.
(() => {
  const rootEnv = path.join(PROJECT_ROOT, ".env");
  if (fsSync.existsSync(rootEnv)) {
    dotenv.config({ path: rootEnv });
    return;
  }
  dotenv.config();
})();

const packageSchema = z.object({ version: z.string() });

/** Application version sourced from package.json. */
export const APP_VERSION: string = (() => {
  const raw: unknown = JSON.parse(fsSync.readFileSync(path.join(PROJECT_ROOT, "package.json"), "utf8"));
  return packageSchema.parse(raw).version;
})();

export type EmbeddingProvider = "transformers" | "hashing";

export interface Config {
  VERBOSE: boolean;
  EMBEDDING_PROVIDER: EmbeddingProvider;
  MODEL_NAME: string | undefined;
  /** Directory the sentence model is downloaded to and loaded from. */
  TRANSFORMERS_CACHE: string;
  ALLOW_REMOTE_MODELS: boolean;
  HASH_EMBEDDING_DIM: number;
  VECTOR_STORE: VectorStoreKind;
  INDEX_STORE_PATH: string;
  GEMINI_API_KEY: string | undefined;
  GEMINI_MODEL: string;
  GENERATION_TEMPERATURE: number;
  ENABLE_RAG_RETRIEVAL: boolean;
  RETRIEVAL_TOP_K: number;
  EMBED_TIMEOUT_MS: number;
  STORE_TIMEOUT_MS: number;
  GENERATION_TIMEOUT_MS: number;
  CHUNK_SIZE: number;
  CHUNK_OVERLAP: number;
  MATERIALS_DIR: string | undefined;
  MATERIALS_EXT: string[];
  EXCLUDED_FOLDERS: string[];
  DEFAULT_DIFFICULTY: string;
  MCP_TRANSPORT: string;
}

type Env = Record<string, string | undefined>;

/** Tolerant truthy parsing; unset or unrecognised values give `fallback`. */
export function parseBool(raw: string | undefined, fallback: boolean): boolean {
  const v = (raw ?? "").trim().toLowerCase();
  if (v === "1" || v === "true" || v === "yes" || v === "on") return true;
  if (v === "0" || v === "false" || v === "no" || v === "off") return false;
  return fallback;
}

/** Integer in [min, max]; unset or non-numeric gives `fallback`, out-of-range values are clamped. */
export function parseBoundedInt(raw: string | undefined, fallback: number, min: number, max: number): number {
  const v = raw?.trim();
  if (!v) return fallback;
  const n = Number(v);
  if (!Number.isFinite(n)) return fallback;
  return Math.min(max, Math.max(min, Math.floor(n)));
}

function parseList(raw: string | undefined, fallback: string[]): string[] {
  const list = raw
    ?.split(",")
    .map((s) => s.trim())
    .filter(Boolean);
  return list?.length ? list : fallback;
}

/**
 * Read every runtime knob from the environment. Malformed values never throw;
 * they fall back to the documented default.
 */
export function getConfig(env: Env = process.env): Config {
  const VERBOSE = parseBool(env.VERBOSE, false);

  const EMBEDDING_PROVIDER: EmbeddingProvider =
    env.EMBEDDING_PROVIDER?.trim().toLowerCase() === "hashing" ? "hashing" : "transformers";
  const HASH_EMBEDDING_DIM = parseBoundedInt(env.HASH_EMBEDDING_DIM, 384, 16, 4096);

  const VECTOR_STORE: VectorStoreKind =
    env.VECTOR_STORE?.trim().toLowerCase() === "memory" ? "memory" : "file";
  const INDEX_STORE_PATH = path.resolve(env.INDEX_STORE_PATH?.trim() || ".data/vector-store.json");

  const temperature = Number(env.GENERATION_TEMPERATURE?.trim());
  const GENERATION_TEMPERATURE =
    env.GENERATION_TEMPERATURE?.trim() && Number.isFinite(temperature)
      ? Math.min(2, Math.max(0, temperature))
      : 0.3;

  // Chunk size impacts recall (too large) vs. precision (too small).
  const CHUNK_SIZE = parseBoundedInt(env.CHUNK_SIZE, 800, 1, 8000);
  let CHUNK_OVERLAP = parseBoundedInt(env.CHUNK_OVERLAP, 120, 0, 4000);
  if (CHUNK_OVERLAP >= CHUNK_SIZE) {
    const fallback = Math.max(0, Math.floor(CHUNK_SIZE * 0.15));
    console.error(
      `[RAG] CHUNK_OVERLAP (=${CHUNK_OVERLAP}) >= CHUNK_SIZE (=${CHUNK_SIZE}). Using fallback overlap ${fallback}.`,
    );
    CHUNK_OVERLAP = fallback;
  }

  return {
    VERBOSE,
    EMBEDDING_PROVIDER,
    MODEL_NAME: env.MODEL_NAME?.trim() || undefined,
    TRANSFORMERS_CACHE: path.resolve(env.TRANSFORMERS_CACHE?.trim() || ".cache/transformers"),
    ALLOW_REMOTE_MODELS: parseBool(env.ALLOW_REMOTE_MODELS, true),
    HASH_EMBEDDING_DIM,
    VECTOR_STORE,
    INDEX_STORE_PATH,
    GEMINI_API_KEY: env.GEMINI_API_KEY?.trim() || undefined,
    GEMINI_MODEL: env.GEMINI_MODEL?.trim() || "gemini-2.5-flash",
    GENERATION_TEMPERATURE,
    ENABLE_RAG_RETRIEVAL: parseBool(env.ENABLE_RAG_RETRIEVAL, true),
    RETRIEVAL_TOP_K: parseBoundedInt(env.RETRIEVAL_TOP_K, 5, 1, 50),
    EMBED_TIMEOUT_MS: parseBoundedInt(env.EMBED_TIMEOUT_MS, 15_000, 0, 600_000),
    STORE_TIMEOUT_MS: parseBoundedInt(env.STORE_TIMEOUT_MS, 5_000, 0, 600_000),
    GENERATION_TIMEOUT_MS: parseBoundedInt(env.GENERATION_TIMEOUT_MS, 30_000, 0, 600_000),
    CHUNK_SIZE,
    CHUNK_OVERLAP,
    MATERIALS_DIR: env.MATERIALS_DIR?.trim() ? path.resolve(env.MATERIALS_DIR.trim()) : undefined,
    MATERIALS_EXT: parseList(env.MATERIALS_EXT, ["md", "markdown", "txt", "pdf"]),
    EXCLUDED_FOLDERS: parseList(env.EXCLUDED_FOLDERS, ["node_modules", ".git", "dist", "build", ".cache"]),
    DEFAULT_DIFFICULTY: env.DEFAULT_DIFFICULTY?.trim() || "intermediate",
    // Transport mode: 'stdio' (default) or 'http'/'streamable-http'.
    MCP_TRANSPORT: (env.MCP_TRANSPORT ?? "").trim().toLowerCase(),
  };
}
