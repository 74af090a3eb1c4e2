import fs from "node:fs/promises";
import { env } from "@huggingface/transformers";

export interface ModelCacheOptions {
  /** Absolute directory for downloaded model files. */
  dir: string;
  /** When false only models already present in `dir` can be loaded. */
  allowRemote?: boolean;
}

/**
 * Point the transformers runtime at a filesystem cache. Kept apart from the
 * embedding class so tests that never load a model don't pull the runtime in.
 * Must run before the first `from_pretrained` call.
 */
export async function configureModelCache(opts: ModelCacheOptions): Promise<string> {
  await fs.mkdir(opts.dir, { recursive: true });
  env.useBrowserCache = false;
  env.cacheDir = opts.dir;
  env.localModelPath = opts.dir;
  env.allowLocalModels = true;
  env.allowRemoteModels = opts.allowRemote ?? true;
  console.error(
    `[RAG] Model cache: ${opts.dir}${env.allowRemoteModels ? "" : " (offline, local models only)"}`,
  );
  return opts.dir;
}
