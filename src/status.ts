import { APP_VERSION } from "./config";

/**
 * Counters for the startup ingestion of the materials folder.
 * All values are non-negative integers updated in place.
 */
export interface IngestStatus {
  /** Files discovered that matched the extension allow-list. */
  filesDiscovered: number;
  /** Chunks produced after splitting every readable file. */
  chunksTotal: number;
  /** Chunks successfully upserted into the materials collection. */
  chunksStored: number;
}

/**
 * Snapshot of server lifecycle, served by GET /health in HTTP mode.
 *
 * ready = true once the store is open and the startup ingestion (if any) has
 * finished; requests are accepted earlier but may see fewer materials.
 */
export interface ServerStatus {
  /** Package / server version (kept in sync with package.json). */
  version: string;
  /** Embedding model identifier. */
  embeddingModel: string;
  /** Generative model identifier, or "fallback" when none is configured. */
  generativeModel: string;
  /** Vector backend in use: "file", "memory" or "memory (fallback)". */
  storeBackend: string;
  /** Active transport: 'stdio' | 'http' | 'unknown'. */
  transport: string;
  ready: boolean;
  /** ISO timestamp when the StatusManager was created. */
  startedAt: string;
  ingest: IngestStatus;
}

/**
 * Class wrapper around mutable server status state. One instance is created at
 * startup and handed to whatever needs to report or read progress.
 */
export class StatusManager {
  private readonly data: ServerStatus;

  public constructor(initial?: Partial<ServerStatus>) {
    this.data = {
      version: initial?.version ?? APP_VERSION,
      embeddingModel: initial?.embeddingModel ?? "",
      generativeModel: initial?.generativeModel ?? "fallback",
      storeBackend: initial?.storeBackend ?? "",
      transport: initial?.transport ?? "unknown",
      ready: initial?.ready ?? false,
      startedAt: initial?.startedAt ?? new Date().toISOString(),
      ingest: initial?.ingest ?? { filesDiscovered: 0, chunksTotal: 0, chunksStored: 0 },
    };
  }

  public markTransport(t: string) {
    this.data.transport = t;
  }

  public setModels(embeddingModel: string, generativeModel: string | undefined) {
    this.data.embeddingModel = embeddingModel;
    this.data.generativeModel = generativeModel ?? "fallback";
  }

  public setStoreBackend(kind: string, degraded: boolean) {
    this.data.storeBackend = degraded ? `${kind} (fallback)` : kind;
  }

  public setIngestTotals(files: number, chunks: number) {
    this.data.ingest.filesDiscovered = files;
    this.data.ingest.chunksTotal = chunks;
  }

  public incStored(count = 1) {
    this.data.ingest.chunksStored += count;
  }

  public markReady() {
    this.data.ready = true;
  }

  /** Access a live reference to current status (treat as read-only). */
  public getStatus(): ServerStatus {
    return this.data;
  }

  public toJSON() {
    return this.data;
  }
}
