import fs from "node:fs/promises";
import path from "node:path";
import fg from "fast-glob";
import type { EmbeddingService } from "../embeddings";
import { DEFAULT_DIFFICULTY, type RagPipeline } from "../rag/pipeline";
import type { StatusManager } from "../status";
import { markdownToText } from "./markdown";
import { PdfExtractor } from "./pdf-extractor";

export interface MaterialsLoaderOptions {
  /** Folder walked for material files. */
  root: string;
  /** Extensions WITHOUT leading dot. */
  allowedExt: string[];
  /** Folder names pruned during the walk. */
  excludedFolders?: string[];
  pipeline: RagPipeline;
  embeddings: EmbeddingService;
  chunkSize?: number; // default 800
  chunkOverlap?: number; // default 120
  defaultDifficulty?: string;
  /** Where pdf-text-cache.json lives (defaults to `root`). */
  pdfCacheDir?: string;
  status?: StatusManager;
  verbose?: boolean;
}

export interface IngestSummary {
  filesDiscovered: number;
  chunksTotal: number;
  chunksStored: number;
}

interface FileInfo {
  rel: string; // forward-slash path relative to root
  abs: string;
  size: number;
}

const MARKDOWN_EXT = new Set([".md", ".markdown"]);

/** Material id of chunk `index` out of `total` for a file. */
export function materialId(rel: string, index: number, total: number): string {
  return total === 1 ? rel : `${rel}#${index}`;
}

/**
 * Loads a folder of study materials (Markdown, plain text, PDF) into the
 * materials collection. The subject is the first folder under the root, the
 * topic the file name; long files are split into overlapping chunks stored
 * under `<path>#<n>`. Re-running over unchanged files rewrites the same ids.
 */
export class MaterialsLoader {
  private readonly root: string;
  private readonly allowedExt: string[];
  private readonly excludedFolders: string[];
  private readonly pipeline: RagPipeline;
  private readonly embeddings: EmbeddingService;
  private readonly chunkSize: number;
  private readonly chunkOverlap: number;
  private readonly difficulty: string;
  private readonly pdf: PdfExtractor;
  private readonly status?: StatusManager;
  private readonly verbose: boolean;

  public constructor(opts: MaterialsLoaderOptions) {
    this.root = opts.root;
    this.allowedExt = opts.allowedExt;
    this.excludedFolders = opts.excludedFolders ?? [];
    this.pipeline = opts.pipeline;
    this.embeddings = opts.embeddings;
    this.chunkSize = opts.chunkSize ?? 800;
    this.chunkOverlap = opts.chunkOverlap ?? 120;
    this.difficulty = opts.defaultDifficulty || DEFAULT_DIFFICULTY;
    this.pdf = new PdfExtractor(opts.pdfCacheDir ?? opts.root, opts.verbose);
    this.status = opts.status;
    this.verbose = !!opts.verbose;
  }

  /**
   * Discover, read, chunk and store every material file. Unreadable files and
   * rejected chunks are logged and skipped so one bad file never blocks the rest.
   */
  public async load(): Promise<IngestSummary> {
    const files = await this.discoverFiles();
    console.error(`[RAG] Loading study materials from ${this.root} ... (${files.length} files)`);
    if (this.verbose) console.error(`[RAG][verbose] Extensions: ${this.allowedExt.join(", ")}`);

    const summary: IngestSummary = { filesDiscovered: files.length, chunksTotal: 0, chunksStored: 0 };
    for (const file of files) {
      let text: string;
      try {
        text = await this.readText(file);
      } catch (e) {
        console.error(`[RAG] Skipping unreadable material ${file.rel}:`, e);
        continue;
      }
      if (!text.trim()) {
        if (this.verbose) console.error(`[RAG][verbose] Skipping empty material ${file.rel}`);
        continue;
      }

      const chunks = this.embeddings.chunk(text, this.chunkSize, this.chunkOverlap);
      summary.chunksTotal += chunks.length;
      this.status?.setIngestTotals(summary.filesDiscovered, summary.chunksTotal);

      const stem = path.basename(file.rel, path.extname(file.rel));
      const segments = file.rel.split("/");
      const subject = segments.length > 1 ? segments[0] : "general";
      // Chunks of one file are stored concurrently; the file backend folds their snapshot writes.
      const results = await Promise.all(
        chunks.map((content, i) =>
          this.pipeline.addStudyMaterial({
            id: materialId(file.rel, i, chunks.length),
            title: chunks.length === 1 ? stem : `${stem} (part ${i + 1})`,
            content,
            topic: stem,
            subject,
            difficulty: this.difficulty,
          }),
        ),
      );
      const storedCount = results.filter((r) => r.ok).length;
      summary.chunksStored += storedCount;
      if (storedCount) this.status?.incStored(storedCount);
    }
    console.error(
      `[RAG] Materials ready: ${summary.chunksStored}/${summary.chunksTotal} chunks stored from ${summary.filesDiscovered} files.`,
    );
    return summary;
  }

  private async readText(file: FileInfo): Promise<string> {
    if (PdfExtractor.isPdf(file.abs)) return this.pdf.extractText(file.abs, file.rel, file.size);
    const raw = await fs.readFile(file.abs, "utf8");
    return MARKDOWN_EXT.has(path.extname(file.abs).toLowerCase()) ? markdownToText(raw) : raw;
  }

  private async discoverFiles(): Promise<FileInfo[]> {
    const patterns = this.allowedExt.map((ext) => `**/*.${ext}`);
    const ignore = this.excludedFolders.map((dir) => `**/${dir}/**`);
    const entries = await fg(patterns, {
      cwd: this.root,
      dot: false,
      onlyFiles: true,
      caseSensitiveMatch: false,
      ignore,
      stats: true,
    });
    return entries
      .map((entry) => ({
        rel: entry.path,
        abs: path.join(this.root, entry.path),
        size: entry.stats?.size ?? 0,
      }))
      .sort((a, b) => a.rel.localeCompare(b.rel));
  }
}
