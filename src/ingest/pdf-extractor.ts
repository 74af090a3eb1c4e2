/**
 * PDF text extraction with a JSON side cache.
 *
 * Extracted text for every PDF lives in one `pdf-text-cache.json` next to the
 * vector store snapshot (or in the materials folder when no snapshot path is
 * configured):
 *
 *   {
 *     "version": 1,
 *     "entries": {
 *       "/abs/path/to/file.pdf": {
 *         "pdfPath": "relative/path/to/file.pdf",
 *         "pdfSize": 12345,
 *         "extractedAt": "2024-01-01T00:00:00Z",
 *         "text": "...",
 *         "pageCount": 10
 *       }
 *     }
 *   }
 *
 * An entry is stale when the PDF's size changed; a missing or corrupt cache
 * file simply starts empty.
 */

import fs from "node:fs/promises";
import path from "node:path";
import { PDFParse } from "pdf-parse";
import { z } from "zod";
import { describeError } from "../errors";

const cacheEntrySchema = z.object({
  pdfPath: z.string(),
  pdfSize: z.number(),
  extractedAt: z.string(),
  text: z.string(),
  pageCount: z.number(),
});

const cacheStoreSchema = z.object({
  version: z.literal(1),
  entries: z.record(cacheEntrySchema),
});
type PdfCacheStore = z.infer<typeof cacheStoreSchema>;

export const PDF_CACHE_FILE = "pdf-text-cache.json";

export class PdfExtractor {
  private readonly cacheFilePath: string;
  private readonly verbose: boolean;
  private cacheStore: PdfCacheStore | null = null;

  /**
   * @param cacheDir Directory holding {@link PDF_CACHE_FILE}.
   * @param verbose  Enable additional logging.
   */
  constructor(cacheDir: string, verbose = false) {
    this.cacheFilePath = path.join(cacheDir, PDF_CACHE_FILE);
    this.verbose = verbose;
  }

  public static isPdf(filePath: string): boolean {
    return path.extname(filePath).toLowerCase() === ".pdf";
  }

  /**
   * Text of a PDF, from the cache when the size still matches, else parsed
   * and cached.
   *
   * @throws If the file cannot be read or parsed; the caller decides whether to skip it.
   */
  public async extractText(pdfAbsPath: string, pdfRelPath: string, pdfSize: number): Promise<string> {
    const store = await this.loadCacheStore();
    const cached = store.entries[pdfAbsPath];
    if (cached && cached.pdfSize === pdfSize && cached.text) {
      if (this.verbose) console.error(`[PDF] Cache hit for ${path.basename(pdfAbsPath)}`);
      return cached.text;
    }

    if (this.verbose) console.error(`[PDF] Extracting text from ${path.basename(pdfAbsPath)}...`);
    const data = await fs.readFile(pdfAbsPath);
    const parser = new PDFParse({ data });
    let text: string;
    let pageCount: number;
    try {
      const result = await parser.getText();
      text = result.text || "";
      pageCount = result.pages.length;
    } finally {
      await parser.destroy();
    }

    store.entries[pdfAbsPath] = {
      pdfPath: pdfRelPath,
      pdfSize,
      extractedAt: new Date().toISOString(),
      text,
      pageCount,
    };
    await this.saveCacheStore(store);
    return text;
  }

  private async loadCacheStore(): Promise<PdfCacheStore> {
    if (this.cacheStore) return this.cacheStore;
    let store: PdfCacheStore = { version: 1, entries: {} };
    try {
      const parsed = cacheStoreSchema.safeParse(JSON.parse(await fs.readFile(this.cacheFilePath, "utf8")));
      if (parsed.success) store = parsed.data;
      else console.error(`[PDF] Ignoring malformed cache at ${this.cacheFilePath}`);
    } catch (e) {
      if (this.verbose) console.error(`[PDF] No usable cache at ${this.cacheFilePath}: ${describeError(e)}`);
    }
    this.cacheStore = store;
    return store;
  }

  /** A failed cache write only costs a re-extraction next time; it is logged, not thrown. */
  private async saveCacheStore(store: PdfCacheStore): Promise<void> {
    try {
      await fs.mkdir(path.dirname(this.cacheFilePath), { recursive: true });
      await fs.writeFile(this.cacheFilePath, JSON.stringify(store, null, 2), "utf8");
    } catch (e) {
      console.error(`[PDF] Failed to save cache store:`, e);
    }
  }
}
