import { randomUUID } from 'node:crypto';
import { createWriteStream } from 'node:fs';
import { mkdir, readdir, rm, stat, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';

export interface UploadHandle {
  id: string;
  /** Client-supplied name; only its extension is ever used. */
  originalName: string;
  extension: string;
  path: string;
  createdAt: Date;
}

export interface ArtifactHandle extends UploadHandle {
  mimeType: string;
  downloadName: string;
}

export interface ArtifactStoreOptions {
  uploadDir: string;
  outputDir: string;
  retentionMs: number;
}

export type SweepSummary = {
  scanned: number;
  removed: number;
  failed: number;
};

const SAFE_EXTENSION = /^\.[a-z0-9]{1,10}$/;

export function safeExtension(fileName: string): string {
  const extension = path.extname(fileName).toLowerCase();
  return SAFE_EXTENSION.test(extension) ? extension : '';
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Scratch storage for request inputs (`uploadDir`) and generated outputs
 * (`outputDir`). Inputs belong to one request and are released when it ends;
 * outputs outlive the request and are removed by the sweep.
 */
export class ArtifactStore {
  constructor(private readonly options: ArtifactStoreOptions) {}

  get uploadDir(): string {
    return this.options.uploadDir;
  }

  get outputDir(): string {
    return this.options.outputDir;
  }

  async init(): Promise<void> {
    await mkdir(this.options.uploadDir, { recursive: true });
    await mkdir(this.options.outputDir, { recursive: true });
  }

  async save(source: Buffer | Readable, originalName: string): Promise<UploadHandle> {
    const id = randomUUID();
    const extension = safeExtension(originalName);
    const filePath = path.join(this.options.uploadDir, id + extension);

    if (Buffer.isBuffer(source)) {
      await writeFile(filePath, source);
    } else {
      try {
        await pipeline(source, createWriteStream(filePath));
      } catch (error) {
        await rm(filePath, { force: true });
        throw error;
      }
    }

    return { id, originalName, extension, path: filePath, createdAt: new Date() };
  }

  /** Reserves a path for an output; the transform writes it. */
  allocateOutput(extension: string, mimeType: string, downloadName: string): ArtifactHandle {
    const id = randomUUID();
    const normalized = extension.startsWith('.') ? extension : `.${extension}`;

    return {
      id,
      originalName: downloadName,
      extension: normalized,
      path: path.join(this.options.outputDir, id + normalized),
      createdAt: new Date(),
      mimeType,
      downloadName,
    };
  }

  async release(handle: UploadHandle): Promise<void> {
    await rm(handle.path, { force: true });
  }

  /**
   * Deletes every file in either scratch area older than the retention window.
   * Files that disappear mid-sweep are skipped.
   */
  async sweep(now: number = Date.now()): Promise<SweepSummary> {
    const summary: SweepSummary = { scanned: 0, removed: 0, failed: 0 };

    for (const folder of [this.options.uploadDir, this.options.outputDir]) {
      let entries: string[];
      try {
        entries = await readdir(folder);
      } catch (error) {
        if (isMissingFile(error)) continue;
        throw error;
      }

      for (const entry of entries) {
        const filePath = path.join(folder, entry);
        try {
          const info = await stat(filePath);
          if (!info.isFile()) continue;

          summary.scanned++;
          if (now - info.mtimeMs > this.options.retentionMs) {
            await rm(filePath, { force: true });
            summary.removed++;
          }
        } catch (error) {
          if (isMissingFile(error)) continue;
          summary.failed++;
          console.warn(`[store] Could not sweep ${filePath}:`, error instanceof Error ? error.message : String(error));
        }
      }
    }

    return summary;
  }
}

/**
 * Runs `store.sweep()` once straight away, then every `intervalMs` for the
 * life of the process. Returns a function that stops the timer.
 */
export function startSweeper(store: ArtifactStore, intervalMs: number): () => void {
  let running = false;

  const tick = () => {
    if (running) return;
    running = true;

    store
      .sweep()
      .then((summary) => {
        if (summary.removed > 0) {
          console.info(`[store] Swept ${summary.removed} expired file(s)`);
        }
      })
      .catch((error: unknown) => {
        console.error('[store] Sweep failed:', error);
      })
      .finally(() => {
        running = false;
      });
  };

  tick();
  const timer = setInterval(tick, intervalMs);

  timer.unref();
  return () => clearInterval(timer);
}
