import { promises as fs } from 'fs';
import * as path from 'path';
import { createLogger, IOError } from '@timbre/core';

const logger = createLogger('artifact-store');

export interface ArtifactEntry {
  jobId: string;
  directory: string;
  files: Map<string, number>; // name -> size in bytes
  createdAt: number;
}

export interface ArtifactStoreOptions {
  rootDir: string;
  maxSizeBytes: number;
}

const SAFE_NAME = /^[A-Za-z0-9._-]+$/;

/**
 * Job-scoped temp directories for encoded outputs.
 * Retained output is bounded; the oldest jobs are evicted first.
 */
export class ArtifactStore {
  private readonly rootDir: string;
  private readonly maxSizeBytes: number;
  private entries = new Map<string, ArtifactEntry>();

  constructor(options: ArtifactStoreOptions) {
    this.rootDir = path.resolve(options.rootDir);
    this.maxSizeBytes = options.maxSizeBytes;

    logger.info({
      rootDir: this.rootDir,
      maxSizeMB: Math.round(this.maxSizeBytes / 1024 / 1024)
    }, 'Artifact store initialized');
  }

  /**
   * Create the root directory
   */
  async initialize(): Promise<void> {
    try {
      await fs.mkdir(this.rootDir, { recursive: true });
    } catch (error) {
      logger.error({ error, rootDir: this.rootDir }, 'Failed to create artifact directory');
      throw new IOError(`Failed to create artifact directory: ${this.rootDir}`);
    }
  }

  /**
   * Write one artifact for a job, returning its absolute path
   */
  async write(jobId: string, name: string, bytes: Buffer): Promise<string> {
    assertSafeName(jobId);
    assertSafeName(name);

    await this.ensureSpace(bytes.length, jobId);

    const directory = path.join(this.rootDir, jobId);
    const filePath = path.join(directory, name);

    try {
      await fs.mkdir(directory, { recursive: true });
      await fs.writeFile(filePath, bytes);
    } catch (error) {
      logger.error({ error, jobId, name }, 'Failed to write artifact');
      throw new IOError(`Failed to write artifact ${name}`, { jobId });
    }

    const entry = this.entries.get(jobId) ?? {
      jobId,
      directory,
      files: new Map<string, number>(),
      createdAt: Date.now()
    };
    entry.files.set(name, bytes.length);
    this.entries.set(jobId, entry);

    logger.debug({ jobId, name, sizeKB: Math.round(bytes.length / 1024) }, 'Artifact written');

    return filePath;
  }

  /**
   * Absolute path of a retained artifact, or null if unknown
   */
  async locate(jobId: string, name: string): Promise<string | null> {
    if (!isSafeName(jobId) || !isSafeName(name)) {
      return null;
    }

    const filePath = path.join(this.rootDir, jobId, name);

    try {
      await fs.access(filePath);
      return filePath;
    } catch {
      // Deleted out from under us
      const entry = this.entries.get(jobId);
      entry?.files.delete(name);
      return null;
    }
  }

  /**
   * Remove everything a job wrote; returns whether anything was removed
   */
  async release(jobId: string): Promise<boolean> {
    if (!isSafeName(jobId)) {
      return false;
    }

    const directory = path.join(this.rootDir, jobId);
    const known = this.entries.delete(jobId);

    try {
      const existed = await fs.stat(directory).then(() => true, () => false);
      await fs.rm(directory, { recursive: true, force: true });

      if (existed) {
        logger.debug({ jobId }, 'Artifacts released');
      }
      return known || existed;
    } catch (error) {
      logger.error({ error, jobId }, 'Failed to release artifacts');
      throw new IOError(`Failed to remove artifacts for job ${jobId}`);
    }
  }

  getStats() {
    const totalSize = this.getCurrentSize();

    return {
      jobs: this.entries.size,
      totalSizeMB: Math.round(totalSize / 1024 / 1024),
      maxSizeMB: Math.round(this.maxSizeBytes / 1024 / 1024),
      utilizationPercent: this.maxSizeBytes > 0 ? (totalSize / this.maxSizeBytes) * 100 : 0
    };
  }

  /**
   * Evict the oldest jobs until `requiredBytes` fits
   */
  private async ensureSpace(requiredBytes: number, writingJobId: string): Promise<void> {
    const currentSize = this.getCurrentSize();

    if (currentSize + requiredBytes <= this.maxSizeBytes) {
      return;
    }

    logger.info({
      currentMB: Math.round(currentSize / 1024 / 1024),
      requiredMB: Math.round(requiredBytes / 1024 / 1024)
    }, 'Artifact store full, evicting jobs');

    const oldestFirst = Array.from(this.entries.values())
      .filter(entry => entry.jobId !== writingJobId)
      .sort((a, b) => a.createdAt - b.createdAt);

    let freedBytes = 0;

    for (const entry of oldestFirst) {
      const size = entrySize(entry);
      await this.release(entry.jobId);
      freedBytes += size;

      if (currentSize - freedBytes + requiredBytes <= this.maxSizeBytes) {
        break;
      }
    }

    logger.info({ freedMB: Math.round(freedBytes / 1024 / 1024) }, 'Artifact eviction complete');
  }

  private getCurrentSize(): number {
    let total = 0;
    for (const entry of this.entries.values()) {
      total += entrySize(entry);
    }
    return total;
  }
}

function entrySize(entry: ArtifactEntry): number {
  let size = 0;
  for (const bytes of entry.files.values()) {
    size += bytes;
  }
  return size;
}

function isSafeName(name: string): boolean {
  return SAFE_NAME.test(name) && name !== '.' && name !== '..';
}

function assertSafeName(name: string): void {
  if (!isSafeName(name)) {
    throw new IOError(`Unsafe artifact name: ${name}`);
  }
}
