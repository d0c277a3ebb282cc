import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { IOError } from '@timbre/core';
import { ArtifactStore } from '../src/storage/artifact-store';

describe('ArtifactStore', () => {
  let rootDir: string;

  beforeEach(async () => {
    rootDir = await fs.mkdtemp(path.join(os.tmpdir(), 'timbre-store-'));
  });

  afterEach(async () => {
    await fs.rm(rootDir, { recursive: true, force: true });
  });

  it('should write artifacts under the job directory', async () => {
    const store = new ArtifactStore({ rootDir, maxSizeBytes: 1024 });
    await store.initialize();

    const filePath = await store.write('job-1', 'full.wav', Buffer.from('abc'));

    expect(filePath).toBe(path.join(rootDir, 'job-1', 'full.wav'));
    expect((await fs.readFile(filePath)).toString()).toBe('abc');
    expect(await store.locate('job-1', 'full.wav')).toBe(filePath);
  });

  it('should refuse names that leave the job directory', async () => {
    const store = new ArtifactStore({ rootDir, maxSizeBytes: 1024 });

    await expect(store.write('..', 'full.wav', Buffer.from('x'))).rejects.toBeInstanceOf(IOError);
    await expect(store.write('job-1', '../escape.wav', Buffer.from('x'))).rejects.toBeInstanceOf(IOError);
    expect(await store.locate('job-1', '..')).toBeNull();
  });

  it('should report unknown artifacts', async () => {
    const store = new ArtifactStore({ rootDir, maxSizeBytes: 1024 });

    expect(await store.locate('job-1', 'full.wav')).toBeNull();
  });

  it('should release a job directory', async () => {
    const store = new ArtifactStore({ rootDir, maxSizeBytes: 1024 });
    await store.write('job-1', 'full.wav', Buffer.from('abc'));

    expect(await store.release('job-1')).toBe(true);
    expect(await store.release('job-1')).toBe(false);
    await expect(fs.access(path.join(rootDir, 'job-1'))).rejects.toThrow();
  });

  it('should evict the oldest jobs when full', async () => {
    const store = new ArtifactStore({ rootDir, maxSizeBytes: 10 });
    await store.write('job-1', 'full.wav', Buffer.alloc(4));
    await store.write('job-2', 'full.wav', Buffer.alloc(4));

    await store.write('job-3', 'full.wav', Buffer.alloc(4));

    expect(await store.locate('job-1', 'full.wav')).toBeNull();
    expect(await store.locate('job-2', 'full.wav')).not.toBeNull();
    expect(await store.locate('job-3', 'full.wav')).not.toBeNull();
    expect(store.getStats().jobs).toBe(2);
  });

  it('should never evict the job being written', async () => {
    const store = new ArtifactStore({ rootDir, maxSizeBytes: 6 });
    await store.write('job-1', 'streaming.mp3', Buffer.alloc(4));

    await store.write('job-1', 'full.wav', Buffer.alloc(4));

    expect(await store.locate('job-1', 'streaming.mp3')).not.toBeNull();
    expect(await store.locate('job-1', 'full.wav')).not.toBeNull();
  });
});
