/**
 * Modelsync Transfer - Local Model Store
 * Reads manifests and blobs straight from the models directory
 */

import { open, readFile, stat } from 'fs/promises';
import { homedir } from 'os';
import * as path from 'path';
import { SourceNotFoundError } from './errors.js';
import { formatModelName } from './endpoints.js';
import type { BandwidthLimiter } from './bandwidth-limiter.js';
import { ManifestSchema, DEFAULT_CHUNK_SIZE, type Manifest, type ModelReference } from './types.js';

export interface BlobReadOptions {
  chunkSize?: number;
  limiter?: BandwidthLimiter;
  signal?: AbortSignal;
  /** Called with the running byte count after each chunk */
  onProgress?: (completed: number) => void;
}

export function defaultModelsDir(env: Record<string, string | undefined> = process.env): string {
  return env.OLLAMA_MODELS ?? path.join(homedir(), '.ollama', 'models');
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class LocalModelStore {
  readonly modelsDir: string;

  constructor(modelsDir: string = defaultModelsDir()) {
    this.modelsDir = modelsDir;
  }

  manifestPath(reference: ModelReference): string {
    return path.join(
      this.modelsDir,
      'manifests',
      reference.host,
      reference.namespace,
      reference.model,
      reference.tag
    );
  }

  blobPath(digest: string): string {
    return path.join(this.modelsDir, 'blobs', digest.replace(':', '-'));
  }

  async readManifest(reference: ModelReference): Promise<Manifest> {
    let content: string;
    try {
      content = await readFile(this.manifestPath(reference), 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        throw new SourceNotFoundError(formatModelName(reference), this.modelsDir);
      }
      throw error;
    }

    const parsed = ManifestSchema.safeParse(JSON.parse(content));
    if (!parsed.success) {
      throw new Error(
        `Manifest for ${formatModelName(reference)} is malformed: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`
      );
    }
    return parsed.data;
  }

  async hasBlob(digest: string): Promise<boolean> {
    try {
      await stat(this.blobPath(digest));
      return true;
    } catch (error) {
      if (isMissingFile(error)) return false;
      throw error;
    }
  }

  async readBlobText(digest: string): Promise<string> {
    return readFile(this.blobPath(digest), 'utf-8');
  }

  /**
   * Stream a blob in fixed-size chunks, throttled when a limiter is given
   */
  async openBlob(digest: string, options: BlobReadOptions = {}): Promise<ReadableStream<Uint8Array>> {
    const chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
    let handle;
    try {
      handle = await open(this.blobPath(digest), 'r');
    } catch (error) {
      if (isMissingFile(error)) {
        throw new SourceNotFoundError(`blob ${digest}`, this.modelsDir);
      }
      throw error;
    }

    const file = handle;
    let position = 0;
    let released = false;
    const release = async () => {
      if (released) return;
      released = true;
      await file.close();
    };

    return new ReadableStream<Uint8Array>({
      pull: async controller => {
        try {
          options.signal?.throwIfAborted();
          const buffer = new Uint8Array(chunkSize);
          const { bytesRead } = await file.read(buffer, 0, chunkSize, position);

          if (bytesRead === 0) {
            await release();
            controller.close();
            return;
          }

          position += bytesRead;
          await options.limiter?.consume(bytesRead, options.signal);
          options.onProgress?.(position);
          controller.enqueue(buffer.subarray(0, bytesRead));
        } catch (error) {
          await release();
          throw error;
        }
      },
      cancel: async () => {
        await release();
      },
    });
  }
}
