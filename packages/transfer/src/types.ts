/**
 * Modelsync Transfer - Type Definitions
 */

import { z } from 'zod';

export const MEDIA_TYPES = {
  model: 'application/vnd.ollama.image.model',
  projector: 'application/vnd.ollama.image.projector',
  adapter: 'application/vnd.ollama.image.adapter',
  template: 'application/vnd.ollama.image.template',
  system: 'application/vnd.ollama.image.system',
  params: 'application/vnd.ollama.image.params',
  license: 'application/vnd.ollama.image.license',
  messages: 'application/vnd.ollama.image.messages',
} as const;

export const LayerSchema = z.object({
  mediaType: z.string(),
  digest: z.string().regex(/^sha256:[a-f0-9]{64}$/, 'digest must be sha256:<64 hex>'),
  size: z.number().int().nonnegative(),
});

export const ManifestSchema = z.object({
  schemaVersion: z.number().optional(),
  mediaType: z.string().optional(),
  config: LayerSchema.optional(),
  layers: z.array(LayerSchema),
});

export type Layer = z.infer<typeof LayerSchema>;
export type Manifest = z.infer<typeof ManifestSchema>;

/**
 * A model name split into registry coordinates
 */
export interface ModelReference {
  host: string;
  namespace: string;
  model: string;
  tag: string;
}

export type Endpoint =
  | { kind: 'local'; reference: ModelReference }
  | { kind: 'remote'; serverUrl: string; reference: ModelReference };

export type TransferMode = 'local-local' | 'local-remote' | 'remote-local' | 'remote-remote';

export type TransferEvent =
  | { type: 'start'; mode: TransferMode; source: string; destination: string; layers: number }
  | { type: 'layer-start'; digest: string; size: number; mediaType: string }
  | { type: 'layer-progress'; digest: string; completed: number; size: number }
  | { type: 'layer-skipped'; digest: string; size: number }
  | { type: 'layer-done'; digest: string; size: number }
  | { type: 'status'; message: string }
  | { type: 'manifest-created'; model: string };

export interface TransferOptions {
  /** Bytes per second; unset or null disables throttling */
  throttle?: number | null;
  /** Relay buffer capacity for server-to-server copies */
  bufferSize?: number;
  chunkSize?: number;
  /** Replace an existing destination model */
  force?: boolean;
  signal?: AbortSignal;
  onEvent?: (event: TransferEvent) => void;
}

export interface TransferResult {
  mode: TransferMode;
  source: string;
  destination: string;
  bytesTransferred: number;
  layersSkipped: number;
  layersTransferred: number;
  /** Digests of every layer the destination model references */
  digests: string[];
  /** Listed manifest digest of the source, when the copy preserves it */
  manifestDigest?: string;
}

export const DEFAULT_BUFFER_SIZE = 512 * 1024 * 1024;
export const DEFAULT_CHUNK_SIZE = 80 * 1024;
