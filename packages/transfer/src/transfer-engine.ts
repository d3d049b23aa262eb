/**
 * Modelsync Transfer - Transfer Engine
 * Copies a model's manifest and layers between the local store and remote servers
 */

import {
  isNotFound,
  isRecord,
  type CreateRequest,
  type InferenceServer,
  type ShowResponse,
} from '@modelsync/ai-gateway';
import { createLogger, withRetry, type Logger } from '@modelsync/shared';
import { BandwidthLimiter } from './bandwidth-limiter.js';
import {
  DestinationAlreadyExistsError,
  NetworkError,
  SourceNotEligibleError,
  SourceNotFoundError,
  TransferError,
  VerificationFailedError,
  toTransferError,
} from './errors.js';
import { describeEndpoint, formatModelName, parseEndpoint, sameModelName } from './endpoints.js';
import type { LocalModelStore } from './local-store.js';
import type { RegistrySource } from './registry-client.js';
import { RelayBuffer } from './relay-buffer.js';
import {
  DEFAULT_BUFFER_SIZE,
  DEFAULT_CHUNK_SIZE,
  MEDIA_TYPES,
  type Endpoint,
  type Layer,
  type Manifest,
  type ModelReference,
  type TransferEvent,
  type TransferMode,
  type TransferOptions,
  type TransferResult,
} from './types.js';

export type TransferServer = Pick<
  InferenceServer,
  'baseUrl' | 'listModels' | 'show' | 'copy' | 'delete' | 'pull' | 'hasBlob' | 'uploadBlob' | 'create'
>;

export interface TransferEngineDependencies {
  /** Server that owns the local models directory */
  localServer: TransferServer;
  store: LocalModelStore;
  registry: RegistrySource;
  connect: (serverUrl: string) => TransferServer;
  logger?: Logger;
}

const UPLOAD_ATTEMPTS = 3;
const RETRY_DELAY_MS = 1000;

/**
 * Ephemeral state of one copy invocation
 */
class TransferSession {
  readonly limiter: BandwidthLimiter;
  bytesTransferred = 0;
  layersSkipped = 0;
  layersTransferred = 0;
  digests: string[] = [];
  manifestDigest: string | undefined;

  constructor(
    readonly mode: TransferMode,
    readonly source: string,
    readonly destination: string,
    readonly options: TransferOptions,
    private logger: Logger
  ) {
    this.limiter = new BandwidthLimiter(options.throttle);
  }

  get signal(): AbortSignal | undefined {
    return this.options.signal;
  }

  get bufferSize(): number {
    return this.options.bufferSize ?? DEFAULT_BUFFER_SIZE;
  }

  get chunkSize(): number {
    return this.options.chunkSize ?? DEFAULT_CHUNK_SIZE;
  }

  emit(event: TransferEvent): void {
    this.options.onEvent?.(event);
  }

  start(layers: Layer[]): void {
    this.digests = layers.map(layer => layer.digest);
    this.logger.info(`Copying ${this.source} to ${this.destination}`, { mode: this.mode, layers: layers.length });
    this.emit({ type: 'start', mode: this.mode, source: this.source, destination: this.destination, layers: layers.length });
  }

  skip(layer: Layer): void {
    this.layersSkipped++;
    this.logger.debug(`Layer ${shortDigest(layer.digest)} already present, skipping`);
    this.emit({ type: 'layer-skipped', digest: layer.digest, size: layer.size });
  }

  layerStart(layer: Layer): void {
    this.emit({ type: 'layer-start', digest: layer.digest, size: layer.size, mediaType: layer.mediaType });
  }

  progress(layer: Layer, completed: number): void {
    this.emit({ type: 'layer-progress', digest: layer.digest, completed, size: layer.size });
  }

  layerDone(layer: Layer): void {
    this.layersTransferred++;
    this.bytesTransferred += layer.size;
    this.emit({ type: 'layer-done', digest: layer.digest, size: layer.size });
  }

  status(message: string): void {
    this.emit({ type: 'status', message });
  }

  result(): TransferResult {
    return {
      mode: this.mode,
      source: this.source,
      destination: this.destination,
      bytesTransferred: this.bytesTransferred,
      layersSkipped: this.layersSkipped,
      layersTransferred: this.layersTransferred,
      digests: this.digests,
      manifestDigest: this.manifestDigest,
    };
  }
}

export class TransferEngine {
  private deps: TransferEngineDependencies;
  private logger: Logger;
  private servers: Map<string, TransferServer> = new Map();

  constructor(deps: TransferEngineDependencies) {
    this.deps = deps;
    this.logger = deps.logger ?? createLogger('transfer');
  }

  /**
   * Copy a model; layers already at the destination are never re-sent
   */
  async copy(
    source: string | Endpoint,
    destination: string | Endpoint,
    options: TransferOptions = {}
  ): Promise<TransferResult> {
    const src = typeof source === 'string' ? parseEndpoint(source) : source;
    const dst = typeof destination === 'string' ? parseEndpoint(destination) : destination;
    const session = new TransferSession(
      transferMode(src, dst),
      describeEndpoint(src),
      describeEndpoint(dst),
      options,
      this.logger
    );

    try {
      if (src.kind === 'local' && dst.kind === 'local') {
        await this.copyLocalToLocal(src.reference, dst.reference, session);
      } else if (src.kind === 'local' && dst.kind === 'remote') {
        await this.copyLocalToRemote(src.reference, this.server(dst.serverUrl), dst.reference, session);
      } else if (src.kind === 'remote' && dst.kind === 'local') {
        await this.copyRemoteToLocal(this.server(src.serverUrl), src.reference, dst.reference, session);
      } else if (src.kind === 'remote' && dst.kind === 'remote') {
        await this.copyRemoteToRemote(
          this.server(src.serverUrl),
          src.reference,
          this.server(dst.serverUrl),
          dst.reference,
          session
        );
      }
    } catch (error) {
      throw toTransferError(error, `Copy ${session.source} to ${session.destination}`);
    }

    const result = session.result();
    this.logger.info(`Copied ${result.source} to ${result.destination}`, {
      bytesTransferred: result.bytesTransferred,
      layersSkipped: result.layersSkipped,
      layersTransferred: result.layersTransferred,
    });
    return result;
  }

  /**
   * Copy, verify the copy, then delete the original. A failed verification keeps the original.
   */
  async rename(
    source: string | Endpoint,
    destination: string | Endpoint,
    options: TransferOptions = {}
  ): Promise<TransferResult> {
    const src = typeof source === 'string' ? parseEndpoint(source) : source;
    const dst = typeof destination === 'string' ? parseEndpoint(destination) : destination;

    const result = await this.copy(src, dst, options);

    try {
      await this.verify(dst, result, options.signal);
    } catch (error) {
      throw toTransferError(error, `Verify ${result.destination}`);
    }

    const origin = this.endpointServer(src);
    await origin.delete(formatModelName(src.reference), { signal: options.signal });
    this.logger.info(`Removed ${result.source} after verified copy`);
    return result;
  }

  /**
   * Check the destination lists the model and holds every layer it references
   */
  async verify(destination: Endpoint, result: TransferResult, signal?: AbortSignal): Promise<void> {
    const server = this.endpointServer(destination);
    const name = formatModelName(destination.reference);

    const models = await server.listModels({ signal });
    const listed = models.find(m => sameModelName(m.name, name));
    if (!listed) {
      throw new VerificationFailedError(`${name} is not listed on ${server.baseUrl} after the copy`);
    }
    if (result.manifestDigest && listed.digest !== result.manifestDigest) {
      throw new VerificationFailedError(
        `${name} on ${server.baseUrl} has digest ${shortDigest(listed.digest)}, expected ${shortDigest(result.manifestDigest)}`
      );
    }

    for (const digest of result.digests) {
      if (!(await server.hasBlob(digest, { signal }))) {
        throw new VerificationFailedError(`Layer ${shortDigest(digest)} is missing on ${server.baseUrl}`);
      }
    }
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // COPY MODES
  // ═══════════════════════════════════════════════════════════════════════════

  private async copyLocalToLocal(
    source: ModelReference,
    destination: ModelReference,
    session: TransferSession
  ): Promise<void> {
    const server = this.deps.localServer;
    const sourceName = formatModelName(source);
    const destinationName = formatModelName(destination);

    const models = await server.listModels({ signal: session.signal });
    const listed = models.find(m => sameModelName(m.name, sourceName));
    if (!listed) {
      throw new SourceNotFoundError(sourceName, server.baseUrl);
    }
    await this.assertDestinationFree(server, destinationName, session);

    session.start([]);
    session.manifestDigest = listed.digest;
    await server.copy(sourceName, destinationName, { signal: session.signal });
    session.emit({ type: 'manifest-created', model: destinationName });
  }

  private async copyLocalToRemote(
    source: ModelReference,
    target: TransferServer,
    destination: ModelReference,
    session: TransferSession
  ): Promise<void> {
    const store = this.deps.store;
    const manifest = await store.readManifest(source);
    const destinationName = formatModelName(destination);

    await this.assertDestinationFree(target, destinationName, session);
    session.start(manifest.layers);

    for (const layer of manifest.layers) {
      if (await this.destinationHas(target, layer, session)) continue;

      await this.withNetworkRetry(`Upload ${shortDigest(layer.digest)}`, session, async () => {
        const body = await store.openBlob(layer.digest, {
          chunkSize: session.chunkSize,
          limiter: session.limiter,
          signal: session.signal,
          onProgress: completed => session.progress(layer, completed),
        });
        await target.uploadBlob(layer.digest, body, { signal: session.signal });
      });

      await this.confirmLayer(target, layer, session);
      session.layerDone(layer);
    }

    const request = await buildCreateRequest(destinationName, manifest, digest => store.readBlobText(digest));
    await this.createModel(target, request, session);
  }

  private async copyRemoteToLocal(
    origin: TransferServer,
    source: ModelReference,
    destination: ModelReference,
    session: TransferSession
  ): Promise<void> {
    const local = this.deps.localServer;
    const manifest = await this.registryManifest(origin, source, session);
    const sourceName = formatModelName(source);
    const destinationName = formatModelName(destination);

    await this.assertDestinationFree(local, destinationName, session);
    const before = await local.listModels({ signal: session.signal });
    const alreadyPulled = before.some(m => sameModelName(m.name, sourceName));

    session.start(manifest.layers);
    const missing: Layer[] = [];
    for (const layer of manifest.layers) {
      if (!(await this.destinationHas(local, layer, session))) missing.push(layer);
    }

    for await (const event of local.pull(sourceName, { signal: session.signal })) {
      const layer = missing.find(l => l.digest === event.digest);
      if (layer && event.completed !== undefined) {
        session.progress(layer, event.completed);
      } else if (!event.digest) {
        session.status(event.status);
      }
    }

    for (const layer of missing) {
      await this.confirmLayer(local, layer, session);
      session.layerDone(layer);
    }

    if (!sameModelName(sourceName, destinationName)) {
      await local.copy(sourceName, destinationName, { signal: session.signal });
      if (!alreadyPulled) {
        await local.delete(sourceName, { signal: session.signal });
      }
    }
    session.emit({ type: 'manifest-created', model: destinationName });
  }

  private async copyRemoteToRemote(
    origin: TransferServer,
    source: ModelReference,
    target: TransferServer,
    destination: ModelReference,
    session: TransferSession
  ): Promise<void> {
    const manifest = await this.registryManifest(origin, source, session);
    const destinationName = formatModelName(destination);

    await this.assertDestinationFree(target, destinationName, session);
    session.start(manifest.layers);

    for (const layer of manifest.layers) {
      if (await this.destinationHas(target, layer, session)) continue;

      await this.withNetworkRetry(`Relay ${shortDigest(layer.digest)}`, session, () =>
        this.relayLayer(source, layer, target, session)
      );

      await this.confirmLayer(target, layer, session);
      session.layerDone(layer);
    }

    const request = await buildCreateRequest(destinationName, manifest, async digest =>
      readStreamText(await this.deps.registry.openBlob(source, digest, session.signal))
    );
    await this.createModel(target, request, session);
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // LAYER PLUMBING
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Download from the registry and upload to the target concurrently through a bounded buffer
   */
  private async relayLayer(
    source: ModelReference,
    layer: Layer,
    target: TransferServer,
    session: TransferSession
  ): Promise<void> {
    const signal = session.signal;
    const relay = new RelayBuffer(session.bufferSize, { signal });
    let downloaded = 0;

    const download = (async () => {
      try {
        const body = await this.deps.registry.openBlob(source, layer.digest, signal);
        const reader = body.getReader();
        try {
          while (true) {
            const { done, value } = await reader.read();
            if (done) break;
            await session.limiter.consume(value.length, signal);
            await relay.write(value, signal);
            downloaded += value.length;
            session.progress(layer, downloaded);
          }
        } catch (error) {
          await reader.cancel(error);
          throw error;
        } finally {
          reader.releaseLock();
        }

        if (downloaded !== layer.size) {
          throw new NetworkError(
            `Blob ${shortDigest(layer.digest)} ended after ${downloaded} of ${layer.size} bytes`
          );
        }
        relay.close();
      } catch (error) {
        relay.closeWithError(error);
        throw error;
      }
    })();

    const upload = (async () => {
      try {
        await target.uploadBlob(layer.digest, relay.toReadableStream(session.chunkSize, signal), { signal });
      } catch (error) {
        relay.closeWithError(error);
        throw error;
      }
    })();

    const [downloadResult, uploadResult] = await Promise.allSettled([download, upload]);
    if (downloadResult.status === 'rejected') throw downloadResult.reason;
    if (uploadResult.status === 'rejected') throw uploadResult.reason;

    const stats = relay.getStats();
    this.logger.debug(`Relayed ${shortDigest(layer.digest)}`, { bytes: stats.bytesRead, peakBuffered: stats.peak });
  }

  private async destinationHas(server: TransferServer, layer: Layer, session: TransferSession): Promise<boolean> {
    if (await server.hasBlob(layer.digest, { signal: session.signal })) {
      session.skip(layer);
      return true;
    }
    session.layerStart(layer);
    return false;
  }

  /**
   * Only a digest-confirmed blob counts as transferred
   */
  private async confirmLayer(server: TransferServer, layer: Layer, session: TransferSession): Promise<void> {
    if (!(await server.hasBlob(layer.digest, { signal: session.signal }))) {
      throw new VerificationFailedError(
        `Layer ${shortDigest(layer.digest)} is missing on ${server.baseUrl} after transfer`
      );
    }
  }

  private async registryManifest(
    origin: TransferServer,
    source: ModelReference,
    session: TransferSession
  ): Promise<Manifest> {
    const name = formatModelName(source);

    let shown: ShowResponse;
    try {
      shown = await origin.show(name, { signal: session.signal });
    } catch (error) {
      if (isNotFound(error)) throw new SourceNotFoundError(name, origin.baseUrl);
      throw error;
    }

    const manifest = await this.deps.registry.fetchManifest(source, session.signal);
    if (!manifest) {
      throw new SourceNotEligibleError(name, 'the registry does not know this model');
    }

    const published = new Set(manifest.layers.map(layer => layer.digest));
    const foreign = extractBlobDigests(shown.modelfile).find(digest => !published.has(digest));
    if (foreign) {
      throw new SourceNotEligibleError(name, `layer ${shortDigest(foreign)} is not in the registry copy`);
    }

    return manifest;
  }

  private async assertDestinationFree(server: TransferServer, name: string, session: TransferSession): Promise<void> {
    if (session.options.force) return;

    const models = await server.listModels({ signal: session.signal });
    if (models.some(m => sameModelName(m.name, name))) {
      throw new DestinationAlreadyExistsError(name, server.baseUrl);
    }
  }

  private async createModel(server: TransferServer, request: CreateRequest, session: TransferSession): Promise<void> {
    for await (const event of server.create(request, { signal: session.signal })) {
      session.status(event.status);
    }
    session.emit({ type: 'manifest-created', model: request.model });
  }

  private async withNetworkRetry(
    context: string,
    session: TransferSession,
    fn: () => Promise<void>
  ): Promise<void> {
    await withRetry(
      async () => {
        try {
          await fn();
        } catch (error) {
          throw toTransferError(error, context);
        }
      },
      {
        attempts: UPLOAD_ATTEMPTS,
        baseDelayMs: RETRY_DELAY_MS,
        signal: session.signal,
        shouldRetry: error => error instanceof TransferError && error.retryable,
        onRetry: (error, attempt, delayMs) =>
          this.logger.warn(`${context} failed (attempt ${attempt}), retrying in ${delayMs}ms`, {
            error: error instanceof Error ? error.message : String(error),
          }),
      }
    );
  }

  private endpointServer(endpoint: Endpoint): TransferServer {
    return endpoint.kind === 'local' ? this.deps.localServer : this.server(endpoint.serverUrl);
  }

  private server(serverUrl: string): TransferServer {
    let server = this.servers.get(serverUrl);
    if (!server) {
      server = this.deps.connect(serverUrl);
      this.servers.set(serverUrl, server);
    }
    return server;
  }
}

function transferMode(source: Endpoint, destination: Endpoint): TransferMode {
  if (source.kind === 'local') {
    return destination.kind === 'local' ? 'local-local' : 'local-remote';
  }
  return destination.kind === 'local' ? 'remote-local' : 'remote-remote';
}

export function shortDigest(digest: string): string {
  return digest.replace(/^sha256[:-]/, '').slice(0, 12);
}

/**
 * Blob digests referenced by FROM/ADAPTER lines of a modelfile
 */
export function extractBlobDigests(modelfile: string): string[] {
  const digests: string[] = [];
  const pattern = /^\s*(?:FROM|ADAPTER)\s+\S*sha256[-:]([a-f0-9]{64})/gim;
  for (const match of modelfile.matchAll(pattern)) {
    const digest = `sha256:${match[1] ?? ''}`;
    if (!digests.includes(digest)) digests.push(digest);
  }
  return digests;
}

/**
 * Translate manifest layers into a create request: weights by digest, small layers inline
 */
export async function buildCreateRequest(
  name: string,
  manifest: Manifest,
  readText: (digest: string) => Promise<string>
): Promise<CreateRequest> {
  const request: CreateRequest = { model: name };
  const files: Record<string, string> = {};
  const adapters: Record<string, string> = {};
  const licenses: string[] = [];
  let models = 0;
  let projectors = 0;

  for (const layer of manifest.layers) {
    switch (layer.mediaType) {
      case MEDIA_TYPES.model:
        files[models === 0 ? 'model.gguf' : `model-${models}.gguf`] = layer.digest;
        models++;
        break;
      case MEDIA_TYPES.projector:
        files[`projector-${projectors}.gguf`] = layer.digest;
        projectors++;
        break;
      case MEDIA_TYPES.adapter:
        adapters[`adapter-${Object.keys(adapters).length}.gguf`] = layer.digest;
        break;
      case MEDIA_TYPES.template:
        request.template = await readText(layer.digest);
        break;
      case MEDIA_TYPES.system:
        request.system = await readText(layer.digest);
        break;
      case MEDIA_TYPES.params: {
        const value: unknown = JSON.parse(await readText(layer.digest));
        if (isRecord(value)) request.parameters = value;
        break;
      }
      case MEDIA_TYPES.license:
        licenses.push(await readText(layer.digest));
        break;
    }
  }

  if (Object.keys(files).length > 0) request.files = files;
  if (Object.keys(adapters).length > 0) request.adapters = adapters;
  if (licenses.length > 0) request.license = licenses.length === 1 ? licenses[0] : licenses;
  return request;
}

async function readStreamText(stream: ReadableStream<Uint8Array>): Promise<string> {
  return new Response(stream).text();
}
