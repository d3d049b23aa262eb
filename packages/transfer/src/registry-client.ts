/**
 * Modelsync Transfer - Registry Client
 * Manifest and blob reads against an OCI-style model registry
 */

import ky, { type KyInstance } from 'ky';
import { NetworkError, SourceNotEligibleError } from './errors.js';
import { DEFAULT_REGISTRY_HOST, formatModelName } from './endpoints.js';
import { ManifestSchema, type Manifest, type ModelReference } from './types.js';

const MANIFEST_ACCEPT =
  'application/vnd.docker.distribution.manifest.v2+json, application/vnd.oci.image.manifest.v1+json';

/**
 * Where registry-backed models are fetched from
 */
export interface RegistrySource {
  /** null when the registry does not know the model */
  fetchManifest(reference: ModelReference, signal?: AbortSignal): Promise<Manifest | null>;
  openBlob(reference: ModelReference, digest: string, signal?: AbortSignal): Promise<ReadableStream<Uint8Array>>;
}

export interface RegistryConfig {
  /** Base URL for the default registry host */
  baseUrl?: string;
  timeout?: number;
  fetch?: typeof fetch;
}

export class RegistryClient implements RegistrySource {
  private baseUrl: string;
  private timeout: number;
  private http: KyInstance;

  constructor(config: RegistryConfig = {}) {
    this.baseUrl = (config.baseUrl ?? `https://${DEFAULT_REGISTRY_HOST}`).replace(/\/+$/, '');
    this.timeout = config.timeout ?? 30000;
    this.http = config.fetch ? ky.create({ retry: 0, fetch: config.fetch }) : ky.create({ retry: 0 });
  }

  async fetchManifest(reference: ModelReference, signal?: AbortSignal): Promise<Manifest | null> {
    const name = formatModelName(reference);
    const response = await this.http.get(
      `${this.repositoryUrl(reference)}/manifests/${encodeURIComponent(reference.tag)}`,
      {
        headers: { Accept: MANIFEST_ACCEPT },
        throwHttpErrors: false,
        timeout: this.timeout,
        signal,
      }
    );

    if (response.status === 404 || response.status === 401 || response.status === 403) {
      return null;
    }
    if (!response.ok) {
      throw new NetworkError(`Registry returned HTTP ${response.status} for ${name}`);
    }

    const body: unknown = await response.json();
    const parsed = ManifestSchema.safeParse(body);
    if (!parsed.success) {
      throw new SourceNotEligibleError(name, 'the registry manifest is malformed');
    }
    return parsed.data;
  }

  async openBlob(
    reference: ModelReference,
    digest: string,
    signal?: AbortSignal
  ): Promise<ReadableStream<Uint8Array>> {
    const response = await this.http.get(`${this.repositoryUrl(reference)}/blobs/${digest}`, {
      timeout: false,
      signal,
    });

    if (!response.body) {
      throw new NetworkError(`Registry returned no body for blob ${digest}`);
    }
    return response.body;
  }

  private repositoryUrl(reference: ModelReference): string {
    const base = reference.host === DEFAULT_REGISTRY_HOST ? this.baseUrl : `https://${reference.host}`;
    return `${base}/v2/${reference.namespace}/${reference.model}`;
  }
}
