/**
 * Modelsync Transfer - Endpoint Parsing
 * "model[:tag]" is local; "http(s)://host:port/model[:tag]" is a remote server
 */

import { InvalidEndpointError } from './errors.js';
import type { Endpoint, ModelReference } from './types.js';

export const DEFAULT_REGISTRY_HOST = 'registry.ollama.ai';
export const DEFAULT_NAMESPACE = 'library';
export const DEFAULT_TAG = 'latest';

export function parseModelReference(name: string): ModelReference {
  const trimmed = name.trim();
  if (!trimmed) {
    throw new InvalidEndpointError(name, 'model name is empty');
  }

  let path = trimmed;
  let tag = DEFAULT_TAG;

  const lastSlash = trimmed.lastIndexOf('/');
  const lastColon = trimmed.lastIndexOf(':');
  if (lastColon > lastSlash) {
    path = trimmed.slice(0, lastColon);
    tag = trimmed.slice(lastColon + 1) || DEFAULT_TAG;
  }

  const parts = path.split('/').filter(part => part.length > 0);
  const [first, second, third] = parts;

  if (parts.length === 1 && first) {
    return { host: DEFAULT_REGISTRY_HOST, namespace: DEFAULT_NAMESPACE, model: first, tag };
  }
  if (parts.length === 2 && first && second) {
    return { host: DEFAULT_REGISTRY_HOST, namespace: first, model: second, tag };
  }
  if (parts.length === 3 && first && second && third) {
    return { host: first, namespace: second, model: third, tag };
  }

  throw new InvalidEndpointError(name, 'expected [host/][namespace/]model[:tag]');
}

/**
 * Name as the inference server lists it
 */
export function formatModelName(reference: ModelReference): string {
  const { host, namespace, model, tag } = reference;
  if (host === DEFAULT_REGISTRY_HOST && namespace === DEFAULT_NAMESPACE) {
    return `${model}:${tag}`;
  }
  if (host === DEFAULT_REGISTRY_HOST) {
    return `${namespace}/${model}:${tag}`;
  }
  return `${host}/${namespace}/${model}:${tag}`;
}

export function parseEndpoint(text: string): Endpoint {
  const match = /^(https?):\/\/([^/]+)\/(.+)$/i.exec(text.trim());
  if (match) {
    const [, scheme, authority, model] = match;
    if (!scheme || !authority || !model) {
      throw new InvalidEndpointError(text, 'expected scheme://host:port/model[:tag]');
    }
    return {
      kind: 'remote',
      serverUrl: `${scheme.toLowerCase()}://${authority}`,
      reference: parseModelReference(model),
    };
  }

  if (/^https?:\/\//i.test(text.trim())) {
    throw new InvalidEndpointError(text, 'remote reference has no model name');
  }

  return { kind: 'local', reference: parseModelReference(text) };
}

export function describeEndpoint(endpoint: Endpoint): string {
  const name = formatModelName(endpoint.reference);
  return endpoint.kind === 'remote' ? `${endpoint.serverUrl}/${name}` : name;
}

/**
 * Compare server-listed names, treating a missing tag as "latest"
 */
export function sameModelName(a: string, b: string): boolean {
  return formatModelName(parseModelReference(a)).toLowerCase() ===
    formatModelName(parseModelReference(b)).toLowerCase();
}
