/**
 * Modelsync CLI - Model Listing Helpers
 */

import type { ModelSummary, RunningModel } from '@modelsync/ai-gateway';
import { globToRegExp, isWildcard } from '@modelsync/qc';
import { formatBytes } from '@modelsync/shared';
import { sameModelName } from '@modelsync/transfer';
import { formatAge, formatDigest, formatTable } from './output.js';

export type ListOrder = 'name' | 'size' | 'size-asc' | 'time' | 'time-asc';

export const LIST_ORDERS: readonly ListOrder[] = ['name', 'size', 'size-asc', 'time', 'time-asc'];

export function isListOrder(value: string): value is ListOrder {
  return LIST_ORDERS.some(order => order === value);
}

/**
 * Wildcards match the full name; a plain name matches every tag of that model
 */
export function matchesModelPattern(name: string, pattern: string): boolean {
  if (isWildcard(pattern)) return globToRegExp(pattern).test(name);
  if (pattern.includes(':')) return sameModelName(name, pattern);

  const colon = name.lastIndexOf(':');
  const withoutTag = colon > name.lastIndexOf('/') ? name.slice(0, colon) : name;
  return withoutTag.toLowerCase() === pattern.toLowerCase();
}

function timeOf(model: ModelSummary): number {
  const time = new Date(model.modifiedAt).getTime();
  return isNaN(time) ? 0 : time;
}

export function sortModels(models: ModelSummary[], order: ListOrder): ModelSummary[] {
  const sorted = [...models];
  switch (order) {
    case 'name':
      return sorted.sort((a, b) => a.name.localeCompare(b.name));
    case 'size':
      return sorted.sort((a, b) => b.size - a.size);
    case 'size-asc':
      return sorted.sort((a, b) => a.size - b.size);
    case 'time':
      return sorted.sort((a, b) => timeOf(b) - timeOf(a));
    case 'time-asc':
      return sorted.sort((a, b) => timeOf(a) - timeOf(b));
  }
}

export function renderModelTable(models: ModelSummary[], now: Date = new Date()): string {
  return formatTable(
    ['NAME', 'ID', 'SIZE', 'MODIFIED'],
    models.map(model => [model.name, formatDigest(model.digest), formatBytes(model.size), formatAge(model.modifiedAt, now)])
  );
}

export function renderRunningTable(models: RunningModel[]): string {
  return formatTable(
    ['NAME', 'ID', 'SIZE', 'VRAM', 'UNTIL'],
    models.map(model => {
      const vram = model.size > 0 ? `${Math.round((model.sizeVram / model.size) * 100)}%` : '-';
      return [model.name, formatDigest(model.digest), formatBytes(model.size), vram, model.expiresAt || '-'];
    })
  );
}
