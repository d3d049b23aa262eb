/**
 * Modelsync AI Gateway - Streaming Utilities
 * Newline-delimited JSON parsing for streamed server responses
 */

import type { z } from 'zod';
import { ServerResponseError } from './errors.js';

/**
 * Parse newline-delimited JSON objects from a response stream
 */
export async function* parseNDJSON(response: Response): AsyncGenerator<unknown> {
  const reader = response.body?.getReader();
  if (!reader) {
    throw new ServerResponseError('Response body is not readable');
  }

  const decoder = new TextDecoder();
  let buffer = '';

  try {
    while (true) {
      const { done, value } = await reader.read();

      if (done) {
        buffer += decoder.decode();
        const event = parseLine(buffer);
        if (event !== undefined) yield event;
        break;
      }

      buffer += decoder.decode(value, { stream: true });
      const lines = buffer.split('\n');
      buffer = lines.pop() ?? '';

      for (const line of lines) {
        const event = parseLine(line);
        if (event !== undefined) yield event;
      }
    }
  } finally {
    reader.releaseLock();
  }
}

/**
 * Validate each streamed line and raise when the server reports an error
 */
export async function* parseNDJSONWith<T extends { error?: string }>(
  response: Response,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): AsyncGenerator<T> {
  for await (const raw of parseNDJSON(response)) {
    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
      throw new ServerResponseError(`Unexpected stream line: ${JSON.stringify(raw).slice(0, 200)}`);
    }
    if (parsed.data.error) {
      throw new ServerResponseError(parsed.data.error);
    }
    yield parsed.data;
  }
}

function parseLine(line: string): unknown {
  const trimmed = line.trim();
  if (!trimmed) return undefined;

  try {
    return JSON.parse(trimmed);
  } catch {
    throw new ServerResponseError(`Malformed stream line: ${trimmed.slice(0, 200)}`);
  }
}
