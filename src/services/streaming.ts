/**
 * Streaming Response Decoding
 *
 * Turns the text of a `text/event-stream` chat completion body into
 * chunks. Network reads do not line up with frames, so lines are
 * buffered until their newline arrives.
 */

import type { ChatCompletionChunk } from '../types/chat.js';

export const SSE_DATA_PREFIX = 'data: ';
export const SSE_DONE = '[DONE]';

/**
 * One classified line of an event stream
 */
export type SSEFrame =
  | { type: 'data'; data: string }
  | { type: 'done' }
  | { type: 'ignore' };

/**
 * Split buffered text into complete lines and the unterminated remainder
 */
export function splitLines(buffer: string): { lines: string[]; rest: string } {
  const parts = buffer.split('\n');
  const rest = parts.pop() ?? '';
  return {
    lines: parts.map((line) => (line.endsWith('\r') ? line.slice(0, -1) : line)),
    rest,
  };
}

/**
 * Classify a single line. Only `data: ` lines matter.
 */
export function parseSSELine(line: string): SSEFrame {
  if (!line.startsWith(SSE_DATA_PREFIX)) {
    return { type: 'ignore' };
  }
  const data = line.slice(SSE_DATA_PREFIX.length).trim();
  if (data === SSE_DONE) {
    return { type: 'done' };
  }
  if (!data) {
    return { type: 'ignore' };
  }
  return { type: 'data', data };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Normalize a decoded frame payload. Frames without a usable `choices`
 * array (heartbeats, metadata) become chunks with no choices.
 */
export function normalizeChunk(payload: unknown): ChatCompletionChunk | null {
  if (!isRecord(payload)) {
    return null;
  }

  const choices: ChatCompletionChunk['choices'] = [];
  if (Array.isArray(payload.choices)) {
    payload.choices.forEach((rawChoice: unknown, position: number) => {
      if (!isRecord(rawChoice)) {
        return;
      }
      const delta = isRecord(rawChoice.delta) ? rawChoice.delta : {};
      choices.push({
        index: typeof rawChoice.index === 'number' ? rawChoice.index : position,
        delta: {
          role: typeof delta.role === 'string' ? delta.role : undefined,
          content: typeof delta.content === 'string' ? delta.content : undefined,
        },
        finish_reason: typeof rawChoice.finish_reason === 'string' ? rawChoice.finish_reason : null,
      });
    });
  }

  return {
    id: typeof payload.id === 'string' ? payload.id : undefined,
    object: typeof payload.object === 'string' ? payload.object : undefined,
    created: typeof payload.created === 'number' ? payload.created : undefined,
    model: typeof payload.model === 'string' ? payload.model : undefined,
    choices,
  };
}

/**
 * Parse one frame payload; malformed frames yield null and are skipped by callers
 */
export function parseChunkData(data: string): ChatCompletionChunk | null {
  try {
    return normalizeChunk(JSON.parse(data));
  } catch {
    return null;
  }
}

export interface DecodeOptions {
  /** Called with the raw payload of every frame that is skipped */
  onSkippedFrame?: (data: string) => void;
}

/**
 * Decode a stream of text pieces into chat completion chunks.
 * Iteration ends at `[DONE]` or when the source is exhausted.
 */
export async function* decodeSSEStream(
  source: AsyncIterable<string>,
  options: DecodeOptions = {}
): AsyncGenerator<ChatCompletionChunk> {
  let buffer = '';

  for await (const piece of source) {
    buffer += piece;
    const { lines, rest } = splitLines(buffer);
    buffer = rest;

    for (const line of lines) {
      const frame = parseSSELine(line);
      if (frame.type === 'done') {
        return;
      }
      if (frame.type === 'data') {
        const chunk = parseChunkData(frame.data);
        if (chunk) {
          yield chunk;
        } else {
          options.onSkippedFrame?.(frame.data);
        }
      }
    }
  }

  // Last line without a trailing newline
  const frame = parseSSELine(buffer.replace(/\r$/, ''));
  if (frame.type === 'data') {
    const chunk = parseChunkData(frame.data);
    if (chunk) {
      yield chunk;
    } else {
      options.onSkippedFrame?.(frame.data);
    }
  }
}

/**
 * Text carried by the first choice of a chunk, if any
 */
export function extractDeltaContent(chunk: ChatCompletionChunk): string | undefined {
  return chunk.choices[0]?.delta.content;
}
