/**
 * Streaming Content
 *
 * Lazy adapters over chunk sequences of unknown length. Every adapter pulls
 * exactly one source chunk per consumer pull, so no more than one chunk of
 * the source is ever materialized ahead of the consumer.
 */

import type { Awaitable, Chunk, ChunkSource } from './types.ts';

const encoder = new TextEncoder();

export interface ChunkTransformer<T extends Chunk, U extends Chunk> {
  /** Transform one source chunk */
  transform(chunk: T, index: number): Awaitable<U>;
  /** Emit a trailing chunk once the source is exhausted */
  flush?(): Awaitable<U | undefined>;
}

/**
 * View any chunk source as an async iterable without reading from it
 */
export async function* toAsyncIterable<T extends Chunk>(
  source: ChunkSource<T>
): AsyncGenerator<T, void, undefined> {
  for await (const chunk of source) {
    yield chunk;
  }
}

/**
 * Lazily map each chunk of a source.
 *
 * Nothing is read from `source` until the first pull on the result.
 */
export async function* mapChunks<T extends Chunk, U extends Chunk>(
  source: ChunkSource<T>,
  transform: (chunk: T, index: number) => Awaitable<U>
): AsyncGenerator<U, void, undefined> {
  let index = 0;
  for await (const chunk of source) {
    yield await transform(chunk, index++);
  }
}

/**
 * Lazily transform a source, with an optional trailing chunk from `flush`
 */
export async function* transformChunks<T extends Chunk, U extends Chunk>(
  source: ChunkSource<T>,
  transformer: ChunkTransformer<T, U>
): AsyncGenerator<U, void, undefined> {
  yield* mapChunks(source, (chunk: T, index: number) => transformer.transform(chunk, index));

  if (transformer.flush) {
    const trailing = await transformer.flush();
    if (trailing !== undefined) {
      yield trailing;
    }
  }
}

export function encodeChunk(chunk: Chunk): Uint8Array {
  return typeof chunk === 'string' ? encoder.encode(chunk) : chunk;
}

/**
 * Concatenate byte arrays into one
 */
export function concatBytes(parts: readonly Uint8Array[]): Uint8Array {
  const totalLength = parts.reduce((acc, part) => acc + part.byteLength, 0);
  const result = new Uint8Array(totalLength);
  let offset = 0;
  for (const part of parts) {
    result.set(part, offset);
    offset += part.byteLength;
  }
  return result;
}

/**
 * Drain a chunk source into a single byte array.
 *
 * Reads the whole source; only for bounded content.
 */
export async function collectChunks(source: ChunkSource<Chunk>): Promise<Uint8Array> {
  const parts: Uint8Array[] = [];
  for await (const chunk of source) {
    parts.push(encodeChunk(chunk));
  }
  return concatBytes(parts);
}
