// src/core/assemble/reassembler.ts
import { ErrorCode } from '../errors.js';
import type { Chunk, DuplicateChunkWarning, Payload } from '../types/index.js';

export interface ReassemblyOutcome {
  payloads: Payload[];
  warnings: DuplicateChunkWarning[];
}

/**
 * Group chunks by stream and join each stream's text in ascending index
 * order. Streams keep the order in which they first appear; the first
 * chunk seen for an index wins.
 */
export function reassemble(chunks: readonly Chunk[]): ReassemblyOutcome {
  const streams = new Map<string, Chunk[]>();
  const seen = new Map<string, Set<number>>();
  const warnings: DuplicateChunkWarning[] = [];

  for (const chunk of chunks) {
    let group = streams.get(chunk.stream);
    let indices = seen.get(chunk.stream);
    if (!group || !indices) {
      group = [];
      indices = new Set();
      streams.set(chunk.stream, group);
      seen.set(chunk.stream, indices);
    }

    if (indices.has(chunk.index)) {
      warnings.push({
        code: ErrorCode.DUPLICATE_CHUNK,
        stream: chunk.stream,
        index: chunk.index,
        position: chunk.position,
        message: `duplicate chunk index ${chunk.index} in stream "${chunk.stream}" discarded`,
      });
      continue;
    }

    indices.add(chunk.index);
    group.push(chunk);
  }

  const payloads = Array.from(streams, ([stream, group]) => {
    const ordered = [...group].sort((a, b) => a.index - b.index);
    return {
      stream,
      text: ordered.map(chunk => chunk.rawText).join(''),
      chunkCount: ordered.length,
      indices: ordered.map(chunk => chunk.index),
      positions: ordered.map(chunk => chunk.position),
    };
  });

  return { payloads, warnings };
}
