// src/core/scan/scanners/push-marker.ts
import { BaseScanner } from './base.js';
import { findClosingBracket, isIdentifierChar, receiverBefore, skipWhitespace } from '../delimiters.js';
import { parseLenient } from '../../parse/permissive.js';
import { LiteralSyntaxError } from '../../parse/errors.js';
import { DEFAULT_RECEIVERS, DEFAULT_STREAM_ID } from '../../config/constants.js';
import type { ScanOutcome } from '../types.js';
import type { Chunk, JsonValue } from '../../types/index.js';

const PUSH_CALL = /push\s*\(/g;

type ChunkShape =
  | { kind: 'chunk'; stream: string; index?: number; rawText: string }
  | { kind: 'bootstrap' }
  | { kind: 'invalid'; reason: string };

/**
 * Streaming hydration markers: `self.__next_f.push([1,"..."])`,
 * `push(["stream", 0, "..."])` and friends.
 */
export class PushMarkerScanner extends BaseScanner {
  readonly name = 'push';
  readonly markers = ['push'];

  private receivers: ReadonlySet<string>;

  constructor(receivers: readonly string[] = DEFAULT_RECEIVERS) {
    super();
    this.receivers = new Set(receivers);
  }

  scan(text: string): ScanOutcome {
    const outcome: ScanOutcome = { chunks: [], warnings: [] };
    const nextIndex = new Map<string, number>();
    const pattern = new RegExp(PUSH_CALL.source, 'g');

    let match: RegExpExecArray | null;
    while ((match = pattern.exec(text)) !== null) {
      const position = match.index;
      if (isIdentifierChar(text[position - 1])) continue;

      const receiver = receiverBefore(text, position);
      if (receiver === undefined || (receiver !== '' && !this.receivers.has(receiver))) {
        continue;
      }

      const open = skipWhitespace(text, position + match[0].length);
      if (text[open] !== '[') {
        // A bare push(...) of something else is ordinary script
        if (receiver !== '') {
          outcome.warnings.push(this.warning(position, 'expected an array argument'));
        }
        continue;
      }

      const close = findClosingBracket(text, open);
      if (close === -1) {
        outcome.warnings.push(this.warning(position, 'unbalanced delimiters'));
        pattern.lastIndex = open + 1;
        continue;
      }

      const paren = skipWhitespace(text, close + 1);
      if (text[paren] !== ')') {
        outcome.warnings.push(this.warning(position, 'missing closing parenthesis'));
        pattern.lastIndex = open + 1;
        continue;
      }
      pattern.lastIndex = paren + 1;

      let args: JsonValue;
      try {
        args = parseLenient(text.slice(open, close + 1));
      } catch (error) {
        if (error instanceof LiteralSyntaxError) {
          outcome.warnings.push(this.warning(position, `undecodable marker: ${error.message}`));
          continue;
        }
        throw error;
      }

      const shape = Array.isArray(args)
        ? this.classify(args)
        : { kind: 'invalid' as const, reason: 'expected an array argument' };

      if (shape.kind === 'bootstrap') continue;
      if (shape.kind === 'invalid') {
        outcome.warnings.push(this.warning(position, shape.reason));
        continue;
      }

      outcome.chunks.push(this.toChunk(shape, position, nextIndex));
    }

    return outcome;
  }

  private classify(args: JsonValue[]): ChunkShape {
    if (args.length === 1 && typeof args[0] === 'number') {
      return { kind: 'bootstrap' };
    }

    let streamId: JsonValue | undefined;
    let index: JsonValue | undefined;
    let payload: JsonValue;

    switch (args.length) {
      case 1:
        [payload] = args;
        break;
      case 2:
        [streamId, payload] = args;
        break;
      case 3:
        [streamId, index, payload] = args;
        break;
      default:
        return { kind: 'invalid', reason: `unsupported chunk shape with ${args.length} elements` };
    }

    if (streamId !== undefined && typeof streamId !== 'string' && typeof streamId !== 'number') {
      return { kind: 'invalid', reason: 'stream identifier must be a string or number' };
    }

    let explicitIndex: number | undefined;
    if (index !== undefined) {
      if (typeof index !== 'number' || !Number.isInteger(index)) {
        return { kind: 'invalid', reason: 'chunk index must be an integer' };
      }
      explicitIndex = index;
    }

    let rawText: string;
    if (typeof payload === 'string') {
      rawText = payload;
    } else if (Array.isArray(payload)) {
      rawText = JSON.stringify(payload);
    } else {
      return { kind: 'invalid', reason: 'chunk payload must be a string or array' };
    }

    return {
      kind: 'chunk',
      stream: streamId === undefined ? DEFAULT_STREAM_ID : String(streamId),
      index: explicitIndex,
      rawText,
    };
  }

  private toChunk(
    shape: Extract<ChunkShape, { kind: 'chunk' }>,
    position: number,
    nextIndex: Map<string, number>
  ): Chunk {
    const index = shape.index ?? nextIndex.get(shape.stream) ?? 0;
    nextIndex.set(shape.stream, Math.max(nextIndex.get(shape.stream) ?? 0, index + 1));

    return {
      stream: shape.stream,
      index,
      rawText: shape.rawText,
      position,
      source: 'push',
    };
  }
}
