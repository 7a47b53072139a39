// src/core/scan/types.ts
import type { Chunk, ScanWarning } from '../types/index.js';

export interface ScanOutcome {
  chunks: Chunk[];
  warnings: ScanWarning[];
}

export interface MarkerScanner {
  readonly name: string;
  readonly markers: readonly string[];

  canHandle(text: string): boolean;
  scan(text: string): ScanOutcome;
}
