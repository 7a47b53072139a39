// src/core/scan/scanners/base.ts
import { ErrorCode } from '../../errors.js';
import type { MarkerScanner, ScanOutcome } from '../types.js';
import type { ScanWarning } from '../../types/index.js';

export abstract class BaseScanner implements MarkerScanner {
  abstract readonly name: string;
  abstract readonly markers: readonly string[];

  canHandle(text: string): boolean {
    return this.markers.some(marker => text.includes(marker));
  }

  abstract scan(text: string): ScanOutcome;

  protected warning(position: number, message: string): ScanWarning {
    return {
      code: ErrorCode.MALFORMED_MARKER,
      scanner: this.name,
      position,
      message,
    };
  }
}
