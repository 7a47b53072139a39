// src/core/scan/registry.ts
import type { MarkerScanner, ScanOutcome } from './types.js';
import { PushMarkerScanner } from './scanners/push-marker.js';
import { NextDataScanner } from './scanners/next-data.js';
import { DEFAULT_RECEIVERS } from '../config/constants.js';

export interface RegistryOptions {
  receivers?: readonly string[];
  nextData?: boolean;
}

export class ScannerRegistry {
  private scanners: MarkerScanner[];

  constructor(scanners: MarkerScanner[] = []) {
    this.scanners = [...scanners];
  }

  register(scanner: MarkerScanner): void {
    this.scanners.push(scanner);
  }

  list(): readonly MarkerScanner[] {
    return this.scanners;
  }

  /**
   * Run every applicable scanner and merge their chunks in source order.
   */
  scan(text: string): ScanOutcome {
    const outcome: ScanOutcome = { chunks: [], warnings: [] };

    for (const scanner of this.scanners) {
      if (!scanner.canHandle(text)) continue;

      const { chunks, warnings } = scanner.scan(text);
      outcome.chunks.push(...chunks);
      outcome.warnings.push(...warnings);
    }

    outcome.chunks.sort((a, b) => a.position - b.position);
    outcome.warnings.sort((a, b) => a.position - b.position);
    return outcome;
  }
}

export function createScannerRegistry(options: RegistryOptions = {}): ScannerRegistry {
  const registry = new ScannerRegistry([
    new PushMarkerScanner(options.receivers ?? DEFAULT_RECEIVERS),
  ]);

  if (options.nextData ?? true) {
    registry.register(new NextDataScanner());
  }

  return registry;
}
