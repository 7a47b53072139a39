// src/core/scan/scanners/next-data.ts
import * as cheerio from 'cheerio';
import { isText, type Element } from 'domhandler';
import { BaseScanner } from './base.js';
import { NEXT_DATA_STREAM_ID } from '../../config/constants.js';
import type { ScanOutcome } from '../types.js';

const NEXT_DATA_TAG = /<script\b[^>]*\bid\s*=\s*["']?__NEXT_DATA__\b/i;

/**
 * Pages-router hydration: `<script id="__NEXT_DATA__" type="application/json">`.
 */
export class NextDataScanner extends BaseScanner {
  readonly name = 'next-data';
  readonly markers = [NEXT_DATA_STREAM_ID];

  scan(text: string): ScanOutcome {
    const $ = cheerio.load(text, { sourceCodeLocationInfo: true });
    const element = $(`script#${NEXT_DATA_STREAM_ID}`).get(0);
    if (!element) {
      return { chunks: [], warnings: [] };
    }

    const rawText = this.scriptText(element);
    const position = element.startIndex ?? text.search(NEXT_DATA_TAG);

    if (!rawText.trim()) {
      return { chunks: [], warnings: [this.warning(position, 'empty __NEXT_DATA__ script')] };
    }

    return {
      chunks: [{
        stream: NEXT_DATA_STREAM_ID,
        index: 0,
        rawText,
        position,
        source: 'next-data',
      }],
      warnings: [],
    };
  }

  private scriptText(element: Element): string {
    return element.children
      .filter(isText)
      .map(node => node.data)
      .join('');
  }
}
