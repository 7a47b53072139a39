// src/core/config/constants.ts
export const DEFAULT_RECEIVERS = ['__next_f'] as const;
export const DEFAULT_STREAM_ID = 'default';
export const NEXT_DATA_STREAM_ID = '__NEXT_DATA__';
export const DEFAULT_KEY_DEPTH = 3;
export const RECEIVER_LOOKBEHIND = 200; // chars scanned back for `(x = x || []).push`
export const PREVIEW_LENGTH = 80;
export const MAX_NESTING = 512; // objects, arrays and call wrappers
