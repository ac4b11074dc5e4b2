// src/sections/errors.ts

export type SegmentationErrorCode = 'EMPTY_INPUT' | 'SECTION_NOT_FOUND' | 'AMBIGUOUS_HEADING';

export const SECTION_NOT_FOUND = 'SECTION_NOT_FOUND' as const;

export class SegmentationError extends Error {
  readonly code: SegmentationErrorCode;

  constructor(code: SegmentationErrorCode, message: string) {
    super(message);
    this.name = 'SegmentationError';
    this.code = code;
  }
}

export function isSegmentationError(err: unknown): err is SegmentationError {
  return err instanceof SegmentationError;
}
