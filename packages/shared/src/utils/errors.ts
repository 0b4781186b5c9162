/**
 * Error types shared by the analyzer, the ROI calculator and the HTTP layer
 */

/**
 * Common error codes returned in API error bodies
 */
export const ErrorCodes = {
  INVALID_INPUT: 'INVALID_INPUT',
  MISSING_IMAGE: 'MISSING_IMAGE',
  IMAGE_DECODE_FAILED: 'IMAGE_DECODE_FAILED',
  IMAGE_FETCH_FAILED: 'IMAGE_FETCH_FAILED',
  IMAGE_TOO_LARGE: 'IMAGE_TOO_LARGE',
  UNSUPPORTED_IMAGE_SOURCE: 'UNSUPPORTED_IMAGE_SOURCE',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = typeof ErrorCodes[keyof typeof ErrorCodes];

/**
 * Raised when a caller breaks a precondition (negative cost, zero-width image, ...)
 */
export class ValidationError extends Error {
  readonly code = ErrorCodes.INVALID_INPUT;

  constructor(
    message: string,
    public readonly field?: string
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * Failure modes of the image boundary.
 * decode_failed covers bytes that are not a JPEG/PNG raster,
 * fetch_failed covers connection errors and non-2xx responses.
 */
export type ImageLoadErrorType =
  | 'decode_failed'
  | 'fetch_failed'
  | 'too_large'
  | 'unsupported_source';

const IMAGE_ERROR_MESSAGES: Record<ImageLoadErrorType, string> = {
  decode_failed: 'Failed to open image. Please upload a valid JPEG or PNG file.',
  fetch_failed: 'Failed to load image from URL. Please check the link and try again.',
  too_large: 'Image is too large to analyze.',
  unsupported_source: 'Image URL must use http or https.',
};

const IMAGE_ERROR_CODES: Record<ImageLoadErrorType, ErrorCode> = {
  decode_failed: ErrorCodes.IMAGE_DECODE_FAILED,
  fetch_failed: ErrorCodes.IMAGE_FETCH_FAILED,
  too_large: ErrorCodes.IMAGE_TOO_LARGE,
  unsupported_source: ErrorCodes.UNSUPPORTED_IMAGE_SOURCE,
};

export class ImageLoadError extends Error {
  readonly type: ImageLoadErrorType;
  readonly code: ErrorCode;
  /** Technical detail for logs; never shown to the user */
  readonly detail?: string;

  constructor(type: ImageLoadErrorType, detail?: string) {
    super(IMAGE_ERROR_MESSAGES[type]);
    this.name = 'ImageLoadError';
    this.type = type;
    this.code = IMAGE_ERROR_CODES[type];
    this.detail = detail;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
