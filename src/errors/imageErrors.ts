import { AppError } from './AppError';
import { ImageErrorKind, Rectangle, Bounds } from '../types/crop';

/**
 * Base for every failure that can be attributed to a single image.
 */
export abstract class ImageProcessingError extends AppError {
  abstract readonly kind: ImageErrorKind;
}

/** Fatal to a whole batch: raised before any item is touched. */
export class InvalidRectangleError extends ImageProcessingError {
  readonly kind = 'InvalidRectangle';

  constructor(reason: string) {
    super(`Invalid rectangle: ${reason}`, 400);
  }
}

export class DecodeFailureError extends ImageProcessingError {
  readonly kind = 'DecodeFailure';

  constructor(detail: string) {
    super(`Could not decode image: ${detail}`, 422);
  }
}

export class TransformFailureError extends ImageProcessingError {
  readonly kind: ImageErrorKind = 'TransformFailure';

  constructor(message: string) {
    super(message, 422);
  }
}

export class OutOfBoundsError extends TransformFailureError {
  readonly kind = 'OutOfBounds';

  constructor(rect: Rectangle, bounds: Bounds) {
    super(
      `Crop rectangle (${rect.left}, ${rect.top}, ${rect.right}, ${rect.bottom}) exceeds image bounds ${bounds.width}x${bounds.height}`
    );
  }
}

export class EncodeFailureError extends ImageProcessingError {
  readonly kind = 'EncodeFailure';

  constructor(format: string, detail: string) {
    super(`Could not encode image as ${format}: ${detail}`, 422);
  }
}

export class BatchCancelledError extends AppError {
  constructor(processed: number, total: number) {
    super(`Batch cancelled after ${processed} of ${total} images`, 409);
  }
}

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
