import { Bounds, CropBox, Rectangle } from '../types/crop';
import { InvalidRectangleError } from '../errors/imageErrors';

export type RectangleValidation = { valid: true } | { valid: false; reason: string };

// Initial edge length offered by the manual coordinate form
const DEFAULT_EDGE = 200;

/**
 * Clamp a number to integer between min and max values
 */
export const clampInt = (value: number, min: number, max: number): number => {
  return Math.max(min, Math.min(max, Math.round(value)));
};

/**
 * Check that a rectangle is well-formed and, when bounds are given, lies inside them.
 * Never clamps.
 */
export const validateRectangle = (rect: Rectangle, bounds?: Bounds): RectangleValidation => {
  const edges = [rect.left, rect.top, rect.right, rect.bottom];
  if (!edges.every(Number.isInteger)) {
    return { valid: false, reason: 'coordinates must be integers' };
  }
  if (rect.right <= rect.left) {
    return { valid: false, reason: `right (${rect.right}) must be greater than left (${rect.left})` };
  }
  if (rect.bottom <= rect.top) {
    return { valid: false, reason: `bottom (${rect.bottom}) must be greater than top (${rect.top})` };
  }
  if (rect.left < 0 || rect.top < 0) {
    return { valid: false, reason: 'left and top must not be negative' };
  }
  if (bounds && (rect.right > bounds.width || rect.bottom > bounds.height)) {
    return {
      valid: false,
      reason: `rectangle exceeds image bounds ${bounds.width}x${bounds.height}`,
    };
  }
  return { valid: true };
};

export const assertValidRectangle = (rect: Rectangle, bounds?: Bounds): void => {
  const result = validateRectangle(rect, bounds);
  if (!result.valid) {
    throw new InvalidRectangleError(result.reason);
  }
};

/**
 * Whether a rectangle fits inside bounds (half-open edges may touch the border)
 */
export const fitsWithin = (rect: Rectangle, bounds: Bounds): boolean =>
  rect.left >= 0 && rect.top >= 0 && rect.right <= bounds.width && rect.bottom <= bounds.height;

export const boxToRectangle = (box: CropBox): Rectangle => ({
  left: box.left,
  top: box.top,
  right: box.left + box.width,
  bottom: box.top + box.height,
});

export const rectangleToBox = (rect: Rectangle): CropBox => ({
  left: rect.left,
  top: rect.top,
  width: rect.right - rect.left,
  height: rect.bottom - rect.top,
});

/**
 * Bound raw coordinate inputs to the image, the way the numeric entry form limits them.
 * Ordering is left to the validator.
 */
export const clampRectangle = (rect: Rectangle, bounds: Bounds): Rectangle => ({
  left: clampInt(rect.left, 0, bounds.width),
  top: clampInt(rect.top, 0, bounds.height),
  right: clampInt(rect.right, 0, bounds.width),
  bottom: clampInt(rect.bottom, 0, bounds.height),
});

export const defaultRectangle = (bounds: Bounds): Rectangle => ({
  left: 0,
  top: 0,
  right: Math.min(DEFAULT_EDGE, bounds.width),
  bottom: Math.min(DEFAULT_EDGE, bounds.height),
});
