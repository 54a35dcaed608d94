import {
  assertValidRectangle,
  boxToRectangle,
  clampRectangle,
  defaultRectangle,
  rectangleToBox,
  validateRectangle,
} from './geometry';
import { InvalidRectangleError } from '../errors/imageErrors';

describe('validateRectangle', () => {
  it('rejects a rectangle whose right edge equals its left edge', () => {
    expect(validateRectangle({ left: 10, top: 10, right: 10, bottom: 20 })).toEqual({
      valid: false,
      reason: 'right (10) must be greater than left (10)',
    });
  });

  it('rejects a rectangle whose bottom is above its top', () => {
    expect(validateRectangle({ left: 10, top: 10, right: 20, bottom: 5 })).toEqual({
      valid: false,
      reason: 'bottom (5) must be greater than top (10)',
    });
  });

  it('accepts a rectangle inside a 200x200 image', () => {
    expect(validateRectangle({ left: 0, top: 0, right: 100, bottom: 100 }, { width: 200, height: 200 })).toEqual({
      valid: true,
    });
  });

  it('accepts edges touching the image border', () => {
    expect(validateRectangle({ left: 0, top: 0, right: 200, bottom: 200 }, { width: 200, height: 200 }).valid).toBe(true);
  });

  it('rejects a rectangle past the image bounds', () => {
    expect(validateRectangle({ left: 0, top: 0, right: 201, bottom: 100 }, { width: 200, height: 200 })).toEqual({
      valid: false,
      reason: 'rectangle exceeds image bounds 200x200',
    });
  });

  it('rejects negative and fractional coordinates', () => {
    expect(validateRectangle({ left: -1, top: 0, right: 10, bottom: 10 }).valid).toBe(false);
    expect(validateRectangle({ left: 0.5, top: 0, right: 10, bottom: 10 })).toEqual({
      valid: false,
      reason: 'coordinates must be integers',
    });
  });
});

describe('assertValidRectangle', () => {
  it('throws a 400 InvalidRectangleError', () => {
    expect.assertions(2);
    try {
      assertValidRectangle({ left: 10, top: 10, right: 10, bottom: 20 });
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidRectangleError);
      expect(error).toMatchObject({
        statusCode: 400,
        kind: 'InvalidRectangle',
        message: 'Invalid rectangle: right (10) must be greater than left (10)',
      });
    }
  });
});

describe('rectangle helpers', () => {
  it('converts between widget boxes and edges', () => {
    const rect = boxToRectangle({ left: 10, top: 20, width: 30, height: 40 });
    expect(rect).toEqual({ left: 10, top: 20, right: 40, bottom: 60 });
    expect(rectangleToBox(rect)).toEqual({ left: 10, top: 20, width: 30, height: 40 });
  });

  it('clamps raw inputs to the image without fixing their order', () => {
    expect(clampRectangle({ left: -5, top: 10, right: 300, bottom: 50 }, { width: 200, height: 100 })).toEqual({
      left: 0,
      top: 10,
      right: 200,
      bottom: 50,
    });
    expect(clampRectangle({ left: 50, top: 0, right: 20, bottom: 10 }, { width: 200, height: 100 })).toEqual({
      left: 50,
      top: 0,
      right: 20,
      bottom: 10,
    });
  });

  it('offers a 200px default rectangle bounded by the image', () => {
    expect(defaultRectangle({ width: 150, height: 400 })).toEqual({ left: 0, top: 0, right: 150, bottom: 200 });
  });
});
