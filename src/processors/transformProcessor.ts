import { Bounds, RasterImage, Rectangle } from '../types/crop';
import { OutOfBoundsError, TransformFailureError, describeError } from '../errors/imageErrors';
import { fitsWithin } from '../utils/geometry';
import { rasterPipeline } from './imageCodec';

// Corners uncovered by a rotation stay transparent (black once alpha is dropped)
const ROTATION_BACKGROUND = { r: 0, g: 0, b: 0, alpha: 0 };

// Matrix terms are rounded so quarter and half turns stay exact
const roundTerm = (value: number): number => Math.round(value * 1e15) / 1e15;

/**
 * Canvas of an expanded rotation: the rotated corners about the centre,
 * floored on the near side and ceiled on the far side.
 *
 * @example expandedBounds({ width: 100, height: 100 }, 45) // { width: 142, height: 142 }
 */
export const expandedBounds = ({ width, height }: Bounds, angle: number): Bounds => {
  const radians = (-angle * Math.PI) / 180;
  const cos = roundTerm(Math.cos(radians));
  const sin = roundTerm(Math.sin(radians));
  const cx = width / 2;
  const cy = height / 2;

  const corners = [[0, 0], [width, 0], [width, height], [0, height]].map(([x, y]) => ({
    x: cos * (x - cx) + sin * (y - cy) + cx,
    y: -sin * (x - cx) + cos * (y - cy) + cy,
  }));
  const span = (values: number[]) => Math.ceil(Math.max(...values)) - Math.floor(Math.min(...values));

  return { width: span(corners.map(c => c.x)), height: span(corners.map(c => c.y)) };
};

/**
 * Centre the raster on a canvas of the given size, padding with the rotation
 * background or trimming evenly from both sides.
 */
const fitCanvas = async (image: RasterImage, target: Bounds): Promise<RasterImage> => {
  const dx = target.width - image.width;
  const dy = target.height - image.height;
  if (dx === 0 && dy === 0) return image;

  let pipeline = rasterPipeline(image);
  if (dx < 0 || dy < 0) {
    pipeline = pipeline.extract({
      left: dx < 0 ? Math.floor(-dx / 2) : 0,
      top: dy < 0 ? Math.floor(-dy / 2) : 0,
      width: Math.min(image.width, target.width),
      height: Math.min(image.height, target.height),
    });
  }
  if (dx > 0 || dy > 0) {
    const padX = Math.max(dx, 0);
    const padY = Math.max(dy, 0);
    pipeline = pipeline.extend({
      left: Math.floor(padX / 2),
      right: padX - Math.floor(padX / 2),
      top: Math.floor(padY / 2),
      bottom: padY - Math.floor(padY / 2),
      background: ROTATION_BACKGROUND,
    });
  }

  const { data, info } = await pipeline.raw().toBuffer({ resolveWithObject: true });
  return { ...image, data, width: info.width, height: info.height, channels: info.channels };
};

/**
 * Rotate clockwise by `angle` degrees (counterclockwise by -angle), growing the canvas
 * to the bounding box of the rotated image so no corner is clipped.
 */
export const rotateImage = async (image: RasterImage, angle: number): Promise<RasterImage> => {
  if (angle === 0) return image;

  try {
    const { data, info } = await rasterPipeline(image)
      .rotate(angle, { background: ROTATION_BACKGROUND })
      .raw()
      .toBuffer({ resolveWithObject: true });

    const rotated: RasterImage = { ...image, data, width: info.width, height: info.height, channels: info.channels };
    // libvips already swaps dimensions exactly on quarter turns
    if (angle % 90 === 0) return rotated;

    return await fitCanvas(rotated, expandedBounds({ width: image.width, height: image.height }, angle));
  } catch (error) {
    throw new TransformFailureError(`Rotation by ${angle} degrees failed: ${describeError(error)}`);
  }
};

/**
 * Crop with half-open edges; output is (right - left) x (bottom - top).
 * A rectangle outside the image is an error, never clamped.
 */
export const cropImage = async (image: RasterImage, rect: Rectangle): Promise<RasterImage> => {
  const bounds: Bounds = { width: image.width, height: image.height };
  if (!fitsWithin(rect, bounds)) {
    throw new OutOfBoundsError(rect, bounds);
  }

  const width = rect.right - rect.left;
  const height = rect.bottom - rect.top;
  if (width <= 0 || height <= 0) {
    throw new TransformFailureError(`Crop rectangle has no area (${width}x${height})`);
  }

  try {
    const { data, info } = await rasterPipeline(image)
      .extract({ left: rect.left, top: rect.top, width, height })
      .raw()
      .toBuffer({ resolveWithObject: true });

    return { ...image, data, width: info.width, height: info.height, channels: info.channels };
  } catch (error) {
    throw new TransformFailureError(`Crop failed: ${describeError(error)}`);
  }
};

/**
 * Rotate then crop. Pure function of its inputs.
 */
export const applyTransform = async (
  image: RasterImage,
  angle: number,
  rect: Rectangle
): Promise<RasterImage> => {
  const rotated = await rotateImage(image, angle);
  return cropImage(rotated, rect);
};
