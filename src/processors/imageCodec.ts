import sharp from 'sharp';
import { OutputFormat, RasterImage } from '../types/crop';
import { DecodeFailureError, EncodeFailureError, describeError } from '../errors/imageErrors';
import { config } from '../config';

export interface EncodeOptions {
  quality?: number;
}

const FORMATS_WITH_ALPHA: ReadonlySet<OutputFormat> = new Set<OutputFormat>(['PNG', 'WEBP', 'GIF', 'TIFF', 'AVIF']);

/**
 * Decode uploaded bytes into raw RGBA. EXIF orientation is left as stored.
 */
export const decodeImage = async (bytes: Buffer): Promise<RasterImage> => {
  try {
    const source = sharp(bytes);
    const metadata = await source.metadata();
    const { data, info } = await source
      .toColourspace('srgb')
      .ensureAlpha()
      .raw()
      .toBuffer({ resolveWithObject: true });

    return {
      data,
      width: info.width,
      height: info.height,
      channels: info.channels,
      hasAlpha: metadata.hasAlpha ?? false,
    };
  } catch (error) {
    throw new DecodeFailureError(describeError(error));
  }
};

/**
 * Wrap a raster in a sharp pipeline without re-decoding it
 */
export const rasterPipeline = (image: RasterImage) =>
  sharp(image.data, {
    raw: { width: image.width, height: image.height, channels: image.channels },
  });

export const encodeImage = async (
  image: RasterImage,
  format: OutputFormat,
  options: EncodeOptions = {}
): Promise<Buffer> => {
  const quality = options.quality ?? config.outputQuality;

  try {
    let pipeline = rasterPipeline(image);
    if (!image.hasAlpha || !FORMATS_WITH_ALPHA.has(format)) {
      pipeline = pipeline.removeAlpha();
    }

    switch (format) {
      case 'JPEG':
        return await pipeline.jpeg({ quality }).toBuffer();
      case 'WEBP':
        return await pipeline.webp({ quality }).toBuffer();
      case 'GIF':
        return await pipeline.gif().toBuffer();
      case 'TIFF':
        return await pipeline.tiff({ quality }).toBuffer();
      case 'AVIF':
        return await pipeline.avif({ quality }).toBuffer();
      case 'PNG':
        return await pipeline.png().toBuffer();
    }
  } catch (error) {
    throw new EncodeFailureError(format, describeError(error));
  }
};
