import sharp from 'sharp';

export interface Colour {
  r: number;
  g: number;
  b: number;
}

const RED: Colour = { r: 200, g: 30, b: 30 };

export const solidPng = (width: number, height: number, background: Colour = RED): Promise<Buffer> =>
  sharp({ create: { width, height, channels: 3, background } }).png().toBuffer();

export const solidJpeg = (width: number, height: number, background: Colour = RED): Promise<Buffer> =>
  sharp({ create: { width, height, channels: 3, background } }).jpeg().toBuffer();

/**
 * PNG built from explicit RGB pixels, row by row
 */
export const pixelPng = (width: number, height: number, rgb: number[]): Promise<Buffer> =>
  sharp(Buffer.from(rgb), { raw: { width, height, channels: 3 } }).png().toBuffer();

export const inspectImage = async (bytes: Buffer) => {
  const metadata = await sharp(bytes).metadata();
  return { width: metadata.width, height: metadata.height, format: metadata.format, channels: metadata.channels };
};
