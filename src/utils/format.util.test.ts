import { mimeTypeForFormat, outputNameFor, resolveFormat } from './format.util';

describe('resolveFormat', () => {
  it.each([
    ['image/jpg', 'JPEG'],
    ['image/png', 'PNG'],
    ['image/jpeg', 'JPEG'],
    ['IMAGE/JPG', 'JPEG'],
    ['image/png; charset=binary', 'PNG'],
    ['image/webp', 'WEBP'],
  ])('maps %s to %s', (declared, expected) => {
    expect(resolveFormat(declared)).toBe(expected);
  });

  it('defaults to PNG when the type is missing', () => {
    expect(resolveFormat(undefined)).toBe('PNG');
    expect(resolveFormat(null)).toBe('PNG');
    expect(resolveFormat('')).toBe('PNG');
  });

  it('falls back to PNG for types the encoder cannot write', () => {
    expect(resolveFormat('image/svg+xml')).toBe('PNG');
    expect(resolveFormat('application/octet-stream')).toBe('PNG');
  });
});

describe('mimeTypeForFormat', () => {
  it('maps formats back to media types', () => {
    expect(mimeTypeForFormat('JPEG')).toBe('image/jpeg');
    expect(mimeTypeForFormat('PNG')).toBe('image/png');
  });
});

describe('outputNameFor', () => {
  const suffix = { style: 'suffix' as const, token: '_Cropped' };

  it('inserts the suffix before the extension', () => {
    expect(outputNameFor('photo.png', suffix)).toBe('photo_Cropped.png');
    expect(outputNameFor('scan.final.JPG', suffix)).toBe('scan.final_Cropped.JPG');
  });

  it('appends the suffix to names without an extension', () => {
    expect(outputNameFor('README', suffix)).toBe('README_Cropped');
  });

  it('prepends a prefix to the whole name', () => {
    expect(outputNameFor('photo.png', { style: 'prefix', token: 'cropped_' })).toBe('cropped_photo.png');
  });
});
