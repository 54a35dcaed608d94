import { BatchProcessor } from './batchProcessor';
import { BatchJob, BatchProgress } from '../types/crop';
import { BatchCancelledError, InvalidRectangleError } from '../errors/imageErrors';
import { inspectImage, solidJpeg, solidPng } from '../testUtils/images';

const SUFFIX = { style: 'suffix' as const, token: '_Cropped' };
const RECT = { left: 10, top: 10, right: 60, bottom: 60 };

const jobOf = (items: BatchJob['items'], overrides: Partial<BatchJob> = {}): BatchJob => ({
  items,
  rectangle: RECT,
  angle: 0,
  naming: SUFFIX,
  ...overrides,
});

describe('BatchProcessor', () => {
  const processor = new BatchProcessor();

  it('records an undecodable item and keeps going', async () => {
    const png = await solidPng(100, 100);
    const progress: BatchProgress[] = [];

    const outcome = await processor.run(
      jobOf([
        { name: 'a.png', bytes: png, declaredType: 'image/png' },
        { name: 'b.png', bytes: Buffer.from('corrupt'), declaredType: 'image/png' },
        { name: 'c.png', bytes: png, declaredType: 'image/png' },
      ]),
      { onProgress: event => progress.push(event) }
    );

    expect(outcome.entries.map(entry => entry.name)).toEqual(['a_Cropped.png', 'c_Cropped.png']);
    expect(outcome.failures).toHaveLength(1);
    expect(outcome.failures[0]).toMatchObject({ name: 'b.png', kind: 'DecodeFailure' });
    expect(progress.map(event => [event.completed, event.fraction, event.ok])).toEqual([
      [1, 1 / 3, true],
      [2, 2 / 3, false],
      [3, 1, true],
    ]);
  });

  it('fails items whose size does not fit the rectangle', async () => {
    const outcome = await processor.run(
      jobOf([
        { name: 'large.png', bytes: await solidPng(100, 100) },
        { name: 'small.png', bytes: await solidPng(40, 40) },
      ])
    );

    expect(outcome.entries.map(entry => entry.name)).toEqual(['large_Cropped.png']);
    expect(outcome.failures).toEqual([
      {
        name: 'small.png',
        kind: 'OutOfBounds',
        message: 'Crop rectangle (10, 10, 60, 60) exceeds image bounds 40x40',
      },
    ]);
  });

  it('rejects a malformed rectangle before touching any item', async () => {
    const onProgress = jest.fn();

    await expect(
      processor.run(jobOf([{ name: 'a.png', bytes: await solidPng(100, 100) }], {
        rectangle: { left: 10, top: 10, right: 20, bottom: 5 },
      }), { onProgress })
    ).rejects.toBeInstanceOf(InvalidRectangleError);
    expect(onProgress).not.toHaveBeenCalled();
  });

  it('checks the rectangle against the reference bounds', async () => {
    await expect(
      processor.run(jobOf([], { bounds: { width: 50, height: 50 } }))
    ).rejects.toBeInstanceOf(InvalidRectangleError);
  });

  it('keeps each item in its declared format', async () => {
    const outcome = await processor.run(
      jobOf([
        { name: 'photo.jpg', bytes: await solidJpeg(100, 100), declaredType: 'image/jpg' },
        { name: 'untyped.png', bytes: await solidPng(100, 100) },
      ])
    );

    expect(await inspectImage(outcome.entries[0].data)).toMatchObject({ width: 50, height: 50, format: 'jpeg' });
    expect(await inspectImage(outcome.entries[1].data)).toMatchObject({ width: 50, height: 50, format: 'png' });
  });

  it('names outputs with a prefix when configured', async () => {
    const outcome = await processor.run(
      jobOf([{ name: 'photo.png', bytes: await solidPng(100, 100) }], {
        naming: { style: 'prefix', token: 'cropped_' },
      })
    );

    expect(outcome.entries.map(entry => entry.name)).toEqual(['cropped_photo.png']);
  });

  it('stops between items once cancelled', async () => {
    const png = await solidPng(100, 100);
    const controller = new AbortController();

    await expect(
      processor.run(
        jobOf([
          { name: 'a.png', bytes: png },
          { name: 'b.png', bytes: png },
        ]),
        { signal: controller.signal, onProgress: () => controller.abort() }
      )
    ).rejects.toBeInstanceOf(BatchCancelledError);
  });

  it('returns nothing for an empty batch', async () => {
    expect(await processor.run(jobOf([]))).toEqual({ entries: [], failures: [] });
  });
});
