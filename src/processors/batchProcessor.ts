import { injectable } from 'tsyringe';
import {
  ArchiveEntry,
  BatchHooks,
  BatchItem,
  BatchJob,
  BatchOutcome,
  ItemFailure,
} from '../types/crop';
import { BatchCancelledError, ImageProcessingError, describeError } from '../errors/imageErrors';
import { assertValidRectangle } from '../utils/geometry';
import { outputNameFor, resolveFormat } from '../utils/format.util';
import { decodeImage, encodeImage } from './imageCodec';
import { applyTransform } from './transformProcessor';
import { getLogger } from '../logger';

/**
 * Applies one rectangle and angle to every item of a job, in order.
 * A failing item is recorded and skipped; it never aborts its siblings.
 */
@injectable()
export class BatchProcessor {
  private readonly log = getLogger(BatchProcessor.name);

  async run(job: BatchJob, hooks: BatchHooks = {}): Promise<BatchOutcome> {
    // Nothing to process without a usable rectangle
    assertValidRectangle(job.rectangle, job.bounds);

    const total = job.items.length;
    const entries: ArchiveEntry[] = [];
    const failures: ItemFailure[] = [];

    this.log.info(`Processing ${total} images with angle ${job.angle}`, { rectangle: job.rectangle });

    for (const [index, item] of job.items.entries()) {
      if (hooks.signal?.aborted) {
        this.log.warn(`Batch cancelled before ${item.name}`);
        throw new BatchCancelledError(index, total);
      }

      let ok = true;
      try {
        entries.push(await this.processItem(item, job));
      } catch (error) {
        ok = false;
        const failure = this.toFailure(item, error);
        failures.push(failure);
        this.log.warn(`Skipping ${item.name}: ${failure.message}`, { kind: failure.kind });
      }

      hooks.onProgress?.({
        completed: index + 1,
        total,
        fraction: (index + 1) / total,
        name: item.name,
        ok,
      });
    }

    this.log.info(`Batch finished: ${entries.length} succeeded, ${failures.length} failed`);
    return { entries, failures };
  }

  private async processItem(item: BatchItem, job: BatchJob): Promise<ArchiveEntry> {
    const image = await decodeImage(item.bytes);
    const transformed = await applyTransform(image, job.angle, job.rectangle);
    const format = resolveFormat(item.declaredType);
    const data = await encodeImage(transformed, format);

    return { name: outputNameFor(item.name, job.naming), data };
  }

  private toFailure(item: BatchItem, error: unknown): ItemFailure {
    if (error instanceof ImageProcessingError) {
      return { name: item.name, kind: error.kind, message: error.message };
    }
    // Anything unexpected happened between decode and encode
    return { name: item.name, kind: 'TransformFailure', message: describeError(error) };
  }
}
