import {inject, injectable} from "tsyringe";
import {ICropService} from "../ICropService";
import {IArchiveService} from "../../archiveService/IArchiveService";
import {ARCHIVE_SERVICE} from "../../../consts/DependencyConstants";
import {BatchProcessor} from "../../../processors/batchProcessor";
import {decodeImage, encodeImage} from "../../../processors/imageCodec";
import {applyTransform, rotateImage} from "../../../processors/transformProcessor";
import {
    BatchHooks,
    BatchItem,
    BatchSummary,
    Bounds,
    CropBatchRequest,
    CropBatchResult,
    ItemFailure,
    PreviewResult,
    Rectangle,
    ReferenceInfo,
} from "../../../types/crop";
import {assertValidRectangle, clampRectangle, defaultRectangle, rectangleToBox} from "../../../utils/geometry";
import {mimeTypeForFormat, resolveFormat} from "../../../utils/format.util";
import {AppError} from "../../../errors/AppError";
import {config} from "../../../config";
import {getLogger} from "../../../logger";

@injectable()
export class CropServiceImpl implements ICropService {
    private readonly log = getLogger(CropServiceImpl.name);

    constructor(
        @inject(BatchProcessor) private batchProcessor: BatchProcessor,
        @inject(ARCHIVE_SERVICE) private archiveService: IArchiveService
    ) {
    }

    async describeReference(item: BatchItem, angle: number): Promise<ReferenceInfo> {
        const image = await decodeImage(item.bytes);
        const rotated = await rotateImage(image, angle);
        const bounds: Bounds = {width: rotated.width, height: rotated.height};
        const rectangle = defaultRectangle(bounds);

        return {
            name: item.name,
            original: {width: image.width, height: image.height},
            rotated: bounds,
            angle,
            defaultRectangle: rectangle,
            defaultBox: rectangleToBox(rectangle),
        };
    }

    async preview(item: BatchItem, angle: number, rectangle: Rectangle, clampToReference = false): Promise<PreviewResult> {
        const rotated = await rotateImage(await decodeImage(item.bytes), angle);
        const bounds: Bounds = {width: rotated.width, height: rotated.height};
        const rect = clampToReference ? clampRectangle(rectangle, bounds) : rectangle;
        assertValidRectangle(rect, bounds);

        // Already rotated: crop only
        const cropped = await applyTransform(rotated, 0, rect);
        const format = resolveFormat(item.declaredType);

        return {
            data: await encodeImage(cropped, format),
            mimeType: mimeTypeForFormat(format),
            format,
            width: cropped.width,
            height: cropped.height,
        };
    }

    async cropBatch(request: CropBatchRequest, hooks: BatchHooks = {}): Promise<CropBatchResult> {
        if (request.items.length === 0) {
            throw new AppError("No images provided", 400);
        }

        const reference = this.pickReference(request);
        const bounds = await this.referenceBounds(reference, request.angle);
        const rectangle = request.clampToReference ? clampRectangle(request.rectangle, bounds) : request.rectangle;

        this.log.info(`Cropping ${request.items.length} images against reference ${reference.name} (${bounds.width}x${bounds.height})`);

        const {entries, failures} = await this.batchProcessor.run({
            items: request.items,
            rectangle,
            angle: request.angle,
            naming: request.naming ?? config.naming,
            bounds,
        }, hooks);

        const archive = await this.archiveService.write(entries);

        return {
            archive,
            archiveName: config.archiveName,
            entries: entries.map(entry => entry.name),
            failures,
            summary: summarize(request.items.length, failures),
        };
    }

    private pickReference(request: CropBatchRequest): BatchItem {
        if (!request.reference) {
            return request.items[0];
        }
        const match = request.items.find(item => item.name === request.reference);
        if (!match) {
            throw new AppError(`Reference image ${request.reference} is not part of the batch`, 400);
        }
        return match;
    }

    private async referenceBounds(reference: BatchItem, angle: number): Promise<Bounds> {
        // A reference that cannot be decoded leaves nothing to check the rectangle against
        const rotated = await rotateImage(await decodeImage(reference.bytes), angle);
        return {width: rotated.width, height: rotated.height};
    }
}

export const summarize = (total: number, failures: ItemFailure[]): BatchSummary => {
    const succeeded = total - failures.length;
    const message = failures.length === 0
        ? `Cropped ${succeeded} of ${total} images`
        : `Cropped ${succeeded} of ${total} images; failed: ${failures.map(failure => failure.name).join(", ")}`;

    return {total, succeeded, failed: failures, message};
};
