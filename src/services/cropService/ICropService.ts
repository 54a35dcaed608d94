import {
    BatchHooks,
    BatchItem,
    CropBatchRequest,
    CropBatchResult,
    PreviewResult,
    Rectangle,
    ReferenceInfo,
} from "../../types/crop";

export interface ICropService {
    /**
     * Size of the reference image before and after rotation, plus a starting rectangle
     */
    describeReference(item: BatchItem, angle: number): Promise<ReferenceInfo>;

    /**
     * Apply the transform to the reference image only
     */
    preview(item: BatchItem, angle: number, rectangle: Rectangle, clampToReference?: boolean): Promise<PreviewResult>;

    /**
     * Crop every item and pack the results. Per-item failures are reported, not thrown.
     */
    cropBatch(request: CropBatchRequest, hooks?: BatchHooks): Promise<CropBatchResult>;
}
