import {Request, Response} from 'express';
import {inject, injectable} from "tsyringe";
import {getLogger} from '../logger';
import {ICropService} from "../services/cropService/ICropService";
import {CROP_SERVICE} from "../consts/DependencyConstants";
import {ApiResponse} from "../types/response.types";
import {ReferenceInfo} from "../types/crop";
import {previewRequestSchema, referenceRequestSchema} from "../validators/crop";
import {parseBatchRequest, requireUploadedImage, sendArchive} from "../utils/http.util";

@injectable()
export default class CropController {
    private readonly logger = getLogger(CropController.name);

    constructor(
        @inject(CROP_SERVICE) private cropService: ICropService
    ) {
    }

    /**
     * Dimensions of the reference image after rotation, used to bound the rectangle inputs
     */
    async describeReference(req: Request, res: Response): Promise<void> {
        const image = requireUploadedImage(req);
        const {angle} = referenceRequestSchema.parse(req.body ?? {});
        this.logger.info(`Describe reference ${image.name} at ${angle} degrees`);

        const info = await this.cropService.describeReference(image, angle);
        const response: ApiResponse<ReferenceInfo> = {
            success: true,
            message: `Image size: ${info.rotated.width} x ${info.rotated.height} px`,
            data: info,
        };
        res.status(200).json(response);
    }

    async preview(req: Request, res: Response): Promise<void> {
        const image = requireUploadedImage(req);
        const body: unknown = req.body;
        const {angle, rectangle, clamp} = previewRequestSchema.parse(
            typeof body === "object" && body !== null ? {...body, rectangle: body} : {}
        );
        this.logger.info(`Preview ${image.name}`, {angle, rectangle});

        const result = await this.cropService.preview(image, angle, rectangle, clamp);
        res.set({
            "X-Image-Width": String(result.width),
            "X-Image-Height": String(result.height),
        });
        res.type(result.mimeType);
        res.status(200).send(result.data);
    }

    /**
     * Crop the whole upload in one request and answer with the archive.
     * Partial failures still return 200; the failed names travel in X-Batch-Failed-Items.
     */
    async cropBatch(req: Request, res: Response): Promise<void> {
        const request = parseBatchRequest(req);
        this.logger.info(`Crop batch endpoint called with ${request.items.length} images`);

        const result = await this.cropService.cropBatch(request);
        this.logger.info(result.summary.message);
        sendArchive(res, result);
    }
}
