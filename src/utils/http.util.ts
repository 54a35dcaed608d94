import {Request, Response} from "express";
import {AppError} from "../errors/AppError";
import {BatchItem, CropBatchRequest, CropBatchResult} from "../types/crop";
import {cropBatchRequestSchema} from "../validators/crop";
import {config, defaultTokenFor} from "../config";
import {encodeHeaderList} from "./media.util";

// multer hands over multipart filenames decoded as latin1
const decodeFileName = (originalname: string): string => Buffer.from(originalname, "latin1").toString("utf8");

export const toBatchItem = (file: Express.Multer.File): BatchItem => ({
    name: decodeFileName(file.originalname),
    bytes: file.buffer,
    declaredType: file.mimetype || undefined,
});

/**
 * The single image of a reference or preview upload
 */
export const requireUploadedImage = (req: Request): BatchItem => {
    if (!req.file) {
        throw new AppError("No image uploaded. Send it as the 'image' form field", 400);
    }
    return toBatchItem(req.file);
};

/**
 * Uploaded batch in the order the client sent it
 */
export const collectBatchItems = (req: Request): BatchItem[] => {
    const files = Array.isArray(req.files) ? req.files : Object.values(req.files ?? {}).flat();
    if (files.length === 0) {
        throw new AppError("No images uploaded. Send them as the 'images' form field", 400);
    }
    return files.map(toBatchItem);
};

/**
 * Turn a multipart batch upload into a crop request. Rectangle fields sit at the top level of the form.
 */
export const parseBatchRequest = (req: Request): CropBatchRequest => {
    const body: unknown = req.body;
    const fields = cropBatchRequestSchema.parse(
        typeof body === "object" && body !== null ? {...body, rectangle: body} : {}
    );

    const style = fields.namingStyle ?? config.naming.style;
    const token = fields.namingToken
        ?? (style === config.naming.style ? config.naming.token : defaultTokenFor(style));

    return {
        items: collectBatchItems(req),
        rectangle: fields.rectangle,
        angle: fields.angle,
        naming: {style, token},
        reference: fields.reference,
        clampToReference: fields.clamp,
    };
};

export const sendArchive = (res: Response, result: CropBatchResult): void => {
    res.attachment(result.archiveName);
    res.type("application/zip");
    res.set({
        "X-Batch-Total": String(result.summary.total),
        "X-Batch-Succeeded": String(result.summary.succeeded),
        "X-Batch-Failed-Items": encodeHeaderList(result.failures.map(failure => failure.name)),
    });
    res.status(200).send(result.archive);
};
