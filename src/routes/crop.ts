import { Router, Request, Response } from 'express';
import { container } from '../container';
import CropController from '../controllers/cropController';
import { upload } from '../middleware/upload';
import { asyncHandler } from '../middleware/errorHandler';

const router = Router();

// Get controller instance from DI container
const cropController = container.resolve(CropController);

router.post("/reference", upload.single('image'), asyncHandler(async (req: Request, res: Response) => {
    await cropController.describeReference(req, res);
}));

router.post("/preview", upload.single('image'), asyncHandler(async (req: Request, res: Response) => {
    await cropController.preview(req, res);
}));

router.post("/batch", upload.array('images'), asyncHandler(async (req: Request, res: Response) => {
    await cropController.cropBatch(req, res);
}));

export default router;
