import {Request, Response, Router} from 'express';
import JobController from "../controllers/JobController";
import {container} from '../container';
import {upload} from '../middleware/upload';

const router = Router();

const jobController = container.resolve(JobController);

// Queue a crop batch
router.post("/crop", upload.array('images'), (req: Request, res: Response) => {
    jobController.submitCropJob(req, res);
});

// Get job status via HTTP polling
router.get("/status", (req: Request, res: Response) => {
    jobController.getJobStatus(req, res);
});

// SSE endpoint for real-time job progress
router.get("/events/:jobId", (req: Request, res: Response) => {
    jobController.getJobProgressSSE(req, res);
});

router.get("/:jobId/archive", (req: Request, res: Response) => {
    jobController.downloadArchive(req, res);
});

router.delete("/:jobId", (req: Request, res: Response) => {
    jobController.cancelJob(req, res);
});

export default router;
