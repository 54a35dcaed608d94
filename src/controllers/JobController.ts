import {inject, injectable} from "tsyringe";
import {Request, Response} from "express";
import {getLogger} from "../logger";
import {IJobService} from "../services/jobService/IJobService";
import {JOB_SERVICE} from "../consts/DependencyConstants";
import {ApiResponse} from "../types/response.types";
import {JobProgressEvent, JobStatusView, TERMINAL_PHASES} from "../types/jobService.types";
import {parseBatchRequest, sendArchive} from "../utils/http.util";
import {describeError} from "../errors/imageErrors";
import {assertValidRectangle} from "../utils/geometry";

// Send heartbeat every 30 seconds
const HEARTBEAT_INTERVAL_MS = 30000;

@injectable()
export default class JobController {
    private readonly log = getLogger(JobController.name);

    constructor(@inject(JOB_SERVICE) private jobService: IJobService) {
    }

    /**
     * Queue a crop batch; progress is followed over SSE or by polling
     */
    submitCropJob(req: Request, res: Response): void {
        const request = parseBatchRequest(req);
        // Image bounds are only known once the job runs
        assertValidRectangle(request.rectangle);
        const id = this.jobService.addJob(request);
        this.log.info(`Queued crop job ${id} with ${request.items.length} images`);

        const response: ApiResponse<string> = {
            success: true,
            message: "Submitted crop batch. Use the id provided as data to track it using SSE",
            data: id,
        };
        res.status(202).json(response);
    }

    /**
     * Get status of jobs based on ids
     * @param req `?ids=abc` or `?ids=abc,def,ghi`
     * @param res Map of id -> status
     */
    getJobStatus(req: Request, res: Response): void {
        const idsParam = typeof req.query.ids === "string" ? req.query.ids : "";
        const ids: string[] = idsParam ? idsParam.split(',').map(id => id.trim()).filter(Boolean) : [];

        this.log.info(`Get job status for IDs: ${ids}`);

        if (ids.length === 0) {
            const errorResponse: ApiResponse<never> = {
                success: false,
                message: "No job IDs provided. Use ?ids=your-job-id or ?ids=id1,id2,id3",
            };
            res.status(400).json(errorResponse);
            return;
        }

        const jobStatuses = this.jobService.getJobStatusByIds(ids);

        const response: ApiResponse<Record<string, JobStatusView>> = {
            success: true,
            message: "Fetched status for provided job ids",
            // Convert Map to Object for proper JSON serialization
            data: Object.fromEntries(jobStatuses),
        };
        res.status(200).json(response);
    }

    downloadArchive(req: Request, res: Response): void {
        const jobId = req.params.jobId;
        const result = this.jobService.getJobResult(jobId);

        if (result === undefined) {
            res.status(404).json({success: false, message: `Job with ID ${jobId} not found`});
            return;
        }
        if (result === null) {
            res.status(409).json({success: false, message: `Job ${jobId} has not completed`});
            return;
        }

        this.log.info(`Sending archive of job ${jobId}: ${result.summary.message}`);
        sendArchive(res, result);
    }

    cancelJob(req: Request, res: Response): void {
        const jobId = req.params.jobId;
        if (!this.jobService.cancelJob(jobId)) {
            res.status(404).json({success: false, message: `No running job with ID ${jobId}`});
            return;
        }
        const response: ApiResponse<string> = {
            success: true,
            message: "Cancellation requested; the job stops before its next image",
            data: jobId,
        };
        res.status(202).json(response);
    }

    /**
     * SSE endpoint for real-time job progress updates
     * @param req Express request with jobId parameter
     * @param res Express response for SSE
     */
    getJobProgressSSE(req: Request, res: Response): void {
        const jobId = req.params.jobId;

        this.log.info(`SSE connection requested for job: ${jobId}`);

        // Get the job's progress stream
        const progressStream = this.jobService.getJobProgressStream(jobId);

        if (!progressStream) {
            res.status(404).json({
                success: false,
                message: `Job with ID ${jobId} not found`
            });
            return;
        }

        // Set up SSE headers
        res.writeHead(200, {
            'Content-Type': 'text/event-stream',
            'Cache-Control': 'no-cache',
            'Connection': 'keep-alive',
        });

        // Send initial connection confirmation
        res.write(`data: ${JSON.stringify({
            type: 'connected',
            jobId: jobId,
            timestamp: Date.now(),
            message: 'Connected to job progress stream'
        })}\n\n`);

        // A job that already finished will not emit again
        const current = this.jobService.getJobStatusByIds([jobId]).get(jobId);
        if (current && TERMINAL_PHASES.has(current.phase)) {
            res.write(`data: ${JSON.stringify({
                type: 'completion',
                jobId: jobId,
                timestamp: Date.now(),
                phase: current.phase,
                message: current.state,
                data: {progress: current.progress, summary: current.summary},
            })}\n\n`);
            res.end();
            return;
        }

        // Keep connection alive with periodic heartbeat
        const heartbeatInterval = setInterval(() => {
            res.write(`data: ${JSON.stringify({
                type: 'heartbeat',
                jobId: jobId,
                timestamp: Date.now()
            })}\n\n`);
        }, HEARTBEAT_INTERVAL_MS);

        const detach = () => {
            clearInterval(heartbeatInterval);
            progressStream.removeListener('progress', progressListener);
        };

        // Forward progress events; the terminal one closes the stream
        const progressListener = (event: JobProgressEvent) => {
            const terminal = TERMINAL_PHASES.has(event.phase);
            res.write(`data: ${JSON.stringify({
                type: terminal ? 'completion' : 'progress',
                jobId: jobId,
                ...event
            })}\n\n`);
            this.log.debug(`Sent SSE progress for job ${jobId}: ${event.phase} - ${event.message}`);

            if (terminal) {
                this.log.info(`Job ${jobId} finished, closing SSE connection`);
                detach();
                res.end();
            }
        };

        // Attach the listener to the progress stream
        progressStream.on('progress', progressListener);

        // Handle client disconnect
        req.on('close', () => {
            this.log.info(`SSE client disconnected for job: ${jobId}`);
            detach();
            this.jobService.cleanupJobStream(jobId);
        });

        // Handle connection errors
        req.on('error', (error: Error) => {
            this.log.error(`SSE connection error for job ${jobId}: ${describeError(error)}`);
            detach();
            this.jobService.cleanupJobStream(jobId);
        });
    }
}
