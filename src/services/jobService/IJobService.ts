import {EventEmitter} from "node:events";
import {CropBatchRequest, CropBatchResult} from "../../types/crop";
import {JobStatusView} from "../../types/jobService.types";

export interface IJobService {
    /**
     * add a crop batch for background processing
     */
    addJob(request: CropBatchRequest): string;

    getJobStatusByIds(ids: string[]): Map<string, JobStatusView>;

    /**
     * Get the progress stream for a specific job
     */
    getJobProgressStream(jobId: string): EventEmitter | null;

    /**
     * Result of a completed job. `undefined` when the job is unknown, `null` while it has not completed.
     */
    getJobResult(jobId: string): CropBatchResult | null | undefined;

    /**
     * Request cancellation; takes effect before the next image. Returns false for unknown or finished jobs.
     */
    cancelJob(jobId: string): boolean;

    /**
     * Clean up job resources when client disconnects
     */
    cleanupJobStream(jobId: string): void;
}
