import {IJobService} from "../IJobService";
import {inject, injectable} from "tsyringe";
import {randomUUID} from "node:crypto";
import {EventEmitter} from "node:events";
import {getLogger} from "../../../logger";
import {
    JobPhase,
    JobProgressData,
    JobProgressEvent,
    JobState,
    JobStatusView,
    TERMINAL_PHASES,
} from "../../../types/jobService.types";
import {CropBatchRequest, CropBatchResult} from "../../../types/crop";
import {ICropService} from "../../cropService/ICropService";
import {CROP_SERVICE} from "../../../consts/DependencyConstants";
import {BatchCancelledError, describeError} from "../../../errors/imageErrors";
import {formatFileSize} from "../../../utils/media.util";
import {config} from "../../../config";

@injectable()
export default class InMemoryJobService implements IJobService {
    private readonly log = getLogger(InMemoryJobService.name);
    private jobState: Map<string, JobState> = new Map();

    constructor(
        @inject(CROP_SERVICE) private cropService: ICropService
    ) {
    }

    addJob(request: CropBatchRequest): string {
        this.pruneExpiredJobs();

        const uid = randomUUID();
        const jobState: JobState = {
            phase: 'QUEUE',
            state: 'QUEUED',
            progress: 0,
            request,
            progressStream: new EventEmitter(),
            abortController: new AbortController(),
            startTime: Date.now(),
            archiveDownloaded: false,
        };

        this.jobState.set(uid, jobState);

        // Emit initial progress event
        this.emitProgress(jobState, 'QUEUE', `Job queued with ${request.items.length} images`);

        void this.processJobAsync(uid).catch((error: unknown) => {
            this.log.error(`Job ${uid} crashed: ${describeError(error)}`);
        });
        return uid;
    }

    getJobStatusByIds(ids: string[]): Map<string, JobStatusView> {
        this.pruneExpiredJobs();
        this.log.info(`Get job status by ids ${ids}`);

        const jobStatusMap: Map<string, JobStatusView> = new Map();
        ids.forEach(value => {
            const state = this.jobState.get(value);
            if (state) {
                jobStatusMap.set(value, {
                    phase: state.phase,
                    state: state.state,
                    progress: state.progress,
                    summary: state.result?.summary,
                });
            }
        });
        return jobStatusMap;
    }

    getJobProgressStream(jobId: string): EventEmitter | null {
        const jobState = this.jobState.get(jobId);
        return jobState ? jobState.progressStream : null;
    }

    getJobResult(jobId: string): CropBatchResult | null | undefined {
        this.pruneExpiredJobs();
        const jobState = this.jobState.get(jobId);
        if (!jobState) return undefined;
        if (jobState.phase !== 'COMPLETED' || !jobState.result) return null;

        jobState.archiveDownloaded = true;
        return jobState.result;
    }

    cancelJob(jobId: string): boolean {
        const jobState = this.jobState.get(jobId);
        if (!jobState || TERMINAL_PHASES.has(jobState.phase)) {
            return false;
        }
        this.log.info(`Cancellation requested for job ${jobId}`);
        jobState.abortController.abort();
        return true;
    }

    cleanupJobStream(jobId: string): void {
        const jobState = this.jobState.get(jobId);
        if (jobState) {
            // Remove all listeners to prevent memory leaks
            jobState.progressStream.removeAllListeners();

            // Completed jobs wait for their archive to be fetched
            const archivePending = jobState.phase === 'COMPLETED' && !jobState.archiveDownloaded;
            if (TERMINAL_PHASES.has(jobState.phase) && !archivePending) {
                this.jobState.delete(jobId);
                this.log.info(`Cleaned up job ${jobId}`);
            }
        }
    }

    private emitProgress(jobState: JobState, phase: JobPhase, message: string, data?: JobProgressData): void {
        const event: JobProgressEvent = {
            timestamp: Date.now(),
            phase,
            message,
            data
        };

        jobState.phase = phase;
        if (data?.progress !== undefined) {
            jobState.progress = data.progress;
        }
        // Update state string for HTTP polling compatibility
        jobState.state = `[${phase}] ${message}`;

        // Emit to stream for SSE clients
        jobState.progressStream.emit('progress', event);
    }

    private async processJobAsync(jobId: string): Promise<void> {
        const jobState = this.jobState.get(jobId);
        if (!jobState) {
            this.log.warn(`Failed to find job with ID ${jobId}`);
            return;
        }

        this.emitProgress(jobState, 'PROCESSING', 'Job started', {progress: 0});
        try {
            const result = await this.cropService.cropBatch(jobState.request, {
                signal: jobState.abortController.signal,
                onProgress: ({completed, total, fraction, name, ok}) => {
                    const verb = ok ? 'Cropped' : 'Failed';
                    this.emitProgress(jobState, 'ITEM', `${verb} ${name} (${completed}/${total})`, {
                        progress: fraction,
                        item: name,
                        ok,
                    });
                },
            });

            jobState.result = result;
            jobState.finishedAt = Date.now();
            this.emitProgress(jobState, 'ARCHIVE', `Archive ready: ${result.archiveName} (${formatFileSize(result.archive.length)})`);
            this.emitProgress(jobState, 'COMPLETED', result.summary.message, {progress: 1, summary: result.summary});
        } catch (error) {
            jobState.finishedAt = Date.now();
            if (error instanceof BatchCancelledError) {
                this.log.warn(`Job ${jobId} cancelled`);
                this.emitProgress(jobState, 'CANCELLED', error.message);
                return;
            }
            this.log.error(`Job ${jobId} failed: ${describeError(error)}`);
            this.emitProgress(jobState, 'FAILED', `Job failed: ${describeError(error)}`);
        } finally {
            // Drop the uploaded bytes once they are no longer needed
            jobState.request = {...jobState.request, items: []};
        }
    }

    private pruneExpiredJobs(): void {
        const cutoff = Date.now() - config.jobRetentionMs;
        for (const [jobId, jobState] of this.jobState) {
            if (jobState.finishedAt !== undefined && jobState.finishedAt < cutoff) {
                jobState.progressStream.removeAllListeners();
                this.jobState.delete(jobId);
                this.log.debug(`Expired job ${jobId}`);
            }
        }
    }
}
