import {EventEmitter} from "node:events";
import {BatchSummary, CropBatchRequest, CropBatchResult} from "./crop";

export type JobPhase =
    | 'QUEUE'
    | 'PROCESSING'
    | 'ITEM'
    | 'ARCHIVE'
    | 'COMPLETED'
    | 'FAILED'
    | 'CANCELLED';

export const TERMINAL_PHASES: ReadonlySet<JobPhase> = new Set<JobPhase>(['COMPLETED', 'FAILED', 'CANCELLED']);

export interface JobProgressData {
    progress?: number;
    item?: string;
    ok?: boolean;
    summary?: BatchSummary;
}

export interface JobProgressEvent {
    timestamp: number;
    phase: JobPhase;
    message: string;
    data?: JobProgressData;
}

export interface JobState {
    phase: JobPhase;
    // Last progress message, for polling clients
    state: string;
    progress: number;
    request: CropBatchRequest;
    progressStream: EventEmitter;
    abortController: AbortController;
    startTime: number;
    finishedAt?: number;
    result?: CropBatchResult;
    archiveDownloaded: boolean;
}

export interface JobStatusView {
    phase: JobPhase;
    state: string;
    progress: number;
    summary?: BatchSummary;
}
