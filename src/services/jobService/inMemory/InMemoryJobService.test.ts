import {EventEmitter} from "node:events";
import InMemoryJobService from "./InMemoryJobService";
import {ICropService} from "../../cropService/ICropService";
import {BatchHooks, BatchProgress, CropBatchRequest, CropBatchResult} from "../../../types/crop";
import {JobPhase, JobProgressEvent} from "../../../types/jobService.types";
import {BatchCancelledError} from "../../../errors/imageErrors";

const REQUEST: CropBatchRequest = {
    items: [{name: "a.png", bytes: Buffer.from("a")}],
    rectangle: {left: 0, top: 0, right: 10, bottom: 10},
    angle: 0,
};

const RESULT: CropBatchResult = {
    archive: Buffer.from("zip"),
    archiveName: "batch_cropped.zip",
    entries: ["a_Cropped.png"],
    failures: [],
    summary: {total: 1, succeeded: 1, failed: [], message: "Cropped 1 of 1 images"},
};

const waitForPhase = (stream: EventEmitter | null, phase: JobPhase): Promise<JobProgressEvent> =>
    new Promise((resolve, reject) => {
        if (!stream) {
            reject(new Error("No progress stream"));
            return;
        }
        const listener = (event: JobProgressEvent) => {
            if (event.phase === phase) {
                stream.off("progress", listener);
                resolve(event);
            }
        };
        stream.on("progress", listener);
    });

const cropServiceWith = (cropBatch: (request: CropBatchRequest, hooks?: BatchHooks) => Promise<CropBatchResult>): ICropService => ({
    describeReference: jest.fn(),
    preview: jest.fn(),
    cropBatch: jest.fn(cropBatch),
});

describe("InMemoryJobService", () => {
    it("runs a job to completion and keeps its archive", async () => {
        const jobService = new InMemoryJobService(cropServiceWith(async (_request, hooks) => {
            hooks?.onProgress?.({completed: 1, total: 1, fraction: 1, name: "a.png", ok: true});
            return RESULT;
        }));

        const id = jobService.addJob(REQUEST);
        const completed = await waitForPhase(jobService.getJobProgressStream(id), "COMPLETED");

        expect(completed.message).toBe("Cropped 1 of 1 images");
        expect(completed.data).toEqual({progress: 1, summary: RESULT.summary});
        expect(jobService.getJobStatusByIds([id]).get(id)).toEqual({
            phase: "COMPLETED",
            state: "[COMPLETED] Cropped 1 of 1 images",
            progress: 1,
            summary: RESULT.summary,
        });
        expect(jobService.getJobResult(id)).toBe(RESULT);
    });

    it("reports item progress while running", async () => {
        const events: JobProgressEvent[] = [];
        let finish: (result: CropBatchResult) => void = () => undefined;
        let report: (progress: BatchProgress) => void = () => undefined;
        const jobService = new InMemoryJobService(cropServiceWith((_request, hooks) => {
            report = hooks?.onProgress ?? report;
            return new Promise(resolve => {
                finish = resolve;
            });
        }));

        const id = jobService.addJob(REQUEST);
        jobService.getJobProgressStream(id)?.on("progress", (event: JobProgressEvent) => events.push(event));
        report({completed: 1, total: 2, fraction: 0.5, name: "a.png", ok: false});

        expect(events).toEqual([expect.objectContaining({
            phase: "ITEM",
            message: "Failed a.png (1/2)",
            data: {progress: 0.5, item: "a.png", ok: false},
        })]);
        expect(jobService.getJobResult(id)).toBeNull();

        const completed = waitForPhase(jobService.getJobProgressStream(id), "COMPLETED");
        finish(RESULT);
        await completed;
        expect(events.map(event => event.phase)).toEqual(["ITEM", "ARCHIVE", "COMPLETED"]);
    });

    it("marks a job failed when the batch cannot run", async () => {
        const jobService = new InMemoryJobService(cropServiceWith(async () => {
            throw new Error("boom");
        }));

        const id = jobService.addJob(REQUEST);
        await waitForPhase(jobService.getJobProgressStream(id), "FAILED");

        expect(jobService.getJobStatusByIds([id]).get(id)).toMatchObject({
            phase: "FAILED",
            state: "[FAILED] Job failed: boom",
        });
        expect(jobService.getJobResult(id)).toBeNull();
    });

    it("cancels a running job between items", async () => {
        const jobService = new InMemoryJobService(cropServiceWith((_request, hooks) =>
            new Promise((_resolve, reject) => {
                hooks?.signal?.addEventListener("abort", () => reject(new BatchCancelledError(0, 1)));
            })
        ));

        const id = jobService.addJob(REQUEST);
        const cancelled = waitForPhase(jobService.getJobProgressStream(id), "CANCELLED");

        expect(jobService.cancelJob(id)).toBe(true);
        expect((await cancelled).message).toBe("Batch cancelled after 0 of 1 images");
        expect(jobService.cancelJob(id)).toBe(false);
    });

    it("returns nothing for unknown jobs", () => {
        const jobService = new InMemoryJobService(cropServiceWith(async () => RESULT));

        expect(jobService.getJobResult("missing")).toBeUndefined();
        expect(jobService.getJobStatusByIds(["missing"]).size).toBe(0);
        expect(jobService.getJobProgressStream("missing")).toBeNull();
        expect(jobService.cancelJob("missing")).toBe(false);
    });

    it("keeps a finished job until its archive has been fetched", async () => {
        const jobService = new InMemoryJobService(cropServiceWith(async () => RESULT));

        const id = jobService.addJob(REQUEST);
        await waitForPhase(jobService.getJobProgressStream(id), "COMPLETED");

        jobService.cleanupJobStream(id);
        expect(jobService.getJobProgressStream(id)).not.toBeNull();

        jobService.getJobResult(id);
        jobService.cleanupJobStream(id);
        expect(jobService.getJobProgressStream(id)).toBeNull();
    });
});
