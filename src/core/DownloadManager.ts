import { randomUUID } from "crypto";
import { basename, dirname, join, resolve } from "path";
import PQueue from "p-queue";
import { resolveOptions, type ResolvedOptions } from "@/config";
import { SegmentError } from "@/errors";
import { HttpClient } from "@/network";
import { Merger } from "@/storage";
import { DownloadManagerEventName } from "@/types";
import type {
    AggregateProgress,
    ByteRange,
    DownloadJob,
    DownloadManagerEventMap,
    DownloadManagerOptions,
    DownloadRequest,
    DownloadResult,
    DownloadState,
    ProbeResult,
    SegmentState,
    TerminalState,
} from "@/types";
import { TypedEventEmitter } from "@/utils/TypedEventEmitter";
import { extractFilename, toError } from "@/utils/common";
import { TEMP_FILE_EXTENSION } from "@/utils/constants";
import { log } from "@/utils/logger";
import { ControlSignal } from "./ControlSignal";
import { ProgressAggregator } from "./ProgressAggregator";
import { planRanges } from "./RangePlanner";
import { SegmentWorker } from "./SegmentWorker";

const ACTIVE_STATES: ReadonlySet<DownloadState> = new Set<DownloadState>([
    "probing",
    "planning",
    "running",
    "paused",
]);

/**
 * Build the temp file path of one segment: `<dir>/<name>.<jobId>.part<index>`.
 */
export function segmentTempPath(
    job: DownloadJob,
    index: number,
    tempDirectory: string | null
): string {
    const directory = tempDirectory ?? dirname(job.destinationPath);
    const name = `${basename(job.destinationPath)}.${job.id}${TEMP_FILE_EXTENSION}${index}`;
    return join(directory, name);
}

/**
 * Drives one download at a time through probe, plan, parallel segment fetch and
 * merge. `pause()`, `resume()` and `stop()` may be called at any point while a
 * download is active; `start()` resolves once every worker has settled.
 */
export class DownloadManager extends TypedEventEmitter<DownloadManagerEventMap> {
    private readonly options: ResolvedOptions;
    private readonly httpClient: HttpClient;
    private state: DownloadState = "idle";
    private job: DownloadJob | null = null;
    private control: ControlSignal | null = null;
    private aggregator: ProgressAggregator | null = null;
    private segments: SegmentState[] = [];
    private progressTimer: ReturnType<typeof setInterval> | null = null;

    constructor(options?: DownloadManagerOptions) {
        super();
        this.options = resolveOptions(options);

        this.httpClient = new HttpClient({
            timeout: this.options.timeout,
            connectTimeout: this.options.connectTimeout,
            maxRedirects: this.options.maxRedirects,
            headers: this.options.headers,
            onRedirect: (fromUrl, toUrl) => {
                this.notify(DownloadManagerEventName.Redirect, fromUrl, toUrl);
            },
        });
    }

    async start(request: DownloadRequest | string): Promise<DownloadResult> {
        if (this.isActive()) throw new Error("A download is already in progress");

        const job = this.createJob(typeof request === "string" ? { url: request } : request);
        const control = new ControlSignal();
        const startedAt = Date.now();

        this.job = job;
        this.control = control;
        this.aggregator = null;
        this.segments = [];

        try {
            this.setState("probing");
            const probe = await this.httpClient.probe(job.url, control.signal);
            job.totalSize = probe.totalSize;
            job.acceptsRanges = probe.acceptsRanges;
            this.emit(DownloadManagerEventName.Probe, job, probe);
            log.debug(
                `Probed ${job.url}: ${probe.totalSize} bytes, ` +
                    `ranges ${probe.acceptsRanges ? "supported" : "unsupported"}`
            );

            if (control.isStopped) return this.finalize("stopped", startedAt, null);

            this.setState("planning");
            const segmentCount = probe.acceptsRanges ? job.segmentCount : 1;
            if (segmentCount < job.segmentCount)
                log.debug(`No range support; downloading ${job.url} as a single segment`);

            const ranges = planRanges(probe.totalSize, segmentCount);
            const aggregator = new ProgressAggregator({
                totalBytes: probe.totalSize,
                segmentCount: ranges.length,
                sampleIntervalMs: this.options.speedSampleInterval,
            });
            this.aggregator = aggregator;

            const workers = ranges.map(range =>
                this.createWorker(job, range, probe, control, aggregator)
            );
            this.segments = workers.map(worker => worker.state);

            this.setState(control.isPaused ? "paused" : "running");
            this.emit(DownloadManagerEventName.Start, job, this.getSegments());
            this.startProgressLoop();

            const failure = await this.runWorkers(workers, control);

            this.stopProgressLoop();
            this.emitProgress();

            if (failure) return this.finalize("failed", startedAt, failure);
            if (control.isStopped) return this.finalize("stopped", startedAt, null);

            const merged = await new Merger(this.options.chunkSize).combine(
                this.segments,
                job.destinationPath
            );
            log.debug(`Merged ${merged.segmentCount} segment(s) into ${merged.outputPath}`);

            return this.finalize("completed", startedAt, null);
        } catch (error) {
            // A stop during probing surfaces as an aborted request
            if (control.isStopped && this.segments.length === 0)
                return this.finalize("stopped", startedAt, null);

            return this.finalize("failed", startedAt, toError(error, "Download failed"));
        } finally {
            this.stopProgressLoop();
        }
    }

    pause(): boolean {
        if (!this.control || !this.isActive() || !this.control.pause()) return false;

        if (this.state === "running") this.setState("paused");
        this.emit(DownloadManagerEventName.Pause);
        return true;
    }

    resume(): boolean {
        if (!this.control || !this.isActive() || !this.control.resume()) return false;

        if (this.state === "paused") this.setState("running");
        this.emit(DownloadManagerEventName.Resume);
        return true;
    }

    /**
     * Ask every worker to stop. The download ends as `stopped` once all of
     * them have settled; the promise returned by `start()` resolves then.
     */
    stop(): boolean {
        if (!this.control || !this.isActive() || !this.control.stop()) return false;

        log.debug(`Stop requested for ${this.job?.url ?? "download"}`);
        this.emit(DownloadManagerEventName.Stop);
        return true;
    }

    currentState(): DownloadState {
        return this.state;
    }

    currentJob(): DownloadJob | null {
        return this.job;
    }

    progress(): AggregateProgress | null {
        return this.aggregator?.snapshot() ?? null;
    }

    getSegments(): SegmentState[] {
        return this.segments.map(segment => ({ ...segment }));
    }

    isActive(): boolean {
        return ACTIVE_STATES.has(this.state);
    }

    private createJob(request: DownloadRequest): DownloadJob {
        const segmentCount = request.segmentCount ?? this.options.segments;
        if (!Number.isSafeInteger(segmentCount) || segmentCount < 1)
            throw new Error(`Invalid segment count: ${segmentCount}`);

        return {
            id: request.id ?? randomUUID(),
            url: request.url.trim(),
            destinationPath: resolve(request.destinationPath ?? extractFilename(request.url)),
            segmentCount,
            acceptsRanges: false,
        };
    }

    private createWorker(
        job: DownloadJob,
        range: ByteRange,
        probe: ProbeResult,
        control: ControlSignal,
        aggregator: ProgressAggregator
    ): SegmentWorker {
        const tempFilePath = segmentTempPath(job, range.index, this.options.tempDirectory);

        return new SegmentWorker(range, tempFilePath, {
            httpClient: this.httpClient,
            url: job.url,
            totalSize: probe.totalSize,
            chunkSize: this.options.chunkSize,
            useRange: probe.acceptsRanges,
            control,
            aggregator,
            onProgress: (index, percent) => {
                this.notify(DownloadManagerEventName.SegmentProgress, index, percent);
            },
        });
    }

    /**
     * Start every worker at once and wait for all of them to settle.
     * @returns the first segment failure, if any
     */
    private async runWorkers(
        workers: SegmentWorker[],
        control: ControlSignal
    ): Promise<SegmentError | null> {
        const queue = new PQueue({ concurrency: workers.length });
        let failure: SegmentError | null = null;

        // Settles only once every worker has, whatever the listeners do
        await Promise.allSettled(
            workers.map(worker =>
                queue.add(() =>
                    worker.run().then(
                        outcome => {
                            if (outcome.status === "completed")
                                this.notify(DownloadManagerEventName.SegmentComplete, {
                                    ...worker.state,
                                });
                        },
                        (error: unknown) => {
                            const segmentError =
                                error instanceof SegmentError
                                    ? error
                                    : new SegmentError(
                                          "ConnectionFailed",
                                          worker.index,
                                          toError(error, "Segment failed").message,
                                          { cause: error }
                                      );
                            failure ??= segmentError;
                            log.debug(segmentError.message);
                            this.notify(
                                DownloadManagerEventName.SegmentError,
                                { ...worker.state },
                                segmentError
                            );

                            if (this.options.failFast) control.stop();
                        }
                    )
                )
            )
        );

        return failure;
    }

    private finalize(
        state: TerminalState,
        startedAt: number,
        error: Error | null
    ): DownloadResult {
        const job = this.job;
        if (!job) throw new Error("No download to finalize");

        const result: DownloadResult = {
            job,
            state,
            outputPath: state === "completed" ? job.destinationPath : null,
            segments: this.getSegments(),
            progress: this.aggregator?.snapshot() ?? null,
            elapsedMs: Date.now() - startedAt,
            error,
        };

        this.setState(state);
        if (state === "completed") this.emit(DownloadManagerEventName.Complete, result);
        if (state === "failed" && error) this.emit(DownloadManagerEventName.Failed, error, result);
        return result;
    }

    private setState(next: DownloadState): void {
        const previous = this.state;
        if (previous === next) return;

        this.state = next;
        log.debug(`Download state ${previous} -> ${next}`);
        this.emit(DownloadManagerEventName.StateChange, next, previous);
    }

    private emitProgress(): void {
        if (this.aggregator)
            this.notify(DownloadManagerEventName.Progress, this.aggregator.snapshot());
    }

    /**
     * Emit from inside a worker callback or the progress timer. A listener that
     * throws is logged; it must not fail a segment or break the worker barrier.
     */
    private notify<K extends Extract<keyof DownloadManagerEventMap, string>>(
        event: K,
        ...args: Parameters<DownloadManagerEventMap[K]>
    ): void {
        try {
            this.emit(event, ...args);
        } catch (error) {
            log.warn(`A ${event} listener threw: ${toError(error, "Listener failed").message}`);
        }
    }

    private startProgressLoop(): void {
        this.stopProgressLoop();
        this.progressTimer = setInterval(() => this.emitProgress(), this.options.progressInterval);
    }

    private stopProgressLoop(): void {
        if (this.progressTimer) {
            clearInterval(this.progressTimer);
            this.progressTimer = null;
        }
    }

    /**
     * Download and resolve with the result, rejecting with the download error
     * unless the download completed.
     */
    static async download(
        request: DownloadRequest | string,
        options?: DownloadManagerOptions
    ): Promise<DownloadResult> {
        const manager = new DownloadManager(options);
        const result = await manager.start(request);

        if (result.state === "completed") return result;
        throw result.error ?? new Error(`Download ${result.state}`);
    }
}
