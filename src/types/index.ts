import type { SegmentError } from "@/errors";

export interface ByteRange {
    index: number;
    start: number;
    end: number; // inclusive
}

export type SegmentStatus = "pending" | "running" | "paused" | "completed" | "failed" | "stopped";

export interface SegmentState {
    range: ByteRange;
    bytesDownloaded: number;
    status: SegmentStatus;
    tempFilePath: string;
}

export interface DownloadJob {
    readonly id: string;
    readonly url: string;
    readonly destinationPath: string;
    readonly segmentCount: number; // requested, before range support is known
    totalSize?: number;
    acceptsRanges: boolean;
}

export interface AggregateProgress {
    totalBytes: number;
    downloadedBytes: number;
    percent: number;
    speedBytesPerSec: number;
    etaSeconds: number;
    perSegmentPercent: Record<number, number>;
}

export interface ProbeResult {
    url: string; // after redirects
    totalSize: number;
    acceptsRanges: boolean;
    statusCode: number;
}

export type DownloadState =
    | "idle"
    | "probing"
    | "planning"
    | "running"
    | "paused"
    | "completed"
    | "failed"
    | "stopped";

export type TerminalState = Extract<DownloadState, "completed" | "failed" | "stopped">;

export interface DownloadRequest {
    url: string;
    destinationPath?: string;
    segmentCount?: number;
    id?: string;
}

export interface DownloadResult {
    job: DownloadJob;
    state: TerminalState;
    outputPath: string | null;
    segments: SegmentState[];
    progress: AggregateProgress | null;
    elapsedMs: number;
    error: Error | null; // a DownloadError subclass unless something unexpected threw
}

export interface DownloadManagerOptions {
    // Parallelism
    segments?: number;

    // Streaming
    chunkSize?: number | string; // e.g. 65536 or "64KB"

    // Network
    timeout?: number; // time to response headers (ms)
    connectTimeout?: number;
    headers?: Record<string, string>;
    maxRedirects?: number;

    // Storage
    tempDirectory?: string | null; // null = next to the destination

    // Reporting
    progressInterval?: number; // ms between progress events
    speedSampleInterval?: number; // ms per speed sample

    // Failure policy
    failFast?: boolean;
}

export enum DownloadManagerEventName {
    StateChange = "stateChange",
    Probe = "probe",
    Start = "start",
    Progress = "progress",
    SegmentProgress = "segmentProgress",
    SegmentComplete = "segmentComplete",
    SegmentError = "segmentError",
    Complete = "complete",
    Failed = "failed",
    Redirect = "redirect",
    Pause = "pause",
    Resume = "resume",
    Stop = "stop",
}

export interface DownloadManagerEventMap {
    stateChange: (state: DownloadState, previous: DownloadState) => void;
    probe: (job: DownloadJob, probe: ProbeResult) => void;
    start: (job: DownloadJob, segments: SegmentState[]) => void;
    progress: (progress: AggregateProgress) => void;
    segmentProgress: (index: number, percent: number) => void;
    segmentComplete: (segment: SegmentState) => void;
    segmentError: (segment: SegmentState, error: SegmentError) => void;
    complete: (result: DownloadResult) => void;
    failed: (error: Error, result: DownloadResult) => void;
    redirect: (fromUrl: string, toUrl: string) => void;
    pause: () => void;
    resume: () => void;
    stop: () => void;
}
