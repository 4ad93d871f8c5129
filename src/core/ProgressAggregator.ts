import type { AggregateProgress } from "@/types";
import { SPEED_SAMPLE_WINDOW_MS } from "@/utils/constants";

export interface ProgressAggregatorOptions {
    totalBytes: number;
    segmentCount: number;
    sampleIntervalMs?: number;
    now?: () => number;
}

/**
 * Single owner of the shared download counters. Every mutation runs
 * synchronously, so updates from concurrent workers on the event loop never
 * interleave and each snapshot sees a consistent total.
 */
export class ProgressAggregator {
    private readonly totalBytes: number;
    private readonly sampleIntervalMs: number;
    private readonly now: () => number;
    private readonly segmentPercent = new Map<number, number>();
    private downloadedBytes = 0;

    private sampleStartedAt: number;
    private sampleStartBytes = 0;
    private speed = 0;

    constructor(options: ProgressAggregatorOptions) {
        this.totalBytes = options.totalBytes;
        this.sampleIntervalMs = options.sampleIntervalMs ?? SPEED_SAMPLE_WINDOW_MS;
        this.now = options.now ?? Date.now;
        this.sampleStartedAt = this.now();

        for (let index = 0; index < options.segmentCount; index++) {
            this.segmentPercent.set(index, 0);
        }
    }

    /** @returns the running total after the increment */
    addBytes(bytes: number): number {
        if (!Number.isSafeInteger(bytes) || bytes < 0) {
            throw new RangeError(`Byte count must be a non-negative integer, got ${bytes}`);
        }
        this.downloadedBytes += bytes;
        return this.downloadedBytes;
    }

    setSegmentPercent(index: number, percent: number): void {
        const clamped = Math.max(0, Math.min(100, percent));
        this.segmentPercent.set(index, clamped);
    }

    get downloaded(): number {
        return Math.min(this.downloadedBytes, this.totalBytes);
    }

    /**
     * Current totals. Closes the speed sample once its window has elapsed, so
     * the reported speed changes at most once per window.
     */
    snapshot(): AggregateProgress {
        const downloadedBytes = this.downloaded;
        const now = this.now();
        const elapsedMs = now - this.sampleStartedAt;

        if (elapsedMs >= this.sampleIntervalMs) {
            this.speed = ((downloadedBytes - this.sampleStartBytes) * 1000) / elapsedMs;
            this.sampleStartedAt = now;
            this.sampleStartBytes = downloadedBytes;
        }

        const remainingBytes = Math.max(0, this.totalBytes - downloadedBytes);
        const percent = this.totalBytes > 0 ? (downloadedBytes / this.totalBytes) * 100 : 0;

        return {
            totalBytes: this.totalBytes,
            downloadedBytes,
            percent: Math.min(percent, 100),
            speedBytesPerSec: this.speed,
            etaSeconds: this.speed > 0 ? remainingBytes / this.speed : 0,
            perSegmentPercent: Object.fromEntries(this.segmentPercent),
        };
    }
}
