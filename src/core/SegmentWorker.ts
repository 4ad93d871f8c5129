import { SegmentError, classifyNetworkError } from "@/errors";
import { parseContentLength, parseContentRange, type HttpClient } from "@/network";
import type { ResponseStream } from "@/network";
import { SegmentWriter } from "@/storage/SegmentWriter";
import type { ByteRange, SegmentState } from "@/types";
import { toError } from "@/utils/common";
import type { ControlSignal } from "./ControlSignal";
import type { ProgressAggregator } from "./ProgressAggregator";
import { rangeLength } from "./RangePlanner";

export interface SegmentWorkerOptions {
    httpClient: HttpClient;
    url: string;
    totalSize: number;
    chunkSize: number;
    useRange: boolean;
    control: ControlSignal;
    aggregator: ProgressAggregator;
    onProgress?: (segmentIndex: number, percent: number) => void;
}

export interface SegmentOutcome {
    index: number;
    status: "completed" | "stopped";
    bytesDownloaded: number;
}

type ConsumeResult = "completed" | "stopped";

/**
 * Downloads one byte range into its own temp file.
 *
 * The body is cut into `chunkSize` blocks. Between blocks the worker checks
 * the control signal: a stop returns at once and leaves the temp file as it
 * is; a pause stops pulling from the response until resumed, so the same
 * request simply continues afterwards.
 */
export class SegmentWorker {
    readonly state: SegmentState;
    private readonly options: SegmentWorkerOptions;
    private readonly expectedBytes: number;
    private receivedBytes = 0;

    constructor(range: ByteRange, tempFilePath: string, options: SegmentWorkerOptions) {
        this.state = { range, bytesDownloaded: 0, status: "pending", tempFilePath };
        this.options = options;
        this.expectedBytes = rangeLength(range);
    }

    get index(): number {
        return this.state.range.index;
    }

    async run(): Promise<SegmentOutcome> {
        const { control, httpClient, url, useRange } = this.options;
        if (control.isStopped) return this.finish("stopped");

        this.state.status = "running";
        const writer = new SegmentWriter();
        let response: ResponseStream | null = null;

        try {
            await writer.open(this.state.tempFilePath).catch((error: unknown) => {
                throw this.ioFailure(error);
            });

            response = await httpClient.openSegmentStream(
                url,
                useRange ? this.state.range : null,
                control.signal
            );
            this.verifyResponse(response);

            return this.finish(await this.consume(response, writer));
        } catch (error) {
            if (error instanceof SegmentError) return this.fail(error);
            if (control.isStopped) return this.finish("stopped");

            const kind = classifyNetworkError(error);
            const detail = toError(error, "Segment request failed").message;
            return this.fail(new SegmentError(kind, this.index, detail, { cause: error }));
        } finally {
            response?.stream.destroy();
            await writer.close();
        }
    }

    private verifyResponse({ statusCode, headers }: ResponseStream): void {
        const { range } = this.state;
        const { useRange, totalSize } = this.options;
        const coversWholeResource = range.start === 0 && range.end === totalSize - 1;

        const statusAccepted = useRange
            ? statusCode === 206 || (statusCode === 200 && coversWholeResource)
            : statusCode === 200;
        if (!statusAccepted) {
            throw new SegmentError(
                "UnexpectedStatus",
                this.index,
                `server answered ${statusCode} for bytes ${range.start}-${range.end}`
            );
        }

        if (statusCode === 206) {
            const contentRange = parseContentRange(headers["content-range"]);
            const sameBounds =
                contentRange?.start === range.start && contentRange.end === range.end;
            if (contentRange && !sameBounds) {
                throw new SegmentError(
                    "UnexpectedStatus",
                    this.index,
                    `server sent bytes ${contentRange.start}-${contentRange.end}, ` +
                        `requested ${range.start}-${range.end}`
                );
            }
            if (contentRange?.total != null && contentRange.total !== totalSize) {
                throw new SegmentError(
                    "ByteCountMismatch",
                    this.index,
                    `resource size changed from ${totalSize} to ${contentRange.total} bytes`
                );
            }
        }

        const contentLength = parseContentLength(headers["content-length"]);
        if (contentLength !== null && contentLength !== this.expectedBytes) {
            throw new SegmentError(
                "ByteCountMismatch",
                this.index,
                `server announced ${contentLength} bytes, expected ${this.expectedBytes}`
            );
        }
    }

    private async consume(
        { stream }: ResponseStream,
        writer: SegmentWriter
    ): Promise<ConsumeResult> {
        const { control, chunkSize } = this.options;
        const iterator = stream[Symbol.asyncIterator]();
        let buffered: Buffer = Buffer.alloc(0);

        while (true) {
            if (control.isStopped) return "stopped";
            if (control.isPaused) {
                this.state.status = "paused";
                await control.waitWhilePaused();
                if (control.isStopped) return "stopped";
                this.state.status = "running";
            }

            const { value, done } = await iterator.next();
            if (done) break;
            if (!Buffer.isBuffer(value))
                throw new TypeError("Response body yielded a string chunk");

            this.receivedBytes += value.length;
            if (this.receivedBytes > this.expectedBytes) {
                throw new SegmentError(
                    "ByteCountMismatch",
                    this.index,
                    `received more than the ${this.expectedBytes} bytes requested`
                );
            }

            buffered = buffered.length > 0 ? Buffer.concat([buffered, value]) : value;
            while (buffered.length >= chunkSize) {
                if (control.isStopped) return "stopped";
                await this.writeBlock(writer, buffered.subarray(0, chunkSize));
                buffered = buffered.subarray(chunkSize);
            }
        }

        // A body cut short by our own abort is a stop, not a short read
        if (control.isStopped) return "stopped";
        if (buffered.length > 0) await this.writeBlock(writer, buffered);

        if (this.state.bytesDownloaded !== this.expectedBytes) {
            throw new SegmentError(
                "ByteCountMismatch",
                this.index,
                `received ${this.state.bytesDownloaded} of ${this.expectedBytes} bytes`
            );
        }
        return "completed";
    }

    private async writeBlock(writer: SegmentWriter, block: Buffer): Promise<void> {
        const { aggregator, onProgress } = this.options;

        await writer.write(block).catch((error: unknown) => {
            throw this.ioFailure(error);
        });

        aggregator.addBytes(block.length);
        this.state.bytesDownloaded += block.length;

        const percent = (this.state.bytesDownloaded / this.expectedBytes) * 100;
        aggregator.setSegmentPercent(this.index, percent);
        onProgress?.(this.index, percent);
    }

    private ioFailure(error: unknown): SegmentError {
        return new SegmentError(
            "IOFailure",
            this.index,
            toError(error, "Temp file write failed").message,
            { cause: error }
        );
    }

    private finish(status: ConsumeResult): SegmentOutcome {
        this.state.status = status;
        return { index: this.index, status, bytesDownloaded: this.state.bytesDownloaded };
    }

    private fail(error: SegmentError): never {
        this.state.status = "failed";
        throw error;
    }
}
