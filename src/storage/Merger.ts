import { mkdir, open, type FileHandle } from "fs/promises";
import { dirname } from "path";
import { rangeLength } from "@/core/RangePlanner";
import { MergeError } from "@/errors";
import type { SegmentState } from "@/types";
import { MERGE_BUFFER_SIZE } from "@/utils/constants";
import { toError } from "@/utils/common";
import { SegmentWriter } from "./SegmentWriter";

export interface MergeResult {
    outputPath: string;
    bytesWritten: number;
    segmentCount: number;
}

/**
 * Concatenates completed segment temp files into the destination in range
 * order. A failed merge leaves the partial output and every temp file in place.
 */
export class Merger {
    private readonly bufferSize: number;

    constructor(bufferSize: number = MERGE_BUFFER_SIZE) {
        this.bufferSize = Math.max(1, bufferSize);
    }

    async combine(segments: readonly SegmentState[], outputPath: string): Promise<MergeResult> {
        if (segments.length === 0) {
            throw new MergeError("SegmentIncomplete", "no segments to merge");
        }

        const pending = segments.find(segment => segment.status !== "completed");
        if (pending) {
            throw new MergeError(
                "SegmentIncomplete",
                `segment ${pending.range.index} is ${pending.status}`
            );
        }

        const ordered = [...segments].sort((a, b) => a.range.index - b.range.index);
        let output: FileHandle | null = null;
        let bytesWritten = 0;

        try {
            await mkdir(dirname(outputPath), { recursive: true });
            output = await open(outputPath, "w");
            const buffer = Buffer.allocUnsafe(this.bufferSize);

            for (const segment of ordered) {
                const copied = await this.appendFile(
                    output,
                    segment.tempFilePath,
                    buffer,
                    bytesWritten
                );
                const expected = rangeLength(segment.range);
                bytesWritten += copied;

                if (copied !== expected) {
                    throw new MergeError(
                        "LengthMismatch",
                        `segment ${segment.range.index} holds ${copied} bytes, expected ${expected}`
                    );
                }
            }
        } catch (error) {
            if (error instanceof MergeError) throw error;
            throw new MergeError("IOFailure", toError(error, "Merge I/O failed").message, {
                cause: error,
            });
        } finally {
            if (output) await output.close();
        }

        for (const segment of ordered) await SegmentWriter.delete(segment.tempFilePath);

        return { outputPath, bytesWritten, segmentCount: ordered.length };
    }

    /** @returns number of bytes copied from `sourcePath` */
    private async appendFile(
        output: FileHandle,
        sourcePath: string,
        buffer: Buffer,
        position: number
    ): Promise<number> {
        const source = await open(sourcePath, "r");
        let copied = 0;

        try {
            while (true) {
                const { bytesRead } = await source.read(buffer, 0, buffer.length, copied);
                if (bytesRead === 0) break;

                let offset = 0;
                while (offset < bytesRead) {
                    const { bytesWritten } = await output.write(
                        buffer,
                        offset,
                        bytesRead - offset,
                        position + copied + offset
                    );
                    offset += bytesWritten;
                }
                copied += bytesRead;
            }
        } finally {
            await source.close();
        }

        return copied;
    }
}
