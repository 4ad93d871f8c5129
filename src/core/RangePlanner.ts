import { PlanError } from "@/errors";
import type { ByteRange } from "@/types";

export function rangeLength(range: ByteRange): number {
    return range.end - range.start + 1;
}

/**
 * Split `[0, totalSize - 1]` into contiguous ranges of equal length; the last
 * range also takes the `totalSize % count` remainder. The count drops to
 * `totalSize` when there are fewer bytes than requested segments.
 */
export function planRanges(totalSize: number, segmentCount: number): ByteRange[] {
    if (!Number.isSafeInteger(totalSize) || totalSize <= 0) {
        throw new PlanError("InvalidSize", `total size must be a positive integer, got ${totalSize}`);
    }
    if (!Number.isSafeInteger(segmentCount) || segmentCount < 1) {
        throw new PlanError(
            "InvalidSegmentCount",
            `segment count must be an integer >= 1, got ${segmentCount}`
        );
    }

    const count = Math.min(segmentCount, totalSize);
    const base = Math.floor(totalSize / count);
    const ranges: ByteRange[] = [];

    for (let index = 0; index < count; index++) {
        const start = index * base;
        const end = index === count - 1 ? totalSize - 1 : start + base - 1;
        ranges.push({ index, start, end });
    }

    return ranges;
}
