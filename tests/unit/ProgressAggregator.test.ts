import { beforeEach, describe, expect, test } from "vitest";
import { ProgressAggregator } from "@/core";

describe("ProgressAggregator", () => {
    let clock = 0;
    let aggregator: ProgressAggregator;

    beforeEach(() => {
        clock = 0;
        aggregator = new ProgressAggregator({
            totalBytes: 2000,
            segmentCount: 2,
            sampleIntervalMs: 1000,
            now: () => clock,
        });
    });

    test("starts empty with every segment at zero", () => {
        expect(aggregator.snapshot()).toEqual({
            totalBytes: 2000,
            downloadedBytes: 0,
            percent: 0,
            speedBytesPerSec: 0,
            etaSeconds: 0,
            perSegmentPercent: { 0: 0, 1: 0 },
        });
    });

    test("returns the running total from addBytes", () => {
        expect(aggregator.addBytes(300)).toBe(300);
        expect(aggregator.addBytes(200)).toBe(500);
        expect(aggregator.downloaded).toBe(500);
    });

    test("measures speed once the sample window has elapsed", () => {
        aggregator.addBytes(500);

        clock = 400;
        expect(aggregator.snapshot().speedBytesPerSec).toBe(0);

        clock = 1000;
        const progress = aggregator.snapshot();
        expect(progress.downloadedBytes).toBe(500);
        expect(progress.percent).toBe(25);
        expect(progress.speedBytesPerSec).toBe(500);
        expect(progress.etaSeconds).toBe(3);
    });

    test("keeps the previous speed until the next window closes", () => {
        aggregator.addBytes(500);
        clock = 1000;
        aggregator.snapshot();

        aggregator.addBytes(1000);
        clock = 1500;
        expect(aggregator.snapshot().speedBytesPerSec).toBe(500);

        clock = 2000;
        expect(aggregator.snapshot().speedBytesPerSec).toBe(1000);
    });

    test("never reports more than the total", () => {
        aggregator.addBytes(5000);

        const progress = aggregator.snapshot();
        expect(progress.downloadedBytes).toBe(2000);
        expect(progress.percent).toBe(100);
        expect(progress.etaSeconds).toBe(0);
    });

    test("never decreases", () => {
        const seen: number[] = [];
        for (const bytes of [100, 0, 250, 50, 1600]) {
            aggregator.addBytes(bytes);
            seen.push(aggregator.snapshot().downloadedBytes);
        }

        expect(seen).toEqual([100, 100, 350, 400, 2000]);
    });

    test("rejects negative and fractional increments", () => {
        expect(() => aggregator.addBytes(-1)).toThrow(RangeError);
        expect(() => aggregator.addBytes(1.5)).toThrow(RangeError);
        expect(aggregator.downloaded).toBe(0);
    });

    test("clamps per-segment percentages", () => {
        aggregator.setSegmentPercent(0, 150);
        aggregator.setSegmentPercent(1, -3);

        expect(aggregator.snapshot().perSegmentPercent).toEqual({ 0: 100, 1: 0 });
    });
});
