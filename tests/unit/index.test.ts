import { describe, expect, test } from "vitest";
import { join } from "path";
import { DownloadManager, segmentTempPath } from "@/core";
import { DownloadManagerEventName, type DownloadJob } from "@/types";

const job: DownloadJob = {
    id: "job1",
    url: "https://example.com/file.bin",
    destinationPath: join("/downloads", "out", "file.bin"),
    segmentCount: 4,
    acceptsRanges: true,
};

describe("segmentTempPath", () => {
    test("places temp files next to the destination by default", () => {
        expect(segmentTempPath(job, 2, null)).toBe(
            join("/downloads", "out", "file.bin.job1.part2")
        );
    });

    test("uses the configured temp directory", () => {
        expect(segmentTempPath(job, 0, join("/var", "tmp"))).toBe(
            join("/var", "tmp", "file.bin.job1.part0")
        );
    });
});

describe("DownloadManager", () => {
    test("starts idle", () => {
        const manager = new DownloadManager();

        expect(manager.currentState()).toBe("idle");
        expect(manager.currentJob()).toBeNull();
        expect(manager.progress()).toBeNull();
        expect(manager.getSegments()).toEqual([]);
        expect(manager.isActive()).toBe(false);
    });

    test("ignores control calls while idle", () => {
        const manager = new DownloadManager();
        const events: string[] = [];
        manager.on(DownloadManagerEventName.Pause, () => events.push("pause"));
        manager.on(DownloadManagerEventName.Stop, () => events.push("stop"));

        expect(manager.pause()).toBe(false);
        expect(manager.resume()).toBe(false);
        expect(manager.stop()).toBe(false);
        expect(events).toEqual([]);
    });

    test("rejects invalid options", () => {
        expect(() => new DownloadManager({ segments: 0 })).toThrow(
            "Invalid value for segments: 0"
        );
        expect(() => new DownloadManager({ chunkSize: "lots" })).toThrow(
            "Invalid size format: lots"
        );
    });

    test("rejects an invalid per-request segment count", async () => {
        const manager = new DownloadManager();

        await expect(
            manager.start({ url: "http://127.0.0.1:9/file.bin", segmentCount: 0 })
        ).rejects.toThrow("Invalid segment count: 0");
        expect(manager.currentState()).toBe("idle");
    });
});
