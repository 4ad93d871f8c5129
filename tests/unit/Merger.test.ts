import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { mkdtemp, readFile, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { MergeError } from "@/errors";
import { Merger, SegmentWriter } from "@/storage";
import type { SegmentState } from "@/types";

describe("Merger", () => {
    let testDir = "";

    beforeEach(async () => {
        testDir = await mkdtemp(join(tmpdir(), "splitget-merger-"));
    });

    afterEach(async () => {
        await rm(testDir, { recursive: true, force: true });
    });

    async function segment(index: number, start: number, content: string): Promise<SegmentState> {
        const tempFilePath = join(testDir, `out.bin.job.part${index}`);
        await writeFile(tempFilePath, content);
        return {
            range: { index, start, end: start + content.length - 1 },
            bytesDownloaded: content.length,
            status: "completed",
            tempFilePath,
        };
    }

    test("concatenates segments in index order and removes the temp files", async () => {
        const first = await segment(0, 0, "hello ");
        const second = await segment(1, 6, "segmented ");
        const third = await segment(2, 16, "world");
        const outputPath = join(testDir, "nested", "out.bin");

        const result = await new Merger(4).combine([third, first, second], outputPath);

        expect(result).toEqual({ outputPath, bytesWritten: 21, segmentCount: 3 });
        expect(await readFile(outputPath, "utf-8")).toBe("hello segmented world");
        for (const { tempFilePath } of [first, second, third]) {
            expect(await SegmentWriter.exists(tempFilePath)).toEqual({ exists: false, size: 0 });
        }
    });

    test("reports a short temp file and keeps the partial output", async () => {
        const first = await segment(0, 0, "abcd");
        const second = await segment(1, 4, "efgh");
        second.range = { index: 1, start: 4, end: 9 };
        const outputPath = join(testDir, "out.bin");

        const merging = new Merger().combine([first, second], outputPath);

        await expect(merging).rejects.toBeInstanceOf(MergeError);
        await expect(merging).rejects.toMatchObject({ kind: "LengthMismatch" });
        expect(await readFile(outputPath, "utf-8")).toBe("abcdefgh");
        expect(await SegmentWriter.exists(first.tempFilePath)).toEqual({ exists: true, size: 4 });
        expect(await SegmentWriter.exists(second.tempFilePath)).toEqual({ exists: true, size: 4 });
    });

    test("refuses to merge while a segment is unfinished", async () => {
        const first = await segment(0, 0, "abcd");
        const second = await segment(1, 4, "ef");
        second.status = "stopped";
        const outputPath = join(testDir, "out.bin");

        await expect(new Merger().combine([first, second], outputPath)).rejects.toMatchObject({
            kind: "SegmentIncomplete",
            detail: "segment 1 is stopped",
        });
        expect(await SegmentWriter.exists(outputPath)).toEqual({ exists: false, size: 0 });
    });

    test("refuses an empty segment list", async () => {
        await expect(new Merger().combine([], join(testDir, "out.bin"))).rejects.toMatchObject({
            kind: "SegmentIncomplete",
        });
    });

    test("wraps a missing temp file as an I/O failure", async () => {
        const first = await segment(0, 0, "abcd");
        await rm(first.tempFilePath);

        await expect(
            new Merger().combine([first], join(testDir, "out.bin"))
        ).rejects.toMatchObject({ name: "MergeError", kind: "IOFailure" });
    });
});

describe("SegmentWriter", () => {
    let testDir = "";

    beforeEach(async () => {
        testDir = await mkdtemp(join(tmpdir(), "splitget-writer-"));
    });

    afterEach(async () => {
        await rm(testDir, { recursive: true, force: true });
    });

    test("appends blocks in order", async () => {
        const filePath = join(testDir, "deep", "file.part0");
        const writer = new SegmentWriter();

        await writer.open(filePath);
        await writer.write(Buffer.from("abc"));
        await writer.write(Buffer.from("defg"));
        await writer.close();

        expect(await readFile(filePath, "utf-8")).toBe("abcdefg");
    });

    test("truncates an existing file on open", async () => {
        const filePath = join(testDir, "file.part0");
        await writeFile(filePath, "stale contents");
        const writer = new SegmentWriter();

        await writer.open(filePath);
        await writer.write(Buffer.from("new"));
        await writer.close();

        expect(await readFile(filePath, "utf-8")).toBe("new");
    });

    test("rejects writes before open", async () => {
        await expect(new SegmentWriter().write(Buffer.from("x"))).rejects.toThrow("File not open");
    });

    test("deleting a missing file is not an error", async () => {
        await expect(SegmentWriter.delete(join(testDir, "missing"))).resolves.toBeUndefined();
    });
});
