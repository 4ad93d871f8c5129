import { describe, expect, test } from "vitest";
import { DEFAULT_OPTIONS, parseByteSize, resolveOptions } from "@/config";

describe("parseByteSize", () => {
    test("passes numbers through", () => {
        expect(parseByteSize(65536)).toBe(65536);
    });

    test("reads binary units", () => {
        expect(parseByteSize("64KB")).toBe(65536);
        expect(parseByteSize("1.5 MiB")).toBe(1572864);
        expect(parseByteSize("2gb")).toBe(2147483648);
    });

    test("treats a bare number as bytes", () => {
        expect(parseByteSize("512")).toBe(512);
    });

    test("rejects malformed sizes", () => {
        expect(() => parseByteSize("abc")).toThrow("Invalid size format: abc");
        expect(() => parseByteSize("5XB")).toThrow("Invalid unit in size: 5XB");
    });
});

describe("resolveOptions", () => {
    test("fills every option from the defaults", () => {
        expect(resolveOptions()).toEqual({ ...DEFAULT_OPTIONS, chunkSize: 65536 });
    });

    test("merges headers and parses the chunk size", () => {
        const options = resolveOptions({
            chunkSize: "1KB",
            headers: { Authorization: "Bearer test-token" },
        });

        expect(options.chunkSize).toBe(1024);
        expect(options.headers).toEqual({ Authorization: "Bearer test-token" });
    });

    test("rejects non-positive numeric options", () => {
        expect(() => resolveOptions({ segments: 0 })).toThrow("Invalid value for segments: 0");
        expect(() => resolveOptions({ chunkSize: "0KB" })).toThrow(
            "Invalid value for chunkSize: 0"
        );
        expect(() => resolveOptions({ timeout: -1 })).toThrow("Invalid value for timeout: -1");
    });

    test("clamps redirects at zero", () => {
        expect(resolveOptions({ maxRedirects: -3 }).maxRedirects).toBe(0);
    });
});
