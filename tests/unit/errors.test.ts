import { describe, expect, test } from "vitest";
import {
    MergeError,
    ProbeError,
    SegmentError,
    classifyNetworkError,
    isDownloadError,
} from "@/errors";

function withCode(code: string): Error {
    return Object.assign(new Error(code), { code });
}

describe("download errors", () => {
    test("carry their kind in the message", () => {
        const error = new SegmentError("IOFailure", 2, "disk full");

        expect(error.message).toBe("Segment 2 failed (IOFailure): disk full");
        expect(error.name).toBe("SegmentError");
        expect(error.segmentIndex).toBe(2);
        expect(error.detail).toBe("disk full");
    });

    test("keep the cause", () => {
        const cause = withCode("ECONNREFUSED");
        const error = new ProbeError("Unreachable", "connection refused", { cause });

        expect(error.cause).toBe(cause);
        expect(error.message).toBe("Probe failed (Unreachable): connection refused");
    });

    test("are recognised by isDownloadError", () => {
        expect(isDownloadError(new MergeError("LengthMismatch", "short"))).toBe(true);
        expect(isDownloadError(new Error("plain"))).toBe(false);
        expect(isDownloadError("string")).toBe(false);
    });
});

describe("classifyNetworkError", () => {
    test("maps resolver failures to DNSFailure", () => {
        expect(classifyNetworkError(withCode("ENOTFOUND"))).toBe("DNSFailure");
        expect(classifyNetworkError(withCode("EAI_AGAIN"))).toBe("DNSFailure");
    });

    test("maps timeouts to TimeoutExceeded", () => {
        expect(classifyNetworkError(withCode("ETIMEDOUT"))).toBe("TimeoutExceeded");

        const timeout = new Error("Timeout awaiting 'response' for 30000ms");
        timeout.name = "TimeoutError";
        expect(classifyNetworkError(timeout)).toBe("TimeoutExceeded");
    });

    test("maps certificate and handshake failures to TLSFailure", () => {
        expect(classifyNetworkError(withCode("CERT_HAS_EXPIRED"))).toBe("TLSFailure");
        expect(classifyNetworkError(withCode("ERR_TLS_CERT_ALTNAME_INVALID"))).toBe("TLSFailure");
        expect(classifyNetworkError(withCode("ERR_SSL_WRONG_VERSION_NUMBER"))).toBe("TLSFailure");
    });

    test("treats anything else as a connection failure", () => {
        expect(classifyNetworkError(withCode("ECONNRESET"))).toBe("ConnectionFailed");
        expect(classifyNetworkError(new Error("socket hang up"))).toBe("ConnectionFailed");
        expect(classifyNetworkError(undefined)).toBe("ConnectionFailed");
    });
});
