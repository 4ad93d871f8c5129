export type ProbeErrorKind = "Unreachable" | "UnexpectedStatus" | "NoContentLength" | "EmptyResource";

export type PlanErrorKind = "InvalidSize" | "InvalidSegmentCount";

export type SegmentErrorKind =
    | "ConnectionFailed"
    | "TimeoutExceeded"
    | "TLSFailure"
    | "DNSFailure"
    | "UnexpectedStatus"
    | "ByteCountMismatch"
    | "IOFailure";

export type MergeErrorKind = "LengthMismatch" | "IOFailure" | "SegmentIncomplete";

/**
 * Base class of every error a download can end with. `kind` names the failure
 * class, `detail` carries the human-readable specifics.
 */
export abstract class DownloadError extends Error {
    abstract readonly kind: string;
    readonly detail: string;

    protected constructor(message: string, detail: string, options?: ErrorOptions) {
        super(message, options);
        this.name = new.target.name;
        this.detail = detail;
    }
}

export class ProbeError extends DownloadError {
    readonly kind: ProbeErrorKind;

    constructor(kind: ProbeErrorKind, detail: string, options?: ErrorOptions) {
        super(`Probe failed (${kind}): ${detail}`, detail, options);
        this.kind = kind;
    }
}

export class PlanError extends DownloadError {
    readonly kind: PlanErrorKind;

    constructor(kind: PlanErrorKind, detail: string) {
        super(`Invalid plan (${kind}): ${detail}`, detail);
        this.kind = kind;
    }
}

export class SegmentError extends DownloadError {
    readonly kind: SegmentErrorKind;
    readonly segmentIndex: number;

    constructor(
        kind: SegmentErrorKind,
        segmentIndex: number,
        detail: string,
        options?: ErrorOptions
    ) {
        super(`Segment ${segmentIndex} failed (${kind}): ${detail}`, detail, options);
        this.kind = kind;
        this.segmentIndex = segmentIndex;
    }
}

export class MergeError extends DownloadError {
    readonly kind: MergeErrorKind;

    constructor(kind: MergeErrorKind, detail: string, options?: ErrorOptions) {
        super(`Merge failed (${kind}): ${detail}`, detail, options);
        this.kind = kind;
    }
}

const DNS_ERROR_CODES = new Set(["ENOTFOUND", "EAI_AGAIN", "EAI_FAIL", "EAI_NONAME"]);
const TIMEOUT_ERROR_CODES = new Set(["ETIMEDOUT", "ESOCKETTIMEDOUT"]);
const TLS_ERROR_CODES = new Set([
    "EPROTO",
    "CERT_HAS_EXPIRED",
    "CERT_NOT_YET_VALID",
    "DEPTH_ZERO_SELF_SIGNED_CERT",
    "SELF_SIGNED_CERT_IN_CHAIN",
    "UNABLE_TO_VERIFY_LEAF_SIGNATURE",
    "UNABLE_TO_GET_ISSUER_CERT_LOCALLY",
]);

export function errorCode(error: unknown): string | undefined {
    if (typeof error === "object" && error !== null && "code" in error) {
        return typeof error.code === "string" ? error.code : undefined;
    }
    return undefined;
}

/**
 * Map a transport failure to the segment error kind it represents. Anything
 * that is not recognisably DNS, TLS or a timeout counts as a connection failure.
 */
export function classifyNetworkError(error: unknown): SegmentErrorKind {
    const code = errorCode(error);

    if (code) {
        if (DNS_ERROR_CODES.has(code)) return "DNSFailure";
        if (TIMEOUT_ERROR_CODES.has(code)) return "TimeoutExceeded";
        if (TLS_ERROR_CODES.has(code) || code.startsWith("ERR_TLS_") || code.startsWith("ERR_SSL_"))
            return "TLSFailure";
    }

    if (error instanceof Error && error.name === "TimeoutError") return "TimeoutExceeded";
    return "ConnectionFailed";
}

export function isDownloadError(error: unknown): error is DownloadError {
    return error instanceof DownloadError;
}
