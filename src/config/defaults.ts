import type { DownloadManagerOptions } from "@/types";
import {
    DEFAULT_CHUNK_SIZE_BYTES,
    DEFAULT_CONNECT_TIMEOUT_MS,
    DEFAULT_SEGMENT_COUNT,
    DEFAULT_TIMEOUT_MS,
    MAX_REDIRECTS,
    PROGRESS_UPDATE_INTERVAL_MS,
    SPEED_SAMPLE_WINDOW_MS,
} from "@/utils/constants";

export type ResolvedOptions = Omit<Required<DownloadManagerOptions>, "chunkSize"> & {
    chunkSize: number;
};

export const DEFAULT_OPTIONS: Required<DownloadManagerOptions> = {
    segments: DEFAULT_SEGMENT_COUNT,
    chunkSize: DEFAULT_CHUNK_SIZE_BYTES,
    timeout: DEFAULT_TIMEOUT_MS,
    connectTimeout: DEFAULT_CONNECT_TIMEOUT_MS,
    headers: {},
    maxRedirects: MAX_REDIRECTS,
    tempDirectory: null,
    progressInterval: PROGRESS_UPDATE_INTERVAL_MS,
    speedSampleInterval: SPEED_SAMPLE_WINDOW_MS,
    failFast: true,
};

const SIZE_UNITS: Record<string, number> = {
    B: 1,
    KB: 1024,
    KIB: 1024,
    MB: 1024 * 1024,
    MIB: 1024 * 1024,
    GB: 1024 * 1024 * 1024,
    GIB: 1024 * 1024 * 1024,
};

/**
 * Parse a byte count such as `65536`, `"64KB"` or `"1.5 MiB"` (binary units).
 */
export function parseByteSize(size: number | string): number {
    if (typeof size === "number") return size;

    const match = size.trim().match(/^(\d+(?:\.\d+)?)\s*([a-z]*)$/i);
    if (!match) throw new Error(`Invalid size format: ${size}`);

    const value = parseFloat(match[1]);
    const unit = (match[2] || "B").toUpperCase();
    const multiplier = SIZE_UNITS[unit];

    if (multiplier === undefined) throw new Error(`Invalid unit in size: ${size}`);

    return Math.floor(value * multiplier);
}

function requirePositiveInteger(value: number, name: string): number {
    if (!Number.isSafeInteger(value) || value <= 0) {
        throw new Error(`Invalid value for ${name}: ${value}`);
    }
    return value;
}

export function mergeOptions(options?: DownloadManagerOptions): Required<DownloadManagerOptions> {
    return {
        ...DEFAULT_OPTIONS,
        ...options,
        headers: {
            ...DEFAULT_OPTIONS.headers,
            ...options?.headers,
        },
    };
}

/**
 * Merge user options over the defaults and validate the numeric ones.
 */
export function resolveOptions(options?: DownloadManagerOptions): ResolvedOptions {
    const merged = mergeOptions(options);

    return {
        ...merged,
        segments: requirePositiveInteger(merged.segments, "segments"),
        chunkSize: requirePositiveInteger(parseByteSize(merged.chunkSize), "chunkSize"),
        timeout: requirePositiveInteger(merged.timeout, "timeout"),
        connectTimeout: requirePositiveInteger(merged.connectTimeout, "connectTimeout"),
        progressInterval: requirePositiveInteger(merged.progressInterval, "progressInterval"),
        speedSampleInterval: requirePositiveInteger(
            merged.speedSampleInterval,
            "speedSampleInterval"
        ),
        maxRedirects: Math.max(0, Math.floor(merged.maxRedirects)),
    };
}
