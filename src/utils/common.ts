/**
 * Common utility functions shared across the codebase
 */
import { DEFAULT_FILENAME } from "./constants";

/**
 * Extract filename from URL
 */
export function extractFilename(url: string): string {
    try {
        const urlObj = new URL(url);
        const filename = urlObj.pathname.split("/").pop() || DEFAULT_FILENAME;
        return decodeURIComponent(filename);
    } catch {
        return DEFAULT_FILENAME;
    }
}

/**
 * Format bytes to human-readable string
 */
export function formatBytes(bytes: number): string {
    if (!Number.isFinite(bytes) || bytes <= 0) return "0B";
    const k = 1024;
    const sizes = ["B", "KiB", "MiB", "GiB", "TiB"];
    const i = Math.min(Math.floor(Math.log(bytes) / Math.log(k)), sizes.length - 1);
    return parseFloat((bytes / Math.pow(k, i)).toFixed(2)) + sizes[i];
}

/**
 * Format duration in seconds to human-readable string
 */
export function formatDuration(seconds: number): string {
    if (!Number.isFinite(seconds) || seconds < 0) return "--";
    if (seconds < 0.5) return "<1s";

    if (seconds < 60) return `${Math.floor(seconds)}s`;

    const minutes = Math.floor(seconds / 60);
    const secs = Math.floor(seconds % 60);

    if (minutes < 60) return secs > 0 ? `${minutes}m${secs}s` : `${minutes}m`;

    const hours = Math.floor(minutes / 60);
    const mins = minutes % 60;
    return mins > 0 ? `${hours}h${mins}m` : `${hours}h`;
}

/**
 * Helper to ignore ENOENT errors in file operations
 */
export function ignoreFileNotFound(error: unknown): boolean {
    return typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT";
}

/**
 * Convert unknown error to Error instance
 */
export function toError(error: unknown, defaultMessage: string): Error {
    return error instanceof Error ? error : new Error(`${defaultMessage}: ${String(error)}`);
}

/**
 * Parse repeated `"Name: value"` header options into a header record
 */
export function parseHeaders(values: string[] = []): Record<string, string> {
    const headers: Record<string, string> = {};

    for (const value of values) {
        const separator = value.indexOf(":");
        if (separator <= 0) throw new Error(`Invalid header (expected "Name: value"): ${value}`);
        headers[value.slice(0, separator).trim()] = value.slice(separator + 1).trim();
    }

    return headers;
}
