/**
 * Application-wide constants
 */

// Segmentation
export const DEFAULT_SEGMENT_COUNT = 4; // Parallel range requests per download
export const DEFAULT_CHUNK_SIZE_BYTES = 64 * 1024; // Block size of temp-file writes

// Progress reporting
export const PROGRESS_UPDATE_INTERVAL_MS = 1000; // Cadence of aggregate progress events
export const SPEED_SAMPLE_WINDOW_MS = 1000; // Speed calculation window

// CLI display constants
export const JOB_TAG_LENGTH = 6; // Hex characters of the job id shown on the progress line
export const JOB_TAG_PREFIX = "#";

// File system constants
export const TEMP_FILE_EXTENSION = ".part"; // Suffix of per-segment temp files, followed by the index
export const MERGE_BUFFER_SIZE = 1024 * 1024; // 1MB copy buffer for the merge step
export const DEFAULT_FILENAME = "download";

// Network constants
export const DEFAULT_TIMEOUT_MS = 30000; // Wait for response headers (30s)
export const DEFAULT_CONNECT_TIMEOUT_MS = 10000;
export const MAX_REDIRECTS = 5; // Maximum HTTP redirects to follow

// Logging
export const LOG_LEVEL_TOKEN_WIDTH = "[PROGRESS]".length; // Width of log level tokens

// CLI exit codes
export const EXIT_CODE_FAILED = 1;
export const EXIT_CODE_STOPPED = 130; // 128 + SIGINT
