#!/usr/bin/env node

import { resolve } from "path";
import { Command } from "commander";
import { DownloadManager } from "@/core";
import type { AggregateProgress, DownloadJob, DownloadResult, SegmentState } from "@/types";
import { DownloadManagerEventName } from "@/types";
import type { SegmentError } from "@/errors";
import { extractFilename, formatBytes, formatDuration, parseHeaders } from "@/utils/common";
import {
    EXIT_CODE_FAILED,
    EXIT_CODE_STOPPED,
    JOB_TAG_LENGTH,
    JOB_TAG_PREFIX,
} from "@/utils/constants";
import { log, parseLogLevel } from "@/utils/logger";
import { createSignalHandlers } from "./signals";

interface CliOptions {
    output?: string;
    dir: string;
    segments: string;
    chunkSize: string;
    timeout: string;
    header?: string[];
    tempDir?: string;
    failFast: boolean;
    logLevel: string;
    verbose?: boolean;
}

function parseNumberOption(value: string, optionName: string): number {
    const parsed = Number.parseInt(value, 10);
    if (!Number.isFinite(parsed) || parsed <= 0) {
        throw new Error(`Invalid value for ${optionName}: ${value}`);
    }
    return parsed;
}

function exitCodeFor(result: DownloadResult): number {
    if (result.state === "completed") return 0;
    return result.state === "stopped" ? EXIT_CODE_STOPPED : EXIT_CODE_FAILED;
}

const program = new Command();

program
    .name("splitget")
    .description("splitget - segmented parallel HTTP downloader")
    .version("0.1.0")
    .argument("<url>", "URL to download")
    .option("-o, --output <file>", "Output file (defaults to the URL's file name)")
    .option("-d, --dir <dir>", "Output directory when --output is not given", ".")
    .option("-s, --segments <number>", "Download the file as N parallel segments", "4")
    .option("-k, --chunk-size <size>", "Write block size (e.g. 64KB, 1MB)", "64KB")
    .option("--timeout <ms>", "Time to wait for response headers", "30000")
    .option("-H, --header <header...>", 'Extra request header, "Name: value"')
    .option("--temp-dir <dir>", "Directory for segment temp files")
    .option("--no-fail-fast", "Let other segments finish after one fails")
    .option("--log-level <level>", "Set log level (debug, info, warn, error, silent)", "info")
    .option("-v, --verbose", "Alias for --log-level debug")
    .action(async (url: string, options: CliOptions) => {
        log.setLevel(parseLogLevel(options.verbose ? "debug" : options.logLevel));
        log.debug(`Options: ${JSON.stringify(options)}`);

        const destinationPath = options.output
            ? resolve(options.output)
            : resolve(options.dir, extractFilename(url));

        const manager = new DownloadManager({
            segments: parseNumberOption(options.segments, "--segments"),
            chunkSize: options.chunkSize,
            timeout: parseNumberOption(options.timeout, "--timeout"),
            headers: parseHeaders(options.header),
            tempDirectory: options.tempDir ? resolve(options.tempDir) : null,
            failFast: options.failFast,
        });

        let tag = JOB_TAG_PREFIX;
        const seenRedirects = new Set<string>();

        manager.on(DownloadManagerEventName.Start, (job: DownloadJob, segments: SegmentState[]) => {
            tag = JOB_TAG_PREFIX + job.id.replace(/-/g, "").slice(0, JOB_TAG_LENGTH);
            log.info(
                `Downloading ${formatBytes(job.totalSize ?? 0)} in ${segments.length} segment(s)`
            );
        });

        manager.on(DownloadManagerEventName.Progress, (progress: AggregateProgress) => {
            const connections = manager
                .getSegments()
                .filter(segment => segment.status === "running").length;

            const downloaded = formatBytes(progress.downloadedBytes);
            const total = formatBytes(progress.totalBytes);

            log.progress({
                tag,
                progressText: `${downloaded}/${total}(${progress.percent.toFixed(1)}%)`,
                connections,
                speedText:
                    progress.speedBytesPerSec > 0
                        ? `${formatBytes(progress.speedBytesPerSec)}/s`
                        : "--",
                etaText: formatDuration(progress.etaSeconds),
                paused: manager.currentState() === "paused",
            });
        });

        manager.on(DownloadManagerEventName.Redirect, (_fromUrl: string, toUrl: string) => {
            if (seenRedirects.has(toUrl)) return;
            seenRedirects.add(toUrl);
            log.info(`Redirecting to ${toUrl}`);
        });

        manager.on(
            DownloadManagerEventName.SegmentError,
            (segment: SegmentState, error: SegmentError) => {
                log.warn(`Segment ${segment.range.index} failed: ${error.detail}`);
            }
        );

        manager.on(DownloadManagerEventName.Pause, () => log.info("Paused"));
        manager.on(DownloadManagerEventName.Resume, () => log.info("Resumed"));

        const { interrupt, togglePause } = createSignalHandlers(manager, code =>
            process.exit(code)
        );

        process.on("SIGINT", interrupt);
        process.on("SIGUSR1", togglePause);

        try {
            const result = await manager.start({ url, destinationPath });
            log.stopProgress();

            if (result.state === "completed") {
                const elapsed = result.elapsedMs / 1000;
                const totalSize = result.job.totalSize ?? 0;
                const avgSpeed = elapsed > 0 ? `${formatBytes(totalSize / elapsed)}/s` : "--";
                log.success(
                    `Download complete: ${formatBytes(totalSize)} in ${formatDuration(elapsed)} (${avgSpeed})`
                );
                log.info(`Saved to: ${destinationPath}`);
            } else if (result.state === "stopped") {
                log.info(`Download stopped; segment files kept next to ${destinationPath}`);
            } else {
                log.error(result.error?.message ?? "Download failed");
            }

            process.exitCode = exitCodeFor(result);
        } finally {
            process.off("SIGINT", interrupt);
            process.off("SIGUSR1", togglePause);
        }
    });

program.parseAsync().catch((error: unknown) => {
    log.stopProgress();
    log.error(error instanceof Error ? error.message : String(error));
    process.exitCode = EXIT_CODE_FAILED;
});
