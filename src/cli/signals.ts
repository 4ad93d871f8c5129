import type { DownloadManager } from "@/core";
import { EXIT_CODE_STOPPED } from "@/utils/constants";
import { log } from "@/utils/logger";

type ControllableDownload = Pick<DownloadManager, "stop" | "pause" | "resume">;

export interface SignalHandlers {
    interrupt: () => void;
    togglePause: () => void;
}

/**
 * The first interrupt asks the download to stop and waits for the segments to
 * settle; a second one exits at once in case a connection hangs.
 */
export function createSignalHandlers(
    download: ControllableDownload,
    exit: (code: number) => void
): SignalHandlers {
    return {
        interrupt: () => {
            log.stopProgress();
            if (download.stop()) {
                log.info("Stopping; waiting for segments to settle (Ctrl+C again to quit)...");
                return;
            }
            log.warn("Interrupted again; exiting without waiting");
            exit(EXIT_CODE_STOPPED);
        },
        togglePause: () => {
            if (!download.pause()) download.resume();
        },
    };
}
