export {
    ControlSignal,
    DownloadManager,
    ProgressAggregator,
    SegmentWorker,
    planRanges,
    rangeLength,
} from "@/core";
export { Merger } from "@/storage";
export {
    DownloadError,
    MergeError,
    PlanError,
    ProbeError,
    SegmentError,
    classifyNetworkError,
    isDownloadError,
} from "@/errors";
export type { MergeErrorKind, PlanErrorKind, ProbeErrorKind, SegmentErrorKind } from "@/errors";
export { DownloadManagerEventName } from "@/types";
export type {
    AggregateProgress,
    ByteRange,
    DownloadJob,
    DownloadManagerOptions,
    DownloadRequest,
    DownloadResult,
    DownloadState,
    ProbeResult,
    SegmentState,
    SegmentStatus,
} from "@/types";
