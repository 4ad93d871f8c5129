export { ControlSignal } from "./ControlSignal";
export { DownloadManager, segmentTempPath } from "./DownloadManager";
export { ProgressAggregator } from "./ProgressAggregator";
export type { ProgressAggregatorOptions } from "./ProgressAggregator";
export { planRanges, rangeLength } from "./RangePlanner";
export { SegmentWorker } from "./SegmentWorker";
export type { SegmentOutcome, SegmentWorkerOptions } from "./SegmentWorker";
