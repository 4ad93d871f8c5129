export { SegmentWriter } from "./SegmentWriter";
export { Merger } from "./Merger";
export type { MergeResult } from "./Merger";
