export { DEFAULT_OPTIONS, mergeOptions, parseByteSize, resolveOptions } from "./defaults";
export type { ResolvedOptions } from "./defaults";
