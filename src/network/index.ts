export {
    HttpClient,
    acceptsByteRanges,
    parseContentLength,
    parseContentRange,
} from "./HttpClient";
export type { ContentRange, ResponseStream } from "./HttpClient";
