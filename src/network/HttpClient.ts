import type { IncomingHttpHeaders } from "http";
import got, { type Got, type Request, type Response } from "got";
import { ProbeError } from "@/errors";
import type { ByteRange, ProbeResult } from "@/types";
import { toError } from "@/utils/common";

interface HttpClientOptions {
    timeout: number;
    connectTimeout: number;
    maxRedirects: number;
    headers?: Record<string, string>;
    onRedirect?: (fromUrl: string, toUrl: string) => void;
}

export interface ResponseStream {
    stream: Request;
    statusCode: number;
    headers: IncomingHttpHeaders;
    url: string;
}

export interface ContentRange {
    start: number;
    end: number;
    total: number | null;
}

function isSuccess(statusCode: number): boolean {
    return statusCode >= 200 && statusCode < 300;
}

export function parseContentLength(value: string | undefined): number | null {
    if (value === undefined || !/^\d+$/.test(value.trim())) return null;
    return Number.parseInt(value, 10);
}

export function parseContentRange(value: string | undefined): ContentRange | null {
    const match = value ? /^bytes\s+(\d+)-(\d+)\/(\d+|\*)$/i.exec(value.trim()) : null;
    if (!match) return null;

    return {
        start: Number.parseInt(match[1], 10),
        end: Number.parseInt(match[2], 10),
        total: match[3] === "*" ? null : Number.parseInt(match[3], 10),
    };
}

export function acceptsByteRanges(value: string | undefined): boolean {
    return (value ?? "")
        .split(",")
        .some(unit => unit.trim().toLowerCase() === "bytes");
}

export class HttpClient {
    private client: Got;

    constructor(options: HttpClientOptions) {
        this.client = got.extend({
            // Failed segments are reported, never re-requested
            retry: { limit: 0 },
            timeout: {
                connect: options.connectTimeout,
                response: options.timeout,
            },
            headers: options.headers,
            followRedirect: options.maxRedirects > 0,
            maxRedirects: options.maxRedirects,
            hooks: {
                beforeRedirect: [
                    (nextOptions, response) => {
                        const fromUrl = String(response.url ?? "");
                        const toUrl = String(nextOptions.url ?? "");
                        if (fromUrl && toUrl && fromUrl !== toUrl)
                            options.onRedirect?.(fromUrl, toUrl);
                    },
                ],
            },
        });
    }

    /**
     * Learn size and range support. Some servers answer HEAD without a
     * Content-Length (or not at all), so the probe then repeats as a GET and
     * reads only the headers.
     */
    async probe(url: string, signal?: AbortSignal): Promise<ProbeResult> {
        let statusCode: number;
        let headers: IncomingHttpHeaders;
        let finalUrl: string;

        try {
            // Same encoding as the segment requests, so the size matches the bytes fetched
            const head = await this.client.head(url, {
                signal,
                decompress: false,
                throwHttpErrors: false,
            });
            ({ statusCode, headers } = head);
            finalUrl = head.url;

            if (!isSuccess(statusCode) || parseContentLength(headers["content-length"]) === null) {
                const fallback = await this.openStream(url, {}, signal);
                fallback.stream.destroy();
                ({ statusCode, headers } = fallback);
                finalUrl = fallback.url;
            }
        } catch (error) {
            throw new ProbeError("Unreachable", toError(error, "Request failed").message, {
                cause: error,
            });
        }

        if (!isSuccess(statusCode)) {
            throw new ProbeError("UnexpectedStatus", `server answered ${statusCode} for ${url}`);
        }

        const totalSize = parseContentLength(headers["content-length"]);
        if (totalSize === null) {
            throw new ProbeError("NoContentLength", `server did not report a size for ${url}`);
        }
        if (totalSize === 0) {
            throw new ProbeError("EmptyResource", `server reported an empty body for ${url}`);
        }

        return {
            url: finalUrl,
            totalSize,
            acceptsRanges: acceptsByteRanges(headers["accept-ranges"]),
            statusCode,
        };
    }

    /**
     * GET one byte range, or the whole resource when `range` is null. Resolves
     * once response headers arrive; the body is left unread in `stream`.
     */
    async openSegmentStream(
        url: string,
        range: ByteRange | null,
        signal?: AbortSignal
    ): Promise<ResponseStream> {
        const headers: Record<string, string> = range
            ? { Range: `bytes=${range.start}-${range.end}` }
            : {};
        return this.openStream(url, headers, signal);
    }

    private openStream(
        url: string,
        headers: Record<string, string>,
        signal?: AbortSignal
    ): Promise<ResponseStream> {
        const stream = this.client.stream(url, {
            headers,
            signal,
            decompress: false,
            throwHttpErrors: false,
        });

        return new Promise<ResponseStream>((resolve, reject) => {
            // Stays attached after the response so a body error before the
            // consumer starts reading cannot go unhandled; the reader sees it too.
            stream.once("error", reject);
            stream.once("response", (response: Response) => {
                resolve({
                    stream,
                    statusCode: response.statusCode,
                    headers: response.headers,
                    url: response.url,
                });
            });
        });
    }
}
