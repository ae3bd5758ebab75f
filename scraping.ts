import { FetchError, errorMessage } from "./errors";
import { HtmlDocument } from "./html";
import { sleep } from "./utils";

/**
 * The one I/O primitive the collectors use: GET a URL, return the body.
 */
export interface PageFetcher {
    fetchText(url: string): Promise<string>;
}

export interface HttpFetcherOptions {
    /** Per-attempt timeout. Default: 15000 */
    timeoutMs?: number;
    /** Attempts per URL, including the first. Default: 3 */
    maxAttempts?: number;
    /** Base delay before a retry, doubled each time. Default: 500 */
    backoffMs?: number;
    userAgent?: string;
}

const isRetryableStatus = (status: number) => status === 429 || status >= 500;

export class HttpPageFetcher implements PageFetcher {
    private readonly timeoutMs: number;
    private readonly maxAttempts: number;
    private readonly backoffMs: number;
    private readonly userAgent: string;

    constructor(options: HttpFetcherOptions = {}) {
        this.timeoutMs = options.timeoutMs ?? 15000;
        this.maxAttempts = options.maxAttempts ?? 3;
        this.backoffMs = options.backoffMs ?? 500;
        this.userAgent = options.userAgent ?? "Mozilla/5.0 (compatible; campus-dining-api)";
    }

    async fetchText(url: string): Promise<string> {
        let lastError: FetchError | null = null;

        for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
            try {
                return await this.attempt(url);
            } catch (error) {
                lastError =
                    error instanceof FetchError
                        ? error
                        : new FetchError(`Failed to fetch ${url}: ${errorMessage(error)}`, url, null, true, {
                              cause: error,
                          });

                if (!lastError.retryable || attempt === this.maxAttempts) {
                    break;
                }

                const delay = this.backoffMs * 2 ** (attempt - 1);
                console.warn(`[Fetch] ${lastError.message}; retrying in ${delay}ms (attempt ${attempt + 1}/${this.maxAttempts})`);
                await sleep(delay);
            }
        }

        throw lastError ?? new FetchError(`Failed to fetch ${url}`, url);
    }

    private async attempt(url: string): Promise<string> {
        const response = await fetch(url, {
            headers: { "User-Agent": this.userAgent },
            redirect: "follow",
            signal: AbortSignal.timeout(this.timeoutMs),
        });

        if (!response.ok) {
            throw new FetchError(
                `Failed to fetch ${url}: Status ${response.status}`,
                url,
                response.status,
                isRetryableStatus(response.status)
            );
        }

        return response.text();
    }
}

export async function fetchDocument(fetcher: PageFetcher, url: string): Promise<HtmlDocument> {
    const html = await fetcher.fetchText(url);
    return HtmlDocument.parse(html);
}
