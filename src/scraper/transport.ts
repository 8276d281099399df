import Bottleneck from 'bottleneck';
import logger from '../util/logger';
import { retryOperation } from '../util/retry';

export interface PageResponse {
    status: number;
    body: string;
}

/**
 * Fetches one page. Resolves with whatever status the site answered;
 * rejects only when no response was received.
 */
export type PageFetcher = (url: string, signal?: AbortSignal) => Promise<PageResponse>;

export interface LetterboxdFetcherOptions {
    /** Runs one request at a time. */
    limiter: Bottleneck;
    /** Pause between one response settling and the next request going out. */
    delayMs: number;
    timeoutMs: number;
    retries: number;
}

const REQUEST_HEADERS = {
    'User-Agent': 'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36',
    'Accept': 'text/html,application/xhtml+xml',
    'Accept-Language': 'en-US,en;q=0.9'
};

export class RequestTimeoutError extends Error {
    constructor(url: string, timeoutMs: number) {
        super(`Timeout after ${timeoutMs}ms fetching page: ${url}`);
        this.name = 'RequestTimeoutError';
    }
}

export class RequestAbortedError extends Error {
    constructor(url: string) {
        super(`Request aborted: ${url}`);
        this.name = 'RequestAbortedError';
    }
}

/**
 * Creates the fetcher used against letterboxd.com.
 * Every attempt, retries included, is queued through the limiter and waits
 * out the delay counted from the end of the previous request. A cancelled
 * request is never retried.
 */
export function createLetterboxdFetcher({ limiter, delayMs, timeoutMs, retries }: LetterboxdFetcherOptions): PageFetcher {
    let lastSettledAt: number | undefined;

    const throttledFetch = (url: string, signal?: AbortSignal) => limiter.schedule(async () => {
        if (lastSettledAt !== undefined) {
            await waitFor(lastSettledAt + delayMs - Date.now(), signal);
        }
        try {
            return await fetchPage(url, timeoutMs, signal);
        } finally {
            lastSettledAt = Date.now();
        }
    });

    return (url, signal) => retryOperation(
        () => throttledFetch(url, signal),
        `fetch ${url}`,
        {
            attempts: retries + 1,
            shouldRetry: error => !(error instanceof RequestAbortedError)
        }
    );
}

/** Resolves after `ms`, or as soon as `signal` aborts. */
function waitFor(ms: number, signal?: AbortSignal): Promise<void> {
    if (ms <= 0 || signal?.aborted) return Promise.resolve();

    return new Promise(resolve => {
        const done = () => {
            clearTimeout(timer);
            signal?.removeEventListener('abort', done);
            resolve();
        };
        const timer = setTimeout(done, ms);
        signal?.addEventListener('abort', done, { once: true });
    });
}

async function fetchPage(url: string, timeoutMs: number, signal?: AbortSignal): Promise<PageResponse> {
    if (signal?.aborted) {
        throw new RequestAbortedError(url);
    }

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
    const onAbort = () => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
        logger.debug(`GET ${url}`);
        const response = await fetch(url, { headers: REQUEST_HEADERS, signal: controller.signal });
        const body = await response.text();
        return { status: response.status, body };
    } catch (e) {
        if (controller.signal.aborted) {
            throw signal?.aborted ? new RequestAbortedError(url) : new RequestTimeoutError(url, timeoutMs);
        }
        throw e;
    } finally {
        clearTimeout(timeoutId);
        signal?.removeEventListener('abort', onAbort);
    }
}
