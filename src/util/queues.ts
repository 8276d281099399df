import PQueue from 'p-queue';
import Bottleneck from 'bottleneck';
import logger from './logger';

// ============================================================================
// P-QUEUE: Command Concurrency Control
// ============================================================================

/**
 * Command Queue
 * Limits how many slash commands scrape Letterboxd at the same time.
 * Each command is already throttled on its own, this bounds the total.
 */
export function createCommandQueue(concurrency: number): PQueue {
    return new PQueue({ concurrency });
}

// ============================================================================
// BOTTLENECK: Letterboxd Request Throttling
// ============================================================================

/**
 * Letterboxd Throttle
 * Runs one request at a time. A new limiter is created for every command so
 * that all pages and all users of that command share it; the fetcher built on
 * it adds the pause between a response and the next request.
 */
export function createLetterboxdThrottle(): Bottleneck {
    const limiter = new Bottleneck({ maxConcurrent: 1 });

    limiter.on('error', (err) => {
        logger.error({ err }, '[Letterboxd Throttle] Unhandled error in queue');
    });

    limiter.on('failed', (err: Error) => {
        logger.debug(`[Letterboxd] Request failed: ${err.message}`);
        return null; // Don't retry within Bottleneck, retry logic is in retryOperation
    });

    return limiter;
}
