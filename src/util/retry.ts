import logger from './logger';

export interface RetryOptions {
    /** Total number of tries, the first included. Never less than one. */
    attempts?: number;
    delayMs?: number;
    /** Errors this rejects are rethrown at once. */
    shouldRetry?: (error: unknown) => boolean;
}

export async function retryOperation<T>(operation: () => Promise<T>, name: string, options: RetryOptions = {}): Promise<T> {
    const { delayMs = 2000, shouldRetry = () => true } = options;
    const attempts = Math.max(1, options.attempts ?? 5);

    for (let i = 1; ; i++) {
        try {
            return await operation();
        } catch (error) {
            if (i >= attempts || !shouldRetry(error)) throw error;
            logger.warn(`Failed to ${name}, retrying in ${delayMs / 1000}s... (${i}/${attempts})`);
            await new Promise(resolve => setTimeout(resolve, delayMs));
        }
    }
}
