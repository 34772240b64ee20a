/**
 * Network helpers shared by the outbound clients
 */

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise(resolve => setTimeout(resolve, ms));

export class TimeoutError extends Error {
    constructor(readonly url: string, readonly timeoutMs: number) {
        super(`Request to ${url} timed out after ${timeoutMs}ms`);
        this.name = 'TimeoutError';
    }
}

/**
 * Fetches a URL and reads its body under one hard timeout. The timeout covers
 * `read` as well, so a server that sends headers and then stalls still fails.
 * The abort timer is always cleared.
 * @throws {TimeoutError} when the timeout elapses before `read` settles.
 */
export const fetchWithTimeout = async <T>(
    fetchImpl: typeof fetch,
    url: string,
    options: RequestInit,
    timeoutMs: number,
    read: (response: Response) => Promise<T>
): Promise<T> => {
    const controller = new AbortController();
    const timedOut = new Promise<never>((_resolve, reject) => {
        controller.signal.addEventListener('abort', () => reject(new TimeoutError(url, timeoutMs)), { once: true });
    });
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

    try {
        const response = await Promise.race([fetchImpl(url, { ...options, signal: controller.signal }), timedOut]);
        return await Promise.race([read(response), timedOut]);
    } catch (error) {
        if (controller.signal.aborted) {
            throw new TimeoutError(url, timeoutMs);
        }
        throw error;
    } finally {
        clearTimeout(timeoutId);
    }
};

export interface RetryOptions {
    /** Retries after the first attempt; 2 means at most 3 calls. */
    maxRetries: number;
    initialDelay: number;
    shouldRetry: (error: unknown) => boolean;
    onRetry?: (error: unknown, attempt: number, delay: number) => void;
    sleep?: Sleep;
}

/**
 * Retry with exponential backoff (initialDelay, 2x, 4x...). Errors that
 * `shouldRetry` rejects are re-thrown immediately.
 */
export const retryWithBackoff = async <T>(
    fn: (attempt: number) => Promise<T>,
    options: RetryOptions
): Promise<T> => {
    const { maxRetries, initialDelay, shouldRetry, onRetry, sleep: wait = sleep } = options;

    for (let attempt = 0; ; attempt++) {
        try {
            return await fn(attempt + 1);
        } catch (error) {
            if (attempt >= maxRetries || !shouldRetry(error)) {
                throw error;
            }

            const delay = initialDelay * Math.pow(2, attempt);
            onRetry?.(error, attempt + 1, delay);
            await wait(delay);
        }
    }
};
