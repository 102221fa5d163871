/**
 * Raised by the asset fetcher when a GET does not produce a 2xx response.
 * Not an HTTP exception: callers decide whether it reaches the client.
 */
export class FetchFailedError extends Error {
    constructor(
        public readonly url: string,
        message: string,
        public readonly statusCode?: number,
    ) {
        super(message);
        this.name = 'FetchFailedError';
    }
}
