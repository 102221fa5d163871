import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import axios from 'axios';
import { FetchFailedError } from './errors/fetch-failed.error';
import { FetchedResource } from './interfaces/page.interface';

const CHARSET_PATTERN = /charset\s*=\s*["']?([^;"'\s]+)/i;

@Injectable()
export class AssetFetcherService {
    private readonly logger = new Logger(AssetFetcherService.name);

    constructor(private readonly configService: ConfigService) { }

    /**
     * GETs an absolute URL and returns the undecoded body, along with the
     * charset named by its Content-Type when there is one.
     * Rejects with FetchFailedError on network errors and non-2xx statuses.
     */
    async fetch(url: string): Promise<FetchedResource> {
        // 0 and 21 are axios' own defaults: no timeout, follow-redirects' limit
        const timeout = Number(this.configService.get('FETCH_TIMEOUT', 0));
        const maxRedirects = Number(this.configService.get('FETCH_MAX_REDIRECTS', 21));

        try {
            const response = await axios.get<ArrayBuffer>(url, {
                timeout,
                maxRedirects,
                responseType: 'arraybuffer',
            });
            return {
                body: Buffer.from(response.data),
                charset: this.charsetOf(response.headers?.['content-type']),
            };
        } catch (error: unknown) {
            const failure = this.toFetchFailed(url, error);
            this.logger.debug(`GET ${url} failed: ${failure.message}`);
            throw failure;
        }
    }

    private charsetOf(contentType: unknown): string | undefined {
        if (typeof contentType !== 'string') {
            return undefined;
        }
        return CHARSET_PATTERN.exec(contentType)?.[1];
    }

    private toFetchFailed(url: string, error: unknown): FetchFailedError {
        if (typeof error !== 'object' || error === null) {
            return new FetchFailedError(url, 'Unknown error');
        }

        const message = 'message' in error && typeof error.message === 'string' && error.message
            ? error.message
            : 'Unknown error';

        let statusCode: number | undefined;
        if ('response' in error && typeof error.response === 'object' && error.response !== null
            && 'status' in error.response && typeof error.response.status === 'number') {
            statusCode = error.response.status;
        }

        return new FetchFailedError(url, message, statusCode);
    }
}
