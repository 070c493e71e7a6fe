import * as http from 'http';
import * as https from 'https';
import { Readable, Transform, TransformCallback, pipeline } from 'stream';
import nodeFetch, { RequestInit, Response } from 'node-fetch';
import { HttpResponse, IHttpClient, StreamedResponse } from '../../domain/interfaces/IHttpClient';
import { NetworkError, errorMessage } from '../../shared/errors/AppError';
import { ILogger } from '../../shared/logging/Logger';
import { FixedRetryPolicy, RetryPolicy } from './RetryPolicy';

export interface HttpClientConfig {
    /** milliseconds; bounds the wait for headers, a buffered body, and each gap between streamed chunks */
    timeout?: number;
    retryPolicy?: RetryPolicy;
    verifySsl?: boolean;
    userAgent?: string;
    headers?: Record<string, string>;
}

export const DEFAULT_ACCEPT = 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8';

/**
 * Non-2xx status, retried like any other request failure
 */
export class HttpStatusError extends Error {
    constructor(readonly status: number, readonly statusText: string) {
        super(`HTTP ${status}${statusText ? `: ${statusText}` : ''}`);
        this.name = 'HttpStatusError';
    }
}

export class HttpClient implements IHttpClient {
    private readonly timeout: number;
    private readonly retryPolicy: RetryPolicy;
    private readonly headers: Readonly<Record<string, string>>;
    private readonly httpAgent: http.Agent;
    private readonly httpsAgent: https.Agent;

    constructor(
        private readonly logger: ILogger,
        config: HttpClientConfig = {}
    ) {
        this.timeout = config.timeout ?? 30000;
        this.retryPolicy = config.retryPolicy ?? new FixedRetryPolicy(3);

        const headers: Record<string, string> = {
            'Accept': DEFAULT_ACCEPT,
            'Accept-Language': 'en-US,en;q=0.5',
            ...config.headers
        };
        if (config.userAgent) {
            headers['User-Agent'] = config.userAgent;
        }
        this.headers = Object.freeze(headers);

        this.httpAgent = new http.Agent();
        this.httpsAgent = new https.Agent({
            rejectUnauthorized: config.verifySsl ?? true
        });
    }

    async get(url: string): Promise<HttpResponse<Buffer>> {
        return this.executeWithRetry(url, response => response.buffer());
    }

    async stream(url: string): Promise<StreamedResponse> {
        const { data, ...response } = await this.executeWithRetry(
            url,
            async (fetched, controller) => this.watchBody(url, fetched, controller)
        );
        return { ...response, data: data.body, abort: data.abort };
    }

    /**
     * Headers sent with every request
     */
    getHeaders(): Readonly<Record<string, string>> {
        return this.headers;
    }

    private async executeWithRetry<T>(
        url: string,
        read: (response: Response, controller: AbortController) => Promise<T>
    ): Promise<HttpResponse<T>> {
        const maxAttempts = this.retryPolicy.maxAttempts;
        let lastError: unknown;

        for (let attempt = 1; attempt <= maxAttempts; attempt++) {
            try {
                this.logger.debug(`HTTP GET ${url} (attempt ${attempt}/${maxAttempts})`);

                const controller = new AbortController();
                const response = await nodeFetch(url, this.requestOptions(controller));

                if (!response.ok) {
                    // Drain so the socket is released before the next attempt
                    response.body.resume();
                    throw new HttpStatusError(response.status, response.statusText);
                }

                const data = await read(response, controller);
                return {
                    data,
                    status: response.status,
                    statusText: response.statusText,
                    headers: this.collectHeaders(response),
                    url: response.url
                };

            } catch (error) {
                lastError = error;

                if (attempt < maxAttempts) {
                    const delay = this.retryPolicy.delayBeforeRetry(attempt);
                    this.logger.warn(
                        `Attempt ${attempt}/${maxAttempts} for ${url} failed, retrying` +
                        `${delay > 0 ? ` in ${delay}ms` : ''}: ${errorMessage(error)}`
                    );
                    if (delay > 0) {
                        await this.sleep(delay);
                    }
                }
            }
        }

        throw new NetworkError(
            `Failed to fetch ${url} after ${maxAttempts} attempts: ${errorMessage(lastError)}`,
            { url, attempts: maxAttempts },
            lastError
        );
    }

    private requestOptions(controller: AbortController): RequestInit {
        return {
            method: 'GET',
            headers: { ...this.headers },
            timeout: this.timeout,
            signal: controller.signal,
            agent: (parsedUrl: URL) => parsedUrl.protocol === 'https:' ? this.httpsAgent : this.httpAgent
        };
    }

    /**
     * Route a streamed body through an idle watchdog; aborting drops the connection
     */
    private watchBody(url: string, response: Response, controller: AbortController): WatchedBody {
        const source = toReadable(response.body);
        // node-fetch reports an abort as an 'error' event on the body
        source.on('error', error => {
            this.logger.debug(`Body of ${url} closed: ${errorMessage(error)}`);
        });

        const watchdog = new IdleWatchdog(this.timeout, () => new NetworkError(
            `No data received from ${url} for ${this.timeout}ms`,
            { url, timeout: this.timeout }
        ));

        pipeline(source, watchdog, error => {
            if (error) {
                this.logger.debug(`Stream of ${url} ended early: ${errorMessage(error)}`);
                controller.abort();
            }
        });

        return {
            body: watchdog,
            abort: () => {
                watchdog.destroy();
                controller.abort();
            }
        };
    }

    private collectHeaders(response: Response): Record<string, string> {
        const headers: Record<string, string> = {};
        response.headers.forEach((value, key) => {
            headers[key.toLowerCase()] = value;
        });
        return headers;
    }

    private sleep(ms: number): Promise<void> {
        return new Promise(resolve => setTimeout(resolve, ms));
    }
}

interface WatchedBody {
    body: Readable;
    abort: () => void;
}

/**
 * Pass-through that fails once no chunk has arrived for `timeout` milliseconds
 */
export class IdleWatchdog extends Transform {
    private timer?: NodeJS.Timeout;

    constructor(private readonly timeout: number, private readonly onIdle: () => Error) {
        super();
        this.arm();
    }

    _transform(chunk: Buffer, _encoding: BufferEncoding, callback: TransformCallback): void {
        this.arm();
        callback(null, chunk);
    }

    _flush(callback: TransformCallback): void {
        clearTimeout(this.timer);
        callback();
    }

    _destroy(error: Error | null, callback: (error?: Error | null) => void): void {
        clearTimeout(this.timer);
        callback(error);
    }

    private arm(): void {
        clearTimeout(this.timer);
        this.timer = setTimeout(() => this.destroy(this.onIdle()), this.timeout);
    }
}

function toReadable(body: NodeJS.ReadableStream): Readable {
    return body instanceof Readable ? body : Readable.from(body);
}
