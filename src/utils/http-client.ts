import { getLogger } from './logger.js';

/**
 * HTTP error with status. `status` is 0 for network failures and timeouts.
 */
export class HttpError extends Error {
    constructor(
        message: string,
        public readonly status: number,
        public readonly response?: unknown
    ) {
        super(message);
        this.name = 'HttpError';
    }
}

export interface HttpClientOptions {
    timeout?: number;
    version?: string;
    tool?: string;
    email?: string;
}

/**
 * Thin wrapper around global fetch: user agent, timeout, error classification.
 * No retries and no rate limiting; one request in, one response out.
 */
export class HttpClient {
    private readonly timeout: number;
    private readonly userAgent: string;

    constructor(options?: HttpClientOptions) {
        this.timeout = options?.timeout ?? 30000;
        const version = options?.version ?? '1.0.0';
        const tool = options?.tool ?? 'biocorp-papers';
        const email = options?.email ?? 'biocorp-papers@example.com';
        this.userAgent = `${tool}/${version} (mailto:${email})`;
    }

    /**
     * GET a URL and parse the body as JSON.
     */
    async getJson(url: string): Promise<unknown> {
        const response = await this.send(url, 'application/json');
        const body = await response.text();

        try {
            const data: unknown = JSON.parse(body);
            return data;
        } catch {
            throw new HttpError(`Invalid JSON from ${url}`, response.status, body.slice(0, 200));
        }
    }

    /**
     * GET a URL and return the body as text.
     */
    async getText(url: string): Promise<string> {
        const response = await this.send(url, '*/*');
        return response.text();
    }

    private async send(url: string, accept: string): Promise<Response> {
        const controller = new AbortController();
        const timeoutId = setTimeout(() => controller.abort(), this.timeout);

        let response: Response;
        try {
            response = await fetch(url, {
                method: 'GET',
                headers: {
                    'User-Agent': this.userAgent,
                    Accept: accept,
                },
                signal: controller.signal,
            });
        } catch (error) {
            if (error instanceof Error && error.name === 'AbortError') {
                throw new HttpError(`Request timeout after ${this.timeout}ms: ${url}`, 0);
            }
            throw new HttpError(
                `Network error: ${error instanceof Error ? error.message : String(error)}`,
                0
            );
        } finally {
            clearTimeout(timeoutId);
        }

        if (!response.ok) {
            const body = await response.text().catch(() => '');
            getLogger().debug({ status: response.status, url }, 'HTTP request failed');
            throw new HttpError(`HTTP ${response.status}: ${response.statusText}`, response.status, body);
        }

        return response;
    }
}

/**
 * Create a new HTTP client.
 */
export function createHttpClient(options?: HttpClientOptions): HttpClient {
    return new HttpClient(options);
}
