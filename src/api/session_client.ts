import axios, { AxiosInstance } from 'axios';
import { Logger } from 'pino';
import { SessionState } from '../domain/models';
import { describeCause } from '../domain/errors';

export const REQUEST_TIMEOUT_MS = 10000;

export const DEFAULT_USER_AGENT = 'Dealer/3.1.0 CFNetwork/1568.200.51 Darwin/24.1.0';

export const HEADER_DEVICE_ID = 'X-Device-Id';
export const HEADER_AUTHORIZATION = 'X-Authorization';
export const HEADER_API_VERSION = 'X-Api-Version';

/**
 * Transport error or non-2xx status. Wraps the underlying cause and the target URL.
 */
export class RequestFailure extends Error {
    constructor(
        public readonly url: string,
        cause: unknown,
        public readonly statusCode?: number
    ) {
        super(`Request to ${url} failed: ${describeCause(cause)}`, { cause });
        this.name = 'RequestFailure';
    }
}

// Every vendor call in the workflow is a POST.
export type HttpMethod = 'POST';

export type Fields = Record<string, string>;

export interface ApiRequest {
    method: HttpMethod;
    url: string;                // Path on the base host, or an absolute URL
    headers: Record<string, string>;
    data?: Fields;              // Form-encoded
    params?: Fields;            // Query string
}

export interface RawResponse {
    status: number;
    body: string;
}

export interface PostOptions {
    session: SessionState;
    headers?: Record<string, string>;
    params?: Fields;
}

/**
 * Gateway the workflow engine talks to. Implemented by SessionClient;
 * tests may substitute their own.
 */
export interface ActivationGateway {
    post(url: string, fields: Fields, options: PostOptions): Promise<RawResponse>;
}

export interface SessionClientOptions {
    baseUrl: string;
    deviceId: string;
    logger: Logger;
    timeoutMs?: number;
    userAgent?: string;
}

export class SessionClient implements ActivationGateway {
    private client: AxiosInstance;
    private readonly deviceId: string;
    private readonly logger: Logger;
    private readonly userAgent: string;

    constructor(options: SessionClientOptions) {
        this.deviceId = options.deviceId;
        this.logger = options.logger;
        this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;

        // One instance for the whole run so the agent can keep connections alive.
        this.client = axios.create({
            baseURL: options.baseUrl,
            timeout: options.timeoutMs ?? REQUEST_TIMEOUT_MS,
            // Bodies stay raw; JSON parsing belongs to the caller.
            transformResponse: [(data: unknown) => data],
        });
    }

    /**
     * Default header set merged with call-specific overrides (overrides win).
     */
    buildHeaders(session: SessionState, overrides: Record<string, string> = {}): Record<string, string> {
        const headers: Record<string, string> = {
            'Accept': '*/*',
            'Accept-Language': 'en-us',
            'User-Agent': this.userAgent,
            [HEADER_API_VERSION]: '1.0',
            [HEADER_DEVICE_ID]: this.deviceId,
            'Content-Type': 'application/x-www-form-urlencoded',
        };

        if (session.authToken) {
            headers[HEADER_AUTHORIZATION] = session.authToken;
        }

        return { ...headers, ...overrides };
    }

    async request(req: ApiRequest): Promise<RawResponse> {
        const target = this.describeTarget(req.url);

        try {
            const response = await this.client.request({
                method: req.method,
                url: req.url,
                headers: req.headers,
                data: req.data ? new URLSearchParams(req.data).toString() : undefined,
                params: req.params,
            });

            this.logger.info({ url: target, status: response.status }, 'Request succeeded');
            return { status: response.status, body: toBodyText(response.data) };
        } catch (error) {
            const failure = axios.isAxiosError(error)
                ? new RequestFailure(target, error, error.response?.status)
                : new RequestFailure(target, error);
            this.logger.error({ url: target, status: failure.statusCode, err: failure }, 'Request failed');
            throw failure;
        }
    }

    async post(url: string, fields: Fields, options: PostOptions): Promise<RawResponse> {
        return this.request({
            method: 'POST',
            url,
            headers: this.buildHeaders(options.session, options.headers),
            data: fields,
            params: options.params,
        });
    }

    private describeTarget(url: string): string {
        if (/^https?:\/\//i.test(url)) return url;
        const base = this.client.defaults.baseURL ?? '';
        return base.replace(/\/+$/, '') + url;
    }
}

function toBodyText(data: unknown): string {
    if (typeof data === 'string') return data;
    if (data === undefined || data === null) return '';
    return JSON.stringify(data);
}
