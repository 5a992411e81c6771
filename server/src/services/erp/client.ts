/**
 * ERP API Client
 *
 * One HTTP call per `call()`: Basic auth from configured credentials, the
 * tenant database in a `db` header, JSON body for every method (the ERP
 * reads GET payloads from the body too). Transport and HTTP failures are
 * translated into the ErpError family; nothing is retried here.
 */

import axios from 'axios';
import type { AxiosAdapter, AxiosInstance, AxiosResponse } from 'axios';
import type { z } from 'zod';
import type { ErpConnectionConfig } from '../../config/pluginConfig.js';
import {
    ErpClientError,
    ErpConnectionError,
    ErpResponseError,
    ErpServerError,
} from '../../utils/errors.js';
import { erpLogger } from '../../utils/logger.js';

export type HttpMethod = 'GET' | 'POST' | 'PUT';

/** Anything that can talk to the ERP. Sync resources and routes depend on this, not on axios. */
export interface ErpRpc {
    call(endpoint: string, payload?: unknown, method?: HttpMethod): Promise<unknown>;
}

export interface ErpClientOptions {
    /** Replaces the HTTP transport; used by tests */
    adapter?: AxiosAdapter;
}

// ============================================
// HELPERS
// ============================================

function parseLenient(text: string): unknown {
    try {
        return JSON.parse(text);
    } catch {
        return null;
    }
}

function messageOf(body: unknown): string | null {
    if (typeof body === 'object' && body !== null && 'message' in body && typeof body.message === 'string' && body.message) {
        return body.message;
    }
    return null;
}

function bodyText(data: unknown): string {
    if (typeof data === 'string') return data;
    if (data === undefined || data === null) return '';
    return JSON.stringify(data);
}

/**
 * Validate a 2xx reply against the shape the caller expects.
 */
export function parseReply<T extends z.ZodTypeAny>(schema: T, endpoint: string, body: unknown): z.output<T> {
    const result = schema.safeParse(body);
    if (!result.success) {
        throw new ErpResponseError(`Unexpected ERP reply from ${endpoint}`, endpoint, body);
    }
    return result.data;
}

// ============================================
// CLIENT
// ============================================

export class ErpClient implements ErpRpc {
    private readonly http: AxiosInstance;
    private readonly baseUrl: string;
    private readonly authHeader: string;

    constructor(private readonly config: ErpConnectionConfig, options: ErpClientOptions = {}) {
        const port = config.port ? `:${config.port}` : '';
        this.baseUrl = `${config.protocol}://${config.host}${port}`;
        this.authHeader = `Basic ${Buffer.from(`${config.username}:${config.password}`).toString('base64')}`;
        this.http = axios.create({
            timeout: config.timeoutMs,
            responseType: 'text',
            transformResponse: [(data: unknown) => data],
            validateStatus: () => true,
            ...(options.adapter ? { adapter: options.adapter } : {}),
        });
    }

    urlFor(endpoint: string): string {
        return `${this.baseUrl}/${endpoint}`;
    }

    /**
     * Send one request and return the decoded JSON reply.
     *
     * @throws ErpConnectionError on timeout or refused connection
     * @throws ErpClientError on 4xx, ErpServerError on 5xx
     * @throws SyntaxError when a 2xx body is not JSON
     */
    async call(endpoint: string, payload: unknown = {}, method: HttpMethod = 'POST'): Promise<unknown> {
        const url = this.urlFor(endpoint);
        const body = JSON.stringify(payload);

        erpLogger.debug({ endpoint, method }, this.curlTrace(method, url, body));

        let response: AxiosResponse<unknown>;
        try {
            response = await this.http.request<unknown>({
                url,
                method,
                data: body,
                headers: {
                    Authorization: this.authHeader,
                    'Content-Type': 'application/json',
                    db: this.config.database,
                },
            });
        } catch (error: unknown) {
            if (axios.isAxiosError(error) && !error.response) {
                const timedOut = error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT';
                const message = timedOut ? 'ERP request timed out' : 'Could not connect to ERP';
                erpLogger.error({ endpoint, code: error.code }, message);
                throw new ErpConnectionError(message, endpoint);
            }
            throw error;
        }

        const text = bodyText(response.data);
        const { status } = response;

        if (status >= 200 && status < 300) {
            erpLogger.debug({ endpoint, status }, 'ERP call completed');
            return JSON.parse(text);
        }

        const message = messageOf(parseLenient(text)) || response.statusText || `HTTP ${status}`;
        erpLogger.warn({ endpoint, status, message }, 'ERP call failed');

        if (status >= 500) {
            throw new ErpServerError(message, endpoint, status);
        }
        throw new ErpClientError(message, endpoint, status);
    }

    /** Human-readable equivalent of the request, credentials redacted */
    curlTrace(method: HttpMethod, url: string, body: string): string {
        return [
            `curl -X ${method} '${url}'`,
            `-H 'Authorization: Basic ***'`,
            `-H 'Content-Type: application/json'`,
            `-H 'db: ${this.config.database}'`,
            `-d '${body}'`,
        ].join(' \\\n  ');
    }
}
