import { AgentCardSchema } from '@pacer/core';
import type { AgentCard, JsonRpcRequest, JsonRpcResponse, Logger } from '@pacer/core';
import { ClientError } from '../errors.js';
import { parseJsonBody, parseJsonRpcResponse } from './response.js';
import type { A2ATransport, FetchFunction, FetchInit, FetchResponse } from './types.js';

export interface HttpTransportOptions {
    /** Peer endpoint; JSON-RPC requests are POSTed here */
    url: string;
    peer: string;
    timeoutMs: number;
    logger: Logger;
    /** Defaults to the global fetch, looked up on each request */
    fetch?: FetchFunction | undefined;
}

/**
 * Direct request/response transport over HTTP.
 */
export class HttpTransport implements A2ATransport {
    readonly kind = 'http' as const;

    private readonly url: string;
    private readonly peer: string;
    private readonly timeoutMs: number;
    private readonly logger: Logger;
    private readonly fetchFn: FetchFunction;

    constructor(options: HttpTransportOptions) {
        this.url = options.url;
        this.peer = options.peer;
        this.timeoutMs = options.timeoutMs;
        this.logger = options.logger;
        this.fetchFn = options.fetch ?? ((input, init) => globalThis.fetch(input, init));
    }

    async call(request: JsonRpcRequest<unknown>): Promise<JsonRpcResponse> {
        const response = await this.fetchWithTimeout(this.url, {
            method: 'POST',
            headers: { 'Content-Type': 'application/json', Accept: 'application/json' },
            body: JSON.stringify(request),
        });
        await this.assertOk(response);

        const text = await this.readBody(response);
        return parseJsonRpcResponse(this.peer, parseJsonBody(this.peer, text));
    }

    /**
     * The timeout covers the wait for response headers only; the body may
     * stream for as long as the peer keeps it open.
     */
    async openStream(
        request: JsonRpcRequest<unknown>,
        signal?: AbortSignal
    ): Promise<FetchResponse> {
        const response = await this.fetchWithTimeout(
            this.url,
            {
                method: 'POST',
                headers: { 'Content-Type': 'application/json', Accept: 'text/event-stream' },
                body: JSON.stringify(request),
            },
            signal
        );
        await this.assertOk(response);
        return response;
    }

    async getAgentCard(): Promise<AgentCard> {
        const cardUrl = `${this.url.replace(/\/+$/, '')}/.well-known/agent.json`;
        const response = await this.fetchWithTimeout(cardUrl, {
            method: 'GET',
            headers: { Accept: 'application/json' },
        });
        await this.assertOk(response);

        const raw = parseJsonBody(this.peer, await this.readBody(response));
        const result = AgentCardSchema.safeParse(raw);
        if (!result.success) {
            throw ClientError.invalidResponse(this.peer, 'malformed agent card', result.error);
        }
        return result.data;
    }

    private async fetchWithTimeout(
        url: string,
        init: FetchInit,
        signal?: AbortSignal
    ): Promise<FetchResponse> {
        const controller = new AbortController();
        let timedOut = false;
        const timeoutId = setTimeout(() => {
            timedOut = true;
            controller.abort();
        }, this.timeoutMs);
        const forwardAbort = () => controller.abort();
        signal?.addEventListener('abort', forwardAbort, { once: true });

        this.logger.debug(`${init.method ?? 'GET'} ${url}`, { peer: this.peer });
        try {
            return await this.fetchFn(url, { ...init, signal: controller.signal });
        } catch (error) {
            if (timedOut) {
                throw ClientError.timeout(this.peer, this.timeoutMs, error);
            }
            throw ClientError.connectionFailed(this.peer, url, error);
        } finally {
            clearTimeout(timeoutId);
            signal?.removeEventListener('abort', forwardAbort);
        }
    }

    private async assertOk(response: FetchResponse): Promise<void> {
        if (response.ok) {
            return;
        }
        const body = await response.text().catch(() => undefined);
        throw ClientError.httpError(this.peer, response.status, response.statusText, body);
    }

    private async readBody(response: FetchResponse): Promise<string> {
        try {
            return await response.text();
        } catch (error) {
            throw ClientError.connectionFailed(this.peer, this.url, error);
        }
    }
}
