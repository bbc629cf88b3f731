import { TransportFailureError } from '../errors';
import type { HttpMethod, JsonObject } from '../types';
import type { FallbackTransport, RawResponse } from './Transport';

export interface FetchFallbackTransportConfig {
    /** Supplies the bearer token for authenticated requests. */
    tokenProvider?: () => string | null | undefined;
    /** Sent as `User-Agent` on every request when set. */
    userAgent?: string;
    /** Injected fetch implementation (default: global fetch). */
    fetch?: typeof fetch;
}

/**
 * Plain HTTP + JSON channel on top of fetch. It only moves bytes; status
 * interpretation belongs to the adapter.
 */
export class FetchFallbackTransport implements FallbackTransport {
    private readonly fetchImpl: typeof fetch;

    constructor(private readonly config: FetchFallbackTransportConfig = {}) {
        this.fetchImpl = config.fetch ?? fetch;
    }

    public async sendRaw(
        method: HttpMethod,
        url: string,
        json: JsonObject | undefined,
        authenticated: boolean
    ): Promise<RawResponse> {
        const headers: Record<string, string> = {};
        if (authenticated) {
            const token = this.config.tokenProvider?.();
            if (token) headers['authorization'] = `Bearer ${token}`;
        }
        if (this.config.userAgent) {
            headers['user-agent'] = this.config.userAgent;
        }
        let body: string | undefined;
        if (json !== undefined) {
            headers['content-type'] = 'application/json';
            body = JSON.stringify(json);
        }

        let response: Response;
        try {
            response = await this.fetchImpl(url, { method, headers, body });
        } catch (error) {
            throw new TransportFailureError(
                `${method} ${url} failed: ${error instanceof Error ? error.message : String(error)}`,
                undefined,
                undefined,
                error
            );
        }
        return { status: response.status, body: new Uint8Array(await response.arrayBuffer()) };
    }
}
