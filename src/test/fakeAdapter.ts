import { AxiosError, type AxiosAdapter, type AxiosResponse, type InternalAxiosRequestConfig } from 'axios';

export type FakeReply =
    | { data: unknown; status?: number }
    | { timeout: true }
    | { networkError: true };

export interface RecordedRequest {
    url: string;
    params: Record<string, unknown>;
}

const paramsOf = (config: InternalAxiosRequestConfig): Record<string, unknown> => {
    const params: unknown = config.params;
    return typeof params === 'object' && params !== null ? { ...params } : {};
};

/**
 * In-process axios adapter that answers requests from a queue of replies, or
 * from a handler, and records what was asked for.
 */
export function createFakeAdapter(replies: FakeReply[] | ((request: RecordedRequest) => FakeReply)) {
    const requests: RecordedRequest[] = [];
    const queue = Array.isArray(replies) ? [...replies] : null;

    const adapter: AxiosAdapter = async (config) => {
        const request = { url: config.url ?? '', params: paramsOf(config) };
        requests.push(request);

        const reply = queue ? queue.shift() : typeof replies === 'function' ? replies(request) : undefined;
        if (!reply) {
            throw new Error(`No fake reply for ${request.url}`);
        }

        if ('timeout' in reply) {
            throw new AxiosError(`timeout of ${config.timeout}ms exceeded`, 'ECONNABORTED', config);
        }
        if ('networkError' in reply) {
            throw new AxiosError('Network Error', AxiosError.ERR_NETWORK, config);
        }

        const status = reply.status ?? 200;
        const response: AxiosResponse = {
            data: reply.data,
            status,
            statusText: status < 300 ? 'OK' : 'Error',
            headers: {},
            config
        };
        if (status >= 300) {
            throw new AxiosError(`Request failed with status code ${status}`, AxiosError.ERR_BAD_RESPONSE, config, null, response);
        }
        return response;
    };

    return { adapter, requests };
}
