import axios, { type AxiosAdapter, type AxiosError, type AxiosInstance, type AxiosRequestConfig } from 'axios';
import { NetworkError, TimeoutError } from './errors';
import { logger } from '../lib/logger';

export const DEFAULT_TIMEOUT_MS = 10000;

const sleep = (ms: number) => new Promise(resolve => setTimeout(resolve, ms));

export interface HttpClientOptions {
    timeoutMs?: number;
    baseURL?: string;
    adapter?: AxiosAdapter;
}

export function createHttpClient(options: HttpClientOptions = {}): AxiosInstance {
    return axios.create({
        baseURL: options.baseURL,
        timeout: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
        headers: { Accept: 'application/json' },
        adapter: options.adapter
    });
}

const isTimeout = (error: AxiosError) =>
    error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT';

const isRetryableStatus = (status?: number) => {
    if (!status) return true;
    return status === 408 || status === 429 || status >= 500;
};

const shouldRetry = (error: AxiosError) => {
    if (isTimeout(error)) return true;
    return isRetryableStatus(error.response?.status);
};

export const formatAxiosError = (error: unknown, context: string) => {
    if (!axios.isAxiosError(error)) {
        return `${context}: Unexpected error.`;
    }
    const status = error.response?.status;
    const statusText = error.response?.statusText || 'Unknown error';
    return `${context}: ${status ? `${status} ${statusText}` : 'Network/timeout error'}.`;
};

/**
 * Maps an axios failure onto the transport error taxonomy. Anything that is not
 * an axios error is returned unchanged.
 */
export function toTransportError(error: unknown, context: string): unknown {
    if (!axios.isAxiosError(error)) return error;

    const message = formatAxiosError(error, context);
    if (isTimeout(error)) {
        return new TimeoutError(message, error.config?.timeout, { cause: error });
    }
    return new NetworkError(message, error.response?.status, { cause: error });
}

export interface RetryOptions {
    retries?: number;
    backoffMs?: number;
}

export async function getJsonWithRetry<T>(
    http: AxiosInstance,
    url: string,
    config: AxiosRequestConfig = {},
    options: RetryOptions = {}
): Promise<T> {
    const retries = options.retries ?? 2;
    const backoffMs = options.backoffMs ?? 500;
    let attempt = 0;

    while (true) {
        try {
            const response = await http.get<T>(url, config);
            return response.data;
        } catch (error) {
            if (!axios.isAxiosError(error)) {
                throw error;
            }
            if (!shouldRetry(error) || attempt >= retries) {
                throw toTransportError(error, `GET ${url}`);
            }
            const delay = backoffMs * Math.pow(2, attempt);
            logger.warn(`Request failed, retrying in ${delay}ms (attempt ${attempt + 1}/${retries})`, formatAxiosError(error, url));
            await sleep(delay);
        }
        attempt += 1;
    }
}
