/**
 * Listing page fetcher.
 *
 * One GET per page with browser headers and a single timeout; no retries.
 * Never throws: every failure comes back as a PageResponse with ok=false so
 * the paginator can stop that site and keep what it already has.
 */

import axios, { type AxiosInstance } from 'axios';
import type { PageFetcher, PageResponse } from '../types/index.js';
import { errorMessage } from '../shared/errors.js';
import { log } from '../server/logging.js';
import { buildBrowserHeaders } from './browser-headers.js';

export const DEFAULT_TIMEOUT_MS = 15000;
export const MIN_TIMEOUT_MS = 10000;
export const MAX_TIMEOUT_MS = 20000;

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

export interface FetcherOptions {
    timeoutMs?: number;
    client?: AxiosInstance;
}

/**
 * Keep every request bounded: axios treats a timeout of 0 as none at all.
 */
export function clampTimeout(value: number | undefined): number {
    if (value === undefined || !Number.isFinite(value)) return DEFAULT_TIMEOUT_MS;
    return Math.min(MAX_TIMEOUT_MS, Math.max(MIN_TIMEOUT_MS, Math.floor(value)));
}

export function createPageFetcher(options: FetcherOptions = {}): PageFetcher {
    const client = options.client ?? axios;
    const timeout = clampTimeout(options.timeoutMs);

    return async (url: string): Promise<PageResponse> => {
        const start = Date.now();
        try {
            const response = await client.get<unknown>(url, {
                timeout,
                headers: buildBrowserHeaders(url),
                maxRedirects: 5,
                responseType: 'text',
                // Status is classified below rather than thrown
                validateStatus: () => true
            });

            const status = response.status;
            if (status < 200 || status >= 300) {
                log('warn', `[Fetch] HTTP ${status} for ${url}`, { durationMs: Date.now() - start });
                return { ok: false, reason: 'http_status', status, message: `HTTP ${status}` };
            }

            const html = typeof response.data === 'string' ? response.data : String(response.data ?? '');
            log('debug', `[Fetch] ${url}`, { status, bytes: html.length, durationMs: Date.now() - start });
            return { ok: true, status, html };
        } catch (error) {
            if (axios.isAxiosError(error) && error.code !== undefined && TIMEOUT_CODES.has(error.code)) {
                log('warn', `[Fetch] Timed out after ${timeout}ms: ${url}`);
                return { ok: false, reason: 'timeout', message: `Timed out after ${timeout}ms` };
            }
            const message = errorMessage(error);
            log('warn', `[Fetch] Request failed for ${url}: ${message}`);
            return { ok: false, reason: 'network', message };
        }
    };
}
