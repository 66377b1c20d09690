/**
 * Pagination driver
 *
 * fetching -> parsing -> advancing -> fetching ... -> done
 *     \-> failed
 *
 * A failed fetch keeps every page already parsed. The page bound and the
 * cycle guard (never go back to the listing url, or any url already fetched)
 * stop adversarial or looping "next page" chains.
 */

import type {
    AnnouncementCandidate,
    PageFetcher,
    PageResponse,
    PaginationState,
    SiteAdapter,
    SiteConfig,
    StopReason,
    TraceEntry
} from '../types/index.js';
import { errorMessage } from '../shared/errors.js';
import { dedupeByUrl, isSameUrl } from '../shared/url-utils.js';
import { log } from '../server/logging.js';

export const DEFAULT_MAX_PAGES = 3;
export const MAX_PAGES_LIMIT = 10;

export interface PaginationResult {
    candidates: AnnouncementCandidate[];
    trace: TraceEntry[];
    pagesFetched: number;
    state: Extract<PaginationState, 'done' | 'failed'>;
}

// Caller-supplied fetchers may throw; that is a connection failure like any other
async function fetchSafely(fetchPage: PageFetcher, url: string): Promise<PageResponse> {
    try {
        return await fetchPage(url);
    } catch (error) {
        return { ok: false, reason: 'network', message: errorMessage(error) };
    }
}

export function clampMaxPages(value: number | undefined): number {
    if (value === undefined || !Number.isFinite(value)) return DEFAULT_MAX_PAGES;
    return Math.min(MAX_PAGES_LIMIT, Math.max(1, Math.floor(value)));
}

export async function paginate(
    site: SiteConfig,
    adapter: SiteAdapter,
    fetchPage: PageFetcher,
    options: { maxPages?: number } = {}
): Promise<PaginationResult> {
    const maxPages = clampMaxPages(options.maxPages);
    const collected: AnnouncementCandidate[] = [];
    const trace: TraceEntry[] = [];
    const visited: string[] = [];

    let state: PaginationState = 'fetching';
    let currentUrl = site.listingUrl;
    let nextPageUrl: string | null = null;
    let html = '';
    let pagesFetched = 0;

    const stop = (reason: StopReason, final: 'done' | 'failed'): PaginationState => {
        trace.push({ kind: 'pagination_stopped', reason, pagesFetched });
        log('debug', `[Site:${site.name}] Pagination stopped: ${reason}`, { pagesFetched });
        return final;
    };

    while (state !== 'done' && state !== 'failed') {
        switch (state) {
            case 'fetching': {
                const page = pagesFetched + 1;
                visited.push(currentUrl);
                const response = await fetchSafely(fetchPage, currentUrl);
                if (!response.ok) {
                    trace.push({
                        kind: 'transport_failure',
                        url: currentUrl,
                        page,
                        reason: response.reason,
                        message: response.message,
                        httpStatus: response.status
                    });
                    log('warn', `[Site:${site.name}] Page ${page} failed: ${response.message}`, { url: currentUrl });
                    state = stop('transport_failure', 'failed');
                    break;
                }
                pagesFetched = page;
                html = response.html;
                state = 'parsing';
                break;
            }

            case 'parsing': {
                const result = adapter.parse(html, site);
                collected.push(...result.candidates);
                nextPageUrl = result.nextPageUrl;
                trace.push({ kind: 'page', url: currentUrl, page: pagesFetched, candidates: result.candidates.length });
                log('info', `[Site:${site.name}] Page ${pagesFetched}: ${result.candidates.length} candidates`);
                state = 'advancing';
                break;
            }

            case 'advancing': {
                const next = nextPageUrl;
                if (next === null) {
                    state = stop('no_next_page', 'done');
                } else if (pagesFetched >= maxPages) {
                    state = stop('max_pages', 'done');
                } else if (visited.some(url => isSameUrl(url, next))) {
                    state = stop('cycle_guard', 'done');
                } else {
                    currentUrl = next;
                    state = 'fetching';
                }
                break;
            }
        }
    }

    return {
        candidates: dedupeByUrl(collected),
        trace,
        pagesFetched,
        state: state === 'failed' ? 'failed' : 'done'
    };
}
