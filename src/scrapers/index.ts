/**
 * Briefing orchestrator
 *
 * Runs every configured site one after another: paginate, filter, then merge
 * the accepted announcements across sites. A failure inside one site is
 * recorded in that site's trace and never stops the others; the run itself
 * never rejects.
 */

import type {
    BriefingResult,
    NormalizedAnnouncement,
    PageFetcher,
    SiteAdapter,
    SiteConfig,
    SiteStats,
    SiteTrace,
    TraceEntry
} from '../types/index.js';
import { loadSettings } from '../config/settings.js';
import { createPageFetcher } from '../fetch/fetcher.js';
import { aggregateAnnouncements } from '../filter/aggregate.js';
import { filterCandidates } from '../filter/relevance.js';
import { errorMessage } from '../shared/errors.js';
import { log } from '../server/logging.js';
import { GenericAnchorAdapter } from './adapters/generic-anchors.js';
import { TableRowAdapter } from './adapters/table-rows.js';
import { paginate } from './paginator.js';

export interface RunOptions {
    keywords?: readonly string[];
    maxAgeDays?: number;
    maxPages?: number;
    now?: Date;
    /** Page source; defaults to the axios fetcher with the configured timeout. */
    fetchPage?: PageFetcher;
    timeoutMs?: number;
}

type ResolvedRunOptions = {
    keywords: readonly string[];
    maxAgeDays: number;
    maxPages: number;
    now: Date;
    fetchPage: PageFetcher;
};

type SiteRun = {
    accepted: NormalizedAnnouncement[];
    trace: SiteTrace;
    stats: SiteStats;
};

/**
 * Map a site to its adapter variant
 */
export function createAdapter(site: SiteConfig): SiteAdapter {
    switch (site.adapter) {
        case 'table': return new TableRowAdapter(site.adapterOptions);
        case 'anchors': return new GenericAnchorAdapter(site.adapterOptions);
        default: {
            const unknown: never = site;
            throw new Error(`No adapter implementation for site: ${JSON.stringify(unknown)}`);
        }
    }
}

function resolveOptions(options: RunOptions): ResolvedRunOptions {
    const settings = loadSettings();
    return {
        keywords: options.keywords ?? settings.keywords,
        maxAgeDays: options.maxAgeDays ?? settings.maxAgeDays,
        maxPages: options.maxPages ?? settings.maxPages,
        now: options.now ?? new Date(),
        fetchPage: options.fetchPage ?? createPageFetcher({ timeoutMs: options.timeoutMs ?? settings.timeoutMs })
    };
}

async function runSite(site: SiteConfig, options: ResolvedRunOptions): Promise<SiteRun> {
    const start = Date.now();
    const entries: TraceEntry[] = [];
    let accepted: NormalizedAnnouncement[] = [];
    let pagesFetched = 0;
    let candidates = 0;

    try {
        const adapter = createAdapter(site);
        const pagination = await paginate(site, adapter, options.fetchPage, { maxPages: options.maxPages });
        entries.push(...pagination.trace);
        pagesFetched = pagination.pagesFetched;
        candidates = pagination.candidates.length;

        const filtered = filterCandidates(pagination.candidates, options);
        entries.push(...filtered.decisions.map((decision): TraceEntry => ({ kind: 'decision', ...decision })));
        accepted = filtered.accepted;

        log('info', `[Site:${site.name}] ${accepted.length}/${candidates} announcements kept from ${pagesFetched} page(s)`);
    } catch (error) {
        const message = errorMessage(error);
        entries.push({ kind: 'site_fault', message });
        log('error', `[Site:${site.name}] Aborted: ${message}`);
        accepted = [];
    }

    return {
        accepted,
        trace: { site: site.name, entries },
        stats: {
            site: site.name,
            pagesFetched,
            candidates,
            accepted: accepted.length,
            durationMs: Date.now() - start
        }
    };
}

/**
 * Run all sites and return merged announcements with per-site traces
 */
export async function runAllSites(sites: readonly SiteConfig[], options: RunOptions = {}): Promise<BriefingResult> {
    const resolved = resolveOptions(options);
    const startTime = Date.now();
    const runs: SiteRun[] = [];

    log('info', `[Briefing] Checking ${sites.length} site(s)`, {
        keywords: resolved.keywords,
        maxAgeDays: resolved.maxAgeDays,
        maxPages: resolved.maxPages
    });

    for (const site of sites) {
        runs.push(await runSite(site, resolved));
    }

    const announcements = aggregateAnnouncements(runs.map(r => r.accepted));

    log('info', `[Briefing] Complete: ${announcements.length} announcements from ${sites.length} site(s)`, {
        durationMs: Date.now() - startTime
    });

    return {
        announcements,
        traces: runs.map(r => r.trace),
        stats: runs.map(r => r.stats)
    };
}

/**
 * Run a single site through the same path (for diagnostics)
 */
export async function runSingleSite(site: SiteConfig, options: RunOptions = {}): Promise<BriefingResult> {
    return runAllSites([site], options);
}
