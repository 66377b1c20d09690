export type {
    AdapterKind,
    AnnouncementCandidate,
    BriefingResult,
    FilterDecision,
    FilterOutcome,
    GenericAnchorOptions,
    NormalizedAnnouncement,
    PageFetcher,
    PageFetchResult,
    PageResponse,
    SiteAdapter,
    SiteConfig,
    SiteStats,
    SiteTrace,
    TableRowOptions,
    TraceEntry,
    TraceSeverity
} from './types/index.js';

export { runAllSites, runSingleSite, createAdapter, type RunOptions } from './scrapers/index.js';
export { paginate, clampMaxPages, DEFAULT_MAX_PAGES, MAX_PAGES_LIMIT } from './scrapers/paginator.js';
export { findNearbyDate, matchDate, type DocumentTree } from './scrapers/extraction.js';
export { createCheerioTree } from './scrapers/cheerio-tree.js';
export { TableRowAdapter } from './scrapers/adapters/table-rows.js';
export { GenericAnchorAdapter } from './scrapers/adapters/generic-anchors.js';
export { loadSiteConfigs, parseSiteConfigs, getSiteConfig } from './scrapers/site-config.js';
export { normalizeDate, formatDate } from './shared/date-normalizer.js';
export { traceSeverity, describeTraceEntry } from './shared/trace.js';
export { filterCandidates, evaluateCandidate } from './filter/relevance.js';
export { aggregateAnnouncements } from './filter/aggregate.js';
export { createPageFetcher, clampTimeout } from './fetch/fetcher.js';
export { loadSettings, type Settings } from './config/settings.js';
