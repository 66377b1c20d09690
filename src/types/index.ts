export type AdapterKind = 'table' | 'anchors';

type CommonAdapterOptions = {
    /** Date-shaped substring to look for near each anchor or inside each row. */
    datePattern?: RegExp;
    minTitleLength?: number;
    /** Substring of an anchor's text that marks the link to the next page. */
    nextPageLabel?: string;
};

export type TableRowOptions = CommonAdapterOptions & {
    /** Row-like grouping element; one announcement per row. */
    rowSelector?: string;
};

export type GenericAnchorOptions = CommonAdapterOptions & {
    /** Ancestors inspected above each anchor, its parent counting as the first. */
    maxDepth?: number;
};

type SiteBase = {
    name: string;
    listingUrl: string;
    /** Base for resolving relative links found on the listing. */
    originUrl: string;
};

export type SiteConfig =
    | (SiteBase & { adapter: 'table'; adapterOptions?: TableRowOptions })
    | (SiteBase & { adapter: 'anchors'; adapterOptions?: GenericAnchorOptions });

export type AnnouncementCandidate = {
    readonly site: string;
    readonly rawDate: string;
    readonly title: string;
    readonly url: string;
};

export type NormalizedAnnouncement = AnnouncementCandidate & {
    /** Midnight of the publish day in UTC+8, or null when the date text could not be read. */
    readonly resolvedDate: Date | null;
};

export type FilterOutcome =
    | 'accepted'
    | 'rejected_unparseable_date'
    | 'rejected_expired'
    | 'rejected_no_keyword';

export type FilterDecision = {
    candidate: NormalizedAnnouncement;
    outcome: FilterOutcome;
    reason: string;
    ageInDays: number | null;
};

export type PageFetchResult = {
    candidates: AnnouncementCandidate[];
    nextPageUrl: string | null;
};

export interface SiteAdapter {
    readonly kind: AdapterKind;
    parse(html: string, site: SiteConfig): PageFetchResult;
}

// HTTP

export type TransportFailureReason = 'http_status' | 'timeout' | 'network';

export type PageResponse =
    | { ok: true; status: number; html: string }
    | { ok: false; reason: TransportFailureReason; message: string; status?: number };

export type PageFetcher = (url: string) => Promise<PageResponse>;

// Trace

export type PaginationState = 'fetching' | 'parsing' | 'advancing' | 'done' | 'failed';

export type StopReason = 'no_next_page' | 'max_pages' | 'cycle_guard' | 'transport_failure';

export type TraceEntry =
    | { kind: 'page'; url: string; page: number; candidates: number }
    | {
          kind: 'transport_failure';
          url: string;
          page: number;
          reason: TransportFailureReason;
          message: string;
          httpStatus?: number;
      }
    | { kind: 'pagination_stopped'; reason: StopReason; pagesFetched: number }
    | ({ kind: 'decision' } & FilterDecision)
    | { kind: 'site_fault'; message: string };

export type TraceSeverity = 'success' | 'info' | 'warning' | 'error';

export type SiteTrace = {
    site: string;
    entries: TraceEntry[];
};

export type SiteStats = {
    site: string;
    pagesFetched: number;
    candidates: number;
    accepted: number;
    durationMs: number;
};

export type BriefingResult = {
    announcements: NormalizedAnnouncement[];
    traces: SiteTrace[];
    stats: SiteStats[];
};
