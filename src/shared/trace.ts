/**
 * Trace helpers for whoever renders a run: a severity per entry (for
 * coloring) and a one-line description.
 */

import type { FilterOutcome, TraceEntry, TraceSeverity } from '../types/index.js';

const DECISION_SEVERITY: Record<FilterOutcome, TraceSeverity> = {
    accepted: 'success',
    rejected_no_keyword: 'info',
    rejected_expired: 'info',
    rejected_unparseable_date: 'warning'
};

export function traceSeverity(entry: TraceEntry): TraceSeverity {
    switch (entry.kind) {
        case 'decision': return DECISION_SEVERITY[entry.outcome];
        case 'page': return 'info';
        case 'pagination_stopped': return entry.reason === 'transport_failure' ? 'warning' : 'info';
        case 'transport_failure': return 'warning';
        case 'site_fault': return 'error';
    }
}

export function describeTraceEntry(entry: TraceEntry): string {
    switch (entry.kind) {
        case 'page':
            return `Page ${entry.page}: ${entry.candidates} candidate(s) from ${entry.url}`;
        case 'transport_failure':
            return `Fetch failed on page ${entry.page} (${entry.reason}${entry.httpStatus ? ` ${entry.httpStatus}` : ''}): ${entry.message}`;
        case 'pagination_stopped':
            return `Stopped after ${entry.pagesFetched} page(s): ${entry.reason.replace(/_/g, ' ')}`;
        case 'decision':
            return `[${entry.outcome}] ${entry.candidate.title} (${entry.candidate.rawDate}) - ${entry.reason}`;
        case 'site_fault':
            return `Site aborted: ${entry.message}`;
    }
}
