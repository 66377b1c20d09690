/**
 * Recency + keyword filter.
 *
 * One decision per candidate, in input order. Expired items that do match a
 * keyword are still recorded so the trace shows why they were left out.
 *
 * The window is a one-sided cutoff: anything newer than `now - maxAgeDays`
 * is inside it, including announcements dated in the future.
 */

import type { AnnouncementCandidate, FilterDecision, NormalizedAnnouncement } from '../types/index.js';
import { formatDate, normalizeDate } from '../shared/date-normalizer.js';

export const DAY_MS = 24 * 60 * 60 * 1000;

export interface RelevanceOptions {
    keywords: readonly string[];
    maxAgeDays: number;
    now: Date;
}

export interface RelevanceResult {
    accepted: NormalizedAnnouncement[];
    decisions: FilterDecision[];
}

/**
 * Case-sensitive substring match; the first keyword found, or null.
 */
export function findKeyword(title: string, keywords: readonly string[]): string | null {
    return keywords.find(keyword => keyword.length > 0 && title.includes(keyword)) ?? null;
}

export function evaluateCandidate(candidate: AnnouncementCandidate, options: RelevanceOptions): FilterDecision {
    const resolvedDate = normalizeDate(candidate.rawDate);
    const normalized: NormalizedAnnouncement = { ...candidate, resolvedDate };

    if (!resolvedDate) {
        return {
            candidate: normalized,
            outcome: 'rejected_unparseable_date',
            reason: `Could not read a date from "${candidate.rawDate}"`,
            ageInDays: null
        };
    }

    const nowMs = options.now.getTime();
    const ageInDays = Math.floor((nowMs - resolvedDate.getTime()) / DAY_MS);
    const withinWindow = resolvedDate.getTime() > nowMs - options.maxAgeDays * DAY_MS;
    const keyword = findKeyword(candidate.title, options.keywords);
    const published = formatDate(resolvedDate);

    if (!withinWindow) {
        return {
            candidate: normalized,
            outcome: 'rejected_expired',
            reason: `Published ${published}, ${ageInDays} days ago (limit ${options.maxAgeDays})` +
                (keyword ? `; matched "${keyword}"` : ''),
            ageInDays
        };
    }

    if (!keyword) {
        return {
            candidate: normalized,
            outcome: 'rejected_no_keyword',
            reason: `No keyword in title (${options.keywords.join(', ')})`,
            ageInDays
        };
    }

    return {
        candidate: normalized,
        outcome: 'accepted',
        reason: ageInDays < 0
            ? `Matched "${keyword}"; future-dated ${published}`
            : `Matched "${keyword}"; published ${published}, ${ageInDays} days ago`,
        ageInDays
    };
}

export function filterCandidates(candidates: readonly AnnouncementCandidate[], options: RelevanceOptions): RelevanceResult {
    const decisions = candidates.map(candidate => evaluateCandidate(candidate, options));
    return {
        accepted: decisions.filter(d => d.outcome === 'accepted').map(d => d.candidate),
        decisions
    };
}
