import type { NormalizedAnnouncement } from '../types/index.js';
import { dedupeByUrl } from '../shared/url-utils.js';

/**
 * Merge per-site accepted lists: newest first, equal dates keep arrival order,
 * then one entry per url.
 */
export function aggregateAnnouncements(perSite: readonly (readonly NormalizedAnnouncement[])[]): NormalizedAnnouncement[] {
    const merged = perSite.flat();
    // Array.prototype.sort is stable, so ties stay in arrival order
    const sorted = [...merged].sort((a, b) => timeOf(b) - timeOf(a));
    return dedupeByUrl(sorted);
}

function timeOf(item: NormalizedAnnouncement): number {
    return item.resolvedDate ? item.resolvedDate.getTime() : Number.MIN_SAFE_INTEGER;
}
