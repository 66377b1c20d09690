/**
 * Generic anchor adapter
 *
 * For responsive listings where titles and dates are nested unpredictably and
 * the table-row assumption does not hold. Ignores layout entirely: every
 * anchor on the page is a potential title, and its date is found by walking
 * up to nearby ancestor text.
 */

import type { CheerioAPI } from 'cheerio';
import type { AnnouncementCandidate, GenericAnchorOptions, SiteConfig } from '../../types/index.js';
import { BaseAdapter, type BaseAdapterOptions } from '../base-adapter.js';
import { createCheerioTree } from '../cheerio-tree.js';
import { findNearbyDate } from '../extraction.js';

type ResolvedAnchorOptions = BaseAdapterOptions & { maxDepth: number };

export const GENERIC_ANCHOR_DEFAULTS: ResolvedAnchorOptions = {
    datePattern: /\d{4}-\d{2}-\d{2}/,
    maxDepth: 3,
    minTitleLength: 5,
    nextPageLabel: '下一頁'
};

export class GenericAnchorAdapter extends BaseAdapter<ResolvedAnchorOptions> {
    readonly kind = 'anchors' as const;

    constructor(overrides: GenericAnchorOptions = {}) {
        super({
            datePattern: overrides.datePattern ?? GENERIC_ANCHOR_DEFAULTS.datePattern,
            maxDepth: overrides.maxDepth ?? GENERIC_ANCHOR_DEFAULTS.maxDepth,
            minTitleLength: overrides.minTitleLength ?? GENERIC_ANCHOR_DEFAULTS.minTitleLength,
            nextPageLabel: overrides.nextPageLabel ?? GENERIC_ANCHOR_DEFAULTS.nextPageLabel
        });
    }

    protected extractCandidates($: CheerioAPI, site: SiteConfig): AnnouncementCandidate[] {
        const tree = createCheerioTree($);
        const candidates: AnnouncementCandidate[] = [];

        for (const el of $('a[href]').toArray()) {
            const anchor = $(el);
            const title = anchor.text();

            // Most anchors on a page are navigation; skip them before walking
            if (title.trim().length < this.options.minTitleLength) continue;

            const rawDate = findNearbyDate(el, tree, {
                datePattern: this.options.datePattern,
                maxDepth: this.options.maxDepth
            });
            if (!rawDate) continue;

            const candidate = this.buildCandidate(site, { title, href: anchor.attr('href') ?? '', rawDate });
            if (candidate) candidates.push(candidate);
        }

        return candidates;
    }
}
