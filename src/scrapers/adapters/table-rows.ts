/**
 * Table row adapter
 *
 * For plain server-rendered listings where each announcement is one row:
 * a row that holds both a date and a titled link becomes one candidate,
 * titled by the first link in the row long enough to be a title.
 */

import type { CheerioAPI } from 'cheerio';
import type { AnnouncementCandidate, SiteConfig, TableRowOptions } from '../../types/index.js';
import { isPlaceholderHref } from '../../shared/url-utils.js';
import { BaseAdapter, type BaseAdapterOptions } from '../base-adapter.js';
import { matchDate } from '../extraction.js';

type ResolvedTableOptions = BaseAdapterOptions & { rowSelector: string };

export const TABLE_ROW_DEFAULTS: ResolvedTableOptions = {
    datePattern: /\d{3,4}([./-])\d{1,2}\1\d{1,2}/,
    minTitleLength: 4,
    rowSelector: 'tr',
    nextPageLabel: null
};

export class TableRowAdapter extends BaseAdapter<ResolvedTableOptions> {
    readonly kind = 'table' as const;

    constructor(overrides: TableRowOptions = {}) {
        super({
            datePattern: overrides.datePattern ?? TABLE_ROW_DEFAULTS.datePattern,
            minTitleLength: overrides.minTitleLength ?? TABLE_ROW_DEFAULTS.minTitleLength,
            rowSelector: overrides.rowSelector ?? TABLE_ROW_DEFAULTS.rowSelector,
            nextPageLabel: overrides.nextPageLabel ?? TABLE_ROW_DEFAULTS.nextPageLabel
        });
    }

    protected extractCandidates($: CheerioAPI, site: SiteConfig): AnnouncementCandidate[] {
        const candidates: AnnouncementCandidate[] = [];
        const selector = this.options.rowSelector;

        for (const el of $(selector).toArray()) {
            const row = $(el);
            // Layout tables wrap whole listings in one outer row; only leaf rows are announcements
            if (row.find(selector).length > 0) continue;

            const rawDate = matchDate(row.text(), this.options.datePattern);
            if (!rawDate) continue;

            // Category and attachment links often precede the title; take the first anchor that reads as one
            for (const a of row.find('a[href]').toArray()) {
                const anchor = $(a);
                const href = anchor.attr('href') ?? '';
                if (isPlaceholderHref(href)) continue;

                const title = anchor.text().trim() || (anchor.attr('title') ?? '');
                const candidate = this.buildCandidate(site, { title, href, rawDate });
                if (candidate) {
                    candidates.push(candidate);
                    break;
                }
            }
        }

        return candidates;
    }
}
