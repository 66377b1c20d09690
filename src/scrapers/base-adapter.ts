/**
 * Base Site Adapter
 *
 * Shared plumbing for the listing adapters:
 * - loads the page with cheerio
 * - builds candidates with absolute urls and the title-length floor
 * - dedupes by url (first occurrence wins)
 * - finds the "next page" link when the adapter has a label for it
 */

import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import type { AdapterKind, AnnouncementCandidate, PageFetchResult, SiteAdapter, SiteConfig } from '../types/index.js';
import { dedupeByUrl, isPlaceholderHref, isSameUrl, resolveUrl } from '../shared/url-utils.js';
import { collapseWhitespace } from './cheerio-tree.js';

export type BaseAdapterOptions = {
    datePattern: RegExp;
    minTitleLength: number;
    nextPageLabel: string | null;
};

export abstract class BaseAdapter<O extends BaseAdapterOptions = BaseAdapterOptions> implements SiteAdapter {
    abstract readonly kind: AdapterKind;
    protected readonly options: O;

    constructor(options: O) {
        this.options = options;
    }

    /**
     * Each adapter walks the loaded document its own way.
     */
    protected abstract extractCandidates($: CheerioAPI, site: SiteConfig): AnnouncementCandidate[];

    parse(html: string, site: SiteConfig): PageFetchResult {
        const $ = cheerio.load(html);
        return {
            candidates: dedupeByUrl(this.extractCandidates($, site)),
            nextPageUrl: this.options.nextPageLabel ? this.findNextPage($, site, this.options.nextPageLabel) : null
        };
    }

    /**
     * Build a candidate, or null when the title is navigation-sized or the
     * href cannot be resolved.
     */
    protected buildCandidate(site: SiteConfig, data: { title: string; href: string; rawDate: string }): AnnouncementCandidate | null {
        const title = collapseWhitespace(data.title);
        if (title.length < this.options.minTitleLength) return null;
        if (isPlaceholderHref(data.href)) return null;

        const url = resolveUrl(data.href, site.originUrl);
        if (!url) return null;

        return {
            site: site.name,
            rawDate: data.rawDate,
            title,
            url
        };
    }

    /**
     * First anchor in document order whose text carries the label, whose
     * target is real, and which does not lead back to the listing page.
     */
    protected findNextPage($: CheerioAPI, site: SiteConfig, label: string): string | null {
        for (const el of $('a[href]').toArray()) {
            const anchor = $(el);
            if (!anchor.text().includes(label)) continue;

            const href = anchor.attr('href') ?? '';
            if (isPlaceholderHref(href)) continue;

            const url = resolveUrl(href, site.originUrl);
            if (!url || isSameUrl(url, site.listingUrl)) continue;

            return url;
        }
        return null;
    }
}
