/**
 * Site configuration
 *
 * Sites are supplied by the caller, normally from config/sites.json. Each
 * entry names its listing page, the origin used to resolve relative links,
 * and which adapter reads the listing.
 */

import * as fs from 'fs';
import { z } from 'zod';
import type { SiteConfig } from '../types/index.js';

const datePattern = z
    .string()
    .min(1)
    .transform((source, ctx) => {
        try {
            return new RegExp(source);
        } catch {
            ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid date pattern: ${source}` });
            return z.NEVER;
        }
    });

const commonOptions = {
    datePattern: datePattern.optional(),
    minTitleLength: z.number().int().positive().optional(),
    nextPageLabel: z.string().min(1).optional()
};

const siteBase = {
    name: z.string().min(1),
    listingUrl: z.string().url(),
    originUrl: z.string().url()
};

export const SiteConfigSchema = z.discriminatedUnion('adapter', [
    z.object({
        ...siteBase,
        adapter: z.literal('table'),
        adapterOptions: z.object({ ...commonOptions, rowSelector: z.string().min(1).optional() }).strict().optional()
    }),
    z.object({
        ...siteBase,
        adapter: z.literal('anchors'),
        adapterOptions: z.object({ ...commonOptions, maxDepth: z.number().int().min(1).max(6).optional() }).strict().optional()
    })
]);

function entryLabel(entry: unknown, index: number): string {
    if (typeof entry === 'object' && entry !== null && 'name' in entry && typeof entry.name === 'string') {
        return `#${index} (${entry.name})`;
    }
    return `#${index}`;
}

/**
 * Validate raw site entries. Throws naming the first bad entry.
 */
export function parseSiteConfigs(data: unknown): SiteConfig[] {
    if (!Array.isArray(data)) {
        throw new Error('Site configuration must be a JSON array');
    }

    return data.map((entry: unknown, index: number): SiteConfig => {
        const result = SiteConfigSchema.safeParse(entry);
        if (!result.success) {
            const issues = result.error.issues
                .map(issue => `${issue.path.join('.') || 'entry'}: ${issue.message}`)
                .join('; ');
            throw new Error(`Invalid site entry ${entryLabel(entry, index)}: ${issues}`);
        }
        return result.data;
    });
}

export function loadSiteConfigs(filePath: string): SiteConfig[] {
    const raw = fs.readFileSync(filePath, 'utf-8');
    return parseSiteConfigs(JSON.parse(raw));
}

/**
 * Look up a site by display name
 */
export function getSiteConfig(sites: readonly SiteConfig[], name: string): SiteConfig | undefined {
    return sites.find(s => s.name === name);
}
