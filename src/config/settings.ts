import { z } from 'zod';
import { isLogLevel, type LogLevel } from '../server/logging.js';
import { DEFAULT_MAX_PAGES, MAX_PAGES_LIMIT } from '../scrapers/paginator.js';
import { DEFAULT_TIMEOUT_MS, MAX_TIMEOUT_MS, MIN_TIMEOUT_MS } from '../fetch/fetcher.js';

export const DEFAULT_KEYWORDS = ['羽球', '羽毛球'];
export const DEFAULT_MAX_AGE_DAYS = 120;
export const DEFAULT_SITES_FILE = 'config/sites.json';

export const SettingsSchema = z.object({
    keywords: z.array(z.string().min(1)).min(1),
    maxAgeDays: z.number().int().positive(),
    maxPages: z.number().int().min(1).max(MAX_PAGES_LIMIT),
    timeoutMs: z.number().int().min(MIN_TIMEOUT_MS).max(MAX_TIMEOUT_MS),
    logLevel: z.enum(['debug', 'info', 'warn', 'error']),
    logFile: z.string().min(1).nullable(),
    sitesFile: z.string().min(1)
});

export type Settings = z.infer<typeof SettingsSchema>;

type Env = Record<string, string | undefined>;

function readInt(value: string | undefined, fallback: number): number {
    if (!value || !value.trim()) return fallback;
    const parsed = Number(value.trim());
    return Number.isInteger(parsed) ? parsed : fallback;
}

function clamp(value: number, min: number, max: number): number {
    return Math.min(max, Math.max(min, value));
}

function readKeywords(value: string | undefined): string[] {
    const keywords = (value || '')
        .split(',')
        .map(k => k.trim())
        .filter(k => k.length > 0);
    return keywords.length > 0 ? keywords : [...DEFAULT_KEYWORDS];
}

function readLogLevel(value: string | undefined): LogLevel {
    const level = (value || '').trim().toLowerCase();
    return isLogLevel(level) ? level : 'info';
}

/**
 * Runtime settings from the environment. Unreadable values fall back to their
 * defaults; page count and timeout are clamped to their allowed ranges.
 */
export function loadSettings(env: Env = process.env): Settings {
    const maxAgeDays = readInt(env.BRIEFING_MAX_AGE_DAYS, DEFAULT_MAX_AGE_DAYS);

    return SettingsSchema.parse({
        keywords: readKeywords(env.BRIEFING_KEYWORDS),
        maxAgeDays: maxAgeDays > 0 ? maxAgeDays : DEFAULT_MAX_AGE_DAYS,
        maxPages: clamp(readInt(env.BRIEFING_MAX_PAGES, DEFAULT_MAX_PAGES), 1, MAX_PAGES_LIMIT),
        timeoutMs: clamp(readInt(env.FETCH_TIMEOUT_MS, DEFAULT_TIMEOUT_MS), MIN_TIMEOUT_MS, MAX_TIMEOUT_MS),
        logLevel: readLogLevel(env.LOG_LEVEL),
        logFile: env.LOG_FILE?.trim() || null,
        sitesFile: env.SITES_FILE?.trim() || DEFAULT_SITES_FILE
    });
}
