/**
 * URL helpers shared by the site adapters, the paginator and the aggregator.
 */

/**
 * Resolve an href against a base url. Returns null when the result is not an
 * http(s) url, so callers can skip just that link.
 */
export function resolveUrl(href: string, base: string): string | null {
    try {
        const u = new URL(href.trim(), base);
        if (!u.protocol.startsWith('http')) return null;
        return u.toString();
    } catch {
        return null;
    }
}

/**
 * Links that point nowhere: empty, bare fragment, or script pseudo-targets.
 */
export function isPlaceholderHref(href: string): boolean {
    const value = href.trim().toLowerCase();
    return value === '' || value.startsWith('#') || value.startsWith('javascript:');
}

export function isSameUrl(a: string, b: string): boolean {
    const left = resolveUrl(a, a);
    const right = resolveUrl(b, b);
    if (left === null || right === null) return a === b;
    return left === right;
}

/**
 * Keep the first item for each url, preserving first-seen order.
 */
export function dedupeByUrl<T extends { url: string }>(items: readonly T[]): T[] {
    const seen = new Set<string>();
    const unique: T[] = [];
    for (const item of items) {
        if (seen.has(item.url)) continue;
        seen.add(item.url);
        unique.push(item);
    }
    return unique;
}
