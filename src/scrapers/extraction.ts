/**
 * Ancestor-walk date extraction.
 *
 * School listings have no machine-readable link between a title anchor and
 * its publish date; the date is only "nearby text". Starting at the anchor's
 * parent we climb a bounded number of levels and take the first date-shaped
 * match, so the closest ancestor wins.
 *
 * The walk only needs parent and flattened-text access, which keeps it
 * independent of the HTML library (see cheerio-tree.ts).
 */

export interface DocumentTree<N> {
    parent(node: N): N | null;
    text(node: N): string;
}

export interface DateSearchOptions {
    datePattern: RegExp;
    /** Number of ancestors to inspect, counting the anchor's parent as the first. */
    maxDepth: number;
}

export function findNearbyDate<N>(anchor: N, tree: DocumentTree<N>, options: DateSearchOptions): string | null {
    let node = tree.parent(anchor);
    for (let level = 0; node !== null && level < options.maxDepth; level++) {
        const match = matchDate(tree.text(node), options.datePattern);
        if (match) return match;
        node = tree.parent(node);
    }
    return null;
}

/**
 * First match of `pattern` in `text`. Global and sticky flags are ignored so a
 * shared RegExp never carries lastIndex between calls.
 */
export function matchDate(text: string, pattern: RegExp): string | null {
    const flags = pattern.flags.replace(/[gy]/g, '');
    const match = new RegExp(pattern.source, flags).exec(text);
    return match ? match[0] : null;
}
