import * as cheerio from 'cheerio';
import { describe, expect, it } from 'vitest';
import { createCheerioTree } from '../cheerio-tree.js';
import { findNearbyDate, matchDate, type DocumentTree } from '../extraction.js';

type FakeNode = { text: string; parent: FakeNode | null };

const tree: DocumentTree<FakeNode> = {
    parent: node => node.parent,
    text: node => node.text
};

const ISO_DATE = /\d{4}-\d{2}-\d{2}/;

function chain(...texts: string[]): FakeNode {
    // texts run from the outermost ancestor down to the anchor
    let node: FakeNode | null = null;
    for (const text of texts) {
        node = { text, parent: node };
    }
    if (!node) throw new Error('empty chain');
    return node;
}

describe('findNearbyDate', () => {
    it('returns the match from the closest ancestor', () => {
        const anchor = chain('page 2024-01-01', 'row 2025-02-02', 'cell', 'anchor 2026-03-03');
        expect(findNearbyDate(anchor, tree, { datePattern: ISO_DATE, maxDepth: 3 })).toBe('2025-02-02');
    });

    it('ignores a date in the anchor text itself', () => {
        const anchor = chain('cell', 'anchor 2026-03-03');
        expect(findNearbyDate(anchor, tree, { datePattern: ISO_DATE, maxDepth: 3 })).toBeNull();
    });

    it('stops at the depth bound', () => {
        const anchor = chain('row 2025-02-02', 'wrapper', 'wrapper', 'cell', 'anchor');
        expect(findNearbyDate(anchor, tree, { datePattern: ISO_DATE, maxDepth: 3 })).toBeNull();
        expect(findNearbyDate(anchor, tree, { datePattern: ISO_DATE, maxDepth: 4 })).toBe('2025-02-02');
    });

    it('returns null for a detached anchor', () => {
        expect(findNearbyDate(chain('anchor'), tree, { datePattern: ISO_DATE, maxDepth: 3 })).toBeNull();
    });

    it('works over a cheerio document', () => {
        const $ = cheerio.load('<table><tr><td><a href="/a">羽球場地開放公告</a></td><td>2025-05-01</td></tr></table>');
        const anchor = $('a').get(0);
        expect(anchor).toBeDefined();
        if (!anchor) return;
        const cheerioTree = createCheerioTree($);
        expect(findNearbyDate(anchor, cheerioTree, { datePattern: ISO_DATE, maxDepth: 1 })).toBeNull();
        expect(findNearbyDate(anchor, cheerioTree, { datePattern: ISO_DATE, maxDepth: 2 })).toBe('2025-05-01');
    });
});

describe('matchDate', () => {
    it('gives the same answer on repeated calls with a global pattern', () => {
        const pattern = /\d{4}-\d{2}-\d{2}/g;
        expect(matchDate('posted 2025-05-01', pattern)).toBe('2025-05-01');
        expect(matchDate('posted 2025-05-01', pattern)).toBe('2025-05-01');
    });
});
