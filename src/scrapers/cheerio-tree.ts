import type { CheerioAPI } from 'cheerio';
import { isTag, type AnyNode, type Element } from 'domhandler';
import type { DocumentTree } from './extraction.js';

/**
 * DocumentTree over a loaded cheerio document. The walk stops below the
 * document root: only elements are ancestors.
 */
export function createCheerioTree($: CheerioAPI): DocumentTree<Element> {
    return {
        parent(node: Element): Element | null {
            const parent: AnyNode | null = node.parent;
            return parent !== null && isTag(parent) ? parent : null;
        },
        text(node: Element): string {
            return $(node).text();
        }
    };
}

export function collapseWhitespace(text: string): string {
    return text.replace(/\s+/g, ' ').trim();
}
