import { XMLParser, XMLValidator } from 'fast-xml-parser';
import type { RawPaperRecord } from '../types/index.js';

/**
 * Minimal ordered XML tree built from fast-xml-parser's `preserveOrder`
 * output. Text nodes are plain strings.
 */
export interface XmlElement {
    name: string;
    children: XmlNode[];
}

export type XmlNode = XmlElement | string;

const parser = new XMLParser({
    preserveOrder: true,
    ignoreAttributes: true,
    removeNSPrefix: true,
    trimValues: false,
    parseTagValue: false,
});

/**
 * Parse GROBID TEI XML into a raw paper record.
 *
 * - title: first `title` under `teiHeader/fileDesc/titleStmt`
 * - abstract: all text under the first `abstract`
 * - body: all text under `text/body`
 * - references: first non-empty `title` of each `listBibl/biblStruct`
 *
 * Returns null for malformed XML or a document that is not TEI.
 */
export function parseTei(xml: string): RawPaperRecord | null {
    if (!xml.trim() || XMLValidator.validate(xml) !== true) return null;

    const roots = toNodes(parser.parse(xml));
    const tei = roots.find((node): node is XmlElement => typeof node !== 'string' && node.name === 'TEI');
    if (!tei) return null;

    const titleStmt = findFirst(tei, 'titleStmt');
    const title = titleStmt ? findFirst(titleStmt, 'title') : undefined;
    const abstract = findFirst(tei, 'abstract');
    const text = findFirst(tei, 'text');
    const body = text ? findFirst(text, 'body') : undefined;

    const references: string[] = [];
    for (const list of findAll(tei, 'listBibl')) {
        for (const entry of list.children) {
            if (typeof entry === 'string' || entry.name !== 'biblStruct') continue;
            const refTitle = findAll(entry, 'title')
                .map(textOf)
                .find((t) => t.length > 0);
            if (refTitle) references.push(refTitle);
        }
    }

    return {
        title: title ? textOf(title) : '',
        abstract: abstract ? textOf(abstract) : '',
        body: body ? textOf(body) : '',
        references,
    };
}

/**
 * Depth-first search for the first descendant element with the given name.
 */
export function findFirst(root: XmlElement, name: string): XmlElement | undefined {
    for (const child of root.children) {
        if (typeof child === 'string') continue;
        if (child.name === name) return child;
        const found = findFirst(child, name);
        if (found) return found;
    }
    return undefined;
}

/**
 * All descendant elements with the given name, in document order.
 * Does not descend into a match.
 */
export function findAll(root: XmlElement, name: string): XmlElement[] {
    const found: XmlElement[] = [];
    for (const child of root.children) {
        if (typeof child === 'string') continue;
        if (child.name === name) {
            found.push(child);
        } else {
            found.push(...findAll(child, name));
        }
    }
    return found;
}

/**
 * Concatenated text of an element and its descendants, whitespace collapsed.
 * Adjacent elements are separated by a space so paragraphs don't fuse.
 */
export function textOf(node: XmlNode): string {
    const parts: string[] = [];
    collectText(node, parts);
    return parts.join(' ').replace(/\s+/g, ' ').trim();
}

function collectText(node: XmlNode, parts: string[]): void {
    if (typeof node === 'string') {
        parts.push(node);
        return;
    }
    for (const child of node.children) collectText(child, parts);
}

/**
 * Convert parser output (`[{ tag: [...children] }, { '#text': '...' }]`)
 * into XmlNodes, dropping comments, attributes and processing instructions.
 */
function toNodes(raw: unknown): XmlNode[] {
    if (!Array.isArray(raw)) return [];

    const nodes: XmlNode[] = [];
    for (const item of raw) {
        if (typeof item !== 'object' || item === null) continue;

        for (const [key, value] of Object.entries(item)) {
            if (key === '#text') {
                if (typeof value === 'string' || typeof value === 'number') nodes.push(String(value));
            } else if (key !== ':@' && !key.startsWith('?') && key !== '#comment') {
                nodes.push({ name: key, children: toNodes(value) });
            }
        }
    }
    return nodes;
}
