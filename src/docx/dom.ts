/**
 * DOM utilities for DOCX XML parts.
 *
 * Uses @xmldom/xmldom for parsing. Parser complaints are collected rather
 * than printed, so callers decide whether a part is usable.
 */

import { DOMParser } from '@xmldom/xmldom';

export interface XmlParseOutcome {
    /** Undefined when the parser produced no document at all. */
    document: Document | undefined;
    /** Messages reported at error or fatal level. */
    errors: string[];
    warnings: string[];
}

export function parseXml(xmlStr: string): XmlParseOutcome {
    const errors: string[] = [];
    const warnings: string[] = [];
    const parser = new DOMParser({
        errorHandler: {
            warning: (msg: string) => {
                warnings.push(msg);
            },
            error: (msg: string) => {
                errors.push(msg);
            },
            fatalError: (msg: string) => {
                errors.push(msg);
            },
        },
    });

    try {
        const document: Document | undefined = parser.parseFromString(xmlStr, 'application/xml');
        return { document, errors, warnings };
    } catch (error) {
        errors.push(error instanceof Error ? error.message : String(error));
        return { document: undefined, errors, warnings };
    }
}

/**
 * Convert any NodeList / HTMLCollection-like object into a real array.
 */
export function nodeListToArray<T extends Node = Node>(
    nl: { length: number; item(index: number): T | null },
): T[] {
    const arr: T[] = [];
    for (let i = 0; i < nl.length; i++) {
        const n = nl.item(i);
        if (n) arr.push(n);
    }
    return arr;
}

/** Direct element children, in document order. */
export function getElementChildren(node: Node): Element[] {
    const out: Element[] = [];
    for (const child of nodeListToArray(node.childNodes)) {
        if (isElement(child)) out.push(child);
    }
    return out;
}

export function isElement(node: Node): node is Element {
    return node.nodeType === 1;
}

/** Local name of an element, ignoring any namespace prefix. */
export function localNameOf(element: Element): string {
    return element.localName || element.nodeName.replace(/^.*:/, '');
}
