/**
 * DOM utilities for ODT XML manipulation.
 *
 * Single Responsibility: XML parsing, serialisation and the few generic
 * element helpers the metadata mapper needs. No file I/O.
 *
 * Uses @xmldom/xmldom so that the document order of nodes is preserved
 * across a parse/serialise round trip.
 */

import { DOMParser, XMLSerializer } from '@xmldom/xmldom';
import { OdtError, OdtErrorCode } from './errors.js';
import { logToStderr } from '../../utils/logger.js';

// ═══════════════════════════════════════════════════════════════════════
// XML parse / serialize
// ═══════════════════════════════════════════════════════════════════════

/**
 * Parse XML text into a mutable Document.
 * Errors that xmldom would only report are raised as PARSE_ERROR.
 */
export function parseXml(xmlStr: string, source?: string): Document {
    const fail = (message: string): never => {
        throw new OdtError(`Malformed XML: ${message}`, OdtErrorCode.PARSE_ERROR, { source });
    };

    const parser = new DOMParser({
        errorHandler: {
            warning: (message: string) => logToStderr('warning', `XML warning${source ? ` in ${source}` : ''}: ${message}`),
            error: fail,
            fatalError: fail,
        },
    });

    const doc = parser.parseFromString(xmlStr, 'application/xml');
    if (!doc || !doc.documentElement) {
        fail('document has no root element');
    }
    return doc;
}

export function serializeXml(doc: Document): string {
    return new XMLSerializer().serializeToString(doc);
}

// ═══════════════════════════════════════════════════════════════════════
// Generic DOM helpers
// ═══════════════════════════════════════════════════════════════════════

/**
 * Convert any NodeList / HTMLCollection-like object into a real array.
 * The result is a snapshot: later tree mutations do not affect it.
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

/** Every element named `tagName`, in document order. */
export function getElements(doc: Document, tagName: string): Element[] {
    return nodeListToArray(doc.getElementsByTagName(tagName));
}

/** The first element named `tagName`, or null. */
export function getFirstElement(doc: Document, tagName: string): Element | null {
    return doc.getElementsByTagName(tagName).item(0);
}

/** Detach `node` from its parent; no-op for a node without one. */
export function detach(node: Node): void {
    node.parentNode?.removeChild(node);
}
