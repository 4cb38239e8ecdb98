/**
 * ODT constants: shared values used across the module.
 */

// ═══════════════════════════════════════════════════════════════════════
// Package paths
// ═══════════════════════════════════════════════════════════════════════

export const ODT_PATHS = {
    MIMETYPE: 'mimetype',
    META_XML: 'meta.xml',
    CONTENT_XML: 'content.xml',
} as const;

// ═══════════════════════════════════════════════════════════════════════
// Metadata tags (qualified names as they appear in meta.xml)
// ═══════════════════════════════════════════════════════════════════════

export const META_TAGS = {
    CONTAINER: 'office:meta',
    TITLE: 'dc:title',
    DESCRIPTION: 'dc:description',
    SUBJECT: 'dc:subject',
    KEYWORD: 'meta:keyword',
    AUTHOR: 'meta:initial-creator',
    CREATION_DATE: 'meta:creation-date',
    STATISTICS: 'meta:document-statistic',
    HYPERLINK: 'text:a',
} as const;

export const META_ATTRIBUTES = {
    TABLE_COUNT: 'meta:table-count',
    IMAGE_COUNT: 'meta:image-count',
    PAGE_COUNT: 'meta:page-count',
    PARAGRAPH_COUNT: 'meta:paragraph-count',
    WORD_COUNT: 'meta:word-count',
    CHARACTER_COUNT: 'meta:character-count',
    NON_WHITESPACE_CHARACTER_COUNT: 'meta:non-whitespace-character-count',
    HYPERLINK_TARGET: 'xlink:href',
} as const;

// ═══════════════════════════════════════════════════════════════════════
// Formatting
// ═══════════════════════════════════════════════════════════════════════

/** Joins the values of multi-valued fields on read. */
export const VALUE_SEPARATOR = ', ';

/** Splits multi-valued fields on write. */
export const WRITE_DELIMITER = ',';

// ═══════════════════════════════════════════════════════════════════════
// Streaming
// ═══════════════════════════════════════════════════════════════════════

export const DEFAULT_BUFFER_SIZE = 1024;

export const STAGING_PREFIX = 'odt-meta-';
