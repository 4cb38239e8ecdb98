/**
 * Type definitions for ODT operations.
 * Single source of truth for every type used across the ODT module.
 */

// ═══════════════════════════════════════════════════════════════════════
// Archive codec
// ═══════════════════════════════════════════════════════════════════════

export type ArchiveEntryKind = 'directory' | 'file';

export interface ArchiveEntry {
    /** Relative, '/'-separated, no leading separator, no trailing '/'. */
    path: string;
    kind: ArchiveEntryKind;
}

export interface CodecOptions {
    /** Upper bound in bytes on each stream buffer. */
    bufferSize?: number;
}

export interface UnpackResult {
    outputDir: string;
    entries: ArchiveEntry[];
}

export interface PackResult {
    archivePath: string;
    entries: ArchiveEntry[];
}

// ═══════════════════════════════════════════════════════════════════════
// Metadata fields
// ═══════════════════════════════════════════════════════════════════════

export type FieldMultiplicity = 'single' | 'multi';

export interface FieldDescriptor {
    tag: string;
    /** Present when the value lives in an attribute rather than in text. */
    attribute?: string;
    multiplicity: FieldMultiplicity;
    writable: boolean;
    label: string;
}

export type WritableFieldName = 'title' | 'description' | 'subject' | 'keywords' | 'author';

export type ReadOnlyFieldName =
    | 'creationDate'
    | 'tableCount'
    | 'imageCount'
    | 'pageCount'
    | 'paragraphCount'
    | 'wordCount'
    | 'characterCount'
    | 'nonWhitespaceCharacterCount'
    | 'hyperlinks';

export type MetadataFieldName = WritableFieldName | ReadOnlyFieldName;

/** Every field rendered as text, exactly as the mapper reads it. */
export type OdtMetadata = Record<MetadataFieldName, string>;

/** `undefined` and `null` both mean "leave untouched"; '' clears. */
export type MetadataChanges = Partial<Record<WritableFieldName, string | null>>;

// ═══════════════════════════════════════════════════════════════════════
// Session
// ═══════════════════════════════════════════════════════════════════════

export interface SessionOptions extends CodecOptions {
    /** Directory under which staging directories are created. */
    stagingRoot?: string;
    /** Leave the staging directory on disk after the session. */
    keepStaging?: boolean;
}

export interface WriteSessionOptions extends SessionOptions {
    /** Defaults to the input path (edit in place). */
    outputPath?: string;
}

export interface ReadOdtMetadataResult {
    path: string;
    metadata: OdtMetadata;
}

export interface WriteOdtMetadataResult {
    path: string;
    outputPath: string;
    applied: WritableFieldName[];
    metadata: OdtMetadata;
}
