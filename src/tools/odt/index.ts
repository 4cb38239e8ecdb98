/**
 * ODT Metadata Library: Public API
 *
 * Re-exports only the symbols that external consumers need.
 *
 * @module odt
 */

// ── Archive codec ───────────────────────────────────────────────────────────
export { unpackArchive, packArchive, listDirectoryTree } from './archive.js';

// ── Documents and fields ────────────────────────────────────────────────────
export { ParsedDocument } from './parsed-document.js';
export { MetadataMapper, splitMultiValue } from './metadata.js';
export { FIELD_DESCRIPTORS, METADATA_FIELD_NAMES, WRITABLE_FIELD_NAMES } from './fields.js';

// ── Sessions ────────────────────────────────────────────────────────────────
export { readOdtMetadata, writeOdtMetadata } from './session.js';

// ── Types ───────────────────────────────────────────────────────────────────
export type {
  ArchiveEntry,
  CodecOptions,
  UnpackResult,
  PackResult,
  FieldDescriptor,
  MetadataFieldName,
  WritableFieldName,
  OdtMetadata,
  MetadataChanges,
  SessionOptions,
  WriteSessionOptions,
  ReadOdtMetadataResult,
  WriteOdtMetadataResult,
} from './types.js';

// ── Errors ──────────────────────────────────────────────────────────────────
export { OdtError, OdtErrorCode } from './errors.js';
