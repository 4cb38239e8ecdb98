/**
 * ODT Validation Utilities
 *
 * Input validation for paths, buffer sizes and metadata changes.
 *
 * @module odt/validators
 */

import fs from 'fs/promises';
import { OdtError, OdtErrorCode } from './errors.js';
import { FIELD_DESCRIPTORS, isMetadataFieldName } from './fields.js';

/** Check if a file path has an `.odt` extension. */
export function isOdtPath(filePath: string): boolean {
  return filePath.toLowerCase().endsWith('.odt');
}

/** Validate that an ODT file path is a non-empty string ending in `.odt`. */
export function validateOdtPath(path: string): void {
  const normalised = path.trim();
  if (!normalised) {
    throw new OdtError('ODT path cannot be empty', OdtErrorCode.INVALID_PATH, { path });
  }
  if (!isOdtPath(normalised)) {
    throw new OdtError('Invalid ODT path: must end with .odt', OdtErrorCode.INVALID_PATH, { path: normalised });
  }
}

/** Validate that `path` names an existing regular file. */
export async function validateExistingFile(path: string): Promise<void> {
  let isFile = false;
  try {
    isFile = (await fs.stat(path)).isFile();
  } catch {
    throw new OdtError(`File not found: ${path}`, OdtErrorCode.INVALID_PATH, { path });
  }
  if (!isFile) {
    throw new OdtError(`Not a regular file: ${path}`, OdtErrorCode.INVALID_PATH, { path });
  }
}

/** Validate a stream buffer size (positive integer). */
export function validateBufferSize(bufferSize: number): void {
  if (!Number.isInteger(bufferSize) || bufferSize <= 0) {
    throw new OdtError('Buffer size must be a positive integer', OdtErrorCode.CONFIG_ERROR, { bufferSize });
  }
}

/** Validate that every key of a change set names a writable field. */
export function validateChanges(changes: Record<string, unknown>): void {
  for (const key of Object.keys(changes)) {
    if (!isMetadataFieldName(key)) {
      throw new OdtError(`Unknown metadata field: ${key}`, OdtErrorCode.READ_ONLY_FIELD, { field: key });
    }
    if (!FIELD_DESCRIPTORS[key].writable) {
      throw new OdtError(`Metadata field is read-only: ${key}`, OdtErrorCode.READ_ONLY_FIELD, { field: key });
    }
  }
}
