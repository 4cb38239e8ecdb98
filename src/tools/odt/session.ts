/**
 * Metadata session: the read / edit orchestrators.
 *
 * Single Responsibility: coordinate one round trip:
 *   1. Validate the input path
 *   2. Unpack the ODT into a fresh staging directory
 *   3. Load meta.xml into a ParsedDocument
 *   4. Read (and optionally apply changes through) a MetadataMapper
 *   5. Save meta.xml and repack the staging directory
 *   6. Remove the staging directory
 *
 * Each step delegates to a single-purpose module; this file holds no
 * archive, DOM or field logic of its own.
 */

import fs from 'fs/promises';
import path from 'path';
import { unpackArchive, packArchive } from './archive.js';
import { ParsedDocument } from './parsed-document.js';
import { MetadataMapper } from './metadata.js';
import { OdtError, OdtErrorCode, errorMessage, withErrorContext } from './errors.js';
import { ODT_PATHS, STAGING_PREFIX } from './constants.js';
import { validateChanges, validateExistingFile, validateOdtPath } from './validators.js';
import { getConfig } from '../../config.js';
import { logToStderr } from '../../utils/logger.js';
import type {
    MetadataChanges,
    OdtMetadata,
    ReadOdtMetadataResult,
    SessionOptions,
    WriteOdtMetadataResult,
    WriteSessionOptions,
} from './types.js';

interface ResolvedSessionOptions {
    bufferSize: number;
    stagingRoot: string;
    keepStaging: boolean;
}

function resolveOptions(options: SessionOptions): ResolvedSessionOptions {
    const config = getConfig();
    return {
        bufferSize: options.bufferSize ?? config.bufferSize,
        stagingRoot: options.stagingRoot ?? config.stagingRoot,
        keepStaging: options.keepStaging ?? config.keepStaging,
    };
}

async function removeQuietly(target: string): Promise<void> {
    try {
        await fs.rm(target, { recursive: true, force: true });
    } catch (error) {
        logToStderr('warning', `Failed to remove ${target}: ${errorMessage(error)}`);
    }
}

async function exists(target: string): Promise<boolean> {
    try {
        await fs.access(target);
        return true;
    } catch {
        return false;
    }
}

/** Hyperlinks live in the document body; every other field comes from meta.xml. */
async function withBodyHyperlinks(stagingDir: string, metadata: OdtMetadata): Promise<OdtMetadata> {
    const contentPath = path.join(stagingDir, ODT_PATHS.CONTENT_XML);
    if (!(await exists(contentPath))) return metadata;

    const content = await ParsedDocument.load(contentPath);
    return { ...metadata, hyperlinks: new MetadataMapper(content).getHyperlinks() };
}

/** Run `fn` against a staging directory holding the unpacked archive. */
async function withStagedArchive<T>(
    odtPath: string,
    options: ResolvedSessionOptions,
    fn: (stagingDir: string, metaPath: string) => Promise<T>,
): Promise<T> {
    const stagingDir = await withErrorContext(
        async () => {
            await fs.mkdir(options.stagingRoot, { recursive: true });
            return fs.mkdtemp(path.join(options.stagingRoot, STAGING_PREFIX));
        },
        OdtErrorCode.IO_ERROR,
        { stagingRoot: options.stagingRoot },
    );

    try {
        await unpackArchive(odtPath, stagingDir, { bufferSize: options.bufferSize });

        const metaPath = path.join(stagingDir, ODT_PATHS.META_XML);
        if (!(await exists(metaPath))) {
            throw new OdtError(`Invalid ODT: missing ${ODT_PATHS.META_XML}`, OdtErrorCode.INVALID_ODT, { path: odtPath });
        }

        return await fn(stagingDir, metaPath);
    } finally {
        if (options.keepStaging) {
            logToStderr('info', `Staging directory kept at ${stagingDir}`);
        } else {
            await removeQuietly(stagingDir);
        }
    }
}

/** Read every metadata field of an ODT file. */
export async function readOdtMetadata(odtPath: string, options: SessionOptions = {}): Promise<ReadOdtMetadataResult> {
    validateOdtPath(odtPath);
    await validateExistingFile(odtPath);
    const resolved = resolveOptions(options);

    return withStagedArchive(odtPath, resolved, async (stagingDir, metaPath) => {
        const document = await ParsedDocument.load(metaPath);
        const metadata = await withBodyHyperlinks(stagingDir, new MetadataMapper(document).toRecord());
        return { path: odtPath, metadata };
    });
}

/**
 * Apply `changes` to an ODT file and repack it.
 *
 * The new archive is written beside `outputPath` first and renamed into
 * place, so a failed pack never clobbers an existing file.
 */
export async function writeOdtMetadata(
    odtPath: string,
    changes: MetadataChanges,
    options: WriteSessionOptions = {},
): Promise<WriteOdtMetadataResult> {
    validateOdtPath(odtPath);
    await validateExistingFile(odtPath);
    validateChanges(changes);
    const outputPath = options.outputPath ?? odtPath;
    validateOdtPath(outputPath);
    const resolved = resolveOptions(options);

    return withStagedArchive(odtPath, resolved, async (stagingDir, metaPath) => {
        const document = await ParsedDocument.load(metaPath);
        const mapper = new MetadataMapper(document);
        const applied = mapper.applyChanges(changes);
        await document.save();

        const tempPath = `${outputPath}.${process.pid}.tmp`;
        try {
            await packArchive(stagingDir, tempPath, { bufferSize: resolved.bufferSize });
            await withErrorContext(() => fs.rename(tempPath, outputPath), OdtErrorCode.IO_ERROR, { outputPath });
        } catch (error) {
            await removeQuietly(tempPath);
            throw error;
        }

        logToStderr('info', `Updated ${applied.length ? applied.join(', ') : 'no fields'} in ${outputPath}`);
        const metadata = await withBodyHyperlinks(stagingDir, mapper.toRecord());
        return { path: odtPath, outputPath, applied, metadata };
    });
}
