/**
 * Archive codec: zip archive ↔ directory tree.
 *
 * Single Responsibility: move entries between a zip file and a staging
 * directory without ever holding a whole entry in memory. Reading goes
 * through yauzl (lazy entries, one read stream at a time); writing goes
 * through JSZip's node stream generator fed by file read streams.
 *
 * Nothing here knows about ODT metadata; the session orchestrator is the
 * only caller that does.
 *
 * @module odt/archive
 */

import fs from 'fs/promises';
import { createReadStream, createWriteStream, type ReadStream } from 'fs';
import path from 'path';
import { pipeline } from 'stream/promises';
import type { Readable } from 'stream';
import yauzl, { type Entry, type ZipFile } from 'yauzl';
import JSZip from 'jszip';
import { OdtError, OdtErrorCode, withErrorContext } from './errors.js';
import { DEFAULT_BUFFER_SIZE, ODT_PATHS } from './constants.js';
import { validateBufferSize } from './validators.js';
import { logToStderr } from '../../utils/logger.js';
import type { ArchiveEntry, CodecOptions, PackResult, UnpackResult } from './types.js';

// ═══════════════════════════════════════════════════════════════════════
// yauzl callback → promise adapters
// ═══════════════════════════════════════════════════════════════════════

function openZip(archivePath: string): Promise<ZipFile> {
    return new Promise((resolve, reject) => {
        yauzl.open(archivePath, { lazyEntries: true, autoClose: false }, (err, zipfile) => {
            if (err) return reject(err);
            if (!zipfile) return reject(new Error(`Failed to open zip file: ${archivePath}`));
            resolve(zipfile);
        });
    });
}

/** Resolve with the next entry, or null once the central directory is exhausted. */
function nextEntry(zipfile: ZipFile): Promise<Entry | null> {
    return new Promise((resolve, reject) => {
        const cleanup = () => {
            zipfile.removeListener('entry', onEntry);
            zipfile.removeListener('end', onEnd);
            zipfile.removeListener('error', onError);
        };
        const onEntry = (entry: Entry) => {
            cleanup();
            resolve(entry);
        };
        const onEnd = () => {
            cleanup();
            resolve(null);
        };
        const onError = (err: Error) => {
            cleanup();
            reject(err);
        };
        zipfile.on('entry', onEntry);
        zipfile.on('end', onEnd);
        zipfile.on('error', onError);
        zipfile.readEntry();
    });
}

function openEntryStream(zipfile: ZipFile, entry: Entry): Promise<Readable> {
    return new Promise((resolve, reject) => {
        zipfile.openReadStream(entry, (err, stream) => {
            if (err) return reject(err);
            if (!stream) return reject(new Error(`Failed to open read stream for: ${entry.fileName}`));
            resolve(stream);
        });
    });
}

// ═══════════════════════════════════════════════════════════════════════
// Path helpers
// ═══════════════════════════════════════════════════════════════════════

/** Map an entry path onto the output root; reject anything that escapes it. */
function resolveInside(root: string, entryPath: string): string {
    const target = path.resolve(root, ...entryPath.split('/'));
    const relative = path.relative(root, target);
    if (!relative || relative.startsWith('..') || path.isAbsolute(relative)) {
        throw new OdtError(`Archive entry escapes output directory: ${entryPath}`, OdtErrorCode.INVALID_ENTRY, {
            entryPath,
        });
    }
    return target;
}

function compareNames(a: string, b: string): number {
    if (a < b) return -1;
    if (a > b) return 1;
    return 0;
}

// ═══════════════════════════════════════════════════════════════════════
// Unpack
// ═══════════════════════════════════════════════════════════════════════

/**
 * Extract every entry of `archivePath` under `outputDir`.
 *
 * Directory entries become empty directories; parents of file entries are
 * created on demand. Partially written output is left in place on failure.
 */
export async function unpackArchive(
    archivePath: string,
    outputDir: string,
    options: CodecOptions = {},
): Promise<UnpackResult> {
    const bufferSize = options.bufferSize ?? DEFAULT_BUFFER_SIZE;
    validateBufferSize(bufferSize);

    const root = path.resolve(outputDir);
    const context = { archivePath, outputDir };

    await withErrorContext(() => fs.mkdir(root, { recursive: true }), OdtErrorCode.IO_ERROR, context);
    const zipfile = await withErrorContext(() => openZip(archivePath), OdtErrorCode.IO_ERROR, context);

    const entries: ArchiveEntry[] = [];
    try {
        await withErrorContext(async () => {
            for (let entry = await nextEntry(zipfile); entry; entry = await nextEntry(zipfile)) {
                const isDirectory = entry.fileName.endsWith('/');
                const entryPath = isDirectory ? entry.fileName.slice(0, -1) : entry.fileName;
                const target = resolveInside(root, entryPath);

                if (isDirectory) {
                    await fs.mkdir(target, { recursive: true });
                    entries.push({ path: entryPath, kind: 'directory' });
                    continue;
                }

                await fs.mkdir(path.dirname(target), { recursive: true });
                const source = await openEntryStream(zipfile, entry);
                await pipeline(source, createWriteStream(target, { highWaterMark: bufferSize }));
                entries.push({ path: entryPath, kind: 'file' });
            }
        }, OdtErrorCode.IO_ERROR, context);
    } finally {
        zipfile.close();
    }

    logToStderr('debug', `Unpacked ${entries.length} entries from ${archivePath} into ${root}`);
    return { outputDir: root, entries };
}

// ═══════════════════════════════════════════════════════════════════════
// Pack
// ═══════════════════════════════════════════════════════════════════════

/**
 * Enumerate every directory and regular file under `root`.
 * Names are sorted at each level and parents precede their children, so
 * the order is stable for a given tree.
 */
export async function listDirectoryTree(root: string): Promise<ArchiveEntry[]> {
    const entries: ArchiveEntry[] = [];

    async function walk(dir: string, prefix: string): Promise<void> {
        const dirents = await fs.readdir(dir, { withFileTypes: true });
        dirents.sort((a, b) => compareNames(a.name, b.name));

        for (const dirent of dirents) {
            const entryPath = prefix ? `${prefix}/${dirent.name}` : dirent.name;
            if (dirent.isDirectory()) {
                entries.push({ path: entryPath, kind: 'directory' });
                await walk(path.join(dir, dirent.name), entryPath);
            } else if (dirent.isFile()) {
                entries.push({ path: entryPath, kind: 'file' });
            }
        }
    }

    await walk(root, '');
    return entries;
}

/** The ODF packaging rules want `mimetype` as the very first entry. */
function mimetypeFirst(entries: ArchiveEntry[]): ArchiveEntry[] {
    const index = entries.findIndex((e) => e.kind === 'file' && e.path === ODT_PATHS.MIMETYPE);
    if (index <= 0) return entries;
    return [entries[index], ...entries.slice(0, index), ...entries.slice(index + 1)];
}

/**
 * Build `archivePath` from the tree rooted at `sourceDir`.
 *
 * Entry paths are relative to the root; directories carry a trailing '/'.
 * A root-level `mimetype` file is written first and stored uncompressed.
 */
export async function packArchive(
    sourceDir: string,
    archivePath: string,
    options: CodecOptions = {},
): Promise<PackResult> {
    const bufferSize = options.bufferSize ?? DEFAULT_BUFFER_SIZE;
    validateBufferSize(bufferSize);

    const root = path.resolve(sourceDir);
    const context = { sourceDir, archivePath };

    const tree = await withErrorContext(() => listDirectoryTree(root), OdtErrorCode.IO_ERROR, context);
    const entries = mimetypeFirst(tree);

    const zip = new JSZip();
    const sources: { entry: ArchiveEntry; stream: ReadStream }[] = [];

    try {
        for (const entry of entries) {
            if (entry.kind === 'directory') {
                zip.file(`${entry.path}/`, null, { dir: true });
                continue;
            }
            const stream = createReadStream(path.join(root, ...entry.path.split('/')), { highWaterMark: bufferSize });
            sources.push({ entry, stream });
            zip.file(entry.path, stream, {
                binary: true,
                compression: entry.path === ODT_PATHS.MIMETYPE ? 'STORE' : 'DEFLATE',
            });
        }

        // A failed source never ends, so JSZip would wait on it forever.
        const aborter = new AbortController();
        const sourceFailure = new Promise<never>((_, reject) => {
            for (const { entry, stream } of sources) {
                stream.on('error', (err) => {
                    reject(new OdtError(`Cannot read ${entry.path}: ${err.message}`, OdtErrorCode.IO_ERROR, {
                        ...context,
                        entryPath: entry.path,
                    }));
                    aborter.abort(err);
                });
            }
        });

        await withErrorContext(
            () => Promise.race([
                pipeline(
                    zip.generateNodeStream({ type: 'nodebuffer', streamFiles: true, compression: 'DEFLATE' }),
                    createWriteStream(archivePath, { highWaterMark: bufferSize }),
                    { signal: aborter.signal },
                ),
                sourceFailure,
            ]),
            OdtErrorCode.IO_ERROR,
            context,
        );
    } finally {
        for (const { stream } of sources) {
            stream.destroy();
        }
    }

    logToStderr('debug', `Packed ${entries.length} entries from ${root} into ${archivePath}`);
    return { archivePath, entries };
}
