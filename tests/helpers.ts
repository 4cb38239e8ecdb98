import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { fileURLToPath } from 'url';
import JSZip from 'jszip';

export const FIXTURES_DIR = fileURLToPath(new URL('./fixtures/', import.meta.url));

export const ODT_MIME = 'application/vnd.oasis.opendocument.text';

export function makeTempDir(prefix = 'odt-meta-test-'): Promise<string> {
    return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string): Promise<void> {
    return fs.rm(dir, { recursive: true, force: true });
}

export function readFixture(name: string): Promise<string> {
    return fs.readFile(path.join(FIXTURES_DIR, name), 'utf8');
}

/** Write a zip with exactly the given entries (no implied folder entries). */
export async function writeZip(target: string, files: Record<string, string | Uint8Array>): Promise<void> {
    const zip = new JSZip();
    for (const [name, content] of Object.entries(files)) {
        zip.file(name, content, { createFolders: false });
    }
    const buf = await zip.generateAsync({ type: 'nodebuffer', compression: 'DEFLATE' });
    await fs.writeFile(target, buf);
}

/** Build a minimal ODT from the fixtures; `overrides` replaces or adds entries. */
export async function buildOdt(
    target: string,
    overrides: Record<string, string | Uint8Array> = {},
): Promise<void> {
    await writeZip(target, {
        mimetype: ODT_MIME,
        'content.xml': await readFixture('content.xml'),
        'meta.xml': await readFixture('meta.xml'),
        'META-INF/manifest.xml': await readFixture('manifest.xml'),
        ...overrides,
    });
}

/** Deterministic pseudo-random bytes. */
export function sampleBytes(length: number, seed = 7): Uint8Array {
    const bytes = new Uint8Array(length);
    let state = seed;
    for (let i = 0; i < length; i++) {
        state = (state * 1103515245 + 12345) % 2147483648;
        bytes[i] = state % 256;
    }
    return bytes;
}
