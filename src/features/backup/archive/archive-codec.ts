import archiver from 'archiver';
import fs from 'fs';
import JSZip from 'jszip';
import path from 'path';
import { logger } from '../../../utils/logger';
import { ArchiveCorruptError, errorMessage } from '../errors';

export type ArchiveEntry =
    | { kind: 'bytes'; path: string; data: Buffer | string }
    | { kind: 'file'; path: string; sourcePath: string }
    | { kind: 'directory'; path: string; sourceDir: string };

/**
 * Split an entry name into safe path segments: backslashes become separators,
 * and empty, `.` and `..` segments are dropped so nothing escapes the target.
 */
export function normalizeEntryPath(name: string): string[] {
    return name
        .replace(/\\/g, '/')
        .split('/')
        .filter(seg => seg.length > 0 && seg !== '.' && seg !== '..');
}

/**
 * Pack entries into a zip held in memory. Archive paths always use forward
 * slashes, whatever the platform.
 */
export function packArchive(entries: ArchiveEntry[]): Promise<Buffer> {
    return new Promise((resolve, reject) => {
        const archive = archiver('zip', { zlib: { level: 9 } });
        const chunks: Buffer[] = [];

        archive.on('data', (chunk: Buffer) => chunks.push(chunk));
        archive.on('end', () => resolve(Buffer.concat(chunks)));
        archive.on('error', (err) => reject(err));
        archive.on('warning', (err) => logger.warn('[ArchiveCodec] Warning while packing:', err));

        for (const entry of entries) {
            const name = normalizeEntryPath(entry.path).join('/');
            switch (entry.kind) {
                case 'bytes':
                    archive.append(entry.data, { name });
                    break;
                case 'file':
                    archive.file(entry.sourcePath, { name });
                    break;
                case 'directory':
                    archive.directory(entry.sourceDir, name);
                    break;
            }
        }

        archive.finalize().catch(reject);
    });
}

async function loadZip(data: Buffer | Uint8Array): Promise<JSZip> {
    try {
        return await JSZip.loadAsync(data);
    } catch (err) {
        throw new ArchiveCorruptError(errorMessage(err));
    }
}

/**
 * Extract an archive into `targetDir`. The entry's original name is normalized
 * with {@link normalizeEntryPath}; entries that normalize to nothing are skipped.
 * Returns the number of files written.
 */
export async function unpackArchive(data: Buffer | Uint8Array, targetDir: string): Promise<number> {
    const zip = await loadZip(data);
    let written = 0;

    for (const entry of Object.values(zip.files)) {
        const parts = normalizeEntryPath(entry.unsafeOriginalName ?? entry.name);
        if (parts.length === 0) continue;
        const outPath = path.join(targetDir, ...parts);

        if (entry.dir) {
            await fs.promises.mkdir(outPath, { recursive: true });
            continue;
        }

        let content: Buffer;
        try {
            content = await entry.async('nodebuffer');
        } catch (err) {
            throw new ArchiveCorruptError(`${entry.name}: ${errorMessage(err)}`);
        }
        await fs.promises.mkdir(path.dirname(outPath), { recursive: true });
        await fs.promises.writeFile(outPath, content);
        written++;
    }

    return written;
}
