import crypto from 'crypto';
import fs from 'fs';
import path from 'path';
import { logger } from '../../../utils/logger';
import { errorMessage } from '../errors';
import { isDirectory, pathExists, removeQuietly, walkFiles } from '../fs-utils';

export type FileTreeAction = 'merge' | 'overwrite';

export interface FileTreeResult {
    applied: number;
    skipped: number;
    warnings: string[];
}

/**
 * Copy through a temp file beside the target, then rename it into place, so
 * the target is either absent or complete.
 */
async function stagedCopy(source: string, target: string): Promise<void> {
    const dir = path.dirname(target);
    await fs.promises.mkdir(dir, { recursive: true });
    const temp = path.join(dir, `.${path.basename(target)}.${crypto.randomUUID()}.tmp`);
    try {
        await fs.promises.copyFile(source, temp);
        await fs.promises.rename(temp, target);
    } catch (err) {
        await removeQuietly(temp, 'FileTreeMerger');
        throw err;
    }
}

/**
 * Restore one file tree from `sourceDir` into `targetDir`.
 *
 * - overwrite: the target is deleted, recreated, and receives every file.
 * - merge: the target is created if needed; existing files are left alone.
 *
 * A missing source means the archive has no such tree and nothing happens.
 * Files that fail to copy are skipped and reported in `warnings`.
 */
export async function restoreFileTree(sourceDir: string, targetDir: string, action: FileTreeAction): Promise<FileTreeResult> {
    const result: FileTreeResult = { applied: 0, skipped: 0, warnings: [] };
    if (!(await isDirectory(sourceDir))) return result;

    if (action === 'overwrite') {
        await removeQuietly(targetDir, 'FileTreeMerger');
    }
    await fs.promises.mkdir(targetDir, { recursive: true });

    for (const rel of await walkFiles(sourceDir)) {
        const parts = rel.split('/');
        const target = path.join(targetDir, ...parts);

        if (action === 'merge' && await pathExists(target)) {
            result.skipped++;
            continue;
        }

        try {
            await stagedCopy(path.join(sourceDir, ...parts), target);
            result.applied++;
        } catch (err) {
            logger.warn(`[FileTreeMerger] Failed to copy ${rel}:`, err);
            result.warnings.push(`${rel}: ${errorMessage(err)}`);
            result.skipped++;
        }
    }

    return result;
}
