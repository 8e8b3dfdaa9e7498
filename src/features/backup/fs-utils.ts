import fs from 'fs';
import path from 'path';
import { logger } from '../../utils/logger';

export function isMissing(err: unknown): boolean {
    return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

export async function pathExists(target: string): Promise<boolean> {
    try {
        await fs.promises.lstat(target);
        return true;
    } catch (err) {
        if (isMissing(err)) return false;
        throw err;
    }
}

export async function isDirectory(target: string): Promise<boolean> {
    try {
        return (await fs.promises.stat(target)).isDirectory();
    } catch (err) {
        if (isMissing(err)) return false;
        throw err;
    }
}

/**
 * Posix-relative paths of the regular files under `root`, sorted. A missing
 * root yields no files. Symlinks are not followed.
 */
export async function walkFiles(root: string, rel = ''): Promise<string[]> {
    let entries: fs.Dirent[];
    try {
        entries = await fs.promises.readdir(path.join(root, rel), { withFileTypes: true });
    } catch (err) {
        if (rel === '' && isMissing(err)) return [];
        throw err;
    }

    const files: string[] = [];
    for (const entry of entries) {
        const childRel = rel ? `${rel}/${entry.name}` : entry.name;
        if (entry.isDirectory()) {
            files.push(...await walkFiles(root, childRel));
        } else if (entry.isFile()) {
            files.push(childRel);
        }
    }
    return files.sort();
}

/** Remove a file or directory tree; failures are logged, not raised. */
export async function removeQuietly(target: string, label: string): Promise<void> {
    try {
        await fs.promises.rm(target, { recursive: true, force: true });
    } catch (err) {
        logger.warn(`[${label}] Failed to remove ${target}:`, err);
    }
}
