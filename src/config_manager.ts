import fs from 'fs';
import os from 'os';
import path from 'path';
import { z } from 'zod';
import { SyncError, errorMessage } from './features/backup/errors';
import { WebDavConfig } from './features/backup/types';
import { WebDavConfigSchema, createWebDavConfig } from './features/backup/webdav/webdav-config';
import { LogLevelName, logger } from './utils/logger';

export const CONFIG_FILENAME = 'sync.config.json';

// --- Validation Schemas ---

const SyncConfigFileSchema = z.object({
    dataDir: z.string().min(1),
    tempDir: z.string().min(1).optional(),
    databasePath: z.string().min(1).optional(),
    logLevel: z.enum(['debug', 'info', 'warn', 'error', 'none']).optional(),
    webdav: WebDavConfigSchema.optional()
});

export type SyncConfigFile = z.infer<typeof SyncConfigFileSchema>;

/** Config with every default filled in and every path absolute. */
export interface SyncConfig {
    dataDir: string;
    tempDir: string;
    databasePath: string;
    logLevel: LogLevelName;
    webdav: WebDavConfig;
}

export interface ValidationResult<T> {
    success: boolean;
    error?: string;
    data?: T;
}

type Env = Record<string, string | undefined>;

/**
 * Where the config file lives: `SYNC_CONFIG_PATH` if set, else the working
 * directory. Returns null when neither exists.
 */
export function getConfigPath(env: Env = process.env): string | null {
    const possiblePaths = [
        env.SYNC_CONFIG_PATH,
        path.join(process.cwd(), CONFIG_FILENAME)
    ];

    for (const p of possiblePaths) {
        if (p && fs.existsSync(p)) return p;
    }
    return null;
}

export function parseSyncConfig(json: unknown): ValidationResult<SyncConfigFile> {
    const result = SyncConfigFileSchema.safeParse(json);
    if (!result.success) {
        const errorMsg = result.error.issues.map(iss => `${iss.path.join('.')}: ${iss.message}`).join('; ');
        return { success: false, error: errorMsg };
    }
    return { success: true, data: result.data };
}

export function validateSyncConfig(content: string): ValidationResult<SyncConfigFile> {
    let json: unknown;
    try {
        json = JSON.parse(content);
    } catch (e) {
        if (e instanceof SyntaxError) {
            return { success: false, error: `Unexpected token: ${e.message}` };
        }
        throw e;
    }
    return parseSyncConfig(json);
}

export function resolveSyncConfig(file: SyncConfigFile): SyncConfig {
    const dataDir = path.resolve(file.dataDir);
    return {
        dataDir,
        tempDir: path.resolve(file.tempDir ?? os.tmpdir()),
        databasePath: file.databasePath === ':memory:'
            ? file.databasePath
            : path.resolve(file.databasePath ?? path.join(dataDir, 'sync.sqlite')),
        logLevel: file.logLevel ?? (process.env.NODE_ENV === 'development' ? 'info' : 'warn'),
        webdav: createWebDavConfig(file.webdav)
    };
}

/**
 * Load, validate and resolve the config. `SYNC_DATA_DIR` overrides `dataDir`
 * and is enough on its own when no config file exists.
 */
export function loadSyncConfig(env: Env = process.env): SyncConfig {
    const p = getConfigPath(env);
    let json: unknown = {};
    if (p) {
        try {
            json = JSON.parse(fs.readFileSync(p, 'utf-8'));
        } catch (e) {
            throw new SyncError(`Invalid ${p}: ${errorMessage(e)}`);
        }
    }

    const dataDirOverride = env.SYNC_DATA_DIR;
    if (dataDirOverride && typeof json === 'object' && json !== null) {
        json = { ...json, dataDir: dataDirOverride };
    }

    const result = parseSyncConfig(json);
    if (!result.success || !result.data) {
        throw new SyncError(`Invalid ${p ?? CONFIG_FILENAME}: ${result.error ?? 'unknown error'}`);
    }

    logger.debug(`[ConfigManager] Loaded config from ${p ?? 'environment'}`);
    return resolveSyncConfig(result.data);
}

export function getRawSyncConfig(env: Env = process.env): { content: string, path: string } {
    const p = getConfigPath(env);
    if (p) {
        return { content: fs.readFileSync(p, 'utf-8'), path: p };
    }
    return { content: '{}', path: '' };
}

/** Validate `content` and write it over the current config file (or a new one in the working directory). */
export function saveRawSyncConfig(content: string, env: Env = process.env): { success: boolean, error?: string } {
    const validation = validateSyncConfig(content);
    if (!validation.success) {
        return { success: false, error: validation.error };
    }

    const p = getConfigPath(env) ?? path.join(process.cwd(), CONFIG_FILENAME);
    try {
        fs.writeFileSync(p, content, 'utf-8');
        return { success: true };
    } catch (e) {
        logger.error('[ConfigManager] Failed to save config:', e);
        return { success: false, error: errorMessage(e) };
    }
}
