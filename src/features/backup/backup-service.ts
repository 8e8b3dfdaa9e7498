import crypto from 'crypto';
import { EventEmitter } from 'events';
import fs from 'fs';
import path from 'path';
import { ChatService, SettingsStore } from '../../infrastructure/repositories/interfaces';
import { logger } from '../../utils/logger';
import { packArchive, unpackArchive } from './archive/archive-codec';
import { BackupNotFoundError, SyncBusyError, errorMessage } from './errors';
import { isMissing, removeQuietly } from './fs-utils';
import { RestorePlanner } from './restore-planner';
import { resolveRestoreOptions } from './restore-options';
import { SnapshotBuilder } from './snapshot/snapshot-builder';
import {
    BackupFileItem,
    BackupPhase,
    BackupProgressEvent,
    BackupResult,
    FileRoots,
    OperationHooks,
    ProgressCallback,
    RestoreMode,
    RestoreOptions,
    RestoreReport,
    WebDavConfig
} from './types';
import { buildBackupFileName } from './webdav/backup-filename';
import { WebDavTransport } from './webdav/webdav-transport';

export interface BackupServiceDeps {
    settings: SettingsStore;
    chats: ChatService;
    fileRoots: FileRoots;
    tempRoot: string;               // Parent directory for per-operation staging dirs
    transport?: WebDavTransport;
}

type Operation = BackupProgressEvent['operation'];

/**
 * Top-level backup and restore operations. One backup or restore runs at a
 * time per instance; starting another meanwhile throws {@link SyncBusyError}.
 *
 * Emits `progress` with a {@link BackupProgressEvent} for every step.
 */
export class BackupService extends EventEmitter {
    private isBackingUp = false;
    private isRestoring = false;

    private readonly snapshot: SnapshotBuilder;
    private readonly planner: RestorePlanner;
    private readonly transport: WebDavTransport;

    public get isInProgress(): boolean {
        return this.isBackingUp || this.isRestoring;
    }

    constructor(private readonly deps: BackupServiceDeps) {
        super();
        this.snapshot = new SnapshotBuilder(deps);
        this.planner = new RestorePlanner(deps);
        this.transport = deps.transport ?? new WebDavTransport();
    }

    async testConnection(cfg: WebDavConfig): Promise<void> {
        await this.transport.testConnection(cfg);
    }

    /**
     * Pack the current state and upload it as a new timestamped file.
     */
    async backupToWebDav(cfg: WebDavConfig, hooks: OperationHooks = {}): Promise<BackupResult> {
        return this.runExclusive('backup', hooks.onProgress, async () => {
            const data = await this.buildArchive(cfg, hooks.onProgress);

            this.emitProgress('backup', hooks.onProgress, 'uploading', 4, 5, 'Uploading backup...');
            await this.transport.ensureCollection(cfg);
            const fileName = buildBackupFileName(new Date());
            const location = await this.transport.upload(cfg, data, fileName);

            logger.info(`[BackupService] Uploaded ${fileName} (${data.length} bytes)`);
            this.emitProgress('backup', hooks.onProgress, 'done', 5, 5, 'Backup complete');
            return { fileName, location, size: data.length };
        });
    }

    /**
     * Write an archive to `targetPath`. The file appears only once complete.
     */
    async exportToFile(cfg: WebDavConfig, targetPath: string, hooks: OperationHooks = {}): Promise<BackupResult> {
        return this.runExclusive('backup', hooks.onProgress, async () => {
            const data = await this.buildArchive(cfg, hooks.onProgress);

            this.emitProgress('backup', hooks.onProgress, 'compressing', 4, 5, 'Writing backup file...');
            const resolved = path.resolve(targetPath);
            await fs.promises.mkdir(path.dirname(resolved), { recursive: true });
            const temp = `${resolved}.${crypto.randomUUID()}.tmp`;
            try {
                await fs.promises.writeFile(temp, data);
                await fs.promises.rename(temp, resolved);
            } catch (err) {
                await removeQuietly(temp, 'BackupService');
                throw err;
            }

            this.emitProgress('backup', hooks.onProgress, 'done', 5, 5, 'Backup complete');
            return { fileName: path.basename(resolved), location: resolved, size: data.length };
        });
    }

    /** Remote backups, newest first. Creates the collection when missing. */
    async listBackupFiles(cfg: WebDavConfig): Promise<BackupFileItem[]> {
        await this.transport.ensureCollection(cfg);
        return this.transport.listCollection(cfg);
    }

    /**
     * Download a remote backup and apply it. `options` may be per-category
     * options or a legacy mode; omitted, the whole archive overwrites local data.
     */
    async restoreFromWebDav(
        item: BackupFileItem,
        cfg: WebDavConfig,
        options?: RestoreOptions | RestoreMode,
        hooks: OperationHooks = {}
    ): Promise<RestoreReport> {
        return this.runExclusive('restore', hooks.onProgress, async () => {
            this.emitProgress('restore', hooks.onProgress, 'downloading', 1, 5, `Downloading ${item.displayName}...`);
            const data = await this.transport.download(cfg, item);
            const report = await this.applyArchive(data, cfg, resolveRestoreOptions(options), hooks.onProgress);
            this.emitProgress('restore', hooks.onProgress, 'done', 5, 5, 'Restore complete');
            return report;
        });
    }

    async restoreFromLocalFile(
        filePath: string,
        cfg: WebDavConfig,
        options?: RestoreOptions | RestoreMode,
        hooks: OperationHooks = {}
    ): Promise<RestoreReport> {
        return this.runExclusive('restore', hooks.onProgress, async () => {
            this.emitProgress('restore', hooks.onProgress, 'preparing', 1, 5, 'Reading backup file...');
            let data: Buffer;
            try {
                data = await fs.promises.readFile(filePath);
            } catch (err) {
                if (isMissing(err)) throw new BackupNotFoundError(filePath);
                throw err;
            }
            const report = await this.applyArchive(data, cfg, resolveRestoreOptions(options), hooks.onProgress);
            this.emitProgress('restore', hooks.onProgress, 'done', 5, 5, 'Restore complete');
            return report;
        });
    }

    async deleteWebDavBackupFile(item: BackupFileItem, cfg: WebDavConfig): Promise<void> {
        await this.transport.delete(cfg, item);
        logger.info(`[BackupService] Deleted remote backup ${item.displayName}`);
    }

    // --- Helpers ---

    private async buildArchive(cfg: WebDavConfig, onProgress: ProgressCallback | undefined): Promise<Buffer> {
        this.emitProgress('backup', onProgress, 'preparing', 0, 5, 'Preparing backup...');

        this.emitProgress('backup', onProgress, 'settings', 1, 5, 'Collecting settings and chats...');
        const entries = await this.snapshot.buildArchiveEntries(cfg);

        this.emitProgress('backup', onProgress, 'compressing', 2, 5, 'Compressing backup...');
        const data = await packArchive(entries);
        logger.debug(`[BackupService] Packed ${entries.length} entries into ${data.length} bytes`);
        return data;
    }

    private async applyArchive(
        data: Buffer,
        cfg: WebDavConfig,
        options: RestoreOptions,
        onProgress: ProgressCallback | undefined
    ): Promise<RestoreReport> {
        await fs.promises.mkdir(this.deps.tempRoot, { recursive: true });
        const stagingDir = await fs.promises.mkdtemp(path.join(this.deps.tempRoot, 'chat-backup-restore-'));

        try {
            this.emitProgress('restore', onProgress, 'extracting', 2, 5, 'Extracting backup...');
            const count = await unpackArchive(data, stagingDir);
            logger.debug(`[BackupService] Extracted ${count} files to ${stagingDir}`);

            this.emitProgress('restore', onProgress, 'applying', 3, 5, 'Applying data...');
            const report = await this.planner.restore(stagingDir, cfg, options);
            for (const warning of report.warnings) {
                logger.warn('[BackupService] Restore warning:', warning);
            }

            return report;
        } finally {
            this.emitProgress('restore', onProgress, 'cleanup', 4, 5, 'Cleaning up...');
            await removeQuietly(stagingDir, 'BackupService');
        }
    }

    private async runExclusive<T>(
        operation: Operation,
        onProgress: ProgressCallback | undefined,
        task: () => Promise<T>
    ): Promise<T> {
        if (this.isInProgress) {
            throw new SyncBusyError();
        }
        if (operation === 'backup') this.isBackingUp = true;
        else this.isRestoring = true;

        try {
            return await task();
        } catch (err) {
            logger.error(`[BackupService] ${operation === 'backup' ? 'Backup' : 'Restore'} failed:`, err);
            this.emitProgress(operation, onProgress, 'error', 0, 0, errorMessage(err));
            throw err;
        } finally {
            if (operation === 'backup') this.isBackingUp = false;
            else this.isRestoring = false;
        }
    }

    private emitProgress(
        operation: Operation,
        cb: ProgressCallback | undefined,
        phase: BackupPhase,
        current: number,
        total: number,
        message: string
    ) {
        const event: BackupProgressEvent = { operation, phase, current, total, message };
        if (cb) cb(event);
        this.emit('progress', event);
    }
}
