import fs from 'fs';
import path from 'path';
import { ChatService, SettingsStore } from '../../infrastructure/repositories/interfaces';
import { logger } from '../../utils/logger';
import { ArchiveCorruptError, errorMessage } from './errors';
import { isDirectory, pathExists } from './fs-utils';
import { ChatRestoreResult, mergeChats, overwriteChats, parseChatsArchive } from './mergers/chat-merger';
import { FileTreeAction, restoreFileTree } from './mergers/file-tree-merger';
import { mergeSettingValue } from './mergers/setting-mergers';
import { isFullOverwrite } from './restore-options';
import { coerceSettingValue, isLocalOnlyKey, isProviderKey } from './settings-keys';
import { CHATS_ENTRY, SETTINGS_ENTRY } from './snapshot/snapshot-builder';
import { FILE_TREES, FileRoots, RestoreOptions, RestoreReport, SettingValue, SettingsMap, WebDavConfig } from './types';

export interface RestoreTargets {
    settings: SettingsStore;
    chats: ChatService;
    fileRoots: FileRoots;
}

function emptyReport(kind: RestoreReport['path']): RestoreReport {
    return {
        path: kind,
        settings: { applied: 0, skipped: 0 },
        conversationsRestored: 0,
        messagesAdded: 0,
        files: { applied: 0, skipped: 0 },
        warnings: []
    };
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function localValue(existing: SettingsMap, key: string): SettingValue | undefined {
    return Object.prototype.hasOwnProperty.call(existing, key) ? existing[key] : undefined;
}

/**
 * Applies an unpacked archive to local state. Phases run in order (settings,
 * chats, files); a failing phase is logged and recorded as a warning, and the
 * next phase still runs.
 */
export class RestorePlanner {
    constructor(private readonly targets: RestoreTargets) { }

    /** All-overwrite options take the full-overwrite path, anything else the granular one. */
    async restore(stagingDir: string, cfg: WebDavConfig, options: RestoreOptions): Promise<RestoreReport> {
        return isFullOverwrite(options)
            ? this.restoreFullOverwrite(stagingDir, cfg)
            : this.restoreGranular(stagingDir, cfg, options);
    }

    async restoreFullOverwrite(stagingDir: string, cfg: WebDavConfig): Promise<RestoreReport> {
        const report = emptyReport('full-overwrite');

        await this.runPhase('settings', report, async () => {
            const incoming = await this.readSettings(stagingDir);
            if (!incoming) return;
            await this.targets.settings.restoreAll(incoming);
            for (const [key, value] of Object.entries(incoming)) {
                if (isLocalOnlyKey(key) || coerceSettingValue(value) === null) {
                    report.settings.skipped++;
                } else {
                    report.settings.applied++;
                }
            }
        });

        if (cfg.includeChats) {
            await this.runPhase('chats', report, () => this.restoreChats(stagingDir, 'overwrite', report));
        }
        if (cfg.includeFiles) {
            await this.runPhase('files', report, () => this.restoreFiles(stagingDir, 'overwrite', report));
        }

        return report;
    }

    async restoreGranular(stagingDir: string, cfg: WebDavConfig, options: RestoreOptions): Promise<RestoreReport> {
        const report = emptyReport('granular');

        await this.runPhase('settings', report, () => this.restoreSettings(stagingDir, options, report));

        const chatsAction = options.chatsAction;
        if (chatsAction !== 'ignore' && cfg.includeChats) {
            await this.runPhase('chats', report, () => this.restoreChats(stagingDir, chatsAction, report));
        }

        const filesAction = options.filesAction;
        if (filesAction !== 'ignore' && cfg.includeFiles) {
            await this.runPhase('files', report, () => this.restoreFiles(stagingDir, filesAction, report));
        }

        return report;
    }

    private async runPhase(name: string, report: RestoreReport, phase: () => Promise<void>): Promise<void> {
        try {
            await phase();
        } catch (err) {
            logger.error(`[RestorePlanner] ${name} phase failed:`, err);
            report.warnings.push(`${name}: ${errorMessage(err)}`);
        }
    }

    private async readSettings(stagingDir: string): Promise<Record<string, unknown> | null> {
        const file = path.join(stagingDir, SETTINGS_ENTRY);
        if (!(await pathExists(file))) return null;

        let parsed: unknown;
        try {
            parsed = JSON.parse(await fs.promises.readFile(file, 'utf-8'));
        } catch (err) {
            throw new ArchiveCorruptError(`${SETTINGS_ENTRY}: ${errorMessage(err)}`);
        }
        if (!isRecord(parsed)) {
            throw new ArchiveCorruptError(`${SETTINGS_ENTRY}: expected an object`);
        }
        return parsed;
    }

    private async restoreSettings(stagingDir: string, options: RestoreOptions, report: RestoreReport): Promise<void> {
        const incoming = await this.readSettings(stagingDir);
        if (!incoming) return;

        const store = this.targets.settings;
        const existing = await store.snapshot();

        for (const [key, value] of Object.entries(incoming)) {
            const action = isProviderKey(key) ? options.providersAction : options.settingsAction;
            if (isLocalOnlyKey(key) || action === 'ignore') {
                report.settings.skipped++;
                continue;
            }

            try {
                let next: unknown = value;
                if (action === 'merge') {
                    const outcome = mergeSettingValue(key, localValue(existing, key), value);
                    if (outcome.kind === 'keep') {
                        report.settings.skipped++;
                        continue;
                    }
                    next = outcome.value;
                }

                // The store drops values it cannot hold
                if (coerceSettingValue(next) === null) {
                    report.settings.skipped++;
                    continue;
                }
                await store.restoreSingle(key, next);
                report.settings.applied++;
            } catch (err) {
                logger.warn(`[RestorePlanner] Skipping setting "${key}":`, err);
                report.warnings.push(`setting ${key}: ${errorMessage(err)}`);
                report.settings.skipped++;
            }
        }
    }

    private async restoreChats(stagingDir: string, action: 'merge' | 'overwrite', report: RestoreReport): Promise<void> {
        const file = path.join(stagingDir, CHATS_ENTRY);
        if (!(await pathExists(file))) return;

        const archive = parseChatsArchive(await fs.promises.readFile(file, 'utf-8'));
        const chats = this.targets.chats;
        const result: ChatRestoreResult = action === 'overwrite'
            ? await overwriteChats(chats, archive)
            : await mergeChats(chats, archive);

        report.conversationsRestored += result.conversationsRestored;
        report.messagesAdded += result.messagesAdded;
        report.warnings.push(...result.warnings);
        logger.info(`[RestorePlanner] Chats ${action}: ${result.conversationsRestored} conversations, ${result.messagesAdded} messages`);
    }

    private async restoreFiles(stagingDir: string, action: FileTreeAction, report: RestoreReport): Promise<void> {
        for (const tree of FILE_TREES) {
            const source = path.join(stagingDir, tree);
            if (!(await isDirectory(source))) continue;

            const result = await restoreFileTree(source, this.targets.fileRoots[tree], action);
            report.files.applied += result.applied;
            report.files.skipped += result.skipped;
            report.warnings.push(...result.warnings.map(w => `${tree}/${w}`));
        }
    }
}
