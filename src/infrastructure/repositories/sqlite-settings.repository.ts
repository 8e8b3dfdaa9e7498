import Database from 'better-sqlite3';
import { coerceSettingValue, isLocalOnlyKey } from '../../features/backup/settings-keys';
import { SettingValue, SettingsMap } from '../../features/backup/types';
import { logger } from '../../utils/logger';
import { SettingsStore } from './interfaces';

interface SettingRow {
    key: string;
    value: string;
}

/**
 * Key-value settings persisted as JSON text. `get`/`set` serve the
 * application and may touch any key; the backup-facing methods never read or
 * write local-only keys.
 */
export class SqliteSettingsStore implements SettingsStore {
    constructor(private db: Database.Database) { }

    private decode(row: SettingRow): SettingValue | null {
        try {
            return coerceSettingValue(JSON.parse(row.value));
        } catch (err) {
            logger.warn(`[SettingsStore] Unreadable value for "${row.key}":`, err);
            return null;
        }
    }

    private write(key: string, value: SettingValue): void {
        this.db.prepare<[string, string]>(`
            INSERT INTO settings (key, value)
            VALUES (?, ?)
            ON CONFLICT(key) DO UPDATE SET value = excluded.value
        `).run(key, JSON.stringify(value));
    }

    getAll(): SettingsMap {
        try {
            const rows = this.db.prepare<[], SettingRow>('SELECT key, value FROM settings ORDER BY key').all();
            const settings: SettingsMap = {};
            for (const row of rows) {
                const value = this.decode(row);
                if (value !== null) settings[row.key] = value;
            }
            return settings;
        } catch (err) {
            logger.error('[SettingsStore] Failed to get all settings:', err);
            return {};
        }
    }

    get(key: string): SettingValue | null {
        try {
            const row = this.db.prepare<[string], SettingRow>('SELECT key, value FROM settings WHERE key = ?').get(key);
            return row ? this.decode(row) : null;
        } catch (err) {
            logger.error(`[SettingsStore] Failed to get setting "${key}":`, err);
            return null;
        }
    }

    set(key: string, value: SettingValue): void {
        this.write(key, value);
    }

    delete(key: string): void {
        this.db.prepare<[string]>('DELETE FROM settings WHERE key = ?').run(key);
    }

    async snapshot(): Promise<SettingsMap> {
        const all = this.getAll();
        const shared: SettingsMap = {};
        for (const [key, value] of Object.entries(all)) {
            if (!isLocalOnlyKey(key)) shared[key] = value;
        }
        return shared;
    }

    async restoreAll(values: Record<string, unknown>): Promise<void> {
        const apply = this.db.transaction(() => {
            for (const [key, raw] of Object.entries(values)) {
                if (isLocalOnlyKey(key)) continue;
                const value = coerceSettingValue(raw);
                if (value === null) {
                    logger.warn(`[SettingsStore] Ignoring unsupported value for "${key}"`);
                    continue;
                }
                this.write(key, value);
            }
        });
        apply();
    }

    async restoreSingle(key: string, value: unknown): Promise<void> {
        if (isLocalOnlyKey(key)) {
            logger.warn(`[SettingsStore] Refusing to restore local-only key "${key}"`);
            return;
        }
        const coerced = coerceSettingValue(value);
        if (coerced === null) {
            logger.warn(`[SettingsStore] Ignoring unsupported value for "${key}"`);
            return;
        }
        this.write(key, coerced);
    }
}
