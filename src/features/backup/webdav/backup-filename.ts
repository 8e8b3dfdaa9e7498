export const BACKUP_FILE_PREFIX = 'kelivo_backup_';
export const BACKUP_FILE_EXT = '.zip';

/** e.g. kelivo_backup_2025-01-19T12-34-56.789Z.zip */
export function buildBackupFileName(date: Date = new Date()): string {
    return `${BACKUP_FILE_PREFIX}${date.toISOString().replace(/:/g, '-')}${BACKUP_FILE_EXT}`;
}

const NAME_TIMESTAMP = /kelivo_backup_(\d{4})-(\d{2})-(\d{2})T(\d{2})-(\d{2})-(\d{2})(?:\.(\d+))?(Z)?\.zip/;

/**
 * Recover the creation time embedded in a backup file name. Names without a
 * trailing Z carry local time.
 */
export function timestampFromBackupName(name: string): Date | null {
    const match = NAME_TIMESTAMP.exec(name);
    if (!match) return null;
    const [, year, month, day, hour, minute, second, fraction, zulu] = match;
    const millis = (fraction ?? '0').padEnd(3, '0').slice(0, 3);
    const iso = `${year}-${month}-${day}T${hour}:${minute}:${second}.${millis}${zulu ?? ''}`;
    const time = Date.parse(iso);
    return Number.isNaN(time) ? null : new Date(time);
}
