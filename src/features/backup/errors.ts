export class SyncError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'SyncError';
    }
}

/** The WebDAV server rejected the credentials (401). Never retried. */
export class AuthError extends SyncError {
    readonly status = 401;

    constructor(readonly url: string) {
        super(`Unauthorized: ${url}`);
        this.name = 'AuthError';
    }
}

export class TransportError extends SyncError {
    constructor(
        readonly method: string,
        readonly url: string,
        readonly status: number
    ) {
        super(`WebDAV ${method} ${url} failed: ${status}`);
        this.name = 'TransportError';
    }
}

/** The archive could not be parsed; the backup file should be treated as unusable. */
export class ArchiveCorruptError extends SyncError {
    constructor(readonly reason: string) {
        super(`Corrupt backup archive: ${reason}`);
        this.name = 'ArchiveCorruptError';
    }
}

export class BackupNotFoundError extends SyncError {
    constructor(readonly filePath: string) {
        super(`Backup file not found: ${filePath}`);
        this.name = 'BackupNotFoundError';
    }
}

export class SyncBusyError extends SyncError {
    constructor() {
        super('Another backup or restore is in progress');
        this.name = 'SyncBusyError';
    }
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
