export type RestoreAction = 'ignore' | 'merge' | 'overwrite';

/** Two-mode API kept for callers that predate per-category options. */
export type RestoreMode = 'overwrite' | 'merge';

export interface RestoreOptions {
    readonly settingsAction: RestoreAction;
    readonly providersAction: RestoreAction;
    readonly chatsAction: RestoreAction;
    readonly filesAction: RestoreAction;
}

export interface WebDavConfig {
    readonly url: string;
    readonly username: string;
    readonly password: string;
    readonly path: string;          // Collection path below url, e.g. "kelivo_backups"
    readonly includeChats: boolean;
    readonly includeFiles: boolean;
}

export interface BackupFileItem {
    href: string;                   // Absolute URL of the remote file
    displayName: string;
    size: number;
    lastModified: Date | null;
}

export type SettingValue = boolean | number | string | string[];

export type SettingsMap = Record<string, SettingValue>;

export const FILE_TREES = ['upload', 'images', 'avatars'] as const;

export type FileTreeName = typeof FILE_TREES[number];

/** Absolute local directory for each archived file tree. */
export type FileRoots = Record<FileTreeName, string>;

export type BackupPhase =
    | 'preparing'
    | 'settings'
    | 'compressing'
    | 'uploading'
    | 'downloading'
    | 'extracting'
    | 'applying'
    | 'cleanup'
    | 'done'
    | 'error';

export interface BackupProgressEvent {
    operation: 'backup' | 'restore';
    phase: BackupPhase;
    current: number;
    total: number;
    message: string;
}

export type ProgressCallback = (event: BackupProgressEvent) => void;

export interface CategoryReport {
    applied: number;
    skipped: number;
}

export interface RestoreReport {
    path: 'full-overwrite' | 'granular';
    settings: CategoryReport;
    conversationsRestored: number;
    messagesAdded: number;
    files: CategoryReport;
    warnings: string[];
}

export interface BackupResult {
    fileName: string;
    location: string;               // Remote URL or local file path
    size: number;
}

export interface OperationHooks {
    onProgress?: ProgressCallback;
}
