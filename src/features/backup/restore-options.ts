import { RestoreAction, RestoreMode, RestoreOptions } from './types';

export const DEFAULT_RESTORE_OPTIONS: RestoreOptions = Object.freeze({
    settingsAction: 'merge',
    providersAction: 'merge',
    chatsAction: 'merge',
    filesAction: 'merge'
});

export function createRestoreOptions(overrides: Partial<RestoreOptions> = {}): RestoreOptions {
    return Object.freeze({ ...DEFAULT_RESTORE_OPTIONS, ...overrides });
}

function allActions(action: RestoreAction): RestoreOptions {
    return createRestoreOptions({
        settingsAction: action,
        providersAction: action,
        chatsAction: action,
        filesAction: action
    });
}

export function restoreOptionsFromMode(mode: RestoreMode): RestoreOptions {
    return mode === 'overwrite' ? allActions('overwrite') : allActions('merge');
}

/**
 * All four categories set to overwrite. Such a restore goes through the
 * full-overwrite path instead of the granular one.
 */
export function isFullOverwrite(options: RestoreOptions): boolean {
    return options.settingsAction === 'overwrite'
        && options.providersAction === 'overwrite'
        && options.chatsAction === 'overwrite'
        && options.filesAction === 'overwrite';
}

/**
 * Accepts either per-category options or the legacy mode. Callers that pass
 * neither get the historical default, a full overwrite.
 */
export function resolveRestoreOptions(input?: RestoreOptions | RestoreMode): RestoreOptions {
    if (input === undefined) return restoreOptionsFromMode('overwrite');
    if (typeof input === 'string') return restoreOptionsFromMode(input);
    return input;
}
