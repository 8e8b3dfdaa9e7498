import { SettingValue } from '../types';

type JsonObject = Record<string, unknown>;

/**
 * How one setting key combines a local value with an incoming one during a
 * merge restore. Values of mergeable keys are JSON documents stored as strings.
 */
export type SettingMergeStrategy =
    | 'assistants'
    | 'incomingWins'
    | 'unionStrings'
    | 'appendNewTags'
    | 'localWins'
    | 'replace';

export type SettingMergeOutcome =
    | { kind: 'write'; value: unknown }
    | { kind: 'keep' };

export const SETTING_MERGE_STRATEGIES: ReadonlyMap<string, SettingMergeStrategy> = new Map<string, SettingMergeStrategy>([
    ['assistants_v1', 'assistants'],
    ['provider_configs_v1', 'incomingWins'],
    ['pinned_models_v1', 'unionStrings'],
    ['assistant_tags_v1', 'appendNewTags'],
    ['assistant_tag_map_v1', 'localWins'],
    ['assistant_tag_collapsed_v1', 'localWins'],
    ['providers_order_v1', 'replace'],
    ['search_services_v1', 'replace']
]);

export class MalformedSettingError extends Error {
    constructor(readonly key: string, reason: string) {
        super(`Cannot merge "${key}": ${reason}`);
        this.name = 'MalformedSettingError';
    }
}

function isObject(value: unknown): value is JsonObject {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isBlank(value: unknown): boolean {
    return value === null || value === undefined || value === '';
}

/** Decode a stored JSON document. Strings are parsed, anything else is taken as already decoded. */
function decode(key: string, value: unknown): unknown {
    if (typeof value !== 'string') return value;
    try {
        return JSON.parse(value);
    } catch {
        throw new MalformedSettingError(key, 'invalid JSON');
    }
}

function decodeList(key: string, value: unknown, blankAsEmpty = false): unknown[] {
    if (blankAsEmpty && isBlank(value)) return [];
    const decoded = decode(key, value);
    if (!Array.isArray(decoded)) throw new MalformedSettingError(key, 'expected a list');
    return decoded;
}

function decodeObject(key: string, value: unknown, blankAsEmpty = false): JsonObject {
    if (blankAsEmpty && isBlank(value)) return {};
    const decoded = decode(key, value);
    if (!isObject(decoded)) throw new MalformedSettingError(key, 'expected an object');
    return decoded;
}

/** Keep the incoming encoding: a JSON string in, a JSON string out. */
function encodeLike(incoming: unknown, merged: unknown): unknown {
    return typeof incoming === 'string' || isBlank(incoming) ? JSON.stringify(merged) : merged;
}

function idOf(entry: JsonObject): string | null {
    const id = entry.id;
    return id === null || id === undefined ? null : String(id);
}

function textOf(value: unknown): string {
    return value === null || value === undefined ? '' : String(value);
}

/**
 * Assistants are matched by id. Incoming fields win, except that a non-blank
 * local avatar or background is kept.
 */
function mergeAssistants(local: unknown[], incoming: unknown[]): JsonObject[] {
    const byId = new Map<string, JsonObject>();
    for (const entry of local) {
        if (!isObject(entry)) continue;
        const id = idOf(entry);
        if (id !== null) byId.set(id, { ...entry });
    }

    for (const entry of incoming) {
        if (!isObject(entry)) continue;
        const id = idOf(entry);
        if (id === null) continue;

        const existing = byId.get(id);
        if (!existing) {
            byId.set(id, { ...entry });
            continue;
        }

        const merged: JsonObject = { ...existing, ...entry };
        const localAvatar = textOf(existing.avatar);
        merged.avatar = localAvatar.trim() ? localAvatar : entry.avatar ?? null;
        const localBackground = textOf(existing.background);
        merged.background = localBackground.trim() ? localBackground : entry.background ?? null;
        byId.set(id, merged);
    }

    return [...byId.values()];
}

function unionStrings(local: unknown[], incoming: unknown[]): string[] {
    const seen = new Set<string>();
    for (const item of [...local, ...incoming]) {
        if (typeof item === 'string') seen.add(item);
    }
    return [...seen];
}

/** Local tags in their order, then incoming tags whose id is new. */
function appendNewTags(local: unknown[], incoming: unknown[]): JsonObject[] {
    const byId = new Map<string, JsonObject>();
    for (const entry of local) {
        if (!isObject(entry)) continue;
        const id = idOf(entry);
        if (id !== null && !byId.has(id)) byId.set(id, entry);
    }
    for (const entry of incoming) {
        if (!isObject(entry)) continue;
        const id = idOf(entry);
        if (id !== null && !byId.has(id)) byId.set(id, entry);
    }
    return [...byId.values()];
}

function applyStrategy(strategy: SettingMergeStrategy, key: string, local: unknown, incoming: unknown): unknown {
    switch (strategy) {
        case 'assistants':
            return mergeAssistants(decodeList(key, local), decodeList(key, incoming));
        case 'incomingWins':
            return { ...decodeObject(key, local), ...decodeObject(key, incoming) };
        case 'unionStrings':
            return unionStrings(decodeList(key, local), decodeList(key, incoming));
        case 'appendNewTags':
            return appendNewTags(decodeList(key, local, true), decodeList(key, incoming, true));
        case 'localWins':
            return { ...decodeObject(key, incoming, true), ...decodeObject(key, local, true) };
        case 'replace':
            return decode(key, incoming);
    }
}

/**
 * Decide what a merge restore writes for `key`. `local` is undefined when the
 * key does not exist locally. Keys without a strategy are only added when
 * absent. Throws {@link MalformedSettingError} when either side cannot be read.
 */
export function mergeSettingValue(key: string, local: SettingValue | undefined, incoming: unknown): SettingMergeOutcome {
    const strategy = SETTING_MERGE_STRATEGIES.get(key);

    if (!strategy) {
        return local === undefined ? { kind: 'write', value: incoming } : { kind: 'keep' };
    }
    if (local === undefined || strategy === 'replace') {
        return { kind: 'write', value: incoming };
    }

    return { kind: 'write', value: encodeLike(incoming, applyStrategy(strategy, key, local, incoming)) };
}
