import { SettingValue } from './types';

// Window state stays on the device it was recorded on.
export const LOCAL_ONLY_SETTING_KEYS: ReadonlySet<string> = new Set([
    'window_width_v1',
    'window_height_v1',
    'window_pos_x_v1',
    'window_pos_y_v1',
    'window_maximized_v1'
]);

/** Keys restored under `providersAction`; everything else follows `settingsAction`. */
export const PROVIDER_SETTING_KEYS: ReadonlySet<string> = new Set([
    'provider_configs_v1',
    'providers_order_v1',
    'pinned_models_v1',
    'assistants_v1',
    'assistant_tags_v1',
    'assistant_tag_map_v1',
    'assistant_tag_collapsed_v1',
    'search_services_v1',
    'quick_phrases_v1'
]);

export function isLocalOnlyKey(key: string): boolean {
    return LOCAL_ONLY_SETTING_KEYS.has(key);
}

export function isProviderKey(key: string): boolean {
    return PROVIDER_SETTING_KEYS.has(key);
}

function isString(item: unknown): item is string {
    return typeof item === 'string';
}

/**
 * Narrow an arbitrary JSON value to a storable setting. Lists keep only their
 * string items. Returns null for objects, null and non-finite numbers.
 */
export function coerceSettingValue(value: unknown): SettingValue | null {
    switch (typeof value) {
        case 'boolean':
        case 'string':
            return value;
        case 'number':
            return Number.isFinite(value) ? value : null;
        default:
            if (Array.isArray(value)) return value.filter(isString);
            return null;
    }
}
