import { z } from 'zod';
import { logger } from '../../../utils/logger';
import { WebDavConfig } from '../types';

export const DEFAULT_COLLECTION_PATH = 'kelivo_backups';

export const WebDavConfigSchema = z.object({
    url: z.string().default(''),
    username: z.string().default(''),
    password: z.string().default(''),
    path: z.string().default(DEFAULT_COLLECTION_PATH),
    includeChats: z.boolean().default(true),
    includeFiles: z.boolean().default(true)
});

export type WebDavConfigInput = z.input<typeof WebDavConfigSchema>;

/**
 * Build an immutable config. Url and username are trimmed, a blank path falls
 * back to the default collection.
 */
export function createWebDavConfig(input: WebDavConfigInput = {}): WebDavConfig {
    const parsed = WebDavConfigSchema.parse(input);
    const path = parsed.path.trim();
    return Object.freeze({
        url: parsed.url.trim(),
        username: parsed.username.trim(),
        password: parsed.password,
        path: path.length > 0 ? path : DEFAULT_COLLECTION_PATH,
        includeChats: parsed.includeChats,
        includeFiles: parsed.includeFiles
    });
}

export function webDavConfigToJsonString(cfg: WebDavConfig): string {
    return JSON.stringify({
        url: cfg.url,
        username: cfg.username,
        password: cfg.password,
        path: cfg.path,
        includeChats: cfg.includeChats,
        includeFiles: cfg.includeFiles
    });
}

export function webDavConfigFromJsonString(content: string): WebDavConfig {
    try {
        const result = WebDavConfigSchema.safeParse(JSON.parse(content));
        if (result.success) return createWebDavConfig(result.data);
        logger.warn('[WebDavConfig] Ignoring invalid stored config:', result.error.issues.map(iss => iss.message).join('; '));
    } catch (err) {
        logger.warn('[WebDavConfig] Stored config is not valid JSON:', err);
    }
    return createWebDavConfig();
}

/** Path segments of the configured collection, without empty parts. */
export function collectionSegments(cfg: WebDavConfig): string[] {
    return cfg.path.split('/').map(s => s.trim()).filter(s => s.length > 0);
}

function baseUrl(cfg: WebDavConfig): string {
    return cfg.url.trim().replace(/\/+$/, '');
}

/** Collection URL with exactly one trailing slash. */
export function collectionUrl(cfg: WebDavConfig): string {
    const segments = collectionSegments(cfg);
    const suffix = segments.length > 0 ? `/${segments.join('/')}` : '';
    return `${baseUrl(cfg)}${suffix}/`;
}

export function fileUrl(cfg: WebDavConfig, childName: string): string {
    return `${collectionUrl(cfg)}${childName.replace(/^\/+/, '')}`;
}

/** URLs of every collection prefix, shortest first, each ending in a slash. */
export function collectionPrefixUrls(cfg: WebDavConfig): string[] {
    const urls: string[] = [];
    let acc = baseUrl(cfg);
    for (const segment of collectionSegments(cfg)) {
        acc = `${acc}/${segment}`;
        urls.push(`${acc}/`);
    }
    return urls;
}
