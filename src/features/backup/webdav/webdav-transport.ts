import { logger } from '../../../utils/logger';
import { AuthError, TransportError } from '../errors';
import { BackupFileItem, WebDavConfig } from '../types';
import { timestampFromBackupName } from './backup-filename';
import { parsePropfindResponse } from './propfind-parser';
import { collectionPrefixUrls, collectionUrl, fileUrl } from './webdav-config';

const PROPFIND_PROBE =
    '<?xml version="1.0" encoding="utf-8" ?><d:propfind xmlns:d="DAV:"><d:prop><d:displayname/></d:prop></d:propfind>';

const PROPFIND_LIST = `<?xml version="1.0" encoding="utf-8" ?>
<d:propfind xmlns:d="DAV:">
  <d:prop>
    <d:displayname/>
    <d:getcontentlength/>
    <d:getlastmodified/>
  </d:prop>
</d:propfind>`;

function authHeaders(cfg: WebDavConfig): Record<string, string> {
    if (cfg.username.trim().length === 0) return {};
    const token = Buffer.from(`${cfg.username}:${cfg.password}`, 'utf-8').toString('base64');
    return { Authorization: `Basic ${token}` };
}

function isSuccess(status: number): boolean {
    return status === 207 || (status >= 200 && status < 300);
}

function isSuccessOrRedirect(status: number): boolean {
    return status >= 200 && status < 400;
}

function normalizeUrl(url: string): string {
    try {
        return new URL(url).href;
    } catch {
        return url;
    }
}

function withoutTrailingSlash(url: string): string {
    return url.replace(/\/+$/, '');
}

function lastSegment(href: string): string {
    const segments = href.split('/').filter(s => s.length > 0);
    const last = segments[segments.length - 1] ?? '';
    try {
        return decodeURIComponent(last);
    } catch {
        return last;
    }
}

// Entries without a timestamp sort last
function newestFirst(a: BackupFileItem, b: BackupFileItem): number {
    const ta = a.lastModified?.getTime() ?? -Infinity;
    const tb = b.lastModified?.getTime() ?? -Infinity;
    if (ta === tb) return 0;
    return tb > ta ? 1 : -1;
}

function parseHttpDate(value: string | null): Date | null {
    if (!value) return null;
    const time = Date.parse(value);
    return Number.isNaN(time) ? null : new Date(time);
}

/**
 * Stateless WebDAV client covering the subset needed for backups: collection
 * probing/creation, depth-1 listing, and single-file PUT/GET/DELETE.
 */
export class WebDavTransport {
    private async send(
        cfg: WebDavConfig,
        method: string,
        url: string,
        init: { headers?: Record<string, string>; body?: string | Uint8Array } = {}
    ): Promise<Response> {
        logger.debug(`[WebDAV] ${method} ${url}`);
        return fetch(url, {
            method,
            headers: { ...authHeaders(cfg), ...init.headers },
            body: init.body
        });
    }

    private fail(method: string, url: string, status: number): never {
        if (status === 401) throw new AuthError(url);
        throw new TransportError(method, url, status);
    }

    /**
     * Make sure every segment of the configured path exists, creating missing
     * collections one level at a time. Safe to call repeatedly.
     */
    async ensureCollection(cfg: WebDavConfig): Promise<void> {
        for (const url of collectionPrefixUrls(cfg)) {
            const probe = await this.send(cfg, 'PROPFIND', url, {
                headers: { Depth: '0', 'Content-Type': 'application/xml; charset=utf-8' },
                body: PROPFIND_PROBE
            });

            if (probe.status === 404) {
                const mk = await this.send(cfg, 'MKCOL', url);
                // 405: created concurrently or already there
                if (mk.status !== 201 && mk.status !== 200 && mk.status !== 405) {
                    this.fail('MKCOL', url, mk.status);
                }
                logger.info(`[WebDAV] Created collection ${url}`);
            } else if (!isSuccessOrRedirect(probe.status)) {
                this.fail('PROPFIND', url, probe.status);
            }
        }
    }

    async testConnection(cfg: WebDavConfig): Promise<void> {
        const url = collectionUrl(cfg);
        const res = await this.send(cfg, 'PROPFIND', url, {
            headers: { Depth: '1', 'Content-Type': 'application/xml; charset=utf-8' },
            body: PROPFIND_PROBE
        });
        if (!isSuccess(res.status)) this.fail('PROPFIND', url, res.status);
    }

    /**
     * List the files directly inside the collection, newest first. Entries with
     * no usable timestamp sort last.
     */
    async listCollection(cfg: WebDavConfig): Promise<BackupFileItem[]> {
        const url = collectionUrl(cfg);
        const res = await this.send(cfg, 'PROPFIND', url, {
            headers: { Depth: '1', 'Content-Type': 'application/xml; charset=utf-8' },
            body: PROPFIND_LIST
        });
        if (!isSuccess(res.status)) this.fail('PROPFIND', url, res.status);

        const self = withoutTrailingSlash(normalizeUrl(url));
        const items: BackupFileItem[] = [];
        for (const entry of parsePropfindResponse(await res.text())) {
            const absolute = normalizeUrl(new URL(entry.href, url).href);
            if (withoutTrailingSlash(absolute) === self) continue;
            if (absolute.endsWith('/')) continue;

            const displayName = entry.displayName || lastSegment(absolute);
            items.push({
                href: absolute,
                displayName,
                size: entry.contentLength ?? 0,
                lastModified: parseHttpDate(entry.lastModified) ?? timestampFromBackupName(displayName)
            });
        }

        items.sort(newestFirst);
        return items;
    }

    async upload(cfg: WebDavConfig, data: Uint8Array, name: string): Promise<string> {
        const url = fileUrl(cfg, name);
        const res = await this.send(cfg, 'PUT', url, {
            headers: { 'content-type': 'application/zip' },
            body: data
        });
        if (!isSuccessOrRedirect(res.status)) this.fail('PUT', url, res.status);
        return url;
    }

    async download(cfg: WebDavConfig, item: BackupFileItem): Promise<Buffer> {
        const res = await this.send(cfg, 'GET', item.href);
        if (!isSuccessOrRedirect(res.status)) this.fail('GET', item.href, res.status);
        return Buffer.from(await res.arrayBuffer());
    }

    async delete(cfg: WebDavConfig, item: BackupFileItem): Promise<void> {
        const res = await this.send(cfg, 'DELETE', item.href);
        if (!isSuccessOrRedirect(res.status)) this.fail('DELETE', item.href, res.status);
    }
}
