/**
 * In-process WebDAV server answering the global fetch. Keeps collections and
 * files in memory and records every request.
 */

export interface RecordedRequest {
    method: string;
    url: string;
    headers: Headers;
}

interface StoredFile {
    data: Buffer;
    modified: Date;
}

function xmlEscape(value: string): string {
    return value.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

export class FakeWebDavServer {
    readonly requests: RecordedRequest[] = [];
    private readonly collections = new Set<string>();
    private readonly files = new Map<string, StoredFile>();
    private clock: Date | null = null;

    /**
     * @param root Collection that always exists, e.g. "https://dav.test/dav/"
     * @param credentials When set, requests without this user/password get 401
     */
    constructor(
        private readonly root: string,
        private readonly credentials?: { username: string; password: string }
    ) {
        this.collections.add(this.pathOf(root));
    }

    /** Fixed modification time for the next uploads. */
    setClock(date: Date): void {
        this.clock = date;
    }

    hasCollection(url: string): boolean {
        return this.collections.has(this.pathOf(url));
    }

    fileNames(): string[] {
        return [...this.files.keys()].map(p => decodeURIComponent(p.split('/').pop() ?? '')).sort();
    }

    requestsOf(method: string): RecordedRequest[] {
        return this.requests.filter(r => r.method === method);
    }

    readonly fetch = async (input: string | URL | Request, init: RequestInit = {}): Promise<Response> => {
        const url = typeof input === 'string' ? input : input instanceof URL ? input.href : input.url;
        const method = (init.method ?? 'GET').toUpperCase();
        const headers = new Headers(init.headers);
        this.requests.push({ method, url, headers });

        if (!this.authorized(headers)) {
            return new Response('Unauthorized', { status: 401 });
        }

        const target = this.pathOf(url);
        switch (method) {
            case 'PROPFIND':
                return this.propfind(target, headers.get('Depth') ?? '1');
            case 'MKCOL':
                return this.mkcol(target);
            case 'PUT':
                return this.put(target, init.body);
            case 'GET': {
                const file = this.files.get(target);
                return file ? new Response(file.data, { status: 200 }) : new Response('Not Found', { status: 404 });
            }
            case 'DELETE':
                return this.files.delete(target) ? new Response(null, { status: 204 }) : new Response('Not Found', { status: 404 });
            default:
                return new Response('Method Not Allowed', { status: 405 });
        }
    };

    private authorized(headers: Headers): boolean {
        if (!this.credentials) return true;
        const { username, password } = this.credentials;
        const expected = `Basic ${Buffer.from(`${username}:${password}`).toString('base64')}`;
        return headers.get('Authorization') === expected;
    }

    private pathOf(url: string): string {
        return new URL(url).pathname;
    }

    private parentOf(pathname: string): string {
        const trimmed = pathname.endsWith('/') ? pathname.slice(0, -1) : pathname;
        return trimmed.slice(0, trimmed.lastIndexOf('/') + 1);
    }

    private propfind(target: string, depth: string): Response {
        const isCollection = this.collections.has(target);
        if (!isCollection && !this.files.has(target)) {
            return new Response('Not Found', { status: 404 });
        }

        const responses = [this.collectionResponse(target)];
        if (isCollection && depth !== '0') {
            for (const child of this.collections) {
                if (child !== target && this.parentOf(child) === target) {
                    responses.push(this.collectionResponse(child));
                }
            }
            for (const [filePath, file] of this.files) {
                if (this.parentOf(filePath) === target) {
                    responses.push(this.fileResponse(filePath, file));
                }
            }
        }

        const body = `<?xml version="1.0" encoding="utf-8"?>
<d:multistatus xmlns:d="DAV:">${responses.join('')}</d:multistatus>`;
        return new Response(body, { status: 207, headers: { 'content-type': 'application/xml' } });
    }

    private collectionResponse(pathname: string): string {
        return `<d:response><d:href>${xmlEscape(pathname)}</d:href><d:propstat><d:prop>`
            + '<d:resourcetype><d:collection/></d:resourcetype>'
            + '</d:prop><d:status>HTTP/1.1 200 OK</d:status></d:propstat></d:response>';
    }

    private fileResponse(pathname: string, file: StoredFile): string {
        return `<d:response><d:href>${xmlEscape(pathname)}</d:href><d:propstat><d:prop>`
            + `<d:getcontentlength>${file.data.length}</d:getcontentlength>`
            + `<d:getlastmodified>${file.modified.toUTCString()}</d:getlastmodified>`
            + '<d:resourcetype/>'
            + '</d:prop><d:status>HTTP/1.1 200 OK</d:status></d:propstat></d:response>';
    }

    private mkcol(target: string): Response {
        if (this.collections.has(target)) return new Response('Method Not Allowed', { status: 405 });
        if (!this.collections.has(this.parentOf(target))) return new Response('Conflict', { status: 409 });
        this.collections.add(target.endsWith('/') ? target : `${target}/`);
        return new Response(null, { status: 201 });
    }

    private async put(target: string, body: RequestInit['body']): Promise<Response> {
        if (!this.collections.has(this.parentOf(target))) return new Response('Conflict', { status: 409 });
        const data = Buffer.from(await new Response(body).arrayBuffer());
        this.files.set(target, { data, modified: this.clock ?? new Date() });
        return new Response(null, { status: 201 });
    }
}
