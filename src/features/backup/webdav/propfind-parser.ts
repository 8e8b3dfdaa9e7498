import { XMLParser } from 'fast-xml-parser';

export interface PropfindEntry {
    href: string;
    displayName: string;
    contentLength: number | null;
    lastModified: string | null;
}

type XmlNode = Record<string, unknown>;

function isNode(value: unknown): value is XmlNode {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asArray(value: unknown): unknown[] {
    if (value === undefined || value === null) return [];
    return Array.isArray(value) ? value : [value];
}

/** Text content of an element, whether the parser produced a string or a node with #text. */
function textOf(value: unknown): string {
    if (typeof value === 'string') return value.trim();
    if (typeof value === 'number') return String(value);
    if (isNode(value)) return textOf(value['#text']);
    return '';
}

/** The 200 propstat if the server split properties by status, else the first one. */
function pickProp(response: XmlNode): XmlNode {
    const propstats = asArray(response.propstat).filter(isNode);
    const ok = propstats.find(ps => textOf(ps.status).includes(' 200')) ?? propstats[0];
    return ok && isNode(ok.prop) ? ok.prop : {};
}

const parser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: '',
    removeNSPrefix: true,
    parseTagValue: false
});

/**
 * Parse a multistatus body into flat entries. Namespace prefixes are dropped, so
 * `d:href`, `D:href` and `href` all read the same.
 */
export function parsePropfindResponse(xml: string): PropfindEntry[] {
    const doc: unknown = parser.parse(xml);
    if (!isNode(doc)) return [];
    const multistatus = isNode(doc.multistatus) ? doc.multistatus : doc;

    const entries: PropfindEntry[] = [];
    for (const response of asArray(multistatus.response)) {
        if (!isNode(response)) continue;
        const href = textOf(response.href);
        if (!href) continue;

        const prop = pickProp(response);
        const length = Number.parseInt(textOf(prop.getcontentlength), 10);
        const lastModified = textOf(prop.getlastmodified);

        entries.push({
            href,
            displayName: textOf(prop.displayname),
            contentLength: Number.isFinite(length) ? length : null,
            lastModified: lastModified || null
        });
    }
    return entries;
}
