import { isMetadataField, METADATA_FIELDS, type PageMetadata } from "./metadata.js";

/**
 * Markup that is already in its final form and must be spliced into the
 * document as-is, without another round of escaping.
 */
export interface SafeHTML {
    readonly __kind: "safe-html";
    readonly html: string;
}

export function raw(html: string): SafeHTML {
    return { __kind: "safe-html", html };
}

export const DEFAULT_INDENT = 4;

function compare(a: string, b: string): number {
    if (a === b) {
        return 0;
    }
    return a < b ? -1 : 1;
}

/**
 * Trim a value and collapse every ASCII whitespace run, newlines included,
 * into a single space. Non-breaking and other Unicode spaces are content and
 * stay as they are. No HTML escaping happens here.
 */
export function cleanup(value: string): string {
    return value.replace(/^[ \t\n\v\f\r]+|[ \t\n\v\f\r]+$/g, "").replace(/[ \t\n\v\f\r]+/g, " ");
}

function markup(tag: string, content: string): string {
    if (tag === "title") {
        return `<title>${content}</title>`;
    }
    if (tag === "description") {
        return `<meta name="description" content="${content}" />`;
    }
    if (tag === "canonical") {
        return `<link rel="canonical" href="${content}" />`;
    }
    if (tag.startsWith("og_")) {
        return `<meta property="og:${tag.slice("og_".length)}" content="${content}" />`;
    }
    return `<meta property="twitter:${tag.slice("twitter_".length)}" content="${content}" />`;
}

/**
 * Render a record into head tags, one line per present field, sorted by tag
 * name and prefixed with `indentWidth` spaces. A value that is empty once
 * cleaned up counts as absent.
 */
export function renderMetadata(record: PageMetadata, indentWidth: number = DEFAULT_INDENT): string {
    if (!Number.isInteger(indentWidth) || indentWidth < 0) {
        throw new RangeError(`indentWidth must be a non-negative integer, got ${indentWidth}`);
    }

    const tags: Array<[string, string]> = [];
    for (const [field, value] of Object.entries(record)) {
        if (typeof value !== "string" || !isMetadataField(field)) {
            continue;
        }
        const content = cleanup(value);
        if (content) {
            tags.push([METADATA_FIELDS[field], content]);
        }
    }
    tags.sort(([a], [b]) => compare(a, b));

    const pad = " ".repeat(indentWidth);
    return tags.map(([tag, value]) => pad + markup(tag, value)).join("\n");
}
