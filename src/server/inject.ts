import type { SafeHTML } from "./render.js";

function stripExistingHeadTags(headContent: string): string {
    return headContent
        .replace(/[ \t]*<title[^>]*>[\s\S]*?<\/title>[ \t]*\r?\n?/gi, "")
        .replace(/[ \t]*<meta\s+name=["']description["'][^>]*>[ \t]*\r?\n?/gi, "")
        .replace(/[ \t]*<meta\s+(?:name|property)=["'](?:og|twitter):[^"']+["'][^>]*>[ \t]*\r?\n?/gi, "")
        .replace(/[ \t]*<link\s+rel=["']canonical["'][^>]*>[ \t]*\r?\n?/gi, "");
}

/**
 * Put rendered tags at the top of the document head, replacing any title,
 * description, canonical, Open Graph or Twitter tags already there.
 *
 * Without a `<head>` the tags are prepended. `null` or empty tags leave the
 * HTML untouched.
 */
export function injectHeadTags(html: string, tags: SafeHTML | null): string {
    if (!tags || !tags.html) {
        return html;
    }

    const headMatch = html.match(/(<head(?:\s[^>]*)?>)([\s\S]*?)(<\/head>)/i);
    if (!headMatch) {
        return `${tags.html}\n${html}`;
    }

    const [fullHead, openTag, innerHead, closeTag] = headMatch;
    const cleanedInnerHead = stripExistingHeadTags(innerHead);
    const rest = cleanedInnerHead.startsWith("\n") ? cleanedInnerHead : `\n${cleanedInnerHead}`;

    return html.replace(fullHead, () => `${openTag}\n${tags.html}${rest}${closeTag}`);
}
