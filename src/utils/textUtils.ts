/**
 * Pulls the JSON object out of a model reply. A fenced block (tagged `json` or
 * not) wins when it parses; otherwise the span from the first `{` to the last
 * `}` is returned for the caller to parse. Arrays are not looked for.
 * @throws {Error} when the reply holds no `{...}` span.
 */
export const extractJson = (text: string): string => {
    const fenced = /```(?:json)?\s*([\s\S]*?)\s*```/.exec(text)?.[1]?.trim();
    if (fenced && isJson(fenced)) {
        return fenced;
    }

    const start = text.indexOf('{');
    const end = text.lastIndexOf('}');
    if (start !== -1 && end > start) {
        return text.slice(start, end + 1);
    }

    throw new Error('Could not find a valid JSON object in the model reply.');
};

const isJson = (text: string): boolean => {
    try {
        JSON.parse(text);
        return true;
    } catch {
        return false;
    }
};

export const stripHtml = (html: string): string =>
    html
        .replace(/<(script|style)[^>]*>[\s\S]*?<\/\1>/gi, ' ')
        .replace(/<[^>]+>/g, ' ')
        .replace(/&nbsp;/g, ' ')
        .replace(/&lt;/g, '<')
        .replace(/&gt;/g, '>')
        .replace(/&quot;/g, '"')
        .replace(/&#39;/g, "'")
        .replace(/&amp;/g, '&')
        .replace(/\s+/g, ' ')
        .trim();

export const countWords = (html: string): number => {
    const text = stripHtml(html);
    return text ? text.split(' ').filter(token => /[\p{L}\p{N}]/u.test(token)).length : 0;
};

export const escapeHtml = (text: string): string =>
    text
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;')
        .replace(/"/g, '&quot;')
        .replace(/'/g, '&#39;');

const escapeRegExp = (text: string): string => text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

/**
 * Case-insensitive whole-word occurrences of `phrase` in the tag-free text.
 * Letters and digits of any script count as word characters.
 */
export const countPhrase = (html: string, phrase: string): number => {
    const needle = phrase.trim().split(/\s+/).map(escapeRegExp).join('\\s+');
    if (!needle) return 0;
    const pattern = new RegExp(`(?<![\\p{L}\\p{N}_])${needle}(?![\\p{L}\\p{N}_])`, 'giu');
    return stripHtml(html).match(pattern)?.length ?? 0;
};
