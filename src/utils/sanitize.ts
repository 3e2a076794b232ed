const PLACEHOLDER = 'Unknown';
const MAX_LENGTH = 99;
const TRUNCATE_AT = 96;

/**
 * Normalizes free text for the accounting system's name fields: no angle
 * brackets or double quotes, `&` spelled out, single spaces, at most 99 chars.
 */
export function sanitize(text?: string | null): string {
    if (!text) return PLACEHOLDER;

    let sanitized = text.trim();
    sanitized = sanitized.replace(/&/g, 'and');
    sanitized = sanitized.replace(/[<>"]/g, '');
    sanitized = sanitized.replace(/\s+/g, ' ');

    // Lengths count code points so a surrogate pair is never split.
    const chars = Array.from(sanitized);
    if (chars.length > MAX_LENGTH) {
        sanitized = chars.slice(0, TRUNCATE_AT).join('') + '...';
    }

    return sanitized || PLACEHOLDER;
}
