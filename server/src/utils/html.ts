const HTML_ESCAPES: Record<string, string> = {
    '&': '&amp;',
    '<': '&lt;',
    '>': '&gt;',
    '"': '&quot;',
    "'": '&#39;',
};

/** Escape text for HTML content and double- or single-quoted attributes. */
export function escapeHtml(value: string): string {
    return value.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

/** Inches as a CSS length, e.g. 0.125 -> "0.125in". */
export function inches(value: number): string {
    return `${value}in`;
}
