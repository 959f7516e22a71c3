import { URLSearchParams } from 'url';

// Known attack signatures, matched as lower-case substrings of the
// request path or its query string.
export const SUSPICIOUS_PATTERNS: readonly string[] = [
    '../../', // path traversal
    'select', // SQL injection
    '<script', // XSS
    '../etc/passwd', // path traversal
];

export function isSuspiciousRequest(path: string, query: string): boolean {
    const p = path.toLowerCase();
    const q = query.toLowerCase();
    return SUSPICIOUS_PATTERNS.some(pattern => p.includes(pattern) || q.includes(pattern));
}

/**
 * Decoded form of a raw query string ("a=1&b=%3Cscript" → "a=1&b=<script"),
 * so encoded payloads are matched the same as plain ones.
 */
export function serializeQuery(rawQuery: string): string {
    const pairs: string[] = [];
    for (const [key, value] of new URLSearchParams(rawQuery)) {
        pairs.push(`${key}=${value}`);
    }
    return pairs.join('&');
}
