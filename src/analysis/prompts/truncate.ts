/**
 * Keeps the first `maxChars` characters of `text`.
 *
 * Counts code points, so a surrogate pair is never split, but words and sentences may be.
 */
export function truncateChars(text: string, maxChars: number): string {
    // Code points never outnumber UTF-16 units
    if (text.length <= maxChars) {
        return text;
    }
    return Array.from(text).slice(0, maxChars).join('');
}
