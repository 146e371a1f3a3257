/**
 * Whether `text` should be recorded in history (blank values never are).
 */
export function isCommittable(text: string): boolean {
    return text.trim().length > 0;
}

/**
 * Move `text` to the front of `history`, dropping the older copy, and cap the
 * result at `maxSize` entries. Blank text leaves the history as it was.
 */
export function pushHistory(history: readonly string[], text: string, maxSize: number): string[] {
    if (!isCommittable(text)) return history.slice(0, Math.max(0, maxSize));
    const next = [text, ...history.filter(entry => entry !== text)].slice(0, Math.max(0, maxSize));
    return Array.from(new Set(next));
}

/**
 * Coerce a stored value into a valid history list, optionally capped at
 * `maxSize` entries.
 */
export function normalizeHistory(raw: unknown, maxSize = Infinity): string[] {
    if (!Array.isArray(raw)) return [];
    const entries = raw.filter((entry): entry is string => typeof entry === 'string' && isCommittable(entry));
    return Array.from(new Set(entries)).slice(0, Math.max(0, maxSize));
}

/**
 * Candidates for `query`: case-insensitive prefix matches first, then the
 * remaining substring matches, both in history order. A blank query returns
 * everything.
 */
export function filterCandidates(items: readonly string[], query: string): string[] {
    const needle = query.trim().toLowerCase();
    if (!needle) return items.slice();
    const prefixed: string[] = [];
    const contained: string[] = [];
    for (const item of items) {
        const lower = item.toLowerCase();
        if (lower.startsWith(needle)) prefixed.push(item);
        else if (lower.includes(needle)) contained.push(item);
    }
    return [...prefixed, ...contained];
}
