/**
 * Stable ascending sort by date string. Returns a new array.
 *
 * ISO dates order chronologically; dates left unparsed compare as opaque
 * text.
 */
export function sortByDate<T extends { date: string }>(records: readonly T[]): T[] {
    return [...records].sort((a, b) => {
        if (a.date < b.date) return -1;
        if (a.date > b.date) return 1;
        return 0;
    });
}
