/**
 * Console output for the CLI. Core never prints; everything the user sees
 * goes through here.
 */

export function log(message: string): void {
    console.log(message);
}

export function success(message: string): void {
    console.log(`✓ ${message}`);
}

export function warn(message: string): void {
    console.warn(`⚠️  ${message}`);
}

export function error(message: string): void {
    console.error(`✖ ${message}`);
}

export function arrow(message: string): void {
    console.log(`→ ${message}`);
}

/**
 * Heading followed by aligned `label: value` lines.
 */
export function table(title: string, rows: [string, string | number][]): void {
    console.log(`\n--- ${title} ---`);
    const width = Math.max(0, ...rows.map(([label]) => label.length)) + 1;
    for (const [label, value] of rows) {
        console.log(`${`${label}:`.padEnd(width)} ${value}`);
    }
}
