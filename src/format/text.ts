/**
 * Text helpers shared by the tool formatters.
 */

/**
 * Fixed-point number with thousands separators: formatNumber(1234.5, 1) → "1,234.5".
 */
export function formatNumber(value: number, digits = 1): string {
    return value.toLocaleString('en-US', {
        minimumFractionDigits: digits,
        maximumFractionDigits: digits,
    });
}

/**
 * Percentage, optionally signed: formatPercent(12.34, { signed: true }) → "+12.3%".
 */
export function formatPercent(value: number, options: { digits?: number; signed?: boolean } = {}): string {
    const text = value.toFixed(options.digits ?? 1);
    return options.signed && value >= 0 ? `+${text}%` : `${text}%`;
}

/**
 * Cut text to `max` characters, appending "..." when shortened.
 */
export function truncate(text: string, max: number): string {
    return text.length > max ? `${text.slice(0, max)}...` : text;
}

/**
 * Markdown table. Pipes inside cells are escaped.
 */
export function markdownTable(headers: string[], rows: Array<Array<string | number>>): string {
    const line = (cells: Array<string | number>): string =>
        `| ${cells.map((cell) => String(cell).replace(/\|/g, '\\|')).join(' | ')} |`;
    const separator = `|${headers.map((header) => '-'.repeat(header.length + 2)).join('|')}|`;
    return [line(headers), separator, ...rows.map(line)].join('\n');
}

export const RULE = '='.repeat(80);
export const THIN_RULE = '-'.repeat(80);
