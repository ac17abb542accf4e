/**
 * Shared utilities for source clients: tolerant field extraction from
 * untyped JSON payloads and identifier helpers.
 */
import type { Field, SourceRecord, WireRecord } from '../types/index.js';

export const ABSENT: Field<never> = { present: false };

export function present<T>(value: T): Field<T> {
    return { present: true, value };
}

/**
 * Value of a field, or the fallback when absent.
 */
export function fieldOr<T, F>(field: Field<T> | undefined, fallback: F): T | F {
    return field?.present ? field.value : fallback;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Read an array at `key`; anything else yields an empty list.
 */
export function arrayAt(obj: unknown, key: string): unknown[] {
    if (!isRecord(obj)) return [];
    const value = obj[key];
    return Array.isArray(value) ? value : [];
}

export function objectAt(obj: unknown, key: string): Record<string, unknown> | null {
    if (!isRecord(obj)) return null;
    const value = obj[key];
    return isRecord(value) ? value : null;
}

/**
 * Non-blank string at `key`. Numbers are accepted and stringified (ids are often numeric).
 */
export function textField(obj: unknown, key: string): Field<string> {
    if (!isRecord(obj)) return ABSENT;
    const value = obj[key];
    if (typeof value === 'string') {
        const trimmed = value.trim();
        return trimmed ? present(trimmed) : ABSENT;
    }
    if (typeof value === 'number' && Number.isFinite(value)) {
        return present(String(value));
    }
    return ABSENT;
}

/**
 * Finite number at `key`. Numeric strings are accepted.
 */
export function numberField(obj: unknown, key: string): Field<number> {
    if (!isRecord(obj)) return ABSENT;
    const value = obj[key];
    if (typeof value === 'number' && Number.isFinite(value)) {
        return present(value);
    }
    if (typeof value === 'string' && value.trim() !== '') {
        const parsed = Number(value);
        return Number.isFinite(parsed) ? present(parsed) : ABSENT;
    }
    return ABSENT;
}

/**
 * Leading four-digit year of a date-like string ("2021-01-01", "2021").
 */
export function yearFrom(field: Field<string>): Field<number> {
    if (!field.present) return ABSENT;
    const match = field.value.match(/^(\d{4})/);
    return match?.[1] ? present(parseInt(match[1], 10)) : ABSENT;
}

/**
 * Collapse internal whitespace (arXiv titles and abstracts wrap lines).
 */
export function collapseWhitespace(text: string): string {
    return text.replace(/\s+/g, ' ').trim();
}

const ARXIV_NEW_STYLE = /^\d{4}\.\d{4,5}(v\d+)?$/;
const ARXIV_OLD_STYLE = /^[a-z-]+(\.[A-Z]{2})?\/\d{7}(v\d+)?$/;

/**
 * Whether a string is an arXiv identifier ("2301.07041", "2301.07041v2", "cs.AI/0001001").
 */
export function isArxivId(id: string): boolean {
    return ARXIV_NEW_STYLE.test(id) || ARXIV_OLD_STYLE.test(id);
}

/**
 * Strip a trailing version suffix: "2301.07041v2" → "2301.07041".
 */
export function stripArxivVersion(id: string): string {
    return id.replace(/v\d+$/, '');
}

/**
 * Extract arXiv ID from an abstract URL.
 * "http://arxiv.org/abs/2401.01234v1" → "2401.01234v1"
 */
export function arxivIdFromUrl(url: string): string {
    const index = url.indexOf('/abs/');
    return index >= 0 ? url.slice(index + '/abs/'.length) : url;
}

/**
 * Caller-facing form of a record: absent fields become null, present values
 * are passed through untouched.
 */
export function toWire(record: SourceRecord): WireRecord {
    const wire: WireRecord = {
        source: record.source,
        id: record.id,
        title: record.title,
    };

    for (const [key, field] of Object.entries(record.text)) {
        wire[key] = field.present ? field.value : null;
    }
    for (const [key, field] of Object.entries(record.numbers)) {
        wire[key] = field.present ? field.value : null;
    }
    for (const [key, list] of Object.entries(record.lists)) {
        wire[key] = [...list];
    }

    return wire;
}
