/**
 * A value extracted from an external payload that may or may not have been there.
 * Absent fields are kept distinct from empty strings or zeros so a missing
 * quantity is never mistaken for a reported zero.
 */
export type Field<T> = { present: true; value: T } | { present: false };

/** Identifies which external system produced a record. */
export type SourceTag = 'arxiv' | 'bgs' | 'edx' | 'comtrade' | 'scholar';

/**
 * SourceRecord: the normalized shape every source client produces.
 * `source` + `id` together address the original external resource.
 */
export interface SourceRecord {
    source: SourceTag;

    /** Stable identifier from the source (arXiv ID, OGC feature id, CKAN id, ...) */
    id: string;

    /** Human-readable title or label */
    title: string;

    /** Descriptive text fields (abstract, notes, units, dates, ...) */
    text: Record<string, Field<string>>;

    /** Numeric / statistical fields (quantity, year, trade value, ...) */
    numbers: Record<string, Field<number>>;

    /** Ordered string lists (authors, categories, tags, ...) */
    lists: Record<string, string[]>;
}

/**
 * Caller-facing serialization of a record. Absent fields become null.
 */
export interface WireRecord {
    source: SourceTag;
    id: string;
    title: string;
    [field: string]: string | number | string[] | null;
}
