import type { SourceRecord } from '../types/index.js';
import { fieldOr } from '../sources/utils.js';
import { truncate } from './text.js';

const BRIEF_AUTHORS = 3;
const BRIEF_CATEGORIES = 3;
const BRIEF_ABSTRACT_CHARS = 300;

function authorsLine(authors: string[], limit?: number): string {
    if (authors.length === 0) return 'Unknown';
    if (limit === undefined || authors.length <= limit) return authors.join(', ');
    return `${authors.slice(0, limit).join(', ')} et al. (${authors.length} total)`;
}

/**
 * Short listing entry for a search result.
 */
export function formatPaperBrief(paper: SourceRecord): string {
    const categories = paper.lists['categories'] ?? [];
    const abstract = fieldOr(paper.text['abstract'], '');

    return [
        `Title: ${paper.title}`,
        `arXiv ID: ${paper.id}`,
        `Authors: ${authorsLine(paper.lists['authors'] ?? [], BRIEF_AUTHORS)}`,
        `Published: ${fieldOr(paper.text['published'], 'Unknown')}`,
        `Categories: ${categories.slice(0, BRIEF_CATEGORIES).join(', ') || 'None'}`,
        `PDF: ${fieldOr(paper.text['pdf_url'], 'Unavailable')}`,
        `Abstract: ${abstract ? truncate(abstract, BRIEF_ABSTRACT_CHARS) : 'No abstract available.'}`,
    ].join('\n');
}

/**
 * Full description of one paper, abstract included.
 */
export function formatPaperDetail(paper: SourceRecord): string {
    const lines = [
        `Title: ${paper.title}`,
        `arXiv ID: ${paper.id}`,
        `Authors: ${authorsLine(paper.lists['authors'] ?? [])}`,
        `Published: ${fieldOr(paper.text['published'], 'Unknown')}`,
        `Categories: ${(paper.lists['categories'] ?? []).join(', ') || 'None'}`,
        `PDF URL: ${fieldOr(paper.text['pdf_url'], 'Unavailable')}`,
    ];

    const doi = paper.text['doi'];
    if (doi?.present) lines.push(`DOI: ${doi.value}`);
    const journal = paper.text['journal_ref'];
    if (journal?.present) lines.push(`Journal reference: ${journal.value}`);

    const abstract = fieldOr(paper.text['abstract'], 'No abstract available.');
    return `${lines.join('\n\n')}\n\nAbstract:\n${abstract}`;
}

/**
 * Prompt asking for a structured summary of one paper.
 */
export function paperSummaryInstruction(): string {
    return [
        'Please provide a concise summary of the following research paper.',
        'Focus on:',
        '1. The main research question or problem',
        '2. The key methodology or approach',
        '3. The main findings or contributions',
        '4. The significance of the work',
        '',
        'Please provide a clear, structured summary in 3-4 paragraphs.',
        '',
        'Paper details:',
    ].join('\n');
}
