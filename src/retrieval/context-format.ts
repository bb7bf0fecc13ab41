/**
 * Text rendering of an assembled context.
 */

import type { ContextEntry, RAGContext } from './types.js';

export const ENTRY_SEPARATOR = '\n\n---\n\n';

export interface FormattedContext {
  text: string;
  /** Entries rendered, in order */
  entryCount: number;
  charCount: number;
}

/**
 * Render entries as header + content blocks joined by a rule.
 */
export function formatContext(context: Pick<RAGContext, 'entries'>): FormattedContext {
  const parts = context.entries.map(formatEntry);
  const text = parts.join(ENTRY_SEPARATOR);
  return { text, entryCount: parts.length, charCount: text.length };
}

export function formatEntry(entry: ContextEntry): string {
  return `${formatHeader(entry)}\n${entry.document.content}`;
}

export function formatHeader(entry: ContextEntry): string {
  const doc = entry.document;
  const fields: string[] = [];

  switch (entry.source) {
    case 'critical':
      fields.push('Critical', doc.path, doc.title);
      break;
    case 'direct':
      fields.push('Direct', doc.path, doc.title);
      break;
    case 'linked':
      fields.push(`Linked from ${entry.linkedFrom ?? '?'} (depth ${entry.linkDepth ?? 0})`);
      fields.push(doc.path, doc.title);
      break;
  }

  if (entry.source !== 'linked' && entry.finalScore !== null && doc.rawScore !== null) {
    fields.push(`Relevance: ${(entry.finalScore * 100).toFixed(0)}%`);
  }
  if (entry.supersession.supersededById) {
    fields.push(`Superseded by ${entry.supersession.supersededById}`);
  }

  return `[${fields.join(' | ')}]`;
}

/**
 * Keep the longest prefix of entries whose summed charCount fits maxChars.
 *
 * Stops at the first entry that overflows so ranking order is preserved.
 * Counts are recomputed; totalMatches is carried over.
 */
export function trimToCharBudget(context: RAGContext, maxChars: number): RAGContext {
  const entries: ContextEntry[] = [];
  let totalCharCount = 0;
  for (const entry of context.entries) {
    if (totalCharCount + entry.document.charCount > maxChars) break;
    totalCharCount += entry.document.charCount;
    entries.push(entry);
  }

  const count = (source: ContextEntry['source']): number =>
    entries.filter((entry) => entry.source === source).length;

  return {
    entries,
    criticalCount: count('critical'),
    directCount: count('direct'),
    linkedCount: count('linked'),
    totalMatches: context.totalMatches,
    totalCharCount,
  };
}
