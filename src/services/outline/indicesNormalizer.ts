import { FormatDefinition } from '../../models/Format';
import { normalizeTitle } from './tocDetector';

export type TocDirectiveType = 'toc' | 'toc_tables' | 'toc_figures' | 'toc_abbreviations';

export interface TocDirective {
  type: TocDirectiveType;
  title: string;
  levels: string;
  pageBreakAfter: boolean;
}

const DICT_KEY_PRIORITY = ['contenido', 'tablas', 'figuras', 'abreviaturas'];
const IGNORED_DICT_KEYS = new Set(['placeholder', 'nota']);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function inferDirectiveType(title: string): TocDirectiveType {
  const normalized = normalizeTitle(title);
  if (normalized.includes('tabla') && normalized !== 'tabla de contenido' && normalized !== 'tabla de contenidos') {
    return 'toc_tables';
  }
  if (normalized.includes('figuras')) {
    return 'toc_figures';
  }
  if (normalized.includes('abreviaturas')) {
    return 'toc_abbreviations';
  }
  return 'toc';
}

function makeDirective(title: string): TocDirective {
  return {
    type: inferDirectiveType(title),
    title,
    levels: '1-3',
    pageBreakAfter: true,
  };
}

function isDirective(value: unknown): value is TocDirective {
  return isRecord(value) && typeof value.type === 'string' && typeof value.title === 'string';
}

function fromDict(indices: Record<string, unknown>): TocDirective[] {
  const seen = new Set<string>();
  const directives: TocDirective[] = [];
  const take = (key: string) => {
    const title = indices[key];
    if (typeof title === 'string' && title.trim()) {
      directives.push(makeDirective(title.trim()));
      seen.add(key);
    }
  };

  DICT_KEY_PRIORITY.forEach(take);
  Object.keys(indices)
    .filter((key) => !seen.has(key) && !IGNORED_DICT_KEYS.has(key))
    .forEach(take);
  return directives;
}

function fromArray(indices: unknown[]): TocDirective[] {
  // Item lists with page numbers are dropped: the document renderer rebuilds them.
  return indices.flatMap((entry) => {
    if (!isRecord(entry)) {
      return [];
    }
    const title = entry.titulo ?? entry.title;
    return typeof title === 'string' && title.trim() ? [makeDirective(title.trim())] : [];
  });
}

export function normalizeIndices(indices: unknown): TocDirective[] | null {
  if (Array.isArray(indices) && indices.length > 0 && indices.every(isDirective)) {
    return indices;
  }
  if (isRecord(indices)) {
    const directives = fromDict(indices);
    return directives.length ? directives : null;
  }
  if (Array.isArray(indices)) {
    const directives = fromArray(indices);
    return directives.length ? directives : null;
  }
  return null;
}

/**
 * Returns a copy with `preliminares.indices` rewritten as TOC directives.
 * The input is never mutated.
 */
export function normalizeDefinition(definition: FormatDefinition): FormatDefinition {
  const preliminares = definition.preliminares;
  if (!isRecord(preliminares) || preliminares.indices === undefined) {
    return definition;
  }
  const directives = normalizeIndices(preliminares.indices);
  if (!directives || directives === preliminares.indices) {
    return definition;
  }
  return {
    ...definition,
    preliminares: {
      ...preliminares,
      indices: directives,
    },
  };
}

export function extractTocDirectives(definition: FormatDefinition): TocDirective[] {
  const normalized = normalizeDefinition(definition);
  const preliminares = normalized.preliminares;
  if (!isRecord(preliminares)) {
    return [];
  }
  return normalizeIndices(preliminares.indices) ?? [];
}
