/**
 * Accent, case and whitespace insensitive form of a heading.
 * `"ÍNDICE DE TABLAS"` becomes `"indice de tablas"`.
 */
export function normalizeTitle(value: unknown): string {
  const text = typeof value === 'string' ? value.trim().toLowerCase() : '';
  if (!text) {
    return '';
  }
  return text
    .normalize('NFKD')
    .replace(/[^\x00-\x7f]/g, '')
    .split(/\s+/)
    .filter(Boolean)
    .join(' ');
}

export const TOC_TITLES: ReadonlySet<string> = new Set([
  'indice',
  'indice de contenido',
  'indice de contenidos',
  'indice de tablas',
  'indice de figuras',
  'indice de abreviaturas',
  'tabla de contenido',
  'tabla de contenidos',
  'table of contents',
  'toc',
]);

/** Whole-title match only: "contenido" alone is a real heading. */
export function isTocTitle(title: unknown): boolean {
  const normalized = normalizeTitle(title);
  return normalized.length > 0 && TOC_TITLES.has(normalized);
}

export function isTocPath(path: string): boolean {
  return path.split('/').some((segment) => isTocTitle(segment));
}

/** Table/figure caption rows such as "Tabla 3: Resultados". */
export function isMediaCaption(title: unknown): boolean {
  const normalized = normalizeTitle(title);
  return normalized.startsWith('tabla ') || normalized.startsWith('figura ');
}

export function isIndexPath(path: string): boolean {
  return path.split('/').some((segment) => isTocTitle(segment) || isMediaCaption(segment));
}

export function isAbbreviationsTitle(title: unknown): boolean {
  const normalized = normalizeTitle(title);
  return !isTocTitle(title) && (normalized.includes('abreviatura') || normalized.includes('siglas') || normalized.includes('acronimos'));
}

export function isAbbreviationsPath(path: string): boolean {
  const segments = path.split('/');
  return isAbbreviationsTitle(segments[segments.length - 1]);
}
