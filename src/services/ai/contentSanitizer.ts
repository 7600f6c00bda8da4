import { SKIP_SECTION_TOKEN } from '../../utils/promptTemplates';
import { isAbbreviationsPath, isTocPath, normalizeTitle } from '../outline/tocDetector';

const LEADER_PAGE_PATTERN = /(?:[.…]{3,}|[ \t]{4,})\s*(?:pag\.?\s*)?(?:\d+|X)\s*$/i;
const PAGE_SUFFIX_PATTERN = /\s+pag\.?\s+(?:\d+|X)\s*$/i;
const ABBREVIATION_LINE_PATTERN = /^\s*([A-ZÁÉÍÓÚÜÑ0-9]{2,})\s*[:\-—]\s*(.+?)\s*$/i;
const ABBREVIATION_PAREN_PATTERN = /^\s*(.+?)\s*\(([\wÁÉÍÓÚÜÑ]{2,})\)\s*$/i;

const FORBIDDEN_PHRASES = [
  'FIGURA DE EJEMPLO',
  'TABLA DE EJEMPLO',
  'TITULO DEL PROYECTO',
  'LOREM IPSUM',
  '[PENDIENTE]',
].map((phrase) => normalizeTitle(phrase));

const SKIP_TOKEN_ALL = new RegExp(SKIP_SECTION_TOKEN, 'g');

/** The skip token on its own, optionally wrapped in a heading, bold or code markers. */
export function isSkipToken(content: string): boolean {
  const unwrapped = content
    .trim()
    .replace(/^#{1,6}\s*/, '')
    .replace(/^(?:\*\*|__|`+)\s*/, '')
    .replace(/\s*(?:\*\*|__|`+)$/, '')
    .trim();
  return unwrapped === SKIP_SECTION_TOKEN;
}

/** Removes "..... 28" and "pag 8" style page references from one line. */
export function stripLeaderPage(line: string): string {
  return line.replace(LEADER_PAGE_PATTERN, '').replace(PAGE_SUFFIX_PATTERN, '').trimEnd();
}

function collapseBlankLines(lines: string[]): string[] {
  const collapsed: string[] = [];
  for (const line of lines) {
    const blank = line.trim() === '';
    if (blank && (collapsed.length === 0 || collapsed[collapsed.length - 1] === '')) {
      continue;
    }
    collapsed.push(blank ? '' : line);
  }
  while (collapsed.length && collapsed[collapsed.length - 1] === '') {
    collapsed.pop();
  }
  return collapsed;
}

export function sanitizeTextBlock(text: string): string {
  return collapseBlankLines(text.split(/\r?\n/).map(stripLeaderPage)).join('\n');
}

function hasForbiddenPhrase(line: string): boolean {
  const normalized = normalizeTitle(line);
  return normalized.length > 0 && FORBIDDEN_PHRASES.some((phrase) => normalized.includes(phrase));
}

/** One `SIGLA<TAB>meaning` line per abbreviation, first occurrence wins. */
export function normalizeAbbreviations(lines: string[]): string {
  const seen = new Set<string>();
  const formatted: string[] = [];

  for (const line of lines) {
    const raw = line.trim();
    if (!raw) {
      continue;
    }

    let sigla = '';
    let meaning = '';
    const tabIndex = raw.indexOf('\t');
    if (tabIndex >= 0) {
      sigla = raw.slice(0, tabIndex).trim().toUpperCase();
      meaning = raw.slice(tabIndex + 1).trim();
    } else {
      const lineMatch = ABBREVIATION_LINE_PATTERN.exec(raw);
      const parenMatch = lineMatch ? null : ABBREVIATION_PAREN_PATTERN.exec(raw);
      if (lineMatch) {
        sigla = lineMatch[1].toUpperCase();
        meaning = lineMatch[2];
      } else if (parenMatch) {
        meaning = parenMatch[1];
        sigla = parenMatch[2].toUpperCase();
      }
    }

    sigla = sigla.replace(/\s+/g, '');
    meaning = meaning.replace(/\s+/g, ' ').trim();
    if (sigla.length < 2 || !meaning || seen.has(sigla)) {
      continue;
    }
    seen.add(sigla);
    formatted.push(`${sigla}\t${meaning}`);
  }

  return formatted.join('\n');
}

/**
 * Turns raw provider output into plain paragraphs ready for the document.
 * Index sections and the skip token always come back empty.
 */
export function sanitizeSectionContent(content: string, path = ''): string {
  if (!content.trim() || isSkipToken(content) || isTocPath(path)) {
    return '';
  }

  const text = content
    .replace(/```[\s\S]*?```/g, ' ')
    .replace(/```/g, ' ')
    .replace(/^\s*#{1,6}\s*/gm, '')
    .replace(/\*\*/g, '')
    .replace(/__/g, '')
    .replace(/\|/g, ' ')
    .replace(SKIP_TOKEN_ALL, ' ');

  const lines = text
    .split(/\r?\n/)
    .map((line) =>
      line
        .replace(/^\s*[-*+]\s+/, '')
        .replace(/^\s*\d+[.)]\s+/, '')
        .replace(/[ \t]+/g, ' ')
        .trim()
    )
    .filter((line) => !hasForbiddenPhrase(line));

  const cleaned = collapseBlankLines(lines);
  if (!cleaned.length) {
    return '';
  }

  if (isAbbreviationsPath(path)) {
    const abbreviations = normalizeAbbreviations(cleaned);
    if (abbreviations) {
      return abbreviations;
    }
  }

  return sanitizeTextBlock(cleaned.join('\n'));
}
