import sanitizeFilename from 'sanitize-filename';

const MAX_FILENAME_LENGTH = 120;

function truncateFilename(value: string, maxLength = MAX_FILENAME_LENGTH): string {
  if (value.length <= maxLength) {
    return value;
  }
  const half = Math.floor((maxLength - 3) / 2);
  return `${value.slice(0, half)}...${value.slice(value.length - half)}`;
}

export function safeFileName(input: string, fallback: string, extension?: string): string {
  const cleaned = sanitizeFilename(input, { replacement: '_' }).trim();
  const base = (cleaned || fallback).replace(/\s+/g, ' ').trim();
  if (!extension) {
    return truncateFilename(base) || fallback;
  }
  const limit = MAX_FILENAME_LENGTH - extension.length - 1;
  const limited = truncateFilename(base, limit > 0 ? limit : MAX_FILENAME_LENGTH);
  return `${limited || fallback}.${extension}`;
}

export function normaliseNewlines(content: string): string {
  return content.replace(/\r\n/g, '\n').replace(/\r/g, '\n');
}

export function splitParagraphs(content: string): string[] {
  const trimmed = normaliseNewlines(content).trim();
  if (!trimmed) {
    return [];
  }
  return trimmed
    .split(/\n{2,}/)
    .map((paragraph) => paragraph.replace(/\s*\n\s*/g, ' ').trim())
    .filter(Boolean);
}
