const PLACEHOLDER_PATTERN = /\{\{\s*(\w+)\s*\}\}/g;

export const PREVIEW_MAX_CHARS = 480;

export interface RenderResult {
  text: string;
  missingVariables: string[];
}

/**
 * Replaces `{{name}}` placeholders. Unknown or empty variables stay in the
 * output verbatim and are reported back to the caller.
 */
export function renderTemplate(template: string, values: Record<string, string>): RenderResult {
  if (!template) {
    return { text: '', missingVariables: [] };
  }

  const missing: string[] = [];
  const text = template.replace(PLACEHOLDER_PATTERN, (placeholder: string, name: string) => {
    const value = values[name];
    if (typeof value === 'string' && value.trim() !== '') {
      return value;
    }
    if (!missing.includes(name)) {
      missing.push(name);
    }
    return placeholder;
  });

  return { text, missingVariables: missing };
}

export function extractVariables(template: string): string[] {
  const names = new Set<string>();
  for (const match of template.matchAll(PLACEHOLDER_PATTERN)) {
    names.add(match[1]);
  }
  return [...names];
}

const SECRET_PATTERNS: RegExp[] = [
  /\bsk-[A-Za-z0-9_-]{8,}\b/g,
  /\bAIza[0-9A-Za-z_-]{10,}\b/g,
  /\b(Bearer)\s+[A-Za-z0-9._-]{8,}/gi,
  /\b(api[_-]?key|token|secret|password)(\s*[:=]\s*)\S+/gi,
];

export function redactSecrets(text: string): string {
  return SECRET_PATTERNS.reduce(
    (current, pattern) =>
      current.replace(pattern, (match: string, label?: string, separator?: string) => {
        if (typeof label === 'string' && typeof separator === 'string') {
          return `${label}${separator}[REDACTED]`;
        }
        if (typeof label === 'string' && label.toLowerCase() === 'bearer') {
          return `${label} [REDACTED]`;
        }
        return '[REDACTED]';
      }),
    text
  );
}

/** Single-line, redacted, clipped snippet for event previews. */
export function clipPreview(text: string, maxChars = PREVIEW_MAX_CHARS): string {
  const normalized = redactSecrets(text).split(/\s+/).filter(Boolean).join(' ');
  if (normalized.length <= maxChars) {
    return normalized;
  }
  return `${normalized.slice(0, maxChars - 1)}…`;
}
