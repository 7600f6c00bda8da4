import { isAbbreviationsPath, normalizeTitle } from '../outline/tocDetector';

export type CompletenessIssueType = 'placeholder' | 'template_var' | 'instruction';

export interface CompletenessIssue {
  type: CompletenessIssueType;
  sample: string;
}

export type AutofillCategory = 'dedicatoria' | 'agradecimiento' | 'abreviaturas';

const PLACEHOLDER_VERBS = '(?:escriba|complete|llene|inserte|coloque|ingrese|agregue)';
const BRACKET_PLACEHOLDER = new RegExp(`\\[[^\\]]*?${PLACEHOLDER_VERBS}[^\\]]*\\]`, 'i');
const BRACKET_PLACEHOLDER_ALL = new RegExp(BRACKET_PLACEHOLDER.source, 'gi');
const PAREN_PLACEHOLDER = /\((?:completar|llenar|insertar|agregar)\b[^)]*\)/i;
const PAREN_PLACEHOLDER_ALL = new RegExp(PAREN_PLACEHOLDER.source, 'gi');
const TEMPLATE_VARIABLE = /\{\{[^}]*\}\}/;
const TEMPLATE_VARIABLE_ALL = new RegExp(TEMPLATE_VARIABLE.source, 'g');

const INSTRUCTION_PATTERNS = [
  /escriba\s+aqu[ií]/i,
  /complete\s+esta\s+secci[oó]n/i,
  /inserte\s+(?:aqu[ií]|su|el|la)\b/i,
  /coloque\s+(?:aqu[ií]|su|el|la)\b/i,
  /ejemplo\s+de\s+(?:dedicatoria|agradecimiento)/i,
  /reemplace\s+este\s+texto/i,
  /(?:no\s+exceder|debe\s+contener)\s+.*palabras/i,
];

// Longer answers that merely mention an instruction are treated as content.
const INSTRUCTION_MAX_LENGTH = 300;

const SAMPLE_LENGTH = 120;

const AUTOFILL: Record<AutofillCategory, string> = {
  dedicatoria:
    'Dedico este trabajo a mi familia, cuyo apoyo incondicional hizo posible la culminacion de esta etapa academica, ' +
    'y a mis docentes, por su orientacion constante y su compromiso con la formacion de sus estudiantes.',
  agradecimiento:
    'Agradezco a mi familia por su paciencia y comprension durante todo el proceso de investigacion. ' +
    'A mi asesor, por su guia academica y profesional. ' +
    'A la universidad, por brindarme las herramientas necesarias para mi formacion, ' +
    'y a mis companeros, por su apoyo y motivacion constante.',
  abreviaturas: 'No se identificaron abreviaturas relevantes en el presente documento.',
};

/** First placeholder, leftover template variable or bare instruction found in the text. */
export function detectIncomplete(content: string): CompletenessIssue | null {
  const checks: Array<[CompletenessIssueType, RegExp]> = [
    ['placeholder', BRACKET_PLACEHOLDER],
    ['placeholder', PAREN_PLACEHOLDER],
    ['template_var', TEMPLATE_VARIABLE],
  ];
  for (const [type, pattern] of checks) {
    const match = pattern.exec(content);
    if (match) {
      return { type, sample: match[0].slice(0, SAMPLE_LENGTH) };
    }
  }

  const trimmed = content.trim();
  if (trimmed.length < INSTRUCTION_MAX_LENGTH && INSTRUCTION_PATTERNS.some((pattern) => pattern.test(trimmed))) {
    return { type: 'instruction', sample: trimmed.slice(0, SAMPLE_LENGTH) };
  }
  return null;
}

export function stripPlaceholders(content: string): string {
  return content
    .replace(BRACKET_PLACEHOLDER_ALL, '')
    .replace(PAREN_PLACEHOLDER_ALL, '')
    .replace(TEMPLATE_VARIABLE_ALL, '')
    .split('\n')
    .map((line) => line.replace(/[ \t]{2,}/g, ' ').trim())
    .join('\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

export function classifyAutofill(path: string): AutofillCategory | null {
  const segments = path.split('/');
  const title = normalizeTitle(segments[segments.length - 1]).replace(/^[\divx]+[.)-]\s*/, '');
  if (title.includes('dedicatoria')) {
    return 'dedicatoria';
  }
  if (title.includes('agradecimiento')) {
    return 'agradecimiento';
  }
  if (isAbbreviationsPath(path)) {
    return 'abreviaturas';
  }
  return null;
}

/** Stock text for front-matter sections, or null when the section has none. */
export function autofillContent(path: string): string | null {
  const category = classifyAutofill(path);
  return category ? AUTOFILL[category] : null;
}
