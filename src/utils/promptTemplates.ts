import { SectionIndexEntry } from '../models/SectionIndex';

export const SKIP_SECTION_TOKEN = '<<SKIP_SECTION>>';

export const GENERIC_SECTION_TITLE = 'Contenido Principal';

export const GENERIC_PROMPT =
  'Redacta un texto academico formal en espanol sobre el proyecto "{{title}}", con parrafos completos y coherentes.';

export interface ChatPromptPayload {
  temperature?: number;
  maxTokens?: number;
  messages: Array<{ role: 'system' | 'user' | 'assistant'; content: string }>;
}

export interface SectionPromptOptions {
  projectTitle: string;
  renderedTemplate: string;
  section: SectionIndexEntry;
}

const OUTPUT_RULES = [
  'Devuelve solo texto plano, sin Markdown: nada de negritas, encabezados con #, listas con guiones ni tablas con |.',
  'No escribas el titulo de la seccion; el documento ya lo incluye. Empieza directamente con el contenido.',
  'Separa los parrafos con una sola linea en blanco y no partas las oraciones en lineas cortas.',
  'No redactes indices ni tablas de contenido manuales ni numeros de pagina.',
  `Si la seccion es un indice (INDICE, INDICE DE TABLAS, INDICE DE FIGURAS, INDICE DE ABREVIATURAS o una ruta que empiece por INDICE/), responde exactamente ${SKIP_SECTION_TOKEN}.`,
  'No uses textos de relleno como FIGURA DE EJEMPLO, TABLA DE EJEMPLO, [PENDIENTE], lorem ipsum o TITULO DEL PROYECTO.',
  'Si necesitas citar una figura, escribe solo su leyenda: Figura X. Descripcion breve. Fuente: Elaboracion propia.',
  'En secciones de contenido escribe al menos entre 180 y 250 palabras con tono academico.',
];

const ABBREVIATION_RULE =
  'Esta seccion es una lista de abreviaturas: escribe una sigla por linea con el formato SIGLA: significado.';

function buildSystemMessage(section: SectionIndexEntry): string {
  const rules = section.kind === 'abbreviations' ? [...OUTPUT_RULES, ABBREVIATION_RULE] : OUTPUT_RULES;
  return [
    'Eres un redactor academico profesional en espanol.',
    'Escribes solo el contenido de UNA seccion de un documento de tesis; el formato lo aplica el documento final.',
    '',
    'Reglas obligatorias:',
    ...rules.map((rule, index) => `${index + 1}) ${rule}`),
  ].join('\n');
}

export function buildSectionPrompt({ projectTitle, renderedTemplate, section }: SectionPromptOptions): ChatPromptPayload {
  const parts: string[] = [
    `Proyecto: ${projectTitle}`,
    '',
    'Seccion a redactar:',
    `- Ruta: ${section.path}`,
    `- Identificador: ${section.sectionId}`,
    `- Nivel: ${section.level}`,
  ];

  if (renderedTemplate.trim()) {
    parts.push('', 'Contexto del proyecto:', renderedTemplate.trim());
  }

  if (section.hints) {
    parts.push('', 'Indicaciones del formato para esta seccion:', section.hints);
  }

  parts.push('', `Redacta ahora la seccion ${section.path} cumpliendo todas las reglas.`);

  return {
    temperature: 0.7,
    maxTokens: 2048,
    messages: [
      { role: 'system', content: buildSystemMessage(section) },
      { role: 'user', content: parts.join('\n') },
    ],
  };
}

export function genericSection(): SectionIndexEntry {
  return {
    sectionId: 'sec-0001',
    path: GENERIC_SECTION_TITLE,
    kind: 'chapter',
    level: 1,
    title: GENERIC_SECTION_TITLE,
    hints: '',
  };
}
