import { Logger } from 'pino';
import { FormatDefinition } from '../../models/Format';
import { SectionIndexEntry, SectionKind } from '../../models/SectionIndex';
import baseLogger from '../../utils/logger';
import { normalizeDefinition } from './indicesNormalizer';
import { isAbbreviationsTitle, isMediaCaption, isTocTitle, normalizeTitle } from './tocDetector';

const MAX_LEVEL = 6;

const TITLE_KEYS = ['titulo', 'title', 'titulo_seccion', 'texto'];

const HINT_KEYS = ['instruccion_detallada', 'nota', 'nota_capitulo'];

const GUIDANCE_KEYS = new Set([
  'nota',
  'nota_capitulo',
  'instruccion',
  'instruccion_detallada',
  'guia',
  'ejemplo',
  'comentario',
  'placeholder',
  'tipo_vista',
  'vista_previa',
  'version',
  'descripcion',
]);

const CONTAINER_KEYS = new Set([
  'preliminares',
  'cuerpo',
  'finales',
  'capitulos',
  'contenido',
  'items',
  'secciones',
  'subsecciones',
  'lista',
  'anexos',
  'indices',
]);

const INDEX_BRANCH_KEYS = new Set([
  'indices',
  'indice',
  'indice_de_tablas',
  'indice_de_figuras',
  'tabla_de_contenido',
  'toc',
]);

const MEDIA_BRANCH_KEYS = new Set(['tabla', 'tablas', 'figura', 'figuras', 'imagen', 'imagenes', 'grafico']);

// Scalar metadata that sits beside headings but never names a section.
const METADATA_KEYS = new Set(['id', 'type', 'tipo', 'nivel', 'numero', 'pag', 'estilo', 'formato', 'levels', 'fuente']);

type JsonObject = Record<string, unknown>;

/**
 * Classification decided once per node. Section variants become outline
 * entries; placeholders prune their whole subtree.
 */
export type OutlineNode =
  | { tag: 'Chapter'; title: string; hints: string }
  | { tag: 'Subchapter'; title: string; hints: string }
  | { tag: 'Appendix'; title: string; hints: string }
  | { tag: 'Abbreviations'; title: string; hints: string }
  | { tag: 'IndexPlaceholder'; title: string }
  | { tag: 'FigurePlaceholder'; title: string }
  | { tag: 'Container' };

type SectionNode = Extract<OutlineNode, { hints: string }>;

const KIND_BY_TAG: Record<SectionNode['tag'], SectionKind> = {
  Chapter: 'chapter',
  Subchapter: 'subchapter',
  Appendix: 'appendix',
  Abbreviations: 'abbreviations',
};

interface WalkContext {
  path: string[];
  inStructure: boolean;
  ancestorKeys: string[];
  /** Key this object is stored under, when it is not a list item. */
  ownKey: string | null;
}

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** A format definition is a JSON object; a compiled outline (a list) is not. */
export function isFormatDefinition(value: unknown): value is FormatDefinition {
  return isJsonObject(value);
}

function collapse(value: unknown): string {
  return typeof value === 'string' ? value.trim().split(/\s+/).filter(Boolean).join(' ') : '';
}

function extractTitle(node: JsonObject): string {
  for (const key of TITLE_KEYS) {
    const title = collapse(node[key]);
    if (title) {
      // Breadcrumbs are joined with "/", so a slash inside a title would split it.
      return title.replace(/\//g, '-');
    }
  }
  return '';
}

function extractHints(node: JsonObject): string {
  return HINT_KEYS.map((key) => node[key])
    .filter((value): value is string => typeof value === 'string' && value.trim().length > 0)
    .map((value) => value.trim())
    .join('\n');
}

function isGuidanceKey(key: string): boolean {
  return GUIDANCE_KEYS.has(key) || key.startsWith('_');
}

function isIndexBranch(ancestorKeys: string[]): boolean {
  return ancestorKeys.some((key) => INDEX_BRANCH_KEYS.has(key));
}

function isMediaBranch(ancestorKeys: string[]): boolean {
  return ancestorKeys.some((key) => MEDIA_BRANCH_KEYS.has(key));
}

function classifyTitledNode(title: string, hints: string, ctx: WalkContext): OutlineNode {
  if (!title) {
    return { tag: 'Container' };
  }
  if (isIndexBranch(ctx.ancestorKeys) || isTocTitle(title)) {
    return { tag: 'IndexPlaceholder', title };
  }
  if (isMediaBranch(ctx.ancestorKeys) || isMediaCaption(title)) {
    return { tag: 'FigurePlaceholder', title };
  }
  if (isAbbreviationsTitle(title)) {
    return { tag: 'Abbreviations', title, hints };
  }
  if (ctx.ancestorKeys.includes('anexos') || normalizeTitle(title).startsWith('anexo')) {
    return { tag: 'Appendix', title, hints };
  }
  return ctx.path.length === 0 ? { tag: 'Chapter', title, hints } : { tag: 'Subchapter', title, hints };
}

class OutlineBuilder {
  readonly entries: SectionIndexEntry[] = [];

  emit(node: SectionNode, path: string[]): string[] {
    const nextPath = [...path, node.title];
    this.entries.push({
      sectionId: `sec-${String(this.entries.length + 1).padStart(4, '0')}`,
      path: nextPath.join('/'),
      kind: KIND_BY_TAG[node.tag],
      level: Math.min(nextPath.length, MAX_LEVEL),
      title: node.title,
      hints: node.hints,
    });
    return nextPath;
  }

  walk(value: unknown, ctx: WalkContext): void {
    if (Array.isArray(value)) {
      value.forEach((item) => this.walk(item, { ...ctx, ownKey: null }));
      return;
    }
    if (!isJsonObject(value)) {
      return;
    }

    const title = ctx.inStructure ? extractTitle(value) : '';
    const node = classifyTitledNode(title, extractHints(value), ctx);
    if (node.tag === 'IndexPlaceholder' || node.tag === 'FigurePlaceholder') {
      return;
    }

    const path = node.tag === 'Container' ? ctx.path : this.emit(node, ctx.path);
    const leafParent = ctx.ownKey !== null && CONTAINER_KEYS.has(ctx.ownKey);

    for (const [rawKey, child] of Object.entries(value)) {
      const key = rawKey.toLowerCase();
      if (isGuidanceKey(key) || TITLE_KEYS.includes(key) || INDEX_BRANCH_KEYS.has(key) || MEDIA_BRANCH_KEYS.has(key)) {
        continue;
      }

      const childCtx: WalkContext = {
        path,
        inStructure: ctx.inStructure || CONTAINER_KEYS.has(key),
        ancestorKeys: [...ctx.ancestorKeys, key],
        ownKey: key,
      };

      if (typeof child === 'string') {
        if (leafParent && ctx.inStructure && !METADATA_KEYS.has(key)) {
          this.walkLeaf(child, childCtx);
        }
        continue;
      }

      this.walk(child, childCtx);
    }
  }

  private walkLeaf(text: string, ctx: WalkContext): void {
    const title = collapse(text).replace(/\//g, '-');
    const node = classifyTitledNode(title, '', ctx);
    if (node.tag === 'Chapter' || node.tag === 'Subchapter' || node.tag === 'Appendix' || node.tag === 'Abbreviations') {
      this.emit(node, ctx.path);
    }
  }
}

/**
 * Flattens a format definition into generation units in document order.
 * Identical input always yields identical output.
 */
export function compileOutline(definition: unknown, logger: Logger = baseLogger.child({ module: 'outline-compiler' })): SectionIndexEntry[] {
  if (!isFormatDefinition(definition)) {
    logger.warn(
      { receivedType: Array.isArray(definition) ? 'array' : typeof definition },
      'format definition is not a JSON object; nothing to compile'
    );
    return [];
  }

  const builder = new OutlineBuilder();
  builder.walk(normalizeDefinition(definition), {
    path: [],
    inStructure: false,
    ancestorKeys: [],
    ownKey: null,
  });
  logger.debug({ sections: builder.entries.length }, 'outline compiled');
  return builder.entries;
}
