import { compileOutline } from '../../src/services/outline/outlineCompiler';
import {
  extractTocDirectives,
  inferDirectiveType,
  normalizeDefinition,
  normalizeIndices,
} from '../../src/services/outline/indicesNormalizer';
import {
  isAbbreviationsTitle,
  isIndexPath,
  isTocPath,
  isTocTitle,
  normalizeTitle,
} from '../../src/services/outline/tocDetector';
import { thesisDefinition } from '../helpers/fixtures';

describe('compileOutline', () => {
  it('flattens a nested definition in document order', () => {
    const outline = compileOutline(thesisDefinition);

    expect(outline.map((entry) => entry.path)).toEqual([
      'I. PLANTEAMIENTO DEL PROBLEMA',
      'I. PLANTEAMIENTO DEL PROBLEMA/1.1 Descripcion del problema',
      'I. PLANTEAMIENTO DEL PROBLEMA/1.2 Formulacion del problema',
      'II. MARCO TEORICO',
    ]);
    expect(outline[0]).toEqual({
      sectionId: 'sec-0001',
      path: 'I. PLANTEAMIENTO DEL PROBLEMA',
      kind: 'chapter',
      level: 1,
      title: 'I. PLANTEAMIENTO DEL PROBLEMA',
      hints: 'Describe la realidad problematica.',
    });
    expect(outline[1]).toMatchObject({ sectionId: 'sec-0002', kind: 'subchapter', level: 2, hints: '' });
  });

  it('returns the same outline for the same definition', () => {
    expect(compileOutline(thesisDefinition)).toEqual(compileOutline(thesisDefinition));
  });

  it('returns nothing for a definition that is a list', () => {
    expect(compileOutline([{ titulo: 'Capitulo' }])).toEqual([]);
  });

  it('turns string leaves of a container into chapters', () => {
    const outline = compileOutline({ cuerpo: { cap1: 'Introduccion', cap2: 'Metodologia', nivel: '1' } });

    expect(outline.map((entry) => [entry.sectionId, entry.path, entry.level])).toEqual([
      ['sec-0001', 'Introduccion', 1],
      ['sec-0002', 'Metodologia', 1],
    ]);
  });

  it('leaves out index pages, captions and guidance', () => {
    const outline = compileOutline({
      cuerpo: [
        { titulo: 'ÍNDICE' },
        {
          titulo: 'Capitulo uno',
          nota: 'Texto de ayuda',
          guia: { titulo: 'Oculta' },
          tablas: [{ titulo: 'Tabla 1: Datos' }],
        },
        { titulo: 'Figura 2. Mapa' },
      ],
    });

    expect(outline.map((entry) => entry.path)).toEqual(['Capitulo uno']);
  });

  it('classifies abbreviations and appendices', () => {
    const outline = compileOutline({
      preliminares: { abreviaturas: { titulo: 'Lista de abreviaturas' } },
      finales: { anexos: [{ titulo: 'Matriz de consistencia' }] },
    });

    expect(outline.map((entry) => [entry.title, entry.kind])).toEqual([
      ['Lista de abreviaturas', 'abbreviations'],
      ['Matriz de consistencia', 'appendix'],
    ]);
  });

  it('replaces slashes inside titles so paths stay unambiguous', () => {
    const [entry] = compileOutline({ cuerpo: [{ titulo: 'Entrada/Salida' }] });

    expect(entry.path).toBe('Entrada-Salida');
  });
});

describe('tocDetector', () => {
  it('normalises accents, case and spacing', () => {
    expect(normalizeTitle('  ÍNDICE   DE  Tablas ')).toBe('indice de tablas');
    expect(normalizeTitle(42)).toBe('');
  });

  it('matches whole index titles only', () => {
    expect(isTocTitle('Índice de Figuras')).toBe(true);
    expect(isTocTitle('Contenido')).toBe(false);
    expect(isTocPath('Preliminares/ÍNDICE')).toBe(true);
    expect(isIndexPath('Resultados/Tabla 3: Encuestas')).toBe(true);
    expect(isIndexPath('Resultados/Discusion')).toBe(false);
  });

  it('recognises abbreviation headings but not their index', () => {
    expect(isAbbreviationsTitle('Siglas y acrónimos')).toBe(true);
    expect(isAbbreviationsTitle('Índice de abreviaturas')).toBe(false);
  });
});

describe('indicesNormalizer', () => {
  it('builds directives from a title map in priority order', () => {
    const directives = normalizeIndices({
      figuras: 'ÍNDICE DE FIGURAS',
      contenido: 'ÍNDICE',
      placeholder: 'ignorar',
      tablas: 'ÍNDICE DE TABLAS',
    });

    expect(directives).toEqual([
      { type: 'toc', title: 'ÍNDICE', levels: '1-3', pageBreakAfter: true },
      { type: 'toc_tables', title: 'ÍNDICE DE TABLAS', levels: '1-3', pageBreakAfter: true },
      { type: 'toc_figures', title: 'ÍNDICE DE FIGURAS', levels: '1-3', pageBreakAfter: true },
    ]);
  });

  it('drops page-numbered item lists and keeps their titles', () => {
    const directives = normalizeIndices([{ titulo: 'Índice de abreviaturas', items: [{ texto: 'APA', pag: 3 }] }]);

    expect(directives).toEqual([
      { type: 'toc_abbreviations', title: 'Índice de abreviaturas', levels: '1-3', pageBreakAfter: true },
    ]);
  });

  it('returns directives that are already normalised unchanged', () => {
    const directives = [{ type: 'toc', title: 'ÍNDICE', levels: '1-2', pageBreakAfter: false }];

    expect(normalizeIndices(directives)).toBe(directives);
    expect(normalizeIndices('ÍNDICE')).toBeNull();
    expect(normalizeIndices({})).toBeNull();
  });

  it('treats a table of contents titled with "tabla" as a content index', () => {
    expect(inferDirectiveType('Tabla de contenidos')).toBe('toc');
    expect(inferDirectiveType('Índice de tablas')).toBe('toc_tables');
  });

  it('never mutates the definition it normalises', () => {
    const definition = { preliminares: { indices: { contenido: 'ÍNDICE' } }, cuerpo: [] };

    const normalised = normalizeDefinition(definition);

    expect(definition.preliminares.indices).toEqual({ contenido: 'ÍNDICE' });
    expect(normalised).not.toBe(definition);
    expect(extractTocDirectives(definition).map((directive) => directive.type)).toEqual(['toc']);
  });
});
