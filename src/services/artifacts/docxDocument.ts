import {
  AlignmentType,
  Document,
  HeadingLevel,
  Packer,
  PageBreak,
  Paragraph,
  TableOfContents,
  TextRun,
} from 'docx';
import { SectionResult } from '../../models/Project';
import { splitParagraphs } from '../../utils/exportUtils';
import { TocDirective } from '../outline/indicesNormalizer';
import { isTocPath } from '../outline/tocDetector';

export interface DocxDocumentInput {
  title: string;
  sections: SectionResult[];
  tocDirectives: TocDirective[];
}

/** Layout of the document before it is turned into WordprocessingML. */
export type DocumentBlock =
  | { kind: 'title'; text: string }
  | { kind: 'toc'; title: string; levels: string; captionLabel: string | null }
  | { kind: 'heading'; text: string; level: number }
  | { kind: 'paragraph'; text: string }
  | { kind: 'page_break' };

const FONT = 'Times New Roman';

const BODY_SIZE = 24;

const HEADING_LEVELS = [
  HeadingLevel.HEADING_1,
  HeadingLevel.HEADING_2,
  HeadingLevel.HEADING_3,
  HeadingLevel.HEADING_4,
  HeadingLevel.HEADING_5,
  HeadingLevel.HEADING_6,
] as const;

const CAPTION_LABELS: Partial<Record<TocDirective['type'], string>> = {
  toc_tables: 'Tabla',
  toc_figures: 'Figura',
};

function tocBlocks(directive: TocDirective): DocumentBlock[] {
  // Abbreviation lists are written as a regular section.
  if (directive.type === 'toc_abbreviations') {
    return [];
  }
  const blocks: DocumentBlock[] = [
    { kind: 'toc', title: directive.title, levels: directive.levels, captionLabel: CAPTION_LABELS[directive.type] ?? null },
  ];
  if (directive.pageBreakAfter) {
    blocks.push({ kind: 'page_break' });
  }
  return blocks;
}

function sectionBlocks(section: SectionResult): DocumentBlock[] {
  const segments = section.path.split('/');
  const level = Math.min(segments.length, HEADING_LEVELS.length);
  const text = segments[segments.length - 1] || section.path;
  return [
    { kind: 'heading', text, level },
    ...splitParagraphs(section.content).map((paragraph): DocumentBlock => ({ kind: 'paragraph', text: paragraph })),
  ];
}

export function planDocument({ title, sections, tocDirectives }: DocxDocumentInput): DocumentBlock[] {
  return [
    { kind: 'title', text: title },
    ...tocDirectives.flatMap(tocBlocks),
    ...sections.filter((section) => !isTocPath(section.path)).flatMap(sectionBlocks),
  ];
}

function toDocxChildren(block: DocumentBlock): Array<Paragraph | TableOfContents> {
  switch (block.kind) {
    case 'title':
      return [
        new Paragraph({
          heading: HeadingLevel.TITLE,
          alignment: AlignmentType.CENTER,
          spacing: { after: 480 },
          children: [new TextRun({ text: block.text, bold: true, font: FONT, size: 40 })],
        }),
      ];
    case 'toc':
      return [
        new Paragraph({ spacing: { after: 240 }, children: [new TextRun({ text: block.title, bold: true, font: FONT, size: 28 })] }),
        block.captionLabel
          ? new TableOfContents(block.title, {
              hyperlink: true,
              hideTabAndPageNumbersInWebView: true,
              captionLabelIncludingNumbers: block.captionLabel,
            })
          : new TableOfContents(block.title, {
              hyperlink: true,
              hideTabAndPageNumbersInWebView: true,
              headingStyleRange: block.levels,
              useAppliedParagraphOutlineLevel: true,
            }),
      ];
    case 'heading':
      return [
        new Paragraph({
          heading: HEADING_LEVELS[block.level - 1],
          spacing: { before: 240, after: 120 },
          children: [new TextRun({ text: block.text, bold: true, font: FONT })],
        }),
      ];
    case 'paragraph':
      return [
        new Paragraph({
          alignment: AlignmentType.JUSTIFIED,
          spacing: { after: 160, line: 360 },
          children: [new TextRun({ text: block.text, font: FONT, size: BODY_SIZE })],
        }),
      ];
    case 'page_break':
      return [new Paragraph({ children: [new PageBreak()] })];
    default:
      return [];
  }
}

/**
 * Word fills the table-of-contents fields when the document is opened,
 * hence `updateFields`.
 */
export function buildDocument(input: DocxDocumentInput): Document {
  return new Document({
    title: input.title,
    features: { updateFields: true },
    sections: [
      {
        properties: {
          page: {
            size: { width: 11906, height: 16838 },
            margin: { top: 1417, right: 1417, bottom: 1417, left: 1701 },
          },
        },
        children: planDocument(input).flatMap(toDocxChildren),
      },
    ],
  });
}

export function renderDocx(input: DocxDocumentInput): Promise<Buffer> {
  return Packer.toBuffer(buildDocument(input));
}
