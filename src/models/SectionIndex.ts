export type SectionKind = 'chapter' | 'subchapter' | 'appendix' | 'abbreviations';

/** One generation unit of a compiled outline. */
export interface SectionIndexEntry {
  sectionId: string;
  path: string;
  kind: SectionKind;
  level: number;
  title: string;
  hints: string;
}
