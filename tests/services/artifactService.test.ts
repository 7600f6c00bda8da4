import { promises as fs } from 'fs';
import ArtifactService from '../../src/services/artifacts/artifactService';
import { planDocument, renderDocx } from '../../src/services/artifacts/docxDocument';
import { Project } from '../../src/models/Project';
import { emptyProgress } from '../../src/services/projects/eventLog';
import { createTempDir, removeDir, thesisDefinition } from '../helpers/fixtures';

function makeProject(overrides: Partial<Project> = {}): Project {
  return {
    id: 'proj_docx',
    title: 'Tesis: energia/solar',
    formatId: 'fmt-1',
    formatName: null,
    formatVersion: null,
    promptId: 'prompt_test',
    promptName: null,
    values: {},
    status: 'completed',
    progress: emptyProgress(),
    events: [],
    aiResult: {
      sections: [
        { sectionId: 'sec-0001', path: 'Capitulo 1', content: 'Primer parrafo.\n\nSegundo parrafo.' },
        { sectionId: 'sec-0002', path: 'Capitulo 1/Antecedentes', content: 'Texto de antecedentes.' },
      ],
    },
    incidents: [],
    artifacts: [],
    error: null,
    runId: 'run_1',
    createdAt: '2025-01-01T00:00:00.000Z',
    updatedAt: '2025-01-01T00:00:00.000Z',
    startedAt: null,
    completedAt: null,
    ...overrides,
  };
}

describe('docxDocument', () => {
  const input = {
    title: 'Tesis & Co',
    sections: [
      { sectionId: 'sec-0001', path: 'Capitulo 1', content: 'Uno\nsigue.\n\nDos' },
      { sectionId: 'sec-0002', path: 'Capitulo 1/Sub', content: 'Tres' },
      { sectionId: 'sec-0003', path: 'ÍNDICE', content: 'no debe aparecer' },
    ],
    tocDirectives: [
      { type: 'toc' as const, title: 'ÍNDICE', levels: '1-3', pageBreakAfter: true },
      { type: 'toc_tables' as const, title: 'ÍNDICE DE TABLAS', levels: '1-3', pageBreakAfter: false },
      { type: 'toc_abbreviations' as const, title: 'ÍNDICE DE ABREVIATURAS', levels: '1-3', pageBreakAfter: true },
    ],
  };

  it('lays out the title, content and table indices, then one heading per section', () => {
    expect(planDocument(input)).toEqual([
      { kind: 'title', text: 'Tesis & Co' },
      { kind: 'toc', title: 'ÍNDICE', levels: '1-3', captionLabel: null },
      { kind: 'page_break' },
      { kind: 'toc', title: 'ÍNDICE DE TABLAS', levels: '1-3', captionLabel: 'Tabla' },
      { kind: 'heading', text: 'Capitulo 1', level: 1 },
      { kind: 'paragraph', text: 'Uno sigue.' },
      { kind: 'paragraph', text: 'Dos' },
      { kind: 'heading', text: 'Sub', level: 2 },
      { kind: 'paragraph', text: 'Tres' },
    ]);
  });

  it('caps heading depth at six levels', () => {
    const blocks = planDocument({
      title: 'Tesis',
      sections: [{ sectionId: 'sec-0001', path: 'a/b/c/d/e/f/g', content: '' }],
      tocDirectives: [],
    });

    expect(blocks).toEqual([
      { kind: 'title', text: 'Tesis' },
      { kind: 'heading', text: 'g', level: 6 },
    ]);
  });

  it('packs the document as a zip container', async () => {
    const buffer = await renderDocx(input);

    expect(buffer.subarray(0, 2).toString('latin1')).toBe('PK');
  });
});

describe('ArtifactService', () => {
  let outputDir: string;

  beforeEach(async () => {
    outputDir = await createTempDir('thesis-artifacts-');
  });

  afterEach(async () => {
    await removeDir(outputDir);
  });

  it('writes a zip package and describes it', async () => {
    const service = new ArtifactService({ outputDir, publicBaseUrl: 'https://bff.test' });
    const project = makeProject();

    const artifact = await service.buildDocx(project, thesisDefinition);

    expect(artifact).toEqual({
      type: 'docx',
      downloadUrl: 'https://bff.test/api/projects/proj_docx/artifacts/docx',
      fileName: 'Tesis_ energia_solar.docx',
    });
    const bytes = await fs.readFile(service.artifactPath(project.id, 'docx'));
    expect(bytes.subarray(0, 2).toString('latin1')).toBe('PK');
    expect(await fs.readdir(outputDir)).toEqual(['proj_docx.docx']);
  });

  it('locates only recorded artifacts that exist on disk', async () => {
    const service = new ArtifactService({ outputDir });
    const project = makeProject();
    const artifact = await service.buildDocx(project, null);

    expect(await service.locate(project, 'docx')).toBeNull();

    const recorded = makeProject({ artifacts: [artifact] });
    expect(await service.locate(recorded, 'docx')).toEqual({
      filePath: service.artifactPath(project.id, 'docx'),
      fileName: 'Tesis_ energia_solar.docx',
      contentType: 'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
    });
    expect(await service.locate(recorded, 'pdf')).toBeNull();

    await service.remove(project.id);
    expect(await service.locate(recorded, 'docx')).toBeNull();
  });
});
