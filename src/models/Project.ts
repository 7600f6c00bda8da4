import { z } from 'zod';

export const PROJECT_STATUSES = [
  'draft',
  'generating',
  'cancel_requested',
  'completed',
  'completed_with_incidents',
  'failed',
  'blocked',
] as const;

export const TERMINAL_STATUSES = ['completed', 'completed_with_incidents', 'failed', 'blocked'] as const;

export const ACTIVE_STATUSES = ['generating', 'cancel_requested'] as const;

export const EVENT_STATUSES = ['running', 'done', 'error', 'warn'] as const;

const timestamp = z.string();

export const projectEventSchema = z.object({
  ts: timestamp,
  step: z.string(),
  status: z.enum(EVENT_STATUSES),
  title: z.string(),
  detail: z.string().default(''),
  meta: z.record(z.unknown()).default({}),
  preview: z.record(z.string()).default({}),
});

export const progressSchema = z.object({
  current: z.number().int().min(0),
  total: z.number().int().min(0),
  currentPath: z.string().nullable(),
  provider: z.string().nullable(),
  updatedAt: timestamp.nullable(),
});

export const sectionResultSchema = z.object({
  sectionId: z.string(),
  path: z.string(),
  content: z.string(),
});

export const incidentSchema = z.object({
  sectionId: z.string().nullable(),
  path: z.string().nullable(),
  kind: z.string(),
  provider: z.string().nullable(),
  message: z.string(),
});

export const artifactSchema = z.object({
  type: z.enum(['docx', 'pdf']),
  downloadUrl: z.string(),
  fileName: z.string(),
});

export const projectRecordSchema = z.object({
  id: z.string().min(1),
  title: z.string(),
  formatId: z.string(),
  formatName: z.string().nullable().default(null),
  formatVersion: z.string().nullable().default(null),
  promptId: z.string(),
  promptName: z.string().nullable().default(null),
  values: z.record(z.string()).default({}),
  status: z.enum(PROJECT_STATUSES),
  progress: progressSchema,
  events: z.array(projectEventSchema).default([]),
  aiResult: z.object({ sections: z.array(sectionResultSchema) }).nullable().default(null),
  incidents: z.array(incidentSchema).default([]),
  artifacts: z.array(artifactSchema).default([]),
  error: z.string().nullable().default(null),
  runId: z.string().nullable().default(null),
  createdAt: timestamp,
  updatedAt: timestamp,
  startedAt: timestamp.nullable().default(null),
  completedAt: timestamp.nullable().default(null),
});

export type ProjectStatus = (typeof PROJECT_STATUSES)[number];
export type TerminalStatus = (typeof TERMINAL_STATUSES)[number];
export type EventStatus = (typeof EVENT_STATUSES)[number];
export type ProjectEvent = z.infer<typeof projectEventSchema>;
export type Progress = z.infer<typeof progressSchema>;
export type SectionResult = z.infer<typeof sectionResultSchema>;
export type Incident = z.infer<typeof incidentSchema>;
export type Artifact = z.infer<typeof artifactSchema>;
export type Project = z.infer<typeof projectRecordSchema>;

export type ProjectSummary = Omit<Project, 'events' | 'aiResult' | 'values'> & { eventCount: number };

export function isActiveStatus(status: ProjectStatus): boolean {
  return status === 'generating' || status === 'cancel_requested';
}

export function isTerminalStatus(status: ProjectStatus): status is TerminalStatus {
  return TERMINAL_STATUSES.some((terminal) => terminal === status);
}

export function toProjectSummary(project: Project): ProjectSummary {
  const { events, aiResult: _aiResult, values: _values, ...rest } = project;
  return { ...rest, eventCount: events.length };
}
