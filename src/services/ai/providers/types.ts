import { SectionIndexEntry } from '../../../models/SectionIndex';
import { ChatPromptPayload } from '../../../utils/promptTemplates';

export interface UsageRecord {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface GenerateRequest {
  prompt: ChatPromptPayload;
  section: SectionIndexEntry;
  signal?: AbortSignal;
}

export interface GenerateResult {
  text: string;
  provider: string;
  model: string;
  usage?: UsageRecord;
  requestId?: string;
}

export interface TextProvider {
  readonly name: string;
  readonly model: string;
  isConfigured(): boolean;
  generate(request: GenerateRequest): Promise<GenerateResult>;
}
