import type { PipelineStage } from '../../utils/errors.js';

export type { PipelineStage };

export type PipelineEvent =
  | { type: 'stage-start'; stage: PipelineStage; message: string; at: Date }
  | { type: 'stage-end'; stage: PipelineStage; message: string; at: Date }
  | { type: 'error'; stage: PipelineStage; message: string; error: unknown; at: Date };

export interface PipelineReporter {
  emit(event: PipelineEvent): void;
}

export const STAGE_LABELS: Record<PipelineStage, string> = {
  acquisition: 'Text acquisition',
  prompt: 'Prompt',
  invocation: 'Model call',
  parsing: 'Response parsing',
  registry: 'Term registry',
  output: 'Output',
};
