export interface GenerationProgress {
  stage: 'discovery' | 'query' | 'normalize' | 'write' | 'complete';
  message?: string;
  entries?: number;
}

export type ProgressCallback = (progress: GenerationProgress) => void;
