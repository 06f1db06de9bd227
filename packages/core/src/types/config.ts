export interface PoolingConfig {
  depthK: number;
}

export interface LabelingConfig {
  concurrency: number;
  skipJudged: boolean;
  labeledBy: string;
  /** Per-call timeout in milliseconds. */
  timeoutMs: number;
  titleFields: string[];
  contentFields: string[];
}

export interface JudgeConfig {
  baseUrl: string;
  model: string;
  apiKey?: string;
  temperature: number;
  maxTokens: number;
  maxContentChars: number;
}

export interface MetricsConfig {
  cutoffs: number[];
}

export interface RelpoolConfig {
  version: string;
  pooling: PoolingConfig;
  labeling: LabelingConfig;
  judge: JudgeConfig;
  metrics: MetricsConfig;
}
