export {
  LabelingOrchestrator,
  DEFAULT_CONCURRENCY,
} from './labeling-orchestrator.js';
export type {
  LabelingOptions,
  LabelingPlan,
  LabelingProgress,
  LabelingProgressCallback,
  LabelingReport,
} from './labeling-orchestrator.js';
export { InMemoryJudgmentStore, judgmentKey } from './judgment-store.js';
export { JsonlJudgmentStore } from './jsonl-judgment-store.js';
export {
  DEFAULT_TITLE_FIELDS,
  DEFAULT_CONTENT_FIELDS,
  extractDocumentContent,
} from './document-content.js';
export type { ContentFieldOptions } from './document-content.js';
export {
  MANUAL_LABELER,
  attachJudgments,
  summarizeJudgments,
  overrideJudgment,
} from './judgments.js';
export type { JudgmentCoverage, ManualJudgmentInput } from './judgments.js';
export { relevanceGradeSchema, relevanceJudgmentSchema } from './judgment-schema.js';
