export { OpenAICompatibleJudge, parseJudgeAnswer, extractJsonBlock } from './openai-judge.js';
export type { OpenAICompatibleJudgeConfig } from './openai-judge.js';
export {
  SYSTEM_PROMPT,
  EMPTY_TITLE,
  EMPTY_CONTENT,
  buildRelevancePrompt,
} from './relevance-prompt.js';
