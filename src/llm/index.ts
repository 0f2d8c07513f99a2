export {
  createOpenAIClient,
  type ChatCompletionClient,
  type ChatCompletionEnvelope,
  type ChatCompletionRequest,
} from './client'
export { LlmClassifier, createLlmClassifier, type LlmClassifierOptions } from './classifier'
export { parseVerdict, extractJsonBlock, normalizeStatus } from './parse-verdict'
export { SYSTEM_PROMPT, buildUserMessage } from './prompt'
