import OpenAI from 'openai'
import { ModelConfig } from '../core/types'

export type ChatCompletionRequest = OpenAI.Chat.Completions.ChatCompletionCreateParamsNonStreaming

// The part of a chat completion the classifier reads
export interface ChatCompletionEnvelope {
  choices?: Array<{ message?: { content?: string | null } | null }> | null
}

/**
 * The slice of the OpenAI client the classifier needs. The real client
 * satisfies it; tests pass a fake.
 */
export interface ChatCompletionClient {
  chat: {
    completions: {
      create(body: ChatCompletionRequest, options?: { signal?: AbortSignal }): Promise<ChatCompletionEnvelope>
    }
  }
}

/**
 * Client for any OpenAI-compatible chat completions endpoint, such as a
 * local Ollama server's /v1 API. Retries are left to the site checker.
 */
export function createOpenAIClient(model: Pick<ModelConfig, 'baseUrl' | 'apiKey' | 'timeout'>): ChatCompletionClient {
  return new OpenAI({
    baseURL: model.baseUrl,
    apiKey: model.apiKey,
    timeout: model.timeout,
    maxRetries: 0,
  })
}
