import { Observation, Verdict, VerdictClassifier } from '../core/types'
import { ClassifyError } from '../core/errors'
import { ChatCompletionClient, ChatCompletionEnvelope } from './client'
import { SYSTEM_PROMPT, buildUserMessage } from './prompt'
import { parseVerdict } from './parse-verdict'
import { logger } from '../logger'

export interface LlmClassifierOptions {
  model: string
  temperature: number
}

/**
 * Verdict classifier that asks a chat model about each observation.
 * Transport failures reject with ClassifyError; whatever the model says
 * is turned into a verdict.
 */
export class LlmClassifier implements VerdictClassifier {
  constructor(
    private readonly client: ChatCompletionClient,
    private readonly options: LlmClassifierOptions,
  ) {}

  async classify(observation: Observation, signal?: AbortSignal): Promise<Verdict> {
    let response: ChatCompletionEnvelope
    try {
      response = await this.client.chat.completions.create(
        {
          model: this.options.model,
          temperature: this.options.temperature,
          messages: [
            { role: 'system', content: SYSTEM_PROMPT },
            { role: 'user', content: buildUserMessage(observation) },
          ],
        },
        { signal },
      )
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error)
      throw new ClassifyError(`Model request failed: ${message}`, error instanceof Error ? error : undefined)
    }

    const content = response.choices?.[0]?.message?.content
    if (typeof content !== 'string') {
      throw new ClassifyError('Model response had no message content')
    }

    logger.debug(`Model answer for ${observation.url}: ${content.slice(0, 200)}`)

    return parseVerdict(content)
  }
}

export function createLlmClassifier(client: ChatCompletionClient, options: LlmClassifierOptions): LlmClassifier {
  return new LlmClassifier(client, options)
}
