import { describe, it, expect, jest, beforeEach } from '@jest/globals'
import { LlmClassifier } from './classifier'
import { ChatCompletionClient, ChatCompletionEnvelope } from './client'
import { SYSTEM_PROMPT, buildUserMessage } from './prompt'
import { ClassifyError } from '../core/errors'
import { Observation } from '../core/types'

jest.mock('../logger', () => ({
  logger: {
    debug: jest.fn(),
    warn: jest.fn(),
    info: jest.fn(),
    error: jest.fn(),
  },
}))

type Create = ChatCompletionClient['chat']['completions']['create']

const observation: Observation = {
  url: 'https://status.example',
  reachable: true,
  rawSignal: 'HTTP status: 200\nFinal URL: https://status.example/\nTitle: Status\nVisible text: All systems go',
  latencyMs: 420,
  httpStatus: 200,
}

describe('LlmClassifier', () => {
  let create: jest.MockedFunction<Create>
  let classifier: LlmClassifier

  beforeEach(() => {
    create = jest.fn<Create>()
    classifier = new LlmClassifier({ chat: { completions: { create } } }, { model: 'test-model', temperature: 0 })
  })

  it('should send the observation to the model and parse the answer', async () => {
    create.mockResolvedValue({
      choices: [{ message: { content: '{"status": "UP", "reason": "Status page lists all systems operational"}' } }],
    })

    const verdict = await classifier.classify(observation)

    expect(verdict).toEqual({ status: 'UP', note: 'Status page lists all systems operational' })
    expect(create).toHaveBeenCalledWith(
      {
        model: 'test-model',
        temperature: 0,
        messages: [
          { role: 'system', content: SYSTEM_PROMPT },
          { role: 'user', content: buildUserMessage(observation) },
        ],
      },
      { signal: undefined },
    )
  })

  it('should pass the abort signal through', async () => {
    create.mockResolvedValue({ choices: [{ message: { content: 'DOWN' } }] })
    const controller = new AbortController()

    await classifier.classify(observation, controller.signal)

    expect(create.mock.calls[0]?.[1]).toEqual({ signal: controller.signal })
  })

  it('should return UNKNOWN for an answer without a status', async () => {
    create.mockResolvedValue({ choices: [{ message: { content: 'I would need to look again.' } }] })

    await expect(classifier.classify(observation)).resolves.toEqual({
      status: 'UNKNOWN',
      note: 'I would need to look again.',
    })
  })

  it('should reject with ClassifyError when the endpoint cannot be reached', async () => {
    create.mockRejectedValue(new Error('Connection error.'))

    const error = await classifier.classify(observation).catch((e: unknown) => e)

    expect(error).toBeInstanceOf(ClassifyError)
    expect(error).toMatchObject({ message: 'Model request failed: Connection error.' })
  })

  const emptyEnvelopes: Array<[string, ChatCompletionEnvelope]> = [
    ['no choices', {}],
    ['an empty choice list', { choices: [] }],
    ['a choice without a message', { choices: [{}] }],
    ['null content', { choices: [{ message: { content: null } }] }],
  ]

  it.each(emptyEnvelopes)('should reject with ClassifyError for %s', async (_label, envelope) => {
    create.mockResolvedValue(envelope)

    await expect(classifier.classify(observation)).rejects.toThrow('Model response had no message content')
  })
})

describe('buildUserMessage', () => {
  it('should describe the observation', () => {
    expect(buildUserMessage({ ...observation, reachable: false, httpStatus: undefined })).toBe(
      [
        'URL: https://status.example',
        'Reachable: no',
        'HTTP status: none',
        'Load time: 420 ms',
        '',
        'Page signal:',
        observation.rawSignal,
      ].join('\n'),
    )
  })
})
