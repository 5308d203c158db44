/**
 * Intent Classifier
 *
 * One hosted-LLM call per utterance. The reply is treated as untrusted
 * input: anything that does not validate falls back to `unknown` instead of
 * a guess. Provider failures are not folded into `unknown`; they propagate
 * as ClassificationFailureError or TimeoutError.
 */

import { z } from 'zod'
import type { ILLMProvider, LLMMessage } from '../ai/llm-provider'
import type { Logger } from '../observability'
import { SECRET_TYPES } from '../secrets/types'
import { CLASSIFIER_EXAMPLES, CLASSIFIER_SYSTEM_PROMPT } from './prompt'
import { INTENTS, unknownIntent } from './types'
import type { ClassifiedIntent, IntentParams } from './types'

const optionalText = z
  .string()
  .transform(value => value.trim())
  .transform(value => (value === '' ? undefined : value))
  .nullish()

const optionalType = z
  .string()
  .transform(value => value.trim().toLowerCase())
  .pipe(z.enum(SECRET_TYPES))
  .nullish()

export const ClassifierReplySchema = z.object({
  intent: z.enum(INTENTS),
  params: z
    .object({
      path: optionalText,
      pathPrefix: optionalText,
      type: optionalType,
    })
    .nullish(),
})

export interface IntentClassifierOptions {
  logger?: Logger
  /** Include the canned example exchanges in the prompt */
  fewShot?: boolean
}

/**
 * Remove a surrounding markdown code fence, if any
 */
export function stripCodeFence(text: string): string {
  const trimmed = text.trim()
  const match = /^```[a-zA-Z]*\s*\n?([\s\S]*?)\n?\s*```$/.exec(trimmed)
  return match ? match[1].trim() : trimmed
}

/**
 * Parse a model reply into a classified intent; never throws
 */
export function parseClassifierReply(reply: string): ClassifiedIntent {
  let json: unknown
  try {
    json = JSON.parse(stripCodeFence(reply))
  } catch {
    return unknownIntent()
  }

  const parsed = ClassifierReplySchema.safeParse(json)
  if (!parsed.success) {
    return unknownIntent()
  }

  const { intent } = parsed.data
  const raw = parsed.data.params ?? {}
  const params: IntentParams = {}
  if (raw.path) params.path = raw.path
  if (raw.pathPrefix) params.pathPrefix = raw.pathPrefix
  if (raw.type) params.type = raw.type

  switch (intent) {
    case 'get_secret':
      if (!params.path) {
        return unknownIntent()
      }
      return { intent, params: params.type ? { path: params.path, type: params.type } : { path: params.path } }

    case 'search_secrets': {
      const searchParams: IntentParams = {}
      if (params.pathPrefix) searchParams.pathPrefix = params.pathPrefix
      if (params.type) searchParams.type = params.type
      return { intent, params: searchParams }
    }

    case 'list_secrets':
    case 'count_by_type':
    case 'unknown':
      return { intent, params: {} }
  }
}

export class IntentClassifier {
  private readonly messages: LLMMessage[]

  constructor(
    private readonly llm: ILLMProvider,
    private readonly options: IntentClassifierOptions = {}
  ) {
    this.messages = [{ role: 'system', content: CLASSIFIER_SYSTEM_PROMPT }]
    if (options.fewShot ?? true) {
      for (const example of CLASSIFIER_EXAMPLES) {
        this.messages.push({ role: 'user', content: example.utterance })
        this.messages.push({ role: 'assistant', content: example.reply })
      }
    }
  }

  async classify(text: string): Promise<ClassifiedIntent> {
    const response = await this.llm.chat(
      [...this.messages, { role: 'user', content: text }],
      { temperature: 0, jsonMode: true }
    )

    const classified = parseClassifierReply(response.content)
    if (classified.intent === 'unknown') {
      this.options.logger?.debug({ reply: response.content.slice(0, 200) }, 'Classifier reply resolved to unknown')
    }
    return classified
  }
}
