import type { Env, Invoker, InvokerBuilder, InvokerConfig, Logger } from '@pipeline-invokers/common'
import { InputError, InvocationError, makeLogger, readInvokerConfig, toError } from '@pipeline-invokers/common'
import { AzureOpenAI } from 'openai'
import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions'
import { z } from 'zod'

// ── Config ─────────────────────────────────────────────────────

/** Keys of an Azure OpenAI step, each falling back to `AZURE_OPENAI_<KEY>`. */
export const azureOpenAIConfigSchema = z.object({
  api_key: z.string().min(1),
  api_version: z.string().min(1),
  endpoint: z.string().min(1),
  deployment_name: z.string().min(1),
})

export type AzureOpenAIInvokerConfig = z.output<typeof azureOpenAIConfigSchema>

export interface AzureOpenAIInvokerOptions {
  readonly env?: Env | undefined
  readonly logger?: Logger | undefined
}

// ── Dialogue ───────────────────────────────────────────────────

export type ChatRole = 'system' | 'user' | 'assistant'

export type ChatMessage = ChatCompletionMessageParam

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

const CHAT_ROLES: readonly ChatRole[] = ['system', 'user', 'assistant']

function isChatRole(value: unknown): value is ChatRole {
  return CHAT_ROLES.some((r) => r === value)
}

function toMessage(element: unknown, index: number): ChatMessage {
  if (!isRecord(element)) {
    throw new InputError('UNPARSABLE_INPUT', `Dialogue element ${index} is not an object`)
  }
  const { role, content } = element
  if (role === undefined || role === null) {
    throw new InputError('MISSING_ROLE', `Dialogue element ${index} has no role`)
  }
  if (!isChatRole(role)) {
    throw new InputError('UNKNOWN_ROLE', `Unknown chat role '${String(role)}'`)
  }
  if (typeof content !== 'string') {
    throw new InputError('MISSING_CONTENT', `Dialogue element ${index} has no content`)
  }
  switch (role) {
    case 'system':
      return { role: 'system', content }
    case 'user':
      return { role: 'user', content }
    case 'assistant':
      return { role: 'assistant', content }
  }
}

/**
 * Parse invoker input into chat messages. The input is a JSON array of
 * `{ "role": "system" | "user" | "assistant", "content": "..." }`.
 */
export function parseDialogue(input: string): ChatMessage[] {
  let raw: unknown
  try {
    raw = JSON.parse(input)
  } catch (err) {
    throw new InputError('UNPARSABLE_INPUT', 'Invoker input cannot be parsed as JSON', toError(err))
  }
  if (!Array.isArray(raw)) {
    throw new InputError('UNPARSABLE_INPUT', 'Invoker input must be a JSON array of dialogue elements')
  }
  return raw.map((element: unknown, i) => toMessage(element, i))
}

// ── Invokers ───────────────────────────────────────────────────

interface ChatInvokerSettings {
  readonly type: string
  readonly jsonMode: boolean
}

function createChatInvoker(
  settings: ChatInvokerSettings,
  config: InvokerConfig,
  options: AzureOpenAIInvokerOptions,
): Invoker {
  const { type, jsonMode } = settings
  const resolved = readInvokerConfig({
    type,
    envPrefix: 'AZURE_OPENAI',
    schema: azureOpenAIConfigSchema,
    config,
    env: options.env,
  })
  const log = options.logger ?? makeLogger({ component: 'azure-openai-invoker' })
  const client = new AzureOpenAI({
    apiKey: resolved.api_key,
    apiVersion: resolved.api_version,
    endpoint: resolved.endpoint,
  })

  return {
    async invoke(input: string): Promise<string> {
      // json_object mode needs the dialogue itself to ask for JSON
      if (jsonMode && !input.toLowerCase().includes('json')) {
        throw new InputError('MISSING_JSON_INSTRUCTION', "The JSON invoker prompt needs to contain the word 'json'")
      }
      const messages = parseDialogue(input)
      log.debug({ deployment: resolved.deployment_name, messages: messages.length }, 'invoking chat completion')

      const response = await client.chat.completions.create({
        model: resolved.deployment_name,
        messages,
        ...(jsonMode ? { response_format: { type: 'json_object' as const } } : {}),
      })

      const content = response.choices[0]?.message.content
      if (content === undefined || content === null) {
        throw new InvocationError('EMPTY_RESPONSE', type, `${type}: the completion returned no content`)
      }
      return content
    },
  }
}

/** Chat completion against an Azure OpenAI deployment; returns the first choice's content. */
export function createAzureOpenAIChatInvoker(config: InvokerConfig, options: AzureOpenAIInvokerOptions = {}): Invoker {
  return createChatInvoker({ type: 'azure_openai_chat', jsonMode: false }, config, options)
}

/**
 * Chat completion in JSON mode. The dialogue must itself ask for JSON,
 * so input that never mentions "json" is rejected before any request.
 */
export function createAzureOpenAIChatJsonInvoker(
  config: InvokerConfig,
  options: AzureOpenAIInvokerOptions = {},
): Invoker {
  return createChatInvoker({ type: 'azure_openai_chat_json', jsonMode: true }, config, options)
}

export function azureOpenAIChatBuilder(options: AzureOpenAIInvokerOptions = {}): InvokerBuilder {
  return (config) => createAzureOpenAIChatInvoker(config, options)
}

export function azureOpenAIChatJsonBuilder(options: AzureOpenAIInvokerOptions = {}): InvokerBuilder {
  return (config) => createAzureOpenAIChatJsonInvoker(config, options)
}
