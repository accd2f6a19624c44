import Anthropic from '@anthropic-ai/sdk'
import logger from '@adonisjs/core/services/logger'
import { BaseProvider } from './base_provider.js'
import { AI_CONFIG } from '../config/ai_config.js'
import type { AIRequest } from '#bot/types/ai_types'

export interface AnthropicProviderConfig {
  apiKey: string
  model?: string
}

export class AnthropicProvider extends BaseProvider {
  readonly name = 'anthropic'
  private readonly client: Anthropic
  private readonly model: string

  constructor(config: AnthropicProviderConfig) {
    super()
    if (!config.apiKey) {
      throw new Error('Anthropic API key is required')
    }

    this.client = new Anthropic({ apiKey: config.apiKey, maxRetries: 0 })
    this.model = config.model || AI_CONFIG.anthropic.defaultModel
    logger.info({ model: this.model }, 'Anthropic provider initialized')
  }

  protected async send(request: AIRequest, signal: AbortSignal): Promise<string> {
    const completion = await this.client.messages.create(
      {
        model: this.model,
        max_tokens: request.maxTokens,
        temperature: request.temperature,
        system: request.system,
        messages: request.messages,
      },
      { signal }
    )

    logger.debug({ usage: completion.usage }, 'Anthropic completion received')

    return completion.content
      .flatMap((block) => (block.type === 'text' ? [block.text] : []))
      .join('\n')
  }

  isAvailable(): boolean {
    return true
  }
}
