import logger from '@adonisjs/core/services/logger'
import ContextBuilder, { type ContextLimits } from '../processors/context_builder.js'
import { sanitizeResponse } from '../processors/response_sanitizer.js'
import { SYSTEM_PROMPTS, renderPrompt } from '../config/prompts.js'
import { AI_CONFIG } from '../config/ai_config.js'
import I18nManager from '#bot/core/managers/i18n_manager'
import { UpstreamErrorException } from '#exceptions/bot_exceptions'
import { withTimeout } from '#bot/utils/timeout'
import type { AIBackend, AIMessage, AIProvider, AIUsageStats } from '#bot/types/ai_types'
import type { ConversationTurn, SupportedLanguage } from '#bot/types/bot_types'

export interface AIEngineOptions {
  botName: string
  timeoutMs: number
  limits: ContextLimits
}

/**
 * Complétion de conversation et traduction via le provider configuré.
 * Chaque appel est borné par `timeoutMs` et tente une seule fois.
 */
export default class AIEngine implements AIBackend {
  private readonly contextBuilder: ContextBuilder

  constructor(
    private readonly provider: AIProvider | null,
    private readonly options: AIEngineOptions,
    private readonly i18n: I18nManager = I18nManager.getInstance()
  ) {
    this.contextBuilder = new ContextBuilder(options.limits)
  }

  async complete(
    context: ConversationTurn[],
    language: SupportedLanguage,
    signal?: AbortSignal
  ): Promise<string> {
    const messages = this.contextBuilder.build(context)
    if (messages.length === 0) {
      throw new UpstreamErrorException('ai_backend', 'conversation context is empty')
    }

    const system = renderPrompt(SYSTEM_PROMPTS.assistant, {
      botName: this.options.botName,
      languageName: this.i18n.getLanguage(language).nativeName,
      languageCode: language,
    })

    const text = await this.generate(system, messages, AI_CONFIG.assistant, signal)
    logger.debug({ language, length: text.length }, 'AI reply generated')
    return text
  }

  async translate(text: string, target: SupportedLanguage, signal?: AbortSignal): Promise<string> {
    const system = renderPrompt(SYSTEM_PROMPTS.translation, {
      languageName: this.i18n.getLanguage(target).name,
    })

    return this.generate(system, [{ role: 'user', content: text }], AI_CONFIG.translation, signal)
  }

  private async generate(
    system: string,
    messages: AIMessage[],
    settings: { maxTokens: number; temperature: number },
    signal?: AbortSignal
  ): Promise<string> {
    const provider = this.provider
    if (!provider || !provider.isAvailable()) {
      throw new UpstreamErrorException('ai_backend', 'no AI provider available')
    }

    let raw: string
    try {
      raw = await withTimeout(
        'ai_backend',
        this.options.timeoutMs,
        (timeoutSignal) => provider.generate({ system, messages, ...settings }, timeoutSignal),
        signal
      )
    } catch (error) {
      throw UpstreamErrorException.wrap('ai_backend', error)
    }

    const text = sanitizeResponse(raw)
    if (!text) {
      throw new UpstreamErrorException('ai_backend', 'empty completion')
    }
    return text
  }

  isAvailable(): boolean {
    return this.provider !== null && this.provider.isAvailable()
  }

  getStats(): AIUsageStats {
    return (
      this.provider?.getUsageStats() ?? {
        provider: 'none',
        isAvailable: false,
        requests: 0,
        failures: 0,
      }
    )
  }
}
