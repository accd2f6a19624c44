import logger from '@adonisjs/core/services/logger'
import I18nManager from '#bot/core/managers/i18n_manager'
import type UserStateMachine from '#bot/core/state/user_state_machine'
import type ResponseRouter from './response_router.js'
import type { Reply, SupportedLanguage } from '#bot/types/bot_types'
import type { IntentCategory } from '#bot/types/intent_types'
import { shortId } from '#bot/utils/timeout'

export type PostbackAction =
  | { kind: 'intent'; intent: IntentCategory }
  | { kind: 'topic'; topic: string }
  | { kind: 'unknown' }

/**
 * Traduit les boutons du menu riche en intentions du routeur :
 * `lang_<code>`, `clear_chat`, `category_emergency`, `category_language`,
 * `category_<sujet>` (question type envoyée comme requête libre).
 */
export default class PostbackRouter {
  constructor(
    private readonly router: ResponseRouter,
    private readonly stateMachine: UserStateMachine,
    private readonly defaultLanguage: SupportedLanguage,
    private readonly i18n: I18nManager = I18nManager.getInstance()
  ) {}

  public parse(data: string): PostbackAction {
    const value = data.trim()

    if (value.startsWith('lang_')) {
      const argument = value.slice('lang_'.length)
      const target = this.i18n.resolveLanguage(argument)
      return {
        kind: 'intent',
        intent: { kind: 'command', command: 'lang', argument, target, invalidArgument: target === null },
      }
    }

    switch (value) {
      case 'clear_chat':
        return { kind: 'intent', intent: this.command('clear') }
      case 'category_emergency':
        return { kind: 'intent', intent: this.command('emergency') }
      case 'category_language':
        return {
          kind: 'intent',
          intent: { kind: 'command', command: 'lang', argument: null, target: null, invalidArgument: false },
        }
    }

    if (value.startsWith('category_')) {
      const topic = value.slice('category_'.length)
      if (/^[a-z_]+$/.test(topic) && this.i18n.hasTranslation(`postbacks.topics.${topic}`, this.defaultLanguage)) {
        return { kind: 'topic', topic }
      }
    }

    return { kind: 'unknown' }
  }

  /**
   * `null` quand la donnée de postback n'est pas reconnue
   */
  public async handle(userId: string, data: string, signal?: AbortSignal): Promise<Reply | null> {
    const action = this.parse(data)

    switch (action.kind) {
      case 'intent':
        return this.router.handle(userId, data, { intent: action.intent, signal })
      case 'topic': {
        const language = (await this.stateMachine.peekLanguage(userId)) ?? this.defaultLanguage
        const prompt = this.i18n.t(`postbacks.topics.${action.topic}`, {}, language)
        return this.router.handle(userId, prompt, { intent: { kind: 'query' }, signal })
      }
      case 'unknown':
        logger.warn({ userId: shortId(userId), data }, 'Unknown postback ignored')
        return null
    }
  }

  private command(command: 'clear' | 'emergency'): IntentCategory {
    return { kind: 'command', command, argument: null, invalidArgument: false }
  }
}
