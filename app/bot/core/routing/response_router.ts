import logger from '@adonisjs/core/services/logger'
import { botEventBus } from '#bot/core/event_bus'
import I18nManager from '#bot/core/managers/i18n_manager'
import type ConversationStore from '#bot/core/managers/conversation_store'
import type UserLockManager from '#bot/core/managers/user_lock_manager'
import type UserStateMachine from '#bot/core/state/user_state_machine'
import type IntentClassifier from './intent_classifier.js'
import type { AIBackend } from '#bot/types/ai_types'
import type {
  BotUserRecord,
  ConversationTurn,
  EmergencyContact,
  QuickReplyOption,
  Reply,
  ReplySource,
  SupportedLanguage,
} from '#bot/types/bot_types'
import type {
  CommandIntent,
  IntentCategory,
  KeywordCategory,
  KeywordIntent,
  LangCommandIntent,
} from '#bot/types/intent_types'
import { InvalidArgumentException } from '#exceptions/bot_exceptions'
import { shortId } from '#bot/utils/timeout'

export interface ResponseRouterOptions {
  botName: string
  defaultLanguage: SupportedLanguage
  emergencyContacts: readonly EmergencyContact[]
}

export interface RouteOptions {
  /**
   * Annulation de la requête entrante
   */
  signal?: AbortSignal
  /**
   * Intention imposée (postbacks), sans classification du texte
   */
  intent?: IntentCategory
}

/**
 * Résultat de la première section critique : soit une réponse finale,
 * soit une requête à envoyer à l'IA hors verrou.
 */
type Prepared =
  | { kind: 'reply'; reply: Reply; syncMenu: boolean }
  | { kind: 'query'; language: SupportedLanguage; context: ConversationTurn[] }

/**
 * Point d'entrée des messages directs : classe le message, consulte et met
 * à jour l'état de l'utilisateur, puis répond sans IA (réponse préparée,
 * commande) ou via l'IA (requête libre).
 *
 * Les écritures d'un même utilisateur passent par son verrou ; l'appel IA
 * se fait hors verrou, entre l'ajout du tour utilisateur et celui du tour
 * assistant. `handle()` ne lève jamais : toute erreur devient une réponse
 * générique localisée.
 */
export default class ResponseRouter {
  constructor(
    private readonly classifier: IntentClassifier,
    private readonly stateMachine: UserStateMachine,
    private readonly conversations: ConversationStore,
    private readonly ai: AIBackend,
    private readonly locks: UserLockManager,
    private readonly options: ResponseRouterOptions,
    private readonly i18n: I18nManager = I18nManager.getInstance()
  ) {}

  public async handle(userId: string, rawText: string, options: RouteOptions = {}): Promise<Reply> {
    let reply: Reply
    try {
      reply = await this.route(userId, rawText, options)
    } catch (error) {
      logger.error(
        { userId: shortId(userId), error: error instanceof Error ? error.message : String(error) },
        'Message routing failed'
      )
      const language = await this.fallbackLanguage(userId)
      reply = this.reply(this.i18n.t('common.error_generic', {}, language), language, 'error')
    }

    botEventBus.publish('bot:reply', {
      userId,
      source: reply.source,
      language: reply.language,
      timestamp: Date.now(),
    })
    return reply
  }

  private async route(userId: string, rawText: string, options: RouteOptions): Promise<Reply> {
    const prepared = await this.locks.run(userId, async () => {
      const result = await this.prepare(userId, rawText, options)
      if (result.kind === 'reply' && result.syncMenu) {
        await this.syncMenu(userId)
      }
      return result
    })

    if (prepared.kind === 'reply') {
      return prepared.reply
    }

    const { language, context } = prepared
    let answer: string | null = null
    try {
      answer = await this.ai.complete(context, language, options.signal)
    } catch (error) {
      logger.warn(
        { userId: shortId(userId), language, error: error instanceof Error ? error.message : String(error) },
        'AI backend unavailable, sending fallback reply'
      )
    }

    return this.locks.run(userId, async () => {
      let reply: Reply
      if (answer !== null && !options.signal?.aborted) {
        await this.conversations.append(userId, 'assistant', answer, language)
        reply = this.reply(answer, language, 'ai')
      } else {
        reply = this.reply(this.i18n.t('common.ai_fallback', {}, language), language, 'ai_fallback')
      }

      await this.syncMenu(userId)
      return reply
    })
  }

  /**
   * Section critique : classification, transitions d'état, réponses sans IA
   * et ajout du tour utilisateur pour une requête
   */
  private async prepare(userId: string, rawText: string, options: RouteOptions): Promise<Prepared> {
    const stored = await this.stateMachine.peekLanguage(userId)
    const intent = options.intent ?? this.classifier.classify(rawText, stored ?? undefined)

    if (intent.kind === 'command' && intent.command === 'lang' && intent.target !== null) {
      return this.changeLanguage(userId, intent.target)
    }

    const { record } = await this.stateMachine.resolve(userId, rawText, options.signal)
    const language = record.preferredLanguage

    if (intent.kind === 'command') {
      return this.runCommand(intent, record)
    }

    if (intent.kind === 'query') {
      await this.conversations.append(userId, 'user', rawText, language)
      const context = await this.conversations.window(userId)
      return { kind: 'query', language, context }
    }

    return this.answer(this.keywordReply(intent, language), language, 'canned')
  }

  private async changeLanguage(userId: string, target: SupportedLanguage): Promise<Prepared> {
    const selection = await this.stateMachine.selectLanguage(userId, target)
    const metadata = this.i18n.getLanguage(target)

    const text = selection.firstContact
      ? this.i18n.t('common.welcome', { botName: this.options.botName }, target)
      : this.i18n.t('common.language_changed', { language: `${metadata.flag} ${metadata.nativeName}` }, target)

    logger.info(
      { userId: shortId(userId), from: selection.previous, to: target },
      'Preferred language selected'
    )
    return this.answer(text, target, 'command')
  }

  private async runCommand(intent: CommandIntent, record: BotUserRecord): Promise<Prepared> {
    const language = record.preferredLanguage

    if (intent.command === 'lang') {
      return this.languageCommand(intent, language)
    }

    switch (intent.command) {
      case 'help':
        return this.answer(
          this.i18n.t('commands.help', { languages: this.i18n.describeLanguages() }, language),
          language,
          'command'
        )
      case 'emergency':
        return this.answer(this.emergencyText(language), language, 'command')
      case 'clear':
        await this.conversations.reset(record.id)
        return this.answer(this.i18n.t('commands.cleared', {}, language), language, 'command')
    }
  }

  /**
   * `/lang` sans argument valide : invite de choix ou erreur listant les
   * codes. Aucune transition, aucune synchronisation sur argument invalide.
   */
  private languageCommand(intent: LangCommandIntent, language: SupportedLanguage): Prepared {
    if (intent.invalidArgument) {
      const error = new InvalidArgumentException(
        `Unsupported language code "${intent.argument ?? ''}"`,
        intent.argument,
        this.i18n.getLanguages().map((metadata) => metadata.code)
      )
      logger.info({ code: error.code, argument: error.argument }, error.message)

      return {
        kind: 'reply',
        syncMenu: false,
        reply: this.reply(
          this.i18n.t(
            'commands.invalid_language',
            { argument: intent.argument ?? '', languages: this.i18n.describeLanguages() },
            language
          ),
          language,
          'invalid_argument'
        ),
      }
    }

    const lines = this.i18n
      .getLanguages()
      .map((metadata) => `${metadata.flag} ${metadata.nativeName} (/lang ${metadata.code})`)
      .join('\n')

    return this.answer(
      this.i18n.t('commands.choose_language', { languages: lines }, language),
      language,
      'command',
      this.languageQuickReplies()
    )
  }

  private keywordReply(intent: KeywordIntent, language: SupportedLanguage): string {
    const replies: Record<KeywordCategory, () => string> = {
      emergency: () => this.emergencyText(language),
      greeting: () => this.i18n.t('intents.greeting', { botName: this.options.botName }, language),
      thanks: () => this.i18n.t('intents.thanks', {}, language),
      goodbye: () => this.i18n.t('intents.goodbye', {}, language),
      help_request: () => this.i18n.t('intents.help_request', {}, language),
    }

    logger.debug({ kind: intent.kind, matchedLanguage: intent.matchedLanguage }, 'Keyword intent')
    return replies[intent.kind]()
  }

  private emergencyText(language: SupportedLanguage): string {
    const contacts = this.options.emergencyContacts.map(
      (contact) => `${this.i18n.t(`emergency.contacts.${contact.key}`, {}, language)}: ${contact.number}`
    )

    return [
      this.i18n.t('emergency.title', {}, language),
      ...contacts,
      '',
      this.i18n.t('emergency.footer', {}, language),
    ].join('\n')
  }

  public languageQuickReplies(): QuickReplyOption[] {
    return this.i18n.getLanguages().map((metadata) => ({
      label: `${metadata.flag} ${metadata.nativeName}`,
      text: `/lang ${metadata.code}`,
    }))
  }

  /**
   * Synchronisation du menu au mieux : un échec est journalisé par le
   * synchroniseur et n'altère pas la réponse
   */
  private async syncMenu(userId: string): Promise<void> {
    try {
      await this.stateMachine.ensureMenu(userId)
    } catch (error) {
      logger.error(
        { userId: shortId(userId), error: error instanceof Error ? error.message : String(error) },
        'Rich menu sync raised'
      )
    }
  }

  private async fallbackLanguage(userId: string): Promise<SupportedLanguage> {
    try {
      return (await this.stateMachine.peekLanguage(userId)) ?? this.options.defaultLanguage
    } catch {
      return this.options.defaultLanguage
    }
  }

  private answer(
    text: string,
    language: SupportedLanguage,
    source: ReplySource,
    quickReplies?: QuickReplyOption[]
  ): Prepared {
    return { kind: 'reply', syncMenu: true, reply: this.reply(text, language, source, quickReplies) }
  }

  private reply(
    text: string,
    language: SupportedLanguage,
    source: ReplySource,
    quickReplies?: QuickReplyOption[]
  ): Reply {
    return quickReplies ? { text, language, source, quickReplies } : { text, language, source }
  }
}
