import logger from '@adonisjs/core/services/logger'
import type botConfig from '#config/bot'
import { botEventBus } from './event_bus.js'
import I18nManager from './managers/i18n_manager.js'
import ConversationStore from './managers/conversation_store.js'
import UserLockManager from './managers/user_lock_manager.js'
import MenuRegistry from './rich_menu/menu_registry.js'
import MenuReconciler from './rich_menu/menu_reconciler.js'
import MenuSynchronizer from './rich_menu/menu_synchronizer.js'
import type MenuBlueprintFactory from './rich_menu/menu_blueprint_factory.js'
import UserStateMachine from './state/user_state_machine.js'
import IntentClassifier from './routing/intent_classifier.js'
import ResponseRouter, { type RouteOptions } from './routing/response_router.js'
import PostbackRouter from './routing/postback_router.js'
import GroupTranslationHandler from './group/group_translation_handler.js'
import type { BotRepository } from '#bot/contracts/persistence.contract'
import type { LanguageDetector, RichMenuPlatform } from '#bot/contracts/platform.contract'
import type { AIBackend, AIUsageStats } from '#bot/types/ai_types'
import type {
  ChannelAdapter,
  IncomingMessage,
  Reply,
  SupportedLanguage,
} from '#bot/types/bot_types'
import type {
  RegistrySnapshot,
  RichMenuArtifact,
  SyncAllSummary,
} from '#bot/types/rich_menu_types'
import { shortId } from '#bot/utils/timeout'

export type BotSettings = typeof botConfig

export interface BotEngineDependencies {
  repository: BotRepository
  platform: RichMenuPlatform
  detector: LanguageDetector
  ai: AIBackend
  channel: ChannelAdapter
  blueprints: MenuBlueprintFactory
}

export interface BotEngineStats {
  ready: boolean
  languages: SupportedLanguage[]
  registry: RegistrySnapshot
  activeUserLanes: number
  ai: AIUsageStats
  events: ReturnType<typeof botEventBus.getStats>
}

/**
 * Assemble les composants du bot et expose les points d'entrée utilisés
 * par le transport : `handle()`, `handleEvent()`, et les opérations
 * d'administration (`syncAllMenus`, `getRegistrySnapshot`,
 * `provisionLanguage`).
 */
export default class BotEngine {
  private static current: BotEngine | null = null

  private readonly i18n = I18nManager.getInstance()
  private readonly locks = new UserLockManager()
  private readonly registry = new MenuRegistry()
  private readonly reconciler: MenuReconciler
  private readonly synchronizer: MenuSynchronizer
  private readonly stateMachine: UserStateMachine
  private readonly router: ResponseRouter
  private readonly postbacks: PostbackRouter
  private readonly groups: GroupTranslationHandler
  private ready = false

  constructor(
    private readonly dependencies: BotEngineDependencies,
    private readonly settings: BotSettings
  ) {
    const { repository, platform, detector, ai, blueprints } = dependencies
    const { general, timeouts, richMenu } = settings

    this.reconciler = new MenuReconciler(platform, blueprints, this.registry, {
      languages: general.supportedLanguages,
      imageDirectory: richMenu.imageDirectory,
      platformTimeoutMs: timeouts.platformMs,
    })
    this.synchronizer = new MenuSynchronizer(repository, this.registry, platform, this.locks, {
      platformTimeoutMs: timeouts.platformMs,
      concurrency: richMenu.syncConcurrency,
    })
    this.stateMachine = new UserStateMachine(repository, this.registry, detector, this.synchronizer, {
      defaultLanguage: general.defaultLanguage,
      detectionTimeoutMs: timeouts.detectionMs,
    })
    this.router = new ResponseRouter(
      new IntentClassifier(),
      this.stateMachine,
      new ConversationStore(repository, settings.conversation.historyWindow),
      ai,
      this.locks,
      {
        botName: general.name,
        defaultLanguage: general.defaultLanguage,
        emergencyContacts: settings.emergency.contacts,
      }
    )
    this.postbacks = new PostbackRouter(this.router, this.stateMachine, general.defaultLanguage)
    this.groups = new GroupTranslationHandler(repository, ai, this.locks, general.defaultLanguage)
  }

  public static get instance(): BotEngine | null {
    return BotEngine.current
  }

  public static register(engine: BotEngine | null): void {
    BotEngine.current = engine
  }

  /**
   * Charge le catalogue puis réconcilie les menus riches. Lève
   * `MissingArtifactException` si une langue reste sans menu : le bot ne
   * se déclare alors pas prêt.
   */
  public async initialize(): Promise<void> {
    await this.i18n.initialize()
    await this.reconciler.reconcile()
    this.ready = true
    logger.info(
      { languages: this.settings.general.supportedLanguages, channel: this.dependencies.channel.channel },
      'Bot engine initialized successfully'
    )
  }

  public get isReady(): boolean {
    return this.ready
  }

  /**
   * Message direct d'un utilisateur
   */
  public handle(userId: string, rawText: string, options: RouteOptions = {}): Promise<Reply> {
    return this.router.handle(userId, rawText, options)
  }

  /**
   * Traite un message normalisé et envoie la réponse éventuelle sur le canal
   */
  public async handleEvent(message: IncomingMessage, signal?: AbortSignal): Promise<Reply | null> {
    const reply = await this.dispatch(message, signal)
    if (!reply) {
      return null
    }

    try {
      await this.dependencies.channel.reply(message.replyToken, reply)
    } catch (error) {
      logger.error(
        {
          userId: shortId(message.userId),
          source: reply.source,
          error: error instanceof Error ? error.message : String(error),
        },
        'Failed to send reply'
      )
    }
    return reply
  }

  private dispatch(message: IncomingMessage, signal?: AbortSignal): Promise<Reply | null> {
    if (message.scope === 'group') {
      if (!message.groupId || message.messageType !== 'text') {
        return Promise.resolve(null)
      }
      return this.groups.handle(
        { groupId: message.groupId, userId: message.userId, text: message.content },
        signal
      )
    }

    if (message.messageType === 'postback') {
      return this.postbacks.handle(message.userId, message.content, signal)
    }

    return this.router.handle(message.userId, message.content, { signal })
  }

  public syncAllMenus(): Promise<SyncAllSummary> {
    return this.synchronizer.syncAll()
  }

  public getRegistrySnapshot(): RegistrySnapshot {
    return this.registry.snapshot()
  }

  public provisionLanguage(language: SupportedLanguage): Promise<RichMenuArtifact> {
    return this.reconciler.provisionLanguage(language)
  }

  public getStats(): BotEngineStats {
    return {
      ready: this.ready,
      languages: this.i18n.getStats().languages,
      registry: this.registry.snapshot(),
      activeUserLanes: this.locks.activeKeys,
      ai: this.dependencies.ai.getStats(),
      events: botEventBus.getStats(),
    }
  }
}
