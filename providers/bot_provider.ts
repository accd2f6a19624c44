import type { ApplicationService } from '@adonisjs/core/types'
import type BotEngine from '#bot/core/bot_engine'

export default class BotProvider {
  private botEngine: BotEngine | null = null
  private initializationPromise: Promise<void> | null = null

  constructor(protected app: ApplicationService) {}

  async ready() {
    if (this.app.getEnvironment() !== 'web') {
      return
    }

    await this.initializeBot()
  }

  private async initializeBot(): Promise<void> {
    if (this.initializationPromise) {
      return this.initializationPromise
    }

    this.initializationPromise = this.doInitialization()

    try {
      await this.initializationPromise
    } catch (error) {
      this.initializationPromise = null
      throw error
    }
  }

  private async doInitialization(): Promise<void> {
    const { default: logger } = await import('@adonisjs/core/services/logger')
    const { default: botConfig } = await import('#config/bot')

    if (!botConfig.general.enabled) {
      logger.info('Bot is disabled in configuration')
      return
    }

    const [
      { default: BotEngine },
      { default: LucidBotRepository },
      { default: LineRichMenuPlatform },
      { default: LineAdapter },
      { default: Cld3LanguageDetector },
      { default: AIEngine },
      { AnthropicProvider },
      { default: MenuBlueprintFactory },
      { default: env },
    ] = await Promise.all([
      import('#bot/core/bot_engine'),
      import('#bot/services/lucid_bot_repository'),
      import('#bot/core/adapters/line_rich_menu_platform'),
      import('#bot/core/adapters/line_adapter'),
      import('#bot/core/language/cld3_language_detector'),
      import('#bot/core/ai/engine/ai_engine'),
      import('#bot/core/ai/providers/anthropic_provider'),
      import('#bot/core/rich_menu/menu_blueprint_factory'),
      import('#start/env'),
    ])

    const apiKey = env.get('ANTHROPIC_API_KEY')
    if (!apiKey) {
      logger.warn('ANTHROPIC_API_KEY is not set, free-form questions will get the fallback reply')
    }

    const channelAccessToken = botConfig.line.channelAccessToken
    const engine = new BotEngine(
      {
        repository: new LucidBotRepository(),
        platform: new LineRichMenuPlatform({ channelAccessToken }),
        channel: new LineAdapter({
          channelAccessToken,
          maxMessageLength: botConfig.line.maxMessageLength,
          timeoutMs: botConfig.timeouts.platformMs,
        }),
        detector: new Cld3LanguageDetector(botConfig.detection),
        ai: new AIEngine(
          apiKey ? new AnthropicProvider({ apiKey, model: env.get('ANTHROPIC_MODEL') }) : null,
          {
            botName: botConfig.general.name,
            timeoutMs: botConfig.timeouts.aiMs,
            limits: botConfig.conversation,
          }
        ),
        blueprints: await MenuBlueprintFactory.fromFile(
          botConfig.richMenu.layoutFile,
          botConfig.richMenu.prefix
        ),
      },
      botConfig
    )

    try {
      await engine.initialize()
    } catch (error) {
      logger.fatal(
        { error: error instanceof Error ? error.message : String(error) },
        'Bot initialization failed'
      )
      throw error
    }

    this.botEngine = engine
    BotEngine.register(engine)
  }

  async shutdown(): Promise<void> {
    if (this.botEngine) {
      const { default: BotEngine } = await import('#bot/core/bot_engine')
      BotEngine.register(null)
      this.botEngine = null
    }
  }
}
