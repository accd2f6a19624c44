import logger from '@adonisjs/core/services/logger'
import CommandManager from '#bot/core/managers/command_manager'
import I18nManager from '#bot/core/managers/i18n_manager'
import type UserLockManager from '#bot/core/managers/user_lock_manager'
import type { BotRepository } from '#bot/contracts/persistence.contract'
import type { AIBackend } from '#bot/types/ai_types'
import type { GroupChannelRecord, Reply, SupportedLanguage } from '#bot/types/bot_types'

export interface GroupMessage {
  groupId: string
  userId: string
  text: string
}

const TRANSLATION_MARKER = '📝'

/**
 * Traduction automatique dans les groupes : `/translate on <code>` active
 * la traduction de chaque message vers la langue choisie, `/translate off`
 * la coupe. Les autres messages de groupe sont ignorés.
 */
export default class GroupTranslationHandler {
  constructor(
    private readonly repository: BotRepository,
    private readonly ai: AIBackend,
    private readonly locks: UserLockManager,
    private readonly defaultLanguage: SupportedLanguage,
    private readonly commands: CommandManager = CommandManager.getInstance(),
    private readonly i18n: I18nManager = I18nManager.getInstance()
  ) {}

  /**
   * `null` quand il n'y a rien à répondre
   */
  public async handle(message: GroupMessage, signal?: AbortSignal): Promise<Reply | null> {
    const command = this.commands.detectCommand(message.text, 'group')
    if (command?.name === 'translate') {
      return this.locks.run(`group:${message.groupId}`, () =>
        this.configure(message.groupId, message.userId, command.argument)
      )
    }

    const channel = await this.repository.getGroupChannel(message.groupId)
    if (!channel?.translateEnabled || channel.targetLanguage === null) {
      return null
    }

    const target = channel.targetLanguage
    let translated: string
    try {
      translated = await this.ai.translate(message.text, target, signal)
    } catch (error) {
      logger.warn(
        { groupId: message.groupId, target, error: error instanceof Error ? error.message : String(error) },
        'Group translation failed'
      )
      return null
    }

    if (translated.trim() === message.text.trim()) {
      return null
    }

    return { text: `${TRANSLATION_MARKER} ${translated}`, language: target, source: 'translation' }
  }

  private async configure(groupId: string, userId: string, argument: string | null): Promise<Reply> {
    const existing = await this.repository.getGroupChannel(groupId)
    const language = existing?.targetLanguage ?? this.defaultLanguage
    const [action = '', code = ''] = (argument ?? '').trim().toLowerCase().split(/\s+/)

    if (action === 'on') {
      const target = this.i18n.resolveLanguage(code)
      if (!target) {
        return {
          text: this.i18n.t(
            'group.invalid_language',
            { argument: code, languages: this.i18n.describeLanguages() },
            language
          ),
          language,
          source: 'invalid_argument',
        }
      }

      await this.save({ groupId, translateEnabled: true, targetLanguage: target, enabledBy: userId })
      const metadata = this.i18n.getLanguage(target)
      return {
        text: this.i18n.t(
          'group.translation_enabled',
          { language: `${metadata.flag} ${metadata.nativeName}` },
          target
        ),
        language: target,
        source: 'command',
      }
    }

    if (action === 'off') {
      await this.save({
        groupId,
        translateEnabled: false,
        targetLanguage: existing?.targetLanguage ?? null,
        enabledBy: existing?.enabledBy ?? null,
      })
      return {
        text: this.i18n.t('group.translation_disabled', {}, language),
        language,
        source: 'command',
      }
    }

    return {
      text: this.i18n.t('group.translate_usage', { languages: this.i18n.describeLanguages() }, language),
      language,
      source: 'command',
    }
  }

  private async save(channel: GroupChannelRecord): Promise<void> {
    await this.repository.upsertGroupChannel(channel)
    logger.info(
      { groupId: channel.groupId, enabled: channel.translateEnabled, target: channel.targetLanguage },
      'Group translation settings updated'
    )
  }
}
