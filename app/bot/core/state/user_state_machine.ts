import { DateTime } from 'luxon'
import logger from '@adonisjs/core/services/logger'
import { botEventBus } from '#bot/core/event_bus'
import type MenuRegistry from '#bot/core/rich_menu/menu_registry'
import type MenuSynchronizer from '#bot/core/rich_menu/menu_synchronizer'
import type { BotRepository } from '#bot/contracts/persistence.contract'
import type { LanguageDetector } from '#bot/contracts/platform.contract'
import type { BotUserRecord, SupportedLanguage } from '#bot/types/bot_types'
import type { SyncResult } from '#bot/types/rich_menu_types'
import {
  LanguageState,
  MenuState,
  StateTrigger,
  STATE_TRANSITIONS,
  isValidTransition,
  type ResolvedUser,
  type UserStateSnapshot,
} from '#bot/types/state.types'
import { ConsistencyViolationException } from '#exceptions/bot_exceptions'
import { shortId, withTimeout } from '#bot/utils/timeout'

export interface UserStateMachineOptions {
  defaultLanguage: SupportedLanguage
  detectionTimeoutMs: number
}

export interface LanguageSelection {
  record: BotUserRecord
  firstContact: boolean
  changed: boolean
  previous: SupportedLanguage | null
}

/**
 * Machine à états par utilisateur : axe langue (aucun choix / langue L)
 * croisé avec l'axe menu (synchronisé / périmé).
 *
 * L'état menu n'est pas stocké : un utilisateur est synchronisé si son
 * menu assigné est l'artefact du registre pour sa langue. Un changement
 * de langue remet le menu assigné à `null`, ce qui garde l'invariant
 * « menu assigné ⇒ même langue » vrai en base. Toutes les méthodes qui
 * écrivent supposent que l'appelant détient le verrou de l'utilisateur.
 */
export default class UserStateMachine {
  constructor(
    private readonly repository: BotRepository,
    private readonly registry: MenuRegistry,
    private readonly detector: LanguageDetector,
    private readonly synchronizer: MenuSynchronizer,
    private readonly options: UserStateMachineOptions
  ) {}

  /**
   * Lecture seule : langue courante, ou `null` avant le premier contact
   */
  public async peekLanguage(userId: string): Promise<SupportedLanguage | null> {
    const user = await this.repository.getUser(userId)
    return user?.preferredLanguage ?? null
  }

  /**
   * Charge l'utilisateur, ou le crée au premier contact en détectant la
   * langue du message (repli sur la langue par défaut).
   */
  public async resolve(userId: string, text: string, signal?: AbortSignal): Promise<ResolvedUser> {
    const existing = await this.repository.getUser(userId)

    if (existing) {
      const record = { ...existing, lastSeenAt: DateTime.now() }
      await this.repository.upsertUser(record)
      return { record, firstContact: false, menu: this.menuState(record) }
    }

    const language = await this.detectLanguage(text, signal)
    const record: BotUserRecord = {
      id: userId,
      preferredLanguage: language,
      assignedMenuId: null,
      lastSeenAt: DateTime.now(),
    }
    await this.repository.upsertUser(record)
    this.recordTransition(userId, StateTrigger.FIRST_CONTACT, null, language)

    return { record, firstContact: true, menu: MenuState.STALE }
  }

  /**
   * `/lang <code>` valide : passe à la langue demandée, quel que soit l'état
   */
  public async selectLanguage(
    userId: string,
    language: SupportedLanguage
  ): Promise<LanguageSelection> {
    const existing = await this.repository.getUser(userId)
    const previous = existing?.preferredLanguage ?? null
    const changed = previous !== language

    const record: BotUserRecord = {
      id: userId,
      preferredLanguage: language,
      // Même langue : le lien existant reste valide
      assignedMenuId: existing && !changed ? existing.assignedMenuId : null,
      lastSeenAt: DateTime.now(),
    }
    await this.repository.upsertUser(record)

    if (changed || !existing) {
      this.recordTransition(
        userId,
        StateTrigger.EXPLICIT_LANGUAGE,
        existing ? this.snapshot(existing) : null,
        language
      )
      botEventBus.publish('user:language_changed', {
        userId,
        from: previous,
        to: language,
        timestamp: Date.now(),
      })
    }

    return { record, firstContact: !existing, changed, previous }
  }

  /**
   * État du menu d'un utilisateur. Un menu assigné qui n'est pas
   * l'artefact courant de sa langue est une incohérence : journalisée,
   * puis traitée comme un menu périmé pour forcer une resynchronisation.
   */
  public menuState(record: BotUserRecord): MenuState {
    const expected = this.registry.get(record.preferredLanguage)
    if (expected && record.assignedMenuId === expected.artifactId) {
      return MenuState.SYNCED
    }

    if (record.assignedMenuId !== null) {
      this.reportViolation(record, record.assignedMenuId)
    }
    return MenuState.STALE
  }

  public snapshot(record: BotUserRecord | null): UserStateSnapshot {
    if (!record) {
      return { language: LanguageState.NO_PREFERENCE, menu: MenuState.STALE }
    }
    const expected = this.registry.get(record.preferredLanguage)
    return {
      language: LanguageState.SELECTED,
      menu:
        expected && record.assignedMenuId === expected.artifactId
          ? MenuState.SYNCED
          : MenuState.STALE,
    }
  }

  /**
   * Synchronise le menu si l'utilisateur est périmé ; `null` s'il était déjà
   * à jour et qu'aucun appel n'a été fait.
   */
  public async ensureMenu(userId: string): Promise<SyncResult | null> {
    const user = await this.repository.getUser(userId)
    if (!user || this.snapshot(user).menu === MenuState.SYNCED) {
      return null
    }

    const result = await this.synchronizer.sync(userId, user.preferredLanguage)
    if (result.ok) {
      this.recordTransition(userId, StateTrigger.MENU_SYNCED, this.snapshot(user), user.preferredLanguage)
    }
    return result
  }

  private async detectLanguage(text: string, signal?: AbortSignal): Promise<SupportedLanguage> {
    try {
      const detected = await withTimeout(
        'language_detector',
        this.options.detectionTimeoutMs,
        () => this.detector.detect(text),
        signal
      )
      if (detected !== 'unknown') {
        return detected
      }
      logger.debug({ detector: this.detector.name }, 'Language unknown, using default')
    } catch (error) {
      logger.warn(
        { detector: this.detector.name, error: error instanceof Error ? error.message : String(error) },
        'Language detection failed, using default'
      )
    }
    return this.options.defaultLanguage
  }

  private reportViolation(record: BotUserRecord, assignedMenuId: string): void {
    if (this.registry.isRetired(assignedMenuId)) {
      logger.info(
        { userId: shortId(record.id), assignedMenuId },
        'User bound to a retired rich menu, resync required'
      )
      return
    }

    const violation = new ConsistencyViolationException(
      record.id,
      record.preferredLanguage,
      assignedMenuId,
      this.registry.languageOf(assignedMenuId) ?? null
    )
    logger.error(
      { userId: shortId(record.id), code: violation.code, assignedMenuId },
      violation.message
    )
    this.recordTransition(
      record.id,
      StateTrigger.CONSISTENCY_VIOLATION,
      { language: LanguageState.SELECTED, menu: MenuState.SYNCED },
      record.preferredLanguage
    )
  }

  private recordTransition(
    userId: string,
    trigger: StateTrigger,
    from: UserStateSnapshot | null,
    language: SupportedLanguage
  ): void {
    const origin = from ?? { language: LanguageState.NO_PREFERENCE, menu: MenuState.STALE }
    if (!isValidTransition(trigger, origin)) {
      logger.warn({ userId: shortId(userId), trigger, from: origin }, 'Unexpected state transition')
      return
    }

    const to = STATE_TRANSITIONS[trigger].to
    logger.debug({ userId: shortId(userId), trigger, from: origin, to, language }, 'User state transition')
    botEventBus.publish('user:state_changed', {
      userId,
      trigger,
      from,
      to,
      language,
      timestamp: Date.now(),
    })
  }
}
