import logger from '@adonisjs/core/services/logger'
import pLimit from 'p-limit'
import { botEventBus } from '#bot/core/event_bus'
import type MenuRegistry from './menu_registry.js'
import type UserLockManager from '#bot/core/managers/user_lock_manager'
import type { BotRepository } from '#bot/contracts/persistence.contract'
import type { RichMenuPlatform } from '#bot/contracts/platform.contract'
import type { BotUserRecord, SupportedLanguage } from '#bot/types/bot_types'
import type { SyncAllSummary, SyncResult } from '#bot/types/rich_menu_types'
import { MissingArtifactException, UpstreamErrorException } from '#exceptions/bot_exceptions'
import { shortId, withTimeout } from '#bot/utils/timeout'

export interface MenuSynchronizerOptions {
  platformTimeoutMs: number
  concurrency: number
  pageSize?: number
}

/**
 * Aligne le menu riche lié à un utilisateur sur sa langue.
 *
 * Un seul essai par appel, borné dans le temps. Le menu assigné n'est
 * persisté qu'après succès de la plateforme. `sync()` suppose que
 * l'appelant détient le verrou de l'utilisateur.
 */
export default class MenuSynchronizer {
  constructor(
    private readonly repository: BotRepository,
    private readonly registry: MenuRegistry,
    private readonly platform: RichMenuPlatform,
    private readonly locks: UserLockManager,
    private readonly options: MenuSynchronizerOptions
  ) {}

  public async sync(userId: string, target: SupportedLanguage): Promise<SyncResult> {
    const artifact = this.registry.get(target)
    if (!artifact) {
      const error = new MissingArtifactException([target])
      logger.fatal({ language: target }, error.message)
      throw error
    }

    const user = await this.repository.getUser(userId)
    if (!user) {
      throw new Error(`Cannot sync rich menu of unknown user ${shortId(userId)}`)
    }

    if (user.assignedMenuId === artifact.artifactId) {
      return { ok: true, artifactId: artifact.artifactId, changed: false }
    }

    try {
      // Un changement de langue remet assignedMenuId à null alors que
      // l'ancien menu peut encore être lié côté plateforme
      if (!this.platform.supportsAtomicReassign) {
        await this.callPlatform(() => this.platform.unlinkArtifact(userId))
      }
      await this.callPlatform(() => this.platform.linkArtifact(userId, artifact.artifactId))
    } catch (error) {
      const syncError = UpstreamErrorException.wrap('ui_platform', error)
      logger.warn(
        { userId: shortId(userId), language: target, code: syncError.code },
        `Rich menu sync failed: ${syncError.message}`
      )
      botEventBus.publish('menu:sync_failed', {
        userId,
        language: target,
        code: syncError.code ?? 'E_UPSTREAM_ERROR',
        message: syncError.message,
        timestamp: Date.now(),
      })
      return { ok: false, error: syncError }
    }

    await this.repository.upsertUser({ ...user, assignedMenuId: artifact.artifactId })

    logger.info(
      { userId: shortId(userId), language: target, artifactId: artifact.artifactId },
      'Rich menu linked'
    )
    botEventBus.publish('menu:synced', {
      userId,
      language: target,
      artifactId: artifact.artifactId,
      changed: true,
      timestamp: Date.now(),
    })

    return { ok: true, artifactId: artifact.artifactId, changed: true }
  }

  /**
   * Resynchronise tous les utilisateurs connus, chacun sous son verrou
   */
  public async syncAll(): Promise<SyncAllSummary> {
    const summary: SyncAllSummary = { total: 0, changed: 0, unchanged: 0, failed: 0 }
    const limit = pLimit(this.options.concurrency)
    const pageSize = this.options.pageSize ?? 100
    let afterId: string | null = null

    while (true) {
      const page: BotUserRecord[] = await this.repository.listUsers(afterId, pageSize)
      if (page.length === 0) break

      const results = await Promise.all(
        page.map((listed) => limit(() => this.locks.run(listed.id, () => this.syncCurrent(listed.id))))
      )

      for (const result of results) {
        if (result === null) continue
        summary.total++
        if (!result.ok) summary.failed++
        else if (result.changed) summary.changed++
        else summary.unchanged++
      }

      afterId = page[page.length - 1].id
      if (page.length < pageSize) break
    }

    logger.info(summary, 'Rich menu sync completed for all users')
    return summary
  }

  /**
   * Relit l'utilisateur sous verrou pour viser sa langue actuelle
   */
  private async syncCurrent(userId: string): Promise<SyncResult | null> {
    const user = await this.repository.getUser(userId)
    if (!user) return null

    try {
      return await this.sync(userId, user.preferredLanguage)
    } catch (error) {
      const syncError = UpstreamErrorException.wrap('ui_platform', error)
      logger.error({ userId: shortId(userId), error: syncError.message }, 'Rich menu sync aborted')
      return { ok: false, error: syncError }
    }
  }

  private callPlatform(operation: () => Promise<void>): Promise<void> {
    return withTimeout('ui_platform', this.options.platformTimeoutMs, operation)
  }
}
