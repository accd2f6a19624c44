import { Exception } from '@adonisjs/core/exceptions'
import type { SupportedLanguage } from '#bot/types/bot_types'

export type UpstreamService = 'ai_backend' | 'language_detector' | 'ui_platform' | 'channel'

/**
 * Argument de commande invalide (code de langue inconnu, syntaxe).
 * Toujours signalé à l'utilisateur dans sa langue.
 */
export class InvalidArgumentException extends Exception {
  static status = 422
  static code = 'E_INVALID_ARGUMENT'

  constructor(
    message: string,
    public readonly argument: string | null,
    public readonly validValues: readonly string[]
  ) {
    super(message)
  }
}

/**
 * Un collaborateur externe n'a pas répondu dans le délai imparti
 */
export class UpstreamTimeoutException extends Exception {
  static status = 504
  static code = 'E_UPSTREAM_TIMEOUT'

  constructor(
    public readonly service: UpstreamService,
    public readonly timeoutMs: number
  ) {
    super(`${service} did not answer within ${timeoutMs}ms`)
  }
}

/**
 * Un collaborateur externe a répondu en erreur
 */
export class UpstreamErrorException extends Exception {
  static status = 502
  static code = 'E_UPSTREAM_ERROR'

  constructor(
    public readonly service: UpstreamService,
    message: string,
    options?: ErrorOptions
  ) {
    super(`${service} failed: ${message}`, options)
  }

  static wrap(service: UpstreamService, error: unknown): UpstreamTimeoutException | UpstreamErrorException {
    if (error instanceof UpstreamTimeoutException || error instanceof UpstreamErrorException) {
      return error
    }
    const message = error instanceof Error ? error.message : String(error)
    return new UpstreamErrorException(service, message, { cause: error })
  }
}

/**
 * Le registre ne contient pas d'artefact pour une langue prise en charge.
 * Erreur de configuration fatale au démarrage.
 */
export class MissingArtifactException extends Exception {
  static status = 500
  static code = 'E_MISSING_ARTIFACT'

  constructor(public readonly languages: readonly SupportedLanguage[]) {
    super(`No rich menu artifact registered for: ${languages.join(', ')}`)
  }
}

/**
 * Le menu assigné à un utilisateur ne correspond pas à sa langue
 */
export class ConsistencyViolationException extends Exception {
  static status = 500
  static code = 'E_CONSISTENCY_VIOLATION'

  constructor(
    public readonly userId: string,
    public readonly preferredLanguage: SupportedLanguage,
    public readonly assignedMenuId: string,
    public readonly assignedLanguage: SupportedLanguage | null
  ) {
    super(
      `User ${userId.slice(0, 8)} is bound to ${assignedMenuId} (${assignedLanguage ?? 'unknown'}) but prefers ${preferredLanguage}`
    )
  }
}

export type SyncError = UpstreamTimeoutException | UpstreamErrorException

/**
 * Le moteur n'a pas terminé son initialisation (réconciliation des menus)
 */
export class BotNotReadyException extends Exception {
  static status = 503
  static code = 'E_BOT_NOT_READY'

  constructor() {
    super('Bot engine is not ready')
  }
}
