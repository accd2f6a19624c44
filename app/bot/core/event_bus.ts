import { EventEmitter } from 'node:events'
import logger from '@adonisjs/core/services/logger'
import type { ReplySource, SupportedLanguage } from '#bot/types/bot_types'
import type { StateTrigger, UserStateSnapshot } from '#bot/types/state.types'
import { shortId } from '#bot/utils/timeout'

export interface StateChangedEvent {
  userId: string
  trigger: StateTrigger
  from: UserStateSnapshot | null
  to: UserStateSnapshot
  language: SupportedLanguage
  timestamp: number
}

export interface LanguageChangedEvent {
  userId: string
  from: SupportedLanguage | null
  to: SupportedLanguage
  timestamp: number
}

export interface MenuSyncedEvent {
  userId: string
  language: SupportedLanguage
  artifactId: string
  changed: boolean
  timestamp: number
}

export interface MenuSyncFailedEvent {
  userId: string
  language: SupportedLanguage
  code: string
  message: string
  timestamp: number
}

export interface BotReplyEvent {
  userId: string
  source: ReplySource
  language: SupportedLanguage
  timestamp: number
}

export interface BotEvents {
  'user:state_changed': StateChangedEvent
  'user:language_changed': LanguageChangedEvent
  'menu:synced': MenuSyncedEvent
  'menu:sync_failed': MenuSyncFailedEvent
  'bot:reply': BotReplyEvent
}

export type BotEventName = keyof BotEvents

/**
 * Bus d'événements du bot. Les identifiants utilisateur sont raccourcis
 * avant émission ; chaque émission incrémente un compteur.
 */
class BotEventBus extends EventEmitter {
  private readonly counters = new Map<BotEventName, number>()

  publish<K extends BotEventName>(name: K, event: BotEvents[K]): void {
    this.counters.set(name, (this.counters.get(name) ?? 0) + 1)
    const payload = { ...event, userId: shortId(event.userId) }

    try {
      this.emit(name, payload)
    } catch (error) {
      logger.error({ event: name, error: String(error) }, 'Bot event listener failed')
    }
  }

  subscribe<K extends BotEventName>(name: K, listener: (event: BotEvents[K]) => void): () => void {
    this.on(name, listener)
    return () => {
      this.off(name, listener)
    }
  }

  getStats(): { events: Record<BotEventName, number>; listenersCount: number } {
    const events: Record<BotEventName, number> = {
      'user:state_changed': this.count('user:state_changed'),
      'user:language_changed': this.count('user:language_changed'),
      'menu:synced': this.count('menu:synced'),
      'menu:sync_failed': this.count('menu:sync_failed'),
      'bot:reply': this.count('bot:reply'),
    }

    return {
      events,
      listenersCount: this.eventNames().reduce<number>(
        (total, name) => total + this.listenerCount(name),
        0
      ),
    }
  }

  private count(name: BotEventName): number {
    return this.counters.get(name) ?? 0
  }

  reset(): void {
    this.counters.clear()
  }
}

export const botEventBus = new BotEventBus()
export default BotEventBus
