import ConversationStore from '#bot/core/managers/conversation_store'
import UserLockManager from '#bot/core/managers/user_lock_manager'
import MenuRegistry from '#bot/core/rich_menu/menu_registry'
import MenuSynchronizer from '#bot/core/rich_menu/menu_synchronizer'
import UserStateMachine from '#bot/core/state/user_state_machine'
import IntentClassifier from '#bot/core/routing/intent_classifier'
import ResponseRouter from '#bot/core/routing/response_router'
import { SUPPORTED_LANGUAGES, type SupportedLanguage } from '#bot/types/bot_types'
import type { DetectionResult } from '#bot/contracts/platform.contract'
import type { RichMenuArtifact } from '#bot/types/rich_menu_types'
import {
  FixedLanguageDetector,
  InMemoryBotRepository,
  RecordingRichMenuPlatform,
  ScriptedAIBackend,
} from './fakes.js'

export const BOT_NAME = 'Pelita'

export const EMERGENCY_CONTACTS = [
  { key: 'police', number: '110' },
  { key: 'fire_ambulance', number: '119' },
]

/**
 * Identifiant de l'artefact de test d'une langue : `rm-<langue>`
 */
export function artifactFor(language: SupportedLanguage): RichMenuArtifact {
  return {
    artifactId: `rm-${language}`,
    language,
    name: `pelita-${language}-v1`,
    layoutVersion: 1,
  }
}

export function frozenRegistry(): MenuRegistry {
  const registry = new MenuRegistry()
  registry.populate(SUPPORTED_LANGUAGES.map(artifactFor), ['rm-retired'])
  registry.freeze()
  return registry
}

export interface BotStackOptions {
  detected?: DetectionResult | Error
  atomic?: boolean
  historyWindow?: number
}

/**
 * Assemble la chaîne routeur → machine à états → synchroniseur sur des
 * collaborateurs en mémoire
 */
export function buildBotStack(options: BotStackOptions = {}) {
  const repository = new InMemoryBotRepository()
  const platform = new RecordingRichMenuPlatform({ supportsAtomicReassign: options.atomic ?? true })
  const detector = new FixedLanguageDetector(options.detected ?? 'unknown')
  const ai = new ScriptedAIBackend()
  const locks = new UserLockManager()
  const registry = frozenRegistry()
  const conversations = new ConversationStore(repository, options.historyWindow ?? 10)

  const synchronizer = new MenuSynchronizer(repository, registry, platform, locks, {
    platformTimeoutMs: 1000,
    concurrency: 2,
    pageSize: 2,
  })
  const stateMachine = new UserStateMachine(repository, registry, detector, synchronizer, {
    defaultLanguage: 'en',
    detectionTimeoutMs: 1000,
  })
  const router = new ResponseRouter(
    new IntentClassifier(),
    stateMachine,
    conversations,
    ai,
    locks,
    { botName: BOT_NAME, defaultLanguage: 'en', emergencyContacts: EMERGENCY_CONTACTS }
  )

  return {
    repository,
    platform,
    detector,
    ai,
    locks,
    registry,
    conversations,
    synchronizer,
    stateMachine,
    router,
  }
}
