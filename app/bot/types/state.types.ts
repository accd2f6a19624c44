import type { BotUserRecord, SupportedLanguage } from './bot_types.js'

/**
 * Axe langue : aucun choix avant le premier contact
 */
export enum LanguageState {
  NO_PREFERENCE = 'no_preference',
  SELECTED = 'language_selected',
}

/**
 * Axe menu : le menu lié correspond-il à la langue ?
 */
export enum MenuState {
  SYNCED = 'menu_synced',
  STALE = 'menu_stale',
}

/**
 * Déclencheurs de transition
 */
export enum StateTrigger {
  FIRST_CONTACT = 'first_contact',
  EXPLICIT_LANGUAGE = 'explicit_language',
  MENU_SYNCED = 'menu_synced',
  CONSISTENCY_VIOLATION = 'consistency_violation',
}

export interface UserStateSnapshot {
  language: LanguageState
  menu: MenuState
}

/**
 * Utilisateur résolu pour un message entrant
 */
export interface ResolvedUser {
  record: BotUserRecord
  firstContact: boolean
  menu: MenuState
}

export interface StateTransition {
  userId: string
  trigger: StateTrigger
  from: UserStateSnapshot
  to: UserStateSnapshot
  language: SupportedLanguage
  timestamp: Date
}

/**
 * Règles de transition : état d'arrivée autorisé pour chaque déclencheur
 */
export const STATE_TRANSITIONS: Record<
  StateTrigger,
  { from: LanguageState[]; to: UserStateSnapshot }
> = {
  [StateTrigger.FIRST_CONTACT]: {
    from: [LanguageState.NO_PREFERENCE],
    to: { language: LanguageState.SELECTED, menu: MenuState.STALE },
  },
  [StateTrigger.EXPLICIT_LANGUAGE]: {
    from: [LanguageState.NO_PREFERENCE, LanguageState.SELECTED],
    to: { language: LanguageState.SELECTED, menu: MenuState.STALE },
  },
  [StateTrigger.MENU_SYNCED]: {
    from: [LanguageState.SELECTED],
    to: { language: LanguageState.SELECTED, menu: MenuState.SYNCED },
  },
  [StateTrigger.CONSISTENCY_VIOLATION]: {
    from: [LanguageState.SELECTED],
    to: { language: LanguageState.SELECTED, menu: MenuState.STALE },
  },
}

/**
 * Vérifie si une transition est valide
 */
export function isValidTransition(trigger: StateTrigger, from: UserStateSnapshot): boolean {
  return STATE_TRANSITIONS[trigger].from.includes(from.language)
}
