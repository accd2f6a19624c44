import type { SupportedLanguage } from './bot_types.js'

/**
 * Catégories détectées par mots-clés, par ordre de priorité
 */
export const KEYWORD_CATEGORIES = [
  'emergency',
  'greeting',
  'thanks',
  'goodbye',
  'help_request',
] as const

export type KeywordCategory = (typeof KEYWORD_CATEGORIES)[number]

export type KeywordTable = Map<SupportedLanguage, Map<KeywordCategory, string[]>>

export type DirectCommandName = 'lang' | 'help' | 'emergency' | 'clear'

/**
 * `/lang [code]` : `target` est renseigné quand l'argument est valide,
 * `invalidArgument` quand un argument est fourni mais inconnu.
 */
export interface LangCommandIntent {
  kind: 'command'
  command: 'lang'
  argument: string | null
  target: SupportedLanguage | null
  invalidArgument: boolean
}

export interface SimpleCommandIntent {
  kind: 'command'
  command: Exclude<DirectCommandName, 'lang'>
  argument: string | null
  invalidArgument: false
}

export type CommandIntent = LangCommandIntent | SimpleCommandIntent

export interface KeywordIntent {
  kind: KeywordCategory
  matchedLanguage: SupportedLanguage
  keyword: string
}

export interface QueryIntent {
  kind: 'query'
}

/**
 * Intention d'un message entrant, filtrée exhaustivement par le routeur
 */
export type IntentCategory = CommandIntent | KeywordIntent | QueryIntent

export type IntentKind = IntentCategory['kind']

/**
 * Résultat de l'analyse syntaxique d'une commande préfixée
 */
export interface ParsedCommand<Name extends string = string> {
  name: Name
  token: string
  argument: string | null
}
