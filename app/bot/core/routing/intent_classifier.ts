import CommandManager from '#bot/core/managers/command_manager'
import I18nManager from '#bot/core/managers/i18n_manager'
import { SUPPORTED_LANGUAGES, type SupportedLanguage } from '#bot/types/bot_types'
import {
  KEYWORD_CATEGORIES,
  type IntentCategory,
  type KeywordCategory,
  type KeywordIntent,
  type KeywordTable,
} from '#bot/types/intent_types'

interface KeywordMatcher {
  keyword: string
  matches(text: string): boolean
}

/**
 * Écritures sans espaces entre les mots : correspondance en sous-chaîne simple
 */
const UNSPACED_SCRIPT = /[\p{Script=Han}\p{Script=Hiragana}\p{Script=Katakana}\p{Script=Thai}]/u

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}

function normalize(text: string): string {
  return text.normalize('NFC').trim().toLowerCase()
}

function buildMatcher(rawKeyword: string): KeywordMatcher {
  const keyword = normalize(rawKeyword)

  if (UNSPACED_SCRIPT.test(keyword)) {
    return { keyword, matches: (text) => text.includes(keyword) }
  }

  const pattern = new RegExp(`(?<![\\p{L}\\p{N}])${escapeRegExp(keyword)}(?![\\p{L}\\p{N}])`, 'u')
  return { keyword, matches: (text) => pattern.test(text) }
}

/**
 * Classe un message brut dans une catégorie d'intention.
 *
 * Ordre de priorité : commande, urgence, salutation, remerciement,
 * au revoir, demande d'aide, puis requête libre. Les mots-clés de toutes
 * les langues sont consultés ; quand plusieurs langues correspondent, la
 * langue enregistrée de l'utilisateur est rapportée en premier, puis
 * l'ordre du catalogue.
 */
export default class IntentClassifier {
  private readonly matchers = new Map<SupportedLanguage, Map<KeywordCategory, KeywordMatcher[]>>()

  constructor(
    private readonly catalog: I18nManager = I18nManager.getInstance(),
    private readonly commands: CommandManager = CommandManager.getInstance(),
    keywords: KeywordTable = catalog.getKeywordTable()
  ) {
    for (const [language, categories] of keywords) {
      const compiled = new Map<KeywordCategory, KeywordMatcher[]>()
      for (const [category, list] of categories) {
        compiled.set(
          category,
          list.filter((keyword) => keyword.trim().length > 0).map(buildMatcher)
        )
      }
      this.matchers.set(language, compiled)
    }
  }

  public classify(rawText: string, preferredLanguage?: SupportedLanguage): IntentCategory {
    const command = this.detectCommand(rawText)
    if (command) {
      return command
    }

    const text = normalize(rawText)
    if (text.length === 0) {
      return { kind: 'query' }
    }

    for (const category of KEYWORD_CATEGORIES) {
      const match = this.matchCategory(text, category, preferredLanguage)
      if (match) {
        return match
      }
    }

    return { kind: 'query' }
  }

  private detectCommand(rawText: string): IntentCategory | null {
    const parsed = this.commands.detectCommand(rawText, 'direct')
    if (!parsed) {
      return null
    }

    switch (parsed.name) {
      case 'lang': {
        if (parsed.argument === null) {
          return { kind: 'command', command: 'lang', argument: null, target: null, invalidArgument: false }
        }
        const target = this.catalog.resolveLanguage(parsed.argument)
        return {
          kind: 'command',
          command: 'lang',
          argument: parsed.argument,
          target,
          invalidArgument: target === null,
        }
      }
      case 'help':
      case 'emergency':
      case 'clear':
        return {
          kind: 'command',
          command: parsed.name,
          argument: parsed.argument,
          invalidArgument: false,
        }
      case 'translate':
        return null
    }
  }

  private matchCategory(
    text: string,
    category: KeywordCategory,
    preferredLanguage?: SupportedLanguage
  ): KeywordIntent | null {
    for (const language of this.languageOrder(preferredLanguage)) {
      const matcher = this.matchers
        .get(language)
        ?.get(category)
        ?.find((candidate) => candidate.matches(text))

      if (matcher) {
        return { kind: category, matchedLanguage: language, keyword: matcher.keyword }
      }
    }
    return null
  }

  private languageOrder(preferredLanguage?: SupportedLanguage): SupportedLanguage[] {
    if (!preferredLanguage) {
      return [...SUPPORTED_LANGUAGES]
    }
    return [preferredLanguage, ...SUPPORTED_LANGUAGES.filter((code) => code !== preferredLanguage)]
  }
}
