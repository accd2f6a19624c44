import app from '@adonisjs/core/services/app'
import logger from '@adonisjs/core/services/logger'
import { readFile, readdir } from 'node:fs/promises'
import { join } from 'node:path'
import botConfig from '#config/bot'
import {
  SUPPORTED_LANGUAGES,
  isSupportedLanguage,
  type LanguageMetadata,
  type SupportedLanguage,
} from '#bot/types/bot_types'
import { KEYWORD_CATEGORIES, type KeywordCategory, type KeywordTable } from '#bot/types/intent_types'

type TranslationValue = string | string[] | TranslationTree
interface TranslationTree {
  [key: string]: TranslationValue
}

function isTranslationValue(value: unknown): value is TranslationValue {
  if (typeof value === 'string') return true
  if (Array.isArray(value)) return value.every((item) => typeof item === 'string')
  return isTranslationTree(value)
}

function isTranslationTree(value: unknown): value is TranslationTree {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false
  return Object.values(value).every(isTranslationValue)
}

export type TranslationParams = Record<string, string | number>

/**
 * Catalogue des langues : métadonnées d'affichage et messages localisés.
 * Les messages sont chargés depuis `resources/locales/<langue>/*.json`.
 */
export default class I18nManager {
  private static instance: I18nManager
  private readonly translations = new Map<string, TranslationTree>()
  private readonly fallbackLanguage: SupportedLanguage = botConfig.general.defaultLanguage
  private readonly languages: Record<SupportedLanguage, LanguageMetadata> =
    botConfig.general.languages
  private loaded = false

  private constructor() {
    // Singleton
  }

  public static getInstance(): I18nManager {
    if (!I18nManager.instance) {
      I18nManager.instance = new I18nManager()
    }
    return I18nManager.instance
  }

  /**
   * Charge les traductions de toutes les langues prises en charge
   */
  public async initialize(): Promise<void> {
    if (this.loaded) return
    await this.loadAllTranslations()
    this.loaded = true
  }

  private async loadAllTranslations(): Promise<void> {
    for (const language of SUPPORTED_LANGUAGES) {
      const languageDir = app.makePath('resources', 'locales', language)
      const files = await this.scanJsonFiles(languageDir)

      for (const file of files) {
        const content = await readFile(join(languageDir, `${file}.json`), 'utf-8')
        const parsed: unknown = JSON.parse(content)

        if (!isTranslationTree(parsed)) {
          throw new Error(`Invalid translation file ${language}/${file}.json`)
        }

        this.translations.set(`${language}.${file}`, parsed)
      }

      logger.debug({ language, files }, 'Translation files loaded')
    }

    logger.info({ totalFiles: this.translations.size }, 'I18nManager initialized successfully')
  }

  private async scanJsonFiles(directory: string): Promise<string[]> {
    try {
      const files = await readdir(directory)
      return files
        .filter((file) => file.endsWith('.json'))
        .map((file) => file.replace(/\.json$/, ''))
        .sort()
    } catch (error) {
      logger.warn({ directory, error: String(error) }, 'Language directory not found')
      return []
    }
  }

  /**
   * Traduit une clé avec paramètres optionnels.
   * Repli sur la langue par défaut, puis `[MISSING: key]`.
   */
  public t(key: string, params: TranslationParams = {}, language?: SupportedLanguage): string {
    const translation =
      this.getTranslation(key, language ?? this.fallbackLanguage) ??
      this.getTranslation(key, this.fallbackLanguage)

    if (typeof translation !== 'string' && !Array.isArray(translation)) {
      return `[MISSING: ${key}]`
    }

    return this.interpolate(translation, params)
  }

  /**
   * Liste de chaînes (mots-clés, lignes d'aide). Pas de repli : une langue
   * sans liste renvoie une liste vide.
   */
  public tList(key: string, language: SupportedLanguage): string[] {
    const value = this.getTranslation(key, language)
    if (Array.isArray(value)) return [...value]
    if (typeof value === 'string') return [value]
    return []
  }

  public hasTranslation(key: string, language: SupportedLanguage): boolean {
    return this.getTranslation(key, language) !== null
  }

  private getTranslation(key: string, language: SupportedLanguage): TranslationValue | null {
    const [file, ...keyParts] = key.split('.')
    const translations = this.translations.get(`${language}.${file}`)

    if (!translations) {
      return null
    }

    let current: TranslationValue = translations
    for (const part of keyParts) {
      // clés propres uniquement : `constructor`, `toString`... n'en sont pas
      if (!isTranslationTree(current) || !Object.hasOwn(current, part)) {
        return null
      }
      current = current[part]
    }

    return current
  }

  private interpolate(text: string | string[], params: TranslationParams): string {
    const finalText = Array.isArray(text) ? text.join('\n') : text

    return finalText.replace(/\{(\w+)\}/g, (match, param: string) => {
      const value = params[param]
      return value === undefined ? match : String(value)
    })
  }

  /**
   * Métadonnées des langues, dans l'ordre du catalogue
   */
  public getLanguages(): LanguageMetadata[] {
    return SUPPORTED_LANGUAGES.map((code) => this.languages[code])
  }

  public getLanguage(code: SupportedLanguage): LanguageMetadata {
    return this.languages[code]
  }


  /**
   * Résout un code ou un alias (`english`, `bahasa`) vers un code pris en charge
   */
  public resolveLanguage(input: string): SupportedLanguage | null {
    const normalized = input.trim().toLowerCase()
    if (isSupportedLanguage(normalized)) return normalized

    const match = this.getLanguages().find((language) =>
      language.aliases.some((alias) => alias.toLowerCase() === normalized)
    )
    return match ? match.code : null
  }

  /**
   * Liste lisible des codes valides, ex. `id (Bahasa Indonesia), zh (中文)`
   */
  public describeLanguages(): string {
    return this.getLanguages()
      .map((language) => `${language.code} (${language.nativeName})`)
      .join(', ')
  }

  /**
   * Table des mots-clés de classification, par langue et par catégorie
   */
  public getKeywordTable(): KeywordTable {
    const table: KeywordTable = new Map()

    for (const language of SUPPORTED_LANGUAGES) {
      const categories = new Map(
        KEYWORD_CATEGORIES.map((category): [KeywordCategory, string[]] => [
          category,
          this.tList(`keywords.${category}`, language).map((keyword) => keyword.toLowerCase()),
        ])
      )
      table.set(language, categories)
    }

    return table
  }

  public getStats(): { totalFiles: number; languages: SupportedLanguage[] } {
    return {
      totalFiles: this.translations.size,
      languages: [...SUPPORTED_LANGUAGES],
    }
  }
}
