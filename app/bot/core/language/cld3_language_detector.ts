import logger from '@adonisjs/core/services/logger'
import { loadModule } from 'cld3-asm'
import { isSupportedLanguage } from '#bot/types/bot_types'
import type { DetectionResult, LanguageDetector } from '#bot/contracts/platform.contract'

type CldFactory = Awaited<ReturnType<typeof loadModule>>
type CldIdentifier = ReturnType<CldFactory['create']>

const MAX_INPUT_BYTES = 512

/**
 * Codes du détecteur ramenés aux langues prises en charge
 */
const CODE_ALIASES: Record<string, string> = {
  ms: 'id',
  in: 'id',
}

export interface Cld3DetectorOptions {
  minConfidence: number
  minTextLength: number
}

/**
 * Détection de langue hors ligne (CLD3 compilé en WebAssembly).
 * Le module est chargé au premier appel puis réutilisé.
 */
export default class Cld3LanguageDetector implements LanguageDetector {
  readonly name = 'cld3'
  private identifierPromise: Promise<CldIdentifier> | null = null

  constructor(private readonly options: Cld3DetectorOptions) {}

  async detect(text: string): Promise<DetectionResult> {
    const input = text.trim()
    if (input.length < this.options.minTextLength) {
      return 'unknown'
    }

    const identifier = await this.getIdentifier()
    const result = identifier.findLanguage(input)
    const code = normalizeCode(String(result.language))

    if (!result.is_reliable && result.probability < this.options.minConfidence) {
      logger.debug({ code, probability: result.probability }, 'Language detection not confident')
      return 'unknown'
    }

    return isSupportedLanguage(code) ? code : 'unknown'
  }

  private getIdentifier(): Promise<CldIdentifier> {
    if (!this.identifierPromise) {
      this.identifierPromise = loadModule().then((factory) => factory.create(0, MAX_INPUT_BYTES))
      // Nouvel essai au prochain appel si le chargement échoue
      this.identifierPromise.catch(() => {
        this.identifierPromise = null
      })
    }
    return this.identifierPromise
  }
}

/**
 * `zh-Hant` → `zh`, `ms` → `id`
 */
export function normalizeCode(raw: string): string {
  const base = raw.trim().toLowerCase().split(/[-_]/)[0]
  return CODE_ALIASES[base] ?? base
}
