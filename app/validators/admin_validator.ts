import vine from '@vinejs/vine'
import { SUPPORTED_LANGUAGES } from '#bot/types/bot_types'

/**
 * Langue d'un menu riche à (re)créer
 */
export const provisionLanguageValidator = vine.compile(
  vine.object({
    language: vine.enum(SUPPORTED_LANGUAGES),
  })
)
