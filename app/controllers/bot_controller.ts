import type { HttpContext } from '@adonisjs/core/http'
import BotEngine from '#bot/core/bot_engine'
import { ResponseHelper } from '#helpers/response_helper'
import { provisionLanguageValidator } from '#validators/admin_validator'
import { BotNotReadyException } from '#exceptions/bot_exceptions'

/**
 * Routes d'administration du bot (protégées par `x-admin-token`)
 */
export default class BotController {
  async getStatus({ response }: HttpContext) {
    const engine = this.engine()

    return response.json(
      ResponseHelper.success(
        {
          ...engine.getStats(),
          system: {
            uptime: process.uptime(),
            nodeVersion: process.version,
          },
        },
        'Bot status retrieved successfully'
      )
    )
  }

  async getRichMenus({ response }: HttpContext) {
    return response.json(
      ResponseHelper.success(this.engine().getRegistrySnapshot(), 'Rich menu registry retrieved')
    )
  }

  async syncRichMenus({ response }: HttpContext) {
    const summary = await this.engine().syncAllMenus()
    return response.json(ResponseHelper.success(summary, 'Rich menus synchronized'))
  }

  async provisionRichMenu({ params, response }: HttpContext) {
    const { language } = await provisionLanguageValidator.validate(params)
    const artifact = await this.engine().provisionLanguage(language)
    return response.json(ResponseHelper.success(artifact, 'Rich menu provisioned'))
  }

  private engine(): BotEngine {
    const engine = BotEngine.instance
    if (!engine || !engine.isReady) {
      throw new BotNotReadyException()
    }
    return engine
  }
}
