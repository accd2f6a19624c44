import { timingSafeEqual } from 'node:crypto'
import type { HttpContext } from '@adonisjs/core/http'
import type { NextFn } from '@adonisjs/core/types/http'
import botConfig from '#config/bot'
import { ResponseHelper } from '#helpers/response_helper'
import { ErrorCodes } from '#constants/response_constants'

/**
 * Protège les routes d'administration par le jeton `x-admin-token`.
 * Sans jeton configuré, toutes les requêtes sont refusées.
 */
export default class AdminTokenMiddleware {
  async handle(ctx: HttpContext, next: NextFn) {
    const { request, response } = ctx
    const token = request.header('x-admin-token')

    if (!token) {
      return response.unauthorized(
        ResponseHelper.error('Missing admin token', ErrorCodes.ADMIN_TOKEN_MISSING)
      )
    }

    if (!this.matches(token, botConfig.admin.token)) {
      return response.forbidden(
        ResponseHelper.error('Invalid admin token', ErrorCodes.ADMIN_TOKEN_INVALID)
      )
    }

    await next()
  }

  private matches(candidate: string, expected: string): boolean {
    if (!expected) return false
    const a = Buffer.from(candidate)
    const b = Buffer.from(expected)
    return a.length === b.length && timingSafeEqual(a, b)
  }
}
