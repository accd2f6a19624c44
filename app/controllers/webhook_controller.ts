import type { HttpContext } from '@adonisjs/core/http'
import logger from '@adonisjs/core/services/logger'
import { validateSignature } from '@line/bot-sdk'
import { v4 as uuidv4 } from 'uuid'
import botConfig from '#config/bot'
import BotEngine from '#bot/core/bot_engine'
import { orderingKey, toIncomingMessage } from '#bot/core/adapters/line_event_mapper'
import { lineWebhookValidator } from '#validators/webhook_validator'
import { ResponseHelper } from '#helpers/response_helper'
import { ErrorCodes } from '#constants/response_constants'
import { BotNotReadyException } from '#exceptions/bot_exceptions'
import type { IncomingMessage } from '#bot/types/bot_types'

export default class WebhookController {
  /**
   * POST /webhook : événements LINE signés par `x-line-signature`
   */
  async handle({ request, response }: HttpContext) {
    const signature = request.header('x-line-signature')
    const rawBody = request.raw()

    if (
      !signature ||
      !rawBody ||
      !validateSignature(rawBody, botConfig.line.channelSecret, signature)
    ) {
      return response.unauthorized(
        ResponseHelper.error('Invalid webhook signature', ErrorCodes.WEBHOOK_SIGNATURE_INVALID)
      )
    }

    const engine = BotEngine.instance
    if (!engine || !engine.isReady) {
      throw new BotNotReadyException()
    }

    const payload = await lineWebhookValidator.validate(request.body())
    const traceId = uuidv4()
    const messages = payload.events.flatMap((event) => toIncomingMessage(event) ?? [])

    logger.info(
      { traceId, received: payload.events.length, handled: messages.length },
      'LINE webhook received'
    )

    const lanes = new Map<string, IncomingMessage[]>()
    for (const message of messages) {
      const key = orderingKey(message)
      lanes.set(key, [...(lanes.get(key) ?? []), message])
    }

    // Une file par source, traitée dans l'ordre ; les sources en parallèle
    const replies = await Promise.all(
      [...lanes.values()].map(async (lane) => {
        let count = 0
        for (const message of lane) {
          if (await engine.handleEvent(message)) count++
        }
        return count
      })
    )

    return response.ok(
      ResponseHelper.success(
        {
          traceId,
          received: payload.events.length,
          replied: replies.reduce((total, count) => total + count, 0),
        },
        'Webhook processed'
      )
    )
  }
}
