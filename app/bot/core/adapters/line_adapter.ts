import logger from '@adonisjs/core/services/logger'
import { messagingApi } from '@line/bot-sdk'
import type { ChannelAdapter, MessageChannel, Reply } from '#bot/types/bot_types'
import { UpstreamErrorException } from '#exceptions/bot_exceptions'
import { withTimeout } from '#bot/utils/timeout'

export interface LineAdapterConfig {
  channelAccessToken: string
  maxMessageLength: number
  timeoutMs: number
}

// Limites de l'API LINE
const MAX_QUICK_REPLY_ITEMS = 13
const MAX_QUICK_REPLY_LABEL = 20

// Coupe par point de code pour ne pas séparer une paire de substitution
function truncate(text: string, max: number): string {
  const codePoints = Array.from(text)
  return codePoints.length > max ? codePoints.slice(0, max).join('') : text
}

/**
 * Envoi des réponses sur LINE via le jeton de réponse du webhook
 */
export default class LineAdapter implements ChannelAdapter {
  public readonly channel: MessageChannel = 'line'
  private readonly client: messagingApi.MessagingApiClient

  constructor(
    private readonly config: LineAdapterConfig,
    client?: messagingApi.MessagingApiClient
  ) {
    this.client =
      client ??
      new messagingApi.MessagingApiClient({ channelAccessToken: config.channelAccessToken })
  }

  public async reply(replyToken: string, reply: Reply): Promise<void> {
    const message = this.buildMessage(reply)

    try {
      await withTimeout('channel', this.config.timeoutMs, () =>
        this.client.replyMessage({ replyToken, messages: [message] })
      )
    } catch (error) {
      throw UpstreamErrorException.wrap('channel', error)
    }

    logger.debug({ source: reply.source, language: reply.language }, 'LINE reply sent')
  }

  public buildMessage(reply: Reply): messagingApi.TextMessage {
    const message: messagingApi.TextMessage = {
      type: 'text',
      text: truncate(reply.text, this.config.maxMessageLength),
    }

    if (reply.quickReplies && reply.quickReplies.length > 0) {
      message.quickReply = {
        items: reply.quickReplies.slice(0, MAX_QUICK_REPLY_ITEMS).map((option) => {
          const action: messagingApi.MessageAction = {
            type: 'message',
            label: truncate(option.label, MAX_QUICK_REPLY_LABEL),
            text: option.text,
          }
          return { type: 'action', action }
        }),
      }
    }

    return message
  }
}
