import type { Infer } from '@vinejs/vine/types'
import type { lineWebhookValidator } from '#validators/webhook_validator'
import type { IncomingMessage } from '#bot/types/bot_types'

export type LineWebhookPayload = Infer<typeof lineWebhookValidator>
export type LineWebhookEvent = LineWebhookPayload['events'][number]

/**
 * Convertit un événement LINE validé en message normalisé. `null` pour
 * les événements non traités (suivi, image, événement sans jeton de
 * réponse).
 */
export function toIncomingMessage(event: LineWebhookEvent): IncomingMessage | null {
  const source = event.source
  if (!source?.userId || !event.replyToken) {
    return null
  }

  const groupId = source.groupId ?? source.roomId
  const scope = source.type === 'user' ? 'direct' : 'group'
  const base = {
    channel: 'line' as const,
    scope,
    userId: source.userId,
    replyToken: event.replyToken,
    timestamp: new Date(event.timestamp),
    ...(scope === 'group' && groupId ? { groupId } : {}),
  } satisfies Omit<IncomingMessage, 'content' | 'messageType'>

  if (event.type === 'message' && event.message?.type === 'text' && event.message.text) {
    return { ...base, content: event.message.text, messageType: 'text' }
  }

  if (event.type === 'postback' && event.postback) {
    return { ...base, content: event.postback.data, messageType: 'postback' }
  }

  return null
}

/**
 * Clé d'ordonnancement : les événements d'une même source sont traités
 * dans l'ordre de réception
 */
export function orderingKey(message: IncomingMessage): string {
  return message.groupId ? `group:${message.groupId}` : `user:${message.userId}`
}
