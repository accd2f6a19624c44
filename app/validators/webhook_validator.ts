import vine from '@vinejs/vine'

const sourceSchema = vine.object({
  type: vine.enum(['user', 'group', 'room']),
  userId: vine.string().optional(),
  groupId: vine.string().optional(),
  roomId: vine.string().optional(),
})

/**
 * Événement LINE réduit aux champs utilisés. Les événements d'autres types
 * passent la validation et sont ignorés par le contrôleur.
 */
const eventSchema = vine.object({
  type: vine.string(),
  timestamp: vine.number(),
  replyToken: vine.string().optional(),
  source: sourceSchema.optional(),
  message: vine
    .object({
      id: vine.string(),
      type: vine.string(),
      text: vine.string().optional(),
    })
    .optional(),
  postback: vine
    .object({
      data: vine.string(),
    })
    .optional(),
  deliveryContext: vine
    .object({
      isRedelivery: vine.boolean(),
    })
    .optional(),
})

export const lineWebhookValidator = vine.compile(
  vine.object({
    destination: vine.string().optional(),
    events: vine.array(eventSchema),
  })
)
