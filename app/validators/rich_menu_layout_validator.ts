import vine from '@vinejs/vine'

const boundsSchema = vine.object({
  x: vine.number().withoutDecimals().min(0),
  y: vine.number().withoutDecimals().min(0),
  width: vine.number().withoutDecimals().min(1),
  height: vine.number().withoutDecimals().min(1),
})

/**
 * Validator for the shared rich menu layout file
 */
export const richMenuLayoutValidator = vine.compile(
  vine.object({
    version: vine.number().withoutDecimals().min(1),
    size: vine.object({
      width: vine.number().withoutDecimals().min(800).max(2500),
      height: vine.number().withoutDecimals().min(250).max(1686),
    }),
    selected: vine.boolean(),
    buttons: vine
      .array(
        vine.object({
          id: vine
            .string()
            .trim()
            .regex(/^[a-z_]+$/),
          postback: vine.string().trim().minLength(1).maxLength(300),
          bounds: boundsSchema,
        })
      )
      .minLength(1)
      .maxLength(20), // limite LINE
  })
)
