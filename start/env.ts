/*
|--------------------------------------------------------------------------
| Environment variables service
|--------------------------------------------------------------------------
|
| The `Env.create` method creates an instance of the Env service. The
| service validates the environment variables and also cast values
| to JavaScript data types.
|
*/

import { Env } from '@adonisjs/core/env'

export default await Env.create(new URL('../', import.meta.url), {
  NODE_ENV: Env.schema.enum(['development', 'production', 'test'] as const),
  PORT: Env.schema.number(),
  APP_KEY: Env.schema.string(),
  HOST: Env.schema.string({ format: 'host' }),
  LOG_LEVEL: Env.schema.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace'] as const),

  /*
  |----------------------------------------------------------
  | Variables for configuring database connection
  |----------------------------------------------------------
  */
  DB_CONNECTION: Env.schema.enum.optional(['pg', 'sqlite'] as const),
  DB_HOST: Env.schema.string.optional({ format: 'host' }),
  DB_PORT: Env.schema.number.optional(),
  DB_USER: Env.schema.string.optional(),
  DB_PASSWORD: Env.schema.string.optional(),
  DB_DATABASE: Env.schema.string.optional(),

  /*
  |----------------------------------------------------------
  | Variables for configuring the LINE channel
  |----------------------------------------------------------
  */
  LINE_CHANNEL_SECRET: Env.schema.string.optional(),
  LINE_CHANNEL_ACCESS_TOKEN: Env.schema.string.optional(),

  /*
  |----------------------------------------------------------
  | Variables for configuring the AI backend
  |----------------------------------------------------------
  */
  ANTHROPIC_API_KEY: Env.schema.string.optional(),
  ANTHROPIC_MODEL: Env.schema.string.optional(),

  /*
  |----------------------------------------------------------
  | Variables for configuring bot
  |----------------------------------------------------------
  */
  BOT_ENABLED: Env.schema.boolean.optional(),
  BOT_DEFAULT_LANGUAGE: Env.schema.string.optional(),
  BOT_HISTORY_WINDOW: Env.schema.number.optional(),
  BOT_AI_TIMEOUT_MS: Env.schema.number.optional(),
  BOT_DETECTION_TIMEOUT_MS: Env.schema.number.optional(),
  BOT_PLATFORM_TIMEOUT_MS: Env.schema.number.optional(),
  BOT_RICH_MENU_PREFIX: Env.schema.string.optional(),

  // Administration
  ADMIN_TOKEN: Env.schema.string.optional(),
})
