import env from '#start/env'
import app from '@adonisjs/core/services/app'
import { Secret } from '@adonisjs/core/helpers'
import { defineConfig } from '@adonisjs/core/http'

/**
 * La clé applicative sert au chiffrement et à la signature des valeurs.
 */
export const appKey = new Secret(env.get('APP_KEY'))

/**
 * Configuration du serveur HTTP
 */
export const http = defineConfig({
  generateRequestId: true,
  allowMethodSpoofing: false,

  /**
   * Le webhook LINE n'utilise pas de session, donc pas de cookies signés
   */
  useAsyncLocalStorage: false,

  cookie: {
    domain: '',
    path: '/',
    maxAge: '2h',
    httpOnly: true,
    secure: app.inProduction,
    sameSite: 'lax',
  },
})
