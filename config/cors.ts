import { defineConfig } from '@adonisjs/cors'

/**
 * Configuration CORS des routes d'administration.
 * Le webhook LINE est appelé de serveur à serveur et n'est pas concerné.
 */
const corsConfig = defineConfig({
  enabled: true,

  /**
   * Origines autorisées pour le tableau de bord d'exploitation
   */
  origin: (requestOrigin) => {
    const allowedOrigins = (process.env.ADMIN_ALLOWED_ORIGINS ?? 'http://localhost:3000')
      .split(',')
      .map((origin) => origin.trim())
      .filter(Boolean)

    return allowedOrigins.includes(requestOrigin)
  },

  methods: ['GET', 'HEAD', 'POST', 'OPTIONS'],

  headers: true,

  exposeHeaders: ['cache-control', 'content-type', 'x-request-id'],

  credentials: false,

  maxAge: 90,
})

export default corsConfig
