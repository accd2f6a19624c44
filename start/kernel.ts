/*
|--------------------------------------------------------------------------
| HTTP kernel file
|--------------------------------------------------------------------------
|
| Enregistre le gestionnaire d'erreurs et les middleware HTTP.
|
*/

import router from '@adonisjs/core/services/router'
import server from '@adonisjs/core/services/server'

server.errorHandler(() => import('#exceptions/handler'))

/**
 * Middleware exécutés pour chaque requête HTTP, même sans route
 */
server.use([() => import('@adonisjs/cors/cors_middleware')])

/**
 * Middleware exécutés pour les requêtes dont la route existe
 */
router.use([() => import('@adonisjs/core/bodyparser_middleware')])

/**
 * Middleware nommés, à appliquer explicitement sur les routes
 */
export const middleware = router.named({
  adminToken: () => import('#middleware/admin_token_middleware'),
})
