/*
|--------------------------------------------------------------------------
| Routes file
|--------------------------------------------------------------------------
|
| The routes file is used for defining the HTTP routes.
|
*/

import { middleware } from '#start/kernel'
import router from '@adonisjs/core/services/router'
import BotEngine from '#bot/core/bot_engine'
const WebhookController = () => import('#controllers/webhook_controller')
const BotController = () => import('#controllers/bot_controller')

/*
|--------------------------------------------------------------------------
| Route de santé (publique)
|--------------------------------------------------------------------------
*/
router.get('/health', async ({ response }) => {
  const ready = BotEngine.instance?.isReady ?? false

  return response.status(ready ? 200 : 503).send({
    status: ready ? 'ok' : 'starting',
    timestamp: new Date().toISOString(),
  })
})

/*
|--------------------------------------------------------------------------
| Webhook LINE
|--------------------------------------------------------------------------
*/
router.post('/webhook', [WebhookController, 'handle'])

/*
|--------------------------------------------------------------------------
| API V1 - Administration
|--------------------------------------------------------------------------
*/
router
  .group(() => {
    router.get('/status', [BotController, 'getStatus'])
    router.get('/rich-menus', [BotController, 'getRichMenus'])
    router.post('/rich-menus/sync', [BotController, 'syncRichMenus'])
    router.post('/rich-menus/:language', [BotController, 'provisionRichMenu'])
  })
  .prefix('/api/v1/admin')
  .use(middleware.adminToken())
