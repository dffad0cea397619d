import { Hono } from 'hono'
import { createApi } from './api'
import type { TelegramDispatcher } from './api/telegram/services'
import type { Env } from './env'
import { getWebHookInfo, setWebHook } from './lib/channels/telegram'

export interface AppDeps {
  env: Env
  dispatcher: TelegramDispatcher
  /** overridable for tests */
  telegram?: { setWebHook: typeof setWebHook; getWebHookInfo: typeof getWebHookInfo }
}

export const WEBHOOK_PATH = '/api/telegram/webhook'

export function createApp({ env, dispatcher, telegram = { setWebHook, getWebHookInfo } }: AppDeps) {
  const app = new Hono()

  app.get('/', (c) => c.text('Nutrition bot'))
  app.get('/health', (c) => c.json({ ok: true, mode: env.TELEGRAM_MODE }))

  app.route('/', createApi(dispatcher, env.TELEGRAM_WEBHOOK_SECRET))

  // admin routes are disabled unless ADMIN_SECRET is set
  app.use('/admin/*', async (c, next) => {
    if (!env.ADMIN_SECRET) return c.json({ error: 'Admin routes are disabled' }, 403)
    if (c.req.header('Authorization') !== `Bearer ${env.ADMIN_SECRET}`) return c.json({ error: 'Unauthorized' }, 401)
    await next()
  })

  /** Point Telegram at this server's webhook. */
  app.post('/admin/telegram-set-webhook', async (c) => {
    if (!env.TELEGRAM_WEBHOOK_BASE_URL) return c.json({ error: 'TELEGRAM_WEBHOOK_BASE_URL is not set' }, 400)
    const url = env.TELEGRAM_WEBHOOK_BASE_URL.replace(/\/+$/, '') + WEBHOOK_PATH
    try {
      await telegram.setWebHook(env, url, { secretToken: env.TELEGRAM_WEBHOOK_SECRET })
      return c.json({ ok: true, url })
    } catch (e) {
      console.error('[admin] setWebhook error', e)
      return c.json({ error: String(e) }, 502)
    }
  })

  app.get('/admin/telegram-webhook-info', async (c) => {
    try {
      return c.json({ ok: true, ...(await telegram.getWebHookInfo(env)) })
    } catch (e) {
      console.error('[admin] getWebhookInfo error', e)
      return c.json({ error: String(e) }, 502)
    }
  })

  return app
}
