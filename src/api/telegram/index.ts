import { Hono } from 'hono'
import { webhookHandler } from './routes'
import type { TelegramDispatcher } from './services'

export function createTelegramRouter(dispatcher: TelegramDispatcher, webhookSecret?: string) {
  return new Hono()
    .get('/webhook', (c) => c.text('Nutrition bot webhook OK — POST here from Telegram'))
    .post('/webhook', (c) => webhookHandler(c, dispatcher, webhookSecret))
}
