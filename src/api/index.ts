import { Hono } from 'hono'
import { createTelegramRouter } from './telegram'
import type { TelegramDispatcher } from './telegram/services'

export function createApi(dispatcher: TelegramDispatcher, webhookSecret?: string) {
  return new Hono().basePath('/api').route('/telegram', createTelegramRouter(dispatcher, webhookSecret))
}
