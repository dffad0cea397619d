import type { Context } from 'hono'
import { handleTelegramUpdate, type TelegramDispatcher } from './services'
import { telegramUpdateSchema } from './schema'

export const SECRET_HEADER = 'X-Telegram-Bot-Api-Secret-Token'

/** POST /api/telegram/webhook — receives Telegram update payloads (set via setWebhook). */
export async function webhookHandler(
  c: Context,
  dispatcher: TelegramDispatcher,
  secret: string | undefined
): Promise<Response> {
  if (secret && c.req.header(SECRET_HEADER) !== secret) {
    console.warn('[telegram] webhook call with a bad secret token')
    return c.json({ ok: false }, 401)
  }
  let body: unknown
  try {
    body = await c.req.json()
  } catch {
    return c.json({ ok: false }, 400)
  }
  const parsed = telegramUpdateSchema.safeParse(body)
  if (!parsed.success) return c.json({ ok: false }, 400)

  const update = parsed.data
  console.log('[telegram] webhook update_id=%s', update.update_id)
  await handleTelegramUpdate(dispatcher, update)
  return c.json({ ok: true })
}
