import { z } from 'zod'
import type { Env } from '../../env'
import { HttpError } from '../errors'
import { telegramUpdateSchema, type TelegramUpdate } from '../../api/telegram/schema'

const TELEGRAM_API = 'https://api.telegram.org'

type TokenEnv = Pick<Env, 'TELEGRAM_BOT_TOKEN'>

/** Every Bot API response: { ok, result } or { ok: false, error_code, description }. */
const apiResponseSchema = z.object({
  ok: z.boolean(),
  result: z.unknown(),
  error_code: z.number().optional(),
  description: z.string().optional(),
})

async function call<T extends z.ZodTypeAny>(
  env: TokenEnv,
  method: string,
  body: Record<string, unknown>,
  result: T
): Promise<z.infer<T>> {
  const res = await fetch(`${TELEGRAM_API}/bot${env.TELEGRAM_BOT_TOKEN}/${method}`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  })
  if (!res.ok) {
    const err = await res.text()
    console.error('[telegram] %s failed: %d %s', method, res.status, err)
    throw new HttpError(`Telegram ${method} failed: ${res.status} ${err}`, res.status)
  }
  const data = apiResponseSchema.parse(await res.json())
  if (!data.ok || data.result === undefined) {
    const msg = data.description ?? `${method} returned ok: false`
    // no error_code: treat like a server fault so it stays retryable
    throw new HttpError(`Telegram ${method} failed (${data.error_code ?? '-'}): ${msg}`, data.error_code ?? 500)
  }
  return result.parse(data.result)
}

export async function sendMessage(env: TokenEnv, chatId: number, text: string): Promise<void> {
  await call(env, 'sendMessage', { chat_id: chatId, text }, z.unknown())
}

/** Get current webhook info (for debugging). */
export async function getWebHookInfo(env: TokenEnv): Promise<{ url: string; pendingUpdateCount: number }> {
  const info = await call(
    env,
    'getWebhookInfo',
    {},
    z.object({ url: z.string().default(''), pending_update_count: z.number().default(0) })
  )
  return { url: info.url, pendingUpdateCount: info.pending_update_count }
}

/**
 * Set webhook URL. Telegram only allows ports 443, 80, 88, 8443 (HTTPS).
 * With a secret, Telegram sends it back in X-Telegram-Bot-Api-Secret-Token.
 */
export async function setWebHook(
  env: TokenEnv,
  webhookUrl: string,
  options: { secretToken?: string; maxConnections?: number } = {}
): Promise<void> {
  await call(
    env,
    'setWebhook',
    {
      url: webhookUrl,
      max_connections: options.maxConnections ?? 100,
      secret_token: options.secretToken,
      allowed_updates: ['message'],
    },
    z.boolean()
  )
}

/** getUpdates refuses to run while a webhook is set. */
export async function deleteWebHook(env: TokenEnv): Promise<void> {
  await call(env, 'deleteWebhook', {}, z.boolean())
}

/** Long-poll for updates after `offset`. */
export async function getUpdates(env: TokenEnv, offset: number, timeoutSeconds = 30): Promise<TelegramUpdate[]> {
  return call(
    env,
    'getUpdates',
    { offset, timeout: timeoutSeconds, allowed_updates: ['message'] },
    z.array(telegramUpdateSchema)
  )
}
