import type { Env } from '../../env'
import { deleteWebHook, getUpdates } from '../../lib/channels/telegram'
import { handleTelegramUpdate, type TelegramDispatcher } from './services'

const RETRY_DELAY_MS = 5000

function sleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    const t = setTimeout(resolve, ms)
    signal.addEventListener('abort', () => {
      clearTimeout(t)
      resolve()
    }, { once: true })
  })
}

/** getUpdates loop for running without a public URL. Stops when `signal` aborts. */
export async function pollTelegram(env: Env, dispatcher: TelegramDispatcher, signal: AbortSignal): Promise<void> {
  await deleteWebHook(env)
  console.log('[telegram] polling for updates')
  let offset = 0
  while (!signal.aborted) {
    try {
      const updates = await getUpdates(env, offset)
      for (const update of updates) {
        offset = update.update_id + 1
        await handleTelegramUpdate(dispatcher, update)
      }
    } catch (e) {
      console.error('[telegram] getUpdates failed; retrying in %d ms', RETRY_DELAY_MS, e)
      await sleep(RETRY_DELAY_MS, signal)
    }
  }
}
