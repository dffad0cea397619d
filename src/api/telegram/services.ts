import type { ConversationEngine } from '../../lib/conversation/conversation'
import { RecentIds } from '../../lib/utils/dedupe'
import { KeyedQueue } from '../../lib/utils/keyedQueue'
import { isTransient, withRetry, type RetryOptions } from '../../lib/utils/retry'
import type { TelegramUpdate } from './schema'

export const TEXT_ONLY_REPLY = 'I only understand text messages. Send a food name, or /help.'
export const FAILURE_REPLY = 'Something went wrong; try again.'

export interface TelegramDeps {
  conversation: ConversationEngine
  send: (chatId: number, text: string) => Promise<void>
  /** reply with the user's own text and touch nothing else */
  echoOnly?: boolean
  /** retry options for sends; tests pass { initialMs: 0 }. Client errors are never retried. */
  retry?: Omit<RetryOptions, 'shouldRetry'>
}

/** Per-process dispatcher state: which updates were seen, and the per-chat queue. */
export interface TelegramDispatcher extends TelegramDeps {
  seen: RecentIds
  queue: KeyedQueue
}

export function createDispatcher(deps: TelegramDeps): TelegramDispatcher {
  return { ...deps, seen: new RecentIds(), queue: new KeyedQueue() }
}

/**
 * Handle one Telegram update. Redelivered update ids are dropped. Messages from one
 * chat run strictly in order and their replies are sent in order before the next
 * message from that chat is handled.
 */
export async function handleTelegramUpdate(d: TelegramDispatcher, update: TelegramUpdate): Promise<void> {
  if (!d.seen.add(update.update_id)) {
    console.log('[telegram] duplicate update_id=%s ignored', update.update_id)
    return
  }
  const msg = update.message
  if (!msg) return

  const chatId = msg.chat.id
  const reply = (text: string) =>
    withRetry(() => d.send(chatId, text), { ...d.retry, shouldRetry: isTransient }).catch((e) =>
      console.error('[telegram] sendMessage', e)
    )

  const text = msg.text?.trim() ?? ''
  if (!text) {
    await reply(TEXT_ONLY_REPLY)
    return
  }

  if (d.echoOnly) {
    await reply(text)
    return
  }

  await d.queue.run(String(chatId), async () => {
    let replies: string[]
    try {
      replies = await d.conversation.handle(String(chatId), text, new Date(msg.date * 1000))
    } catch (e) {
      console.error('[telegram] conversation error', e)
      replies = [FAILURE_REPLY]
    }
    for (const r of replies) await reply(r)
  })
}
