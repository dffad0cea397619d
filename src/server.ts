import 'dotenv/config'
import { serve } from '@hono/node-server'
import { pollTelegram } from './api/telegram/polling'
import { createDispatcher } from './api/telegram/services'
import { isEchoOnly, loadEnv, type Env } from './env'
import { createApp } from './index'
import { SheetsClient, SheetsTrackerMirror } from './lib/api/sheets'
import { sendMessage } from './lib/channels/telegram'
import { ConversationEngine } from './lib/conversation/conversation'
import { loadCatalog } from './lib/food/catalog'
import { NutritionLedger, type LedgerListener } from './lib/ledger/ledger'
import { JsonFileLedgerStore, MemoryLedgerStore, type LedgerStore } from './lib/ledger/store'
import { MemorySessionStore } from './lib/session/store'

const SWEEP_INTERVAL_MS = 60_000

function trackerListeners(env: Env): LedgerListener[] {
  const { GOOGLE_SERVICE_ACCOUNT_EMAIL, GOOGLE_PRIVATE_KEY, TRACKER_SHEET_ID } = env
  if (!GOOGLE_SERVICE_ACCOUNT_EMAIL || !GOOGLE_PRIVATE_KEY || !TRACKER_SHEET_ID) return []
  console.log('[sheets] mirroring entries to tracker sheet %s', TRACKER_SHEET_ID)
  const client = new SheetsClient({
    serviceAccountEmail: GOOGLE_SERVICE_ACCOUNT_EMAIL,
    privateKey: GOOGLE_PRIVATE_KEY,
    spreadsheetId: TRACKER_SHEET_ID,
  })
  return [new SheetsTrackerMirror(client)]
}

async function main(): Promise<void> {
  const env = loadEnv()

  const store: LedgerStore = env.STORAGE === 'memory' ? new MemoryLedgerStore() : new JsonFileLedgerStore(env.DATA_PATH)
  const ledger = new NutritionLedger(store, {
    defaultTzOffsetMinutes: env.DEFAULT_TZ_OFFSET_MINUTES,
    listeners: trackerListeners(env),
  })
  const sessions = new MemorySessionStore(env.SESSION_TIMEOUT_MINUTES * 60_000)
  const conversation = new ConversationEngine({ ledger, sessions, catalog: loadCatalog() })
  const dispatcher = createDispatcher({
    conversation,
    send: (chatId, text) => sendMessage(env, chatId, text),
    echoOnly: isEchoOnly(env),
  })

  const sweep = setInterval(() => {
    const evicted = sessions.sweep(Date.now())
    if (evicted) console.log('[session] evicted %d expired sessions', evicted)
  }, SWEEP_INTERVAL_MS)
  sweep.unref()

  const server = serve({ fetch: createApp({ env, dispatcher }).fetch, port: env.PORT }, (info) => {
    console.log('[server] listening on :%d (%s mode, %s storage)', info.port, env.TELEGRAM_MODE, env.STORAGE)
  })

  const stop = new AbortController()
  const shutdown = () => {
    console.log('[server] shutting down')
    stop.abort()
    clearInterval(sweep)
    server.close()
  }
  process.once('SIGINT', shutdown)
  process.once('SIGTERM', shutdown)

  if (env.TELEGRAM_MODE === 'polling') await pollTelegram(env, dispatcher, stop.signal)
}

main().catch((e) => {
  console.error('[server] fatal', e)
  process.exit(1)
})
