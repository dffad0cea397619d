import { z } from 'zod'

const optionalString = z
  .string()
  .optional()
  .transform((v) => (v != null && v.trim() !== '' ? v.trim() : undefined))

const envSchema = z.object({
  /** Telegram */
  TELEGRAM_BOT_TOKEN: z.string().trim().min(1, 'TELEGRAM_BOT_TOKEN is not set'),
  /** "webhook" serves POST /api/telegram/webhook; "polling" runs a getUpdates loop (no public URL needed). */
  TELEGRAM_MODE: z.enum(['webhook', 'polling']).default('webhook'),
  /** Base URL for webhook (e.g. https://bot.example.com). Used by POST /admin/telegram-set-webhook. */
  TELEGRAM_WEBHOOK_BASE_URL: optionalString,
  /** Compared with the X-Telegram-Bot-Api-Secret-Token header when set. */
  TELEGRAM_WEBHOOK_SECRET: optionalString,
  /** If set (e.g. "true"), bot only echoes the message back; no logging. For local testing. */
  TELEGRAM_ECHO_ONLY: optionalString,

  /** Ledger storage. "memory" keeps nothing across restarts. */
  STORAGE: z.enum(['file', 'memory']).default('file'),
  DATA_PATH: z.string().trim().min(1).default('data.json'),

  SESSION_TIMEOUT_MINUTES: z.coerce.number().int().positive().default(30),
  /** UTC offset given to new profiles until the user runs /timezone. */
  DEFAULT_TZ_OFFSET_MINUTES: z.coerce.number().int().min(-720).max(840).default(0),

  PORT: z.coerce.number().int().positive().default(8787),

  /** Optional: require Authorization: Bearer <ADMIN_SECRET> for /admin routes */
  ADMIN_SECRET: optionalString,

  /** Google Sheets tracker mirror. All three must be set to enable it. */
  GOOGLE_SERVICE_ACCOUNT_EMAIL: optionalString,
  GOOGLE_PRIVATE_KEY: optionalString,
  TRACKER_SHEET_ID: optionalString,
})

export type Env = z.infer<typeof envSchema>

/** Parse and validate configuration. Throws with every offending key listed. */
export function loadEnv(source: Record<string, string | undefined> = process.env): Env {
  const result = envSchema.safeParse(source)
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')
    throw new Error(`Invalid configuration: ${issues}`)
  }
  return result.data
}

export function isEchoOnly(env: Env): boolean {
  return env.TELEGRAM_ECHO_ONLY === 'true' || env.TELEGRAM_ECHO_ONLY === '1'
}
