import { z } from 'zod'

/** Telegram update payload (only the fields the bot reads). */
export const telegramMessageSchema = z.object({
  message_id: z.number(),
  from: z.object({ id: z.number(), first_name: z.string().optional(), username: z.string().optional() }).optional(),
  chat: z.object({ id: z.number(), type: z.string() }),
  /** unix seconds */
  date: z.number(),
  text: z.string().optional(),
})

export const telegramUpdateSchema = z.object({
  update_id: z.number(),
  message: telegramMessageSchema.optional(),
})

export type TelegramMessage = z.infer<typeof telegramMessageSchema>
export type TelegramUpdate = z.infer<typeof telegramUpdateSchema>
