import type { Macros } from '../../types'
import { isKnownUnit, normalizeUnit } from '../food/units'
import { isIsoDate, shiftDate } from '../ledger/aggregate'

const CANCEL_WORDS = new Set(['/cancel', 'cancel', 'stop', 'quit', 'abort'])
const AFFIRMATIVE_WORDS = new Set(['yes', 'y', 'yeah', 'yep', 'yup', 'ok', 'okay', 'sure', 'confirm', 'save', '/yes', '👍'])
const NEGATIVE_WORDS = new Set(['no', 'n', 'nope', 'nah', 'discard', '/no', '👎'])
const SKIP_WORDS = new Set(['skip', '-', '/skip', 'none'])

function word(text: string): string {
  return text.trim().toLowerCase().replace(/[.!]+$/, '')
}

export function isCancel(text: string): boolean {
  return CANCEL_WORDS.has(word(text))
}

export function isAffirmative(text: string): boolean {
  return AFFIRMATIVE_WORDS.has(word(text))
}

export function isNegative(text: string): boolean {
  return NEGATIVE_WORDS.has(word(text))
}

export function isSkip(text: string): boolean {
  return SKIP_WORDS.has(word(text))
}

export interface Command {
  /** lowercase, without the slash or a @botname suffix */
  name: string
  args: string
}

/** "/log@my_bot oats" -> { name: 'log', args: 'oats' } */
export function parseCommand(text: string): Command | null {
  const m = /^\/([a-z_]+)(?:@\w+)?(?:\s+([\s\S]*))?$/i.exec(text.trim())
  if (!m) return null
  return { name: m[1].toLowerCase(), args: (m[2] ?? '').trim() }
}

const NUMBER_RE = /^\d+(?:[.,]\d+)?$/

/** Non-negative decimal; comma works as the decimal mark. Null when it is anything else. */
export function parseNonNegativeNumber(text: string): number | null {
  const t = text.trim()
  if (!NUMBER_RE.test(t)) return null
  const n = Number(t.replace(',', '.'))
  return Number.isFinite(n) ? n : null
}

const FRACTIONS: Record<string, number> = { '½': 0.5, '¼': 0.25, '¾': 0.75, half: 0.5, quarter: 0.25 }

export interface Amount {
  amount: number
  unit?: string
}

/** "2", "1.5", "150 g", "150g", "half cup", "½ cup". Null when no amount can be read. */
export function parseAmount(text: string): Amount | null {
  const t = text.trim().toLowerCase()
  const m = /^(\d+(?:[.,]\d+)?|½|¼|¾|half|quarter)\s*([a-z]+)?$/.exec(t)
  if (!m) return null
  const amount = FRACTIONS[m[1]] ?? parseNonNegativeNumber(m[1])
  if (amount == null) return null
  if (!m[2]) return { amount }
  if (!isKnownUnit(m[2])) return null
  return { amount, unit: normalizeUnit(m[2]) }
}

/** "30 10 50" or "30/10/50" -> protein, fat, carbs grams. */
export function parseMacros(text: string): Macros | null {
  const parts = text.trim().split(/[\s/;]+/).filter(Boolean)
  if (parts.length !== 3) return null
  const [protein, fat, carbs] = parts.map(parseNonNegativeNumber)
  if (protein == null || fat == null || carbs == null) return null
  return { protein, fat, carbs }
}

/**
 * UTC offset in minutes from "+3", "-5", "+05:30", "UTC+2", "GMT-3:30", "0".
 * Null when unreadable; range is checked by the ledger.
 */
export function parseTimezoneOffset(text: string): number | null {
  const t = text.trim().toUpperCase().replace(/^(UTC|GMT)\s*/, '')
  if (t === '' || t === 'Z') return 0
  const m = /^([+-]?)(\d{1,2})(?::?(\d{2}))?$/.exec(t)
  if (!m) return null
  const minutes = Number(m[3] ?? 0)
  if (minutes >= 60) return null
  const total = Number(m[2]) * 60 + minutes
  return m[1] === '-' ? -total : total
}

export function formatTimezoneOffset(minutes: number): string {
  const sign = minutes < 0 ? '-' : '+'
  const abs = Math.abs(minutes)
  const hh = String(Math.floor(abs / 60)).padStart(2, '0')
  const mm = String(abs % 60).padStart(2, '0')
  return `UTC${sign}${hh}:${mm}`
}

/** "2026-10-01", "today", "yesterday" relative to `today`. */
export function parseDay(text: string, today: string): string | null {
  const t = text.trim().toLowerCase()
  if (t === '' || t === 'today') return today
  if (t === 'yesterday') return shiftDate(today, -1)
  return isIsoDate(t) ? t : null
}

export const MAX_LAST_DAYS = 90

export interface DayRange {
  start: string
  end: string
}

/** "2026-10-01 2026-10-07", "2026-10-01..2026-10-07" or a day count "7" ending today. */
export function parseRange(text: string, today: string): DayRange | null {
  const t = text.trim()
  if (/^\d{1,3}$/.test(t)) {
    const n = Number(t)
    if (n < 1 || n > MAX_LAST_DAYS) return null
    return { start: shiftDate(today, -(n - 1)), end: today }
  }
  const parts = t.split(/\s*(?:\.\.|—|–)\s*|\s+to\s+|\s+/).filter(Boolean)
  if (parts.length !== 2) return null
  const [start, end] = parts.map((p) => parseDay(p, today))
  if (start == null || end == null) return null
  return { start, end }
}
