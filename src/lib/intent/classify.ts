import { isPlausibleFood } from '../food/validate'
import { isAffirmative, isCancel, isNegative } from '../conversation/parse'

/** What a free-text message means when no flow is active. */
export type Intent = 'food_log' | 'greeting' | 'command' | 'query' | 'acknowledgement' | 'other'

const GREETINGS = ['hi', 'hello', 'hey', 'good morning', 'hey there', 'good evening', 'good afternoon', 'yo']
const QUERY_INDICATORS = ['what did', 'how many', 'how much', 'show my', "today's", 'summary', 'ate today', 'total']
const ACKNOWLEDGEMENTS = ['thanks', 'thank you', 'thx', 'cool', 'nice', 'great', 'lol', 'k', '👌']

/** Keyword classification; no model call. Everything unrecognized is "other". */
export function classifyIntent(message: string): Intent {
  const t = message.trim().toLowerCase().replace(/[!?.]+$/, '')
  if (t.startsWith('/')) return 'command'
  if (GREETINGS.some((g) => t === g || t.startsWith(g + ' '))) return 'greeting'
  if (isAffirmative(t) || isNegative(t) || isCancel(t) || ACKNOWLEDGEMENTS.includes(t)) return 'acknowledgement'
  if (QUERY_INDICATORS.some((w) => t.includes(w)) || message.trim().endsWith('?')) return 'query'
  if (isPlausibleFood(t)) return 'food_log'
  return 'other'
}
