/**
 * Reject obvious non-food names before starting a log flow from free text
 * or accepting a typed food name.
 */

const NON_FOOD_WORDS = new Set([
  'hi', 'hello', 'hey', 'thanks', 'thank you', 'ok', 'okay', 'yes', 'no', 'lol', 'cool', 'nice', 'k',
  'nope', 'yep', 'nah', 'asdf', 'asdfghjk', 'test', 'unknown', 'other', 'none', 'idk', 'idc', 'wtf', 'omg',
  'good morning', 'good evening', 'good afternoon', 'good night', 'bye', 'goodbye', 'see you',
  'skip', 'cancel', 'stop', 'help', 'undo', 'today',
])

const MIN_FOOD_NAME_LENGTH = 2
const MAX_FOOD_NAME_LENGTH = 80

export function isPlausibleFood(name: string): boolean {
  const t = name.trim().toLowerCase()
  if (t.length < MIN_FOOD_NAME_LENGTH || t.length > MAX_FOOD_NAME_LENGTH) return false
  if (t.startsWith('/')) return false
  if (NON_FOOD_WORDS.has(t)) return false
  // numbers and amounts alone ("150", "2.5", "200 g") are answers, not names
  if (/^[\d.,\s]+[a-z]{0,4}$/.test(t)) return false
  if (!/\p{L}{2}/u.test(t)) return false
  return true
}
