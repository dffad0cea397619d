import type { CatalogFood } from '../../types'

/** Lowercase, drop bracketed notes and punctuation, collapse whitespace. */
export function normalizeFoodName(s: string): string {
  return s
    .toLowerCase()
    .replace(/\([^)]*\)/g, ' ')
    .replace(/[^\p{L}\p{N}\s]+/gu, ' ')
    .trim()
    .replace(/\s+/g, ' ')
}

function findIn(want: string, foods: CatalogFood[]): CatalogFood | null {
  let best: CatalogFood | null = null
  for (const food of foods) {
    const n = normalizeFoodName(food.name)
    if (n === want) return food
    // "rice with dal" is rice; "pineapple" is not apple
    if (want.startsWith(`${n} `) && (!best || n.length > normalizeFoodName(best.name).length)) best = food
  }
  return best
}

/**
 * Match by exact normalized name, then by a catalog name that opens the typed name as
 * whole words (longest wins). Earlier lists win, so pass personal foods before the
 * shared catalog. Retries once without a plural "s".
 */
export function matchFood(name: string, ...sources: CatalogFood[][]): CatalogFood | null {
  const want = normalizeFoodName(name)
  if (!want) return null
  const candidates = want.endsWith('s') && want.length > 3 ? [want, want.slice(0, -1)] : [want]
  for (const w of candidates) {
    for (const foods of sources) {
      const hit = findIn(w, foods)
      if (hit) return hit
    }
  }
  return null
}
