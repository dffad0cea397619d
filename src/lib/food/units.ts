/** Cup-equivalent per 1 unit for scaling. Countable "n" has no cup equivalent. */
const UNIT_TO_CUPS: Record<string, number> = {
  cup: 1,
  cups: 1,
  serving: 1,
  bowl: 1.5,
  plate: 2,
  tbsp: 0.0625,
  tablespoon: 0.0625,
  teaspoon: 0.0208,
  tsp: 0.0208,
  g: 0, // weight - no direct conversion
  ml: 0,
  n: 0, // countable
}

/** Grams per unit for weights the user may type. */
const UNIT_TO_GRAMS: Record<string, number> = {
  g: 1,
  gram: 1,
  grams: 1,
  kg: 1000,
  oz: 28.35,
  lb: 453.6,
}

const UNIT_ALIASES: Record<string, string> = {
  gr: 'g',
  gram: 'g',
  grams: 'g',
  milliliter: 'ml',
  millilitre: 'ml',
  pc: 'n',
  pcs: 'n',
  piece: 'n',
  pieces: 'n',
  x: 'n',
  tablespoons: 'tablespoon',
  teaspoons: 'teaspoon',
  servings: 'serving',
  bowls: 'bowl',
  plates: 'plate',
}

export function normalizeUnit(unit: string): string {
  const u = unit.toLowerCase().trim()
  return UNIT_ALIASES[u] ?? u
}

export function isKnownUnit(unit: string): boolean {
  const u = normalizeUnit(unit)
  return u in UNIT_TO_CUPS || u in UNIT_TO_GRAMS
}

/** Multiplier for user quantity to base quantity when units differ. Uses cup-equivalent when both units have one. */
export function quantityMultiplier(
  userQty: number,
  userUnit: string,
  baseQty: number,
  baseUnit: string
): number {
  const u = normalizeUnit(userUnit)
  const b = normalizeUnit(baseUnit)
  const userGrams = UNIT_TO_GRAMS[u]
  const baseGrams = UNIT_TO_GRAMS[b]
  if (userGrams != null && baseGrams != null) {
    return baseQty ? (userQty * userGrams) / (baseQty * baseGrams) : userQty
  }
  const userCups = UNIT_TO_CUPS[u]
  const baseCups = UNIT_TO_CUPS[b]
  if (userCups != null && userCups > 0 && baseCups != null && baseCups > 0) {
    const userCupEquiv = userQty * userCups
    const baseCupEquiv = baseQty * baseCups
    return baseCupEquiv ? userCupEquiv / baseCupEquiv : userQty / baseQty
  }
  return baseQty ? userQty / baseQty : userQty
}

/** Whether an amount in `userUnit` can be scaled against a base measured in `baseUnit`. */
export function unitsCompatible(userUnit: string, baseUnit: string): boolean {
  const u = normalizeUnit(userUnit)
  const b = normalizeUnit(baseUnit)
  if (u === b) return true
  if (UNIT_TO_GRAMS[u] != null && UNIT_TO_GRAMS[b] != null) return true
  return (UNIT_TO_CUPS[u] ?? 0) > 0 && (UNIT_TO_CUPS[b] ?? 0) > 0
}
