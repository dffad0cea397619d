import { readFileSync } from 'node:fs'
import { fileURLToPath } from 'node:url'
import { z } from 'zod'
import type { CatalogFood } from '../../types'
import { normalizeFoodName } from './match'

const DEFAULT_CATALOG_PATH = fileURLToPath(new URL('../../../data/foods.json', import.meta.url))

const rowSchema = z.object({
  name: z.string().trim().min(1),
  unit: z.string().trim().default('n'),
  quantity: z.number().positive().default(1),
  calories: z.number().nonnegative(),
  protein: z.number().nonnegative().default(0),
  fat: z.number().nonnegative().default(0),
  carbs: z.number().nonnegative().default(0),
})

/** Parse catalog rows (same columns as the reference sheet: name, unit, quantity, calories, protein, fat, carbs). */
export function parseCatalog(raw: unknown): CatalogFood[] {
  return z
    .array(rowSchema)
    .parse(raw)
    .map((r) => ({ ...r, key: normalizeFoodName(r.name), source: 'catalog' as const }))
}

/** Load the shared reference foods shipped in data/foods.json. */
export function loadCatalog(path: string = DEFAULT_CATALOG_PATH): CatalogFood[] {
  const foods = parseCatalog(JSON.parse(readFileSync(path, 'utf-8')))
  console.log('[food] loaded %d catalog foods from %s', foods.length, path)
  return foods
}
