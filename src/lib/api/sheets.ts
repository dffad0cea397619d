import * as jose from 'jose'
import { z } from 'zod'
import type { FoodEntry, TrackerRow, UserProfile } from '../../types'
import { localDateOf } from '../ledger/aggregate'
import type { LedgerListener } from '../ledger/ledger'
import { HttpError } from '../errors'
import { isTransient, withRetry, type RetryOptions } from '../utils/retry'

const SCOPE = 'https://www.googleapis.com/auth/spreadsheets'
const TOKEN_URL = 'https://oauth2.googleapis.com/token'
const SHEETS_BASE = 'https://sheets.googleapis.com/v4/spreadsheets'

const HEADER = ['Date', 'User', 'Food Item', 'Quantity', 'Calories (kcal)', 'Protein (g)', 'Fat (g)', 'Carbs (g)', 'Note']

export interface SheetsConfig {
  serviceAccountEmail: string
  /** PEM; literal "\n" sequences from .env files are accepted */
  privateKey: string
  spreadsheetId: string
}

const tokenSchema = z.object({ access_token: z.string(), expires_in: z.number().default(3600) })
const metaSchema = z.object({
  sheets: z.array(z.object({ properties: z.object({ title: z.string() }).partial().optional() })).default([]),
})

/** Sheet per month: "2026-10_Tracker". */
export function monthSheetName(date: string): string {
  return `${date.slice(0, 7)}_Tracker`
}

/** Ledger entry as a tracker row. A removal is mirrored as a negative row. */
export function toTrackerRow(entry: FoodEntry, removed = false): TrackerRow {
  const sign = removed ? -1 : 1
  return {
    date: localDateOf(entry.timestamp, entry.tzOffsetMinutes),
    userId: entry.userId,
    foodItem: entry.label,
    quantity: String(entry.quantity),
    calories: sign * entry.calories,
    protein: sign * entry.macros.protein,
    fat: sign * entry.macros.fat,
    carbs: sign * entry.macros.carbs,
    note: removed ? `undo ${entry.id}` : entry.id,
  }
}

export function rowValues(r: TrackerRow): Array<string | number> {
  return [r.date, r.userId, r.foodItem, r.quantity, r.calories, r.protein, r.fat, r.carbs, r.note ?? '']
}

/** Append-only Google Sheets client for the tracker spreadsheet. */
export class SheetsClient {
  private token?: { value: string; expiresAt: number }
  private readonly knownSheets = new Set<string>()

  constructor(private readonly config: SheetsConfig) {}

  private async getAccessToken(): Promise<string> {
    if (this.token && this.token.expiresAt > Date.now() + 60_000) return this.token.value
    const keyPem = this.config.privateKey.replace(/\\n/g, '\n')
    const key = await jose.importPKCS8(keyPem, 'RS256')
    const jwt = await new jose.SignJWT({ scope: SCOPE })
      .setProtectedHeader({ alg: 'RS256' })
      .setIssuer(this.config.serviceAccountEmail)
      .setAudience(TOKEN_URL)
      .setIssuedAt()
      .setExpirationTime('1h')
      .sign(key)
    const res = await fetch(TOKEN_URL, {
      method: 'POST',
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      body: new URLSearchParams({
        grant_type: 'urn:ietf:params:oauth:grant-type:jwt-bearer',
        assertion: jwt,
      }),
    })
    if (!res.ok) throw new HttpError(`Google token error: ${res.status} ${await res.text()}`, res.status)
    const data = tokenSchema.parse(await res.json())
    this.token = { value: data.access_token, expiresAt: Date.now() + data.expires_in * 1000 }
    return data.access_token
  }

  private async sheetsFetch(method: string, url: string, body?: unknown): Promise<Response> {
    const token = await this.getAccessToken()
    return fetch(url, {
      method,
      headers: {
        Authorization: `Bearer ${token}`,
        'Content-Type': 'application/json',
      },
      body: body !== undefined ? JSON.stringify(body) : undefined,
    })
  }

  private async ensureSheet(sheetName: string): Promise<void> {
    if (this.knownSheets.has(sheetName)) return
    const id = this.config.spreadsheetId
    const metaRes = await this.sheetsFetch('GET', `${SHEETS_BASE}/${id}?fields=sheets(properties(title))`)
    if (!metaRes.ok) throw new HttpError(`Sheets meta failed: ${metaRes.status}`, metaRes.status)
    const meta = metaSchema.parse(await metaRes.json())
    if (!meta.sheets.some((s) => s.properties?.title === sheetName)) {
      const addRes = await this.sheetsFetch('POST', `${SHEETS_BASE}/${id}:batchUpdate`, {
        requests: [{ addSheet: { properties: { title: sheetName, gridProperties: { frozenRowCount: 1 } } } }],
      })
      if (!addRes.ok) throw new HttpError(`Sheets addSheet failed: ${addRes.status} ${await addRes.text()}`, addRes.status)
      await this.append(sheetName, [HEADER])
    }
    this.knownSheets.add(sheetName)
  }

  private async append(sheetName: string, values: Array<Array<string | number>>): Promise<void> {
    const range = encodeURIComponent(`'${sheetName}'!A:I`)
    const url = `${SHEETS_BASE}/${this.config.spreadsheetId}/values/${range}:append?valueInputOption=USER_ENTERED`
    const res = await this.sheetsFetch('POST', url, { values })
    if (!res.ok) throw new HttpError(`Sheets append failed: ${res.status} ${await res.text()}`, res.status)
  }

  async appendTrackerRows(rows: TrackerRow[]): Promise<void> {
    const bySheet = new Map<string, TrackerRow[]>()
    for (const r of rows) {
      const name = monthSheetName(r.date)
      bySheet.set(name, [...(bySheet.get(name) ?? []), r])
    }
    for (const [sheetName, sheetRows] of bySheet) {
      await this.ensureSheet(sheetName)
      await this.append(sheetName, sheetRows.map(rowValues))
    }
  }
}

export interface TrackerSink {
  appendTrackerRows(rows: TrackerRow[]): Promise<void>
}

/**
 * Mirrors committed food entries to the tracker spreadsheet. Failures are logged and
 * never reach the ledger or the user.
 */
export class SheetsTrackerMirror implements LedgerListener {
  constructor(
    private readonly sink: TrackerSink,
    private readonly retry: Omit<RetryOptions, 'shouldRetry'> = {}
  ) {}

  entryRecorded(entry: FoodEntry, _profile: UserProfile): Promise<void> {
    return this.push(toTrackerRow(entry))
  }

  entryRemoved(entry: FoodEntry, _profile: UserProfile): Promise<void> {
    return this.push(toTrackerRow(entry, true))
  }

  private async push(row: TrackerRow): Promise<void> {
    try {
      await withRetry(() => this.sink.appendTrackerRows([row]), { ...this.retry, shouldRetry: isTransient })
    } catch (e) {
      console.error('[sheets] tracker append failed for %s', row.note, e)
    }
  }
}
