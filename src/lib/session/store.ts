import type { UserId } from '../../types'
import { idleSession, type SessionState } from '../conversation/states'

export interface SessionStore {
  /** Current session, or a fresh idle one. Never throws. */
  get(userId: UserId, now: number): SessionState
  put(userId: UserId, state: SessionState): void
  clear(userId: UserId): void
}

export const DEFAULT_SESSION_TIMEOUT_MS = 30 * 60_000

/**
 * One session per user, held in memory. A non-idle session untouched for longer than
 * the timeout is dropped with its partial entry; the next `get` returns idle marked
 * `expired` so the conversation can say so.
 */
export class MemorySessionStore implements SessionStore {
  private readonly sessions = new Map<UserId, SessionState>()

  constructor(private readonly timeoutMs: number = DEFAULT_SESSION_TIMEOUT_MS) {}

  get(userId: UserId, now: number): SessionState {
    const s = this.sessions.get(userId)
    if (!s) return idleSession(now)
    if (this.isExpired(s, now)) {
      this.sessions.delete(userId)
      const expired = s.flow.kind !== 'idle'
      return { flow: expired ? { kind: 'idle', expired: true } : { kind: 'idle' }, lastActivityAt: now }
    }
    return s
  }

  put(userId: UserId, state: SessionState): void {
    if (state.flow.kind === 'idle') {
      // nothing to remember for idle users
      this.sessions.delete(userId)
      return
    }
    this.sessions.set(userId, state)
  }

  clear(userId: UserId): void {
    this.sessions.delete(userId)
  }

  /** Drop every expired session. Returns how many were evicted. */
  sweep(now: number): number {
    let evicted = 0
    for (const [userId, s] of this.sessions) {
      if (this.isExpired(s, now)) {
        this.sessions.delete(userId)
        evicted++
      }
    }
    return evicted
  }

  get size(): number {
    return this.sessions.size
  }

  private isExpired(s: SessionState, now: number): boolean {
    return now - s.lastActivityAt > this.timeoutMs
  }
}
