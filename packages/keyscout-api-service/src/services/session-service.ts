/**
 * Session Service
 *
 * One ChatSession per dashboard conversation, private to its id. Sessions
 * idle past the TTL are evicted whenever the map is touched.
 */

import { ChatSession } from 'keyscout'

export interface SessionServiceOptions {
  ttlMs: number
  maxSessions: number
  maxTurns: number
  now?: () => number
}

interface SessionEntry {
  session: ChatSession
  lastAccess: number
}

export class SessionService {
  private sessions = new Map<string, SessionEntry>()
  private readonly now: () => number

  constructor(private readonly options: SessionServiceOptions) {
    this.now = options.now ?? Date.now
  }

  /**
   * Existing session for the id, or a fresh one when absent or expired
   */
  getOrCreate(id?: string): ChatSession {
    this.evictExpired()

    if (id) {
      const entry = this.sessions.get(id)
      if (entry) {
        entry.lastAccess = this.now()
        return entry.session
      }
    }

    this.evictOldestBeyond(this.options.maxSessions - 1)
    const session = new ChatSession({ maxTurns: this.options.maxTurns })
    this.sessions.set(session.id, { session, lastAccess: this.now() })
    return session
  }

  get(id: string): ChatSession | undefined {
    this.evictExpired()
    const entry = this.sessions.get(id)
    if (entry) {
      entry.lastAccess = this.now()
    }
    return entry?.session
  }

  delete(id: string): boolean {
    return this.sessions.delete(id)
  }

  get size(): number {
    return this.sessions.size
  }

  private evictExpired(): void {
    const cutoff = this.now() - this.options.ttlMs
    for (const [id, entry] of this.sessions) {
      if (entry.lastAccess <= cutoff) {
        this.sessions.delete(id)
      }
    }
  }

  private evictOldestBeyond(limit: number): void {
    // Map iteration order is insertion order, not access order
    while (this.sessions.size > Math.max(0, limit)) {
      let oldestId: string | undefined
      let oldestAccess = Infinity
      for (const [id, entry] of this.sessions) {
        if (entry.lastAccess < oldestAccess) {
          oldestAccess = entry.lastAccess
          oldestId = id
        }
      }
      if (oldestId === undefined) return
      this.sessions.delete(oldestId)
    }
  }
}
