import { v4 as uuidv4 } from 'uuid'
import type { Dataset } from './customerDataset.js'
import { SessionNotFoundError } from '../utils/errors.js'

export interface CustomerSession {
  id: string
  dataset: Dataset
  createdAt: Date
  updatedAt: Date
}

export interface SessionServiceOptions {
  // Sessions untouched for this long are discarded
  idleTtlMs?: number
}

export const DEFAULT_SESSION_IDLE_TTL_MS = 30 * 60 * 1000

interface SessionEntry {
  session: CustomerSession
  lastAccessedAt: number
}

/**
 * In-memory upload sessions. Each session owns exactly one Dataset; a
 * re-upload swaps in a new session object in a single step, so readers never
 * see a half-replaced dataset. Idle sessions are swept on the next access to
 * the store.
 */
export class SessionService {
  private readonly sessions = new Map<string, SessionEntry>()
  private readonly idleTtlMs: number

  constructor(options: SessionServiceOptions = {}) {
    this.idleTtlMs = options.idleTtlMs ?? DEFAULT_SESSION_IDLE_TTL_MS
  }

  create(dataset: Dataset): CustomerSession {
    this.sweepExpired()
    const now = new Date()
    const session: CustomerSession = Object.freeze({
      id: uuidv4(),
      dataset,
      createdAt: now,
      updatedAt: now
    })
    this.sessions.set(session.id, { session, lastAccessedAt: now.getTime() })
    console.log(`Session ${session.id} created from '${dataset.sourceName}' (${dataset.records.length} rows)`)
    return session
  }

  get(sessionId: string): CustomerSession {
    this.sweepExpired()
    const entry = this.sessions.get(sessionId)
    if (!entry) {
      throw new SessionNotFoundError(sessionId)
    }
    entry.lastAccessedAt = Date.now()
    return entry.session
  }

  replaceDataset(sessionId: string, dataset: Dataset): CustomerSession {
    const current = this.get(sessionId)
    const replaced: CustomerSession = Object.freeze({
      ...current,
      dataset,
      updatedAt: new Date()
    })
    this.sessions.set(sessionId, { session: replaced, lastAccessedAt: replaced.updatedAt.getTime() })
    console.log(`Session ${sessionId} replaced with '${dataset.sourceName}' (${dataset.records.length} rows)`)
    return replaced
  }

  delete(sessionId: string): void {
    this.sweepExpired()
    if (!this.sessions.delete(sessionId)) {
      throw new SessionNotFoundError(sessionId)
    }
    console.log(`Session ${sessionId} discarded`)
  }

  get size(): number {
    this.sweepExpired()
    return this.sessions.size
  }

  private sweepExpired(): void {
    const cutoff = Date.now() - this.idleTtlMs
    for (const [id, entry] of this.sessions) {
      if (entry.lastAccessedAt <= cutoff) {
        this.sessions.delete(id)
        console.log(`Session ${id} expired after ${Math.round(this.idleTtlMs / 1000)}s idle`)
      }
    }
  }
}
