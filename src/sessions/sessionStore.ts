import crypto from "crypto";
import { assertSessionInvariants, type Session } from "../contracts/session";
import { SessionNotFoundError } from "../errors";
import { trace } from "../utils/trace";
import { KeyedMutex } from "./keyedMutex";

export type SessionStoreOptions = {
  idleTimeoutMs: number;
  // Oldest turns are dropped beyond this many.
  maxHistory: number;
  now?: () => Date;
  generateId?: () => string;
};

export type MutationResult<T> = { session: Session; result: T };

/**
 * Exclusive handle on one session. `session` is a private copy; nothing is
 * stored until `commit`. Always `release` in a finally block.
 */
export interface SessionLease {
  readonly session: Session;
  commit(next: Session): Session;
  release(): void;
}

const MAX_ID_ATTEMPTS = 5;

export class SessionStore {
  private readonly sessions = new Map<string, Session>();
  private readonly locks = new KeyedMutex();
  private readonly idleTimeoutMs: number;
  private readonly maxHistory: number;
  private readonly now: () => Date;
  private readonly generateId: () => string;
  private sweeper: NodeJS.Timeout | null = null;

  constructor(opts: SessionStoreOptions) {
    this.idleTimeoutMs = opts.idleTimeoutMs;
    this.maxHistory = opts.maxHistory;
    this.now = opts.now ?? (() => new Date());
    this.generateId = opts.generateId ?? (() => crypto.randomUUID());
  }

  create(templateKey: string): string {
    let id = this.generateId();
    for (let attempt = 1; this.sessions.has(id) || this.locks.isLocked(id); attempt++) {
      if (attempt >= MAX_ID_ATTEMPTS) {
        throw new Error("Unable to allocate a unique session id.");
      }
      id = this.generateId();
    }

    const ts = this.now().toISOString();
    const session: Session = {
      id,
      templateKey,
      state: "COLLECTING",
      history: [],
      draft: null,
      artifactId: null,
      createdAt: ts,
      lastActivity: ts,
    };
    this.sessions.set(id, session);
    trace("session.created", { sessionId: id, templateKey });
    return id;
  }

  /** Copy of the current session. */
  get(id: string): Session {
    const session = this.sessions.get(id);
    // A session that is being worked on is live regardless of its timestamp.
    if (!session || (this.isIdle(session, this.now()) && !this.locks.isLocked(id))) {
      throw new SessionNotFoundError(id);
    }
    return structuredClone(session);
  }

  size(): number {
    return this.sessions.size;
  }

  async lease(id: string): Promise<SessionLease> {
    if (!this.sessions.has(id)) throw new SessionNotFoundError(id);

    const release = await this.locks.acquire(id);
    const stored = this.sessions.get(id);
    if (!stored) {
      release();
      throw new SessionNotFoundError(id);
    }
    if (this.isIdle(stored, this.now())) {
      this.sessions.delete(id);
      release();
      trace("session.expired", { sessionId: id });
      throw new SessionNotFoundError(id);
    }

    let current = structuredClone(stored);
    let active = true;

    return {
      get session() {
        return structuredClone(current);
      },
      commit: (next: Session) => {
        if (!active) throw new Error(`Lease on session ${id} was already released`);
        current = this.store(current, next);
        return structuredClone(current);
      },
      release: () => {
        if (!active) return;
        active = false;
        release();
      },
    };
  }

  /**
   * Atomic read-modify-write. `fn` sees a copy; if it throws, nothing changes.
   */
  async mutate<T>(
    id: string,
    fn: (session: Session) => MutationResult<T> | Promise<MutationResult<T>>
  ): Promise<T> {
    const lease = await this.lease(id);
    try {
      const { session, result } = await fn(lease.session);
      lease.commit(session);
      return result;
    } finally {
      lease.release();
    }
  }

  /** Removes the session; waits for an in-flight mutation first. */
  async delete(id: string): Promise<boolean> {
    if (!this.sessions.has(id)) return false;
    return this.locks.runExclusive(id, () => {
      const existed = this.sessions.delete(id);
      if (existed) trace("session.deleted", { sessionId: id });
      return existed;
    });
  }

  /**
   * Drops every session idle for longer than the timeout. Each removal
   * takes the session's lock and re-checks, so work in progress survives.
   */
  async sweep(now: Date = this.now()): Promise<number> {
    const candidates: string[] = [];
    for (const [id, session] of this.sessions) {
      if (this.isIdle(session, now)) candidates.push(id);
    }

    const removed = await Promise.all(
      candidates.map((id) =>
        this.locks.runExclusive(id, () => {
          const session = this.sessions.get(id);
          if (!session || !this.isIdle(session, now)) return false;
          this.sessions.delete(id);
          return true;
        })
      )
    );

    const count = removed.filter(Boolean).length;
    if (count > 0) trace("session.sweep", { removed: count, remaining: this.sessions.size });
    return count;
  }

  startSweeper(intervalMs: number): void {
    if (this.sweeper) return;
    this.sweeper = setInterval(() => {
      this.sweep().catch((err: unknown) => {
        console.error("Session sweep failed:", err);
      });
    }, intervalMs);
    // Allow the process to exit naturally (important for tests/CLI).
    this.sweeper.unref?.();
  }

  stopSweeper(): void {
    if (!this.sweeper) return;
    clearInterval(this.sweeper);
    this.sweeper = null;
  }

  private isIdle(session: Session, now: Date): boolean {
    return now.getTime() - Date.parse(session.lastActivity) > this.idleTimeoutMs;
  }

  private store(previous: Session, next: Session): Session {
    if (next.id !== previous.id || next.templateKey !== previous.templateKey || next.createdAt !== previous.createdAt) {
      throw new Error(`Session ${previous.id}: id, templateKey and createdAt are immutable`);
    }

    const history =
      next.history.length > this.maxHistory ? next.history.slice(next.history.length - this.maxHistory) : next.history;
    const stored: Session = structuredClone({ ...next, history, lastActivity: this.now().toISOString() });
    assertSessionInvariants(stored);

    this.sessions.set(stored.id, stored);
    return stored;
  }
}
