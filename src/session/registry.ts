// Copyright 2026 jem-sec-attest contributors
//
// Licensed under the Apache License, Version 2.0 (the "License");
// you may not use this file except in compliance with the License.
// You may obtain a copy of the License at
//
//     http://www.apache.org/licenses/LICENSE-2.0
//
// Unless required by applicable law or agreed to in writing, software
// distributed under the License is distributed on an "AS IS" BASIS,
// WITHOUT WARRANTIES OR CONDITIONS OF ANY KIND, either express or implied.
// See the License for the specific language governing permissions and
// limitations under the License.

/**
 * In-memory participant sessions. Each session owns one private FlowState;
 * nothing survives a process restart.
 */

import { randomUUID } from "node:crypto";
import { createFlowState } from "../flow/flow-state.js";
import { type Clock, type FlowState, systemClock } from "../flow/types.js";

export interface ParticipantSession {
  readonly id: string;
  readonly state: FlowState;
  readonly createdAt: number;
  lastSeenAt: number;
}

export class SessionNotFoundError extends Error {
  constructor(public readonly sessionId: string) {
    super(`No participant session: ${sessionId}`);
    this.name = "SessionNotFoundError";
  }
}

const noop = (): void => {};

export class SessionRegistry {
  private readonly sessions = new Map<string, ParticipantSession>();
  /** Tail of each session's action chain. */
  private readonly queues = new Map<string, Promise<void>>();

  constructor(
    private readonly ttlSeconds: number,
    private readonly clock: Clock = systemClock,
  ) {}

  get size(): number {
    return this.sessions.size;
  }

  create(): ParticipantSession {
    this.evictExpired();
    const now = this.clock.now();
    const session: ParticipantSession = {
      id: randomUUID(),
      state: createFlowState(),
      createdAt: now,
      lastSeenAt: now,
    };
    this.sessions.set(session.id, session);
    return session;
  }

  /** Returns the session, or undefined when unknown or idle past the TTL. */
  get(id: string): ParticipantSession | undefined {
    const session = this.sessions.get(id);
    if (!session) return undefined;
    if (this.isExpired(session)) {
      this.sessions.delete(id);
      return undefined;
    }
    return session;
  }

  /**
   * Runs `fn` against the session once every earlier action on the same
   * session has settled.
   * @throws SessionNotFoundError when the session is unknown or expired.
   */
  async run<R>(id: string, fn: (session: ParticipantSession) => R | Promise<R>): Promise<R> {
    const session = this.get(id);
    if (!session) throw new SessionNotFoundError(id);

    const previous = this.queues.get(id) ?? Promise.resolve();
    const task = previous.then(() => fn(session));
    const settled = task.then(noop, noop);
    this.queues.set(id, settled);

    try {
      return await task;
    } finally {
      session.lastSeenAt = this.clock.now();
      if (this.queues.get(id) === settled) this.queues.delete(id);
    }
  }

  /** Drops sessions idle past the TTL. Returns how many were removed. */
  evictExpired(): number {
    let removed = 0;
    for (const [id, session] of this.sessions) {
      if (this.isExpired(session)) {
        this.sessions.delete(id);
        removed += 1;
      }
    }
    if (removed > 0) console.log(`[session] Evicted ${removed} idle participant session(s)`);
    return removed;
  }

  private isExpired(session: ParticipantSession): boolean {
    return this.clock.now() - session.lastSeenAt > this.ttlSeconds * 1000;
  }
}
