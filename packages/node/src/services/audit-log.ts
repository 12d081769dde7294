/**
 * Append-only audit log of committed commands.
 *
 * Records who changed which trust line, and how. Rejected commands are
 * not recorded here; they are logged and counted instead. In-memory
 * only: survives as long as the process.
 */

import type { CommandType, ParticipantId } from "@trustnet/types";

// =============================================================================
// Types
// =============================================================================

export interface AuditLogEntry {
  readonly timestamp: string;
  readonly action: CommandType;
  /** The participant that issued the command */
  readonly actor: ParticipantId;
  /** Every participant whose line the command changed */
  readonly participants: readonly ParticipantId[];
  readonly detail?: string | undefined;
}

export interface AuditLogQuery {
  readonly action?: string | undefined;
  /** Entries issued by, or touching, this participant */
  readonly participant?: string | undefined;
  readonly limit?: number | undefined;
}

// =============================================================================
// AuditLog
// =============================================================================

export class AuditLog {
  private readonly _entries: AuditLogEntry[] = [];
  private readonly _clock: () => string;

  constructor(clock: () => string = () => new Date().toISOString()) {
    this._clock = clock;
  }

  append(entry: Omit<AuditLogEntry, "timestamp">): void {
    this._entries.push({
      ...entry,
      participants: [...entry.participants],
      timestamp: this._clock(),
    });
  }

  /**
   * Query entries with optional filters. Returns newest first.
   */
  query(filter?: AuditLogQuery): readonly AuditLogEntry[] {
    let results: AuditLogEntry[] = this._entries;

    if (filter?.action !== undefined) {
      results = results.filter((e) => e.action === filter.action);
    }
    const participant = filter?.participant;
    if (participant !== undefined) {
      results = results.filter(
        (e) => e.actor === participant || e.participants.includes(participant),
      );
    }

    results = [...results].reverse();

    if (filter?.limit !== undefined && filter.limit > 0) {
      results = results.slice(0, filter.limit);
    }

    return results;
  }

  get size(): number {
    return this._entries.length;
  }
}
