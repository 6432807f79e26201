import type Database from 'better-sqlite3';
import { isForwardTransition, isLedgerPhaseName, type LedgerPhaseName } from '../../core/phase';

/**
 * Local projection of an election. Only `isLiveResults` and `expiresAt` are local policy;
 * everything else mirrors the ledger and may lag it.
 */
export interface CachedElection {
  electionId: number;
  name: string;
  description: string;
  phase: LedgerPhaseName;
  isLiveResults: boolean;
  expiresAt: Date | null;
  startedAt: Date | null;
  endedAt: Date | null;
  createdAt: Date;
}

export interface UpsertElectionInput {
  electionId: number;
  name: string;
  description: string;
  isLiveResults: boolean;
  expiresAt: Date | null;
}

interface ElectionRow {
  blockchain_id: number;
  name: string;
  description: string;
  phase: string;
  is_live_results: number;
  expires_at: string | null;
  started_at: string | null;
  ended_at: string | null;
  created_at: string;
}

const COLUMNS =
  'blockchain_id, name, description, phase, is_live_results, expires_at, started_at, ended_at, created_at';

function toDate(value: string | null): Date | null {
  return value === null ? null : new Date(value);
}

function toElection(row: ElectionRow): CachedElection {
  if (!isLedgerPhaseName(row.phase)) {
    throw new RangeError(`Cached election ${row.blockchain_id} has unknown phase '${row.phase}'`);
  }
  return {
    electionId: row.blockchain_id,
    name: row.name,
    description: row.description,
    phase: row.phase,
    isLiveResults: row.is_live_results === 1,
    expiresAt: toDate(row.expires_at),
    startedAt: toDate(row.started_at),
    endedAt: toDate(row.ended_at),
    createdAt: new Date(row.created_at),
  };
}

export type ElectionModel = ReturnType<typeof createElectionModel>;

export function createElectionModel(db: Database.Database) {
  const upsert = db.prepare(`
    INSERT INTO elections (blockchain_id, name, description, phase, is_live_results, expires_at, created_at)
    VALUES (@blockchain_id, @name, @description, 'CREATED', @is_live_results, @expires_at, @created_at)
    ON CONFLICT(blockchain_id) DO UPDATE SET
      name = excluded.name,
      description = excluded.description,
      is_live_results = excluded.is_live_results,
      expires_at = excluded.expires_at
  `);
  const byId = db.prepare<[number], ElectionRow>(`SELECT ${COLUMNS} FROM elections WHERE blockchain_id = ?`);
  const all = db.prepare<[], ElectionRow>(`SELECT ${COLUMNS} FROM elections ORDER BY blockchain_id`);
  const setPhase = db.prepare(`
    UPDATE elections SET
      phase = @phase,
      started_at = COALESCE(@started_at, started_at),
      ended_at = COALESCE(@ended_at, ended_at)
    WHERE blockchain_id = @blockchain_id
  `);
  const count = db.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM elections');

  const advance = db.transaction((electionId: number, phase: LedgerPhaseName, at: Date): boolean => {
    const row = byId.get(electionId);
    if (!row || !isLedgerPhaseName(row.phase) || !isForwardTransition(row.phase, phase)) {
      return false;
    }
    setPhase.run({
      blockchain_id: electionId,
      phase,
      started_at: phase === 'ACTIVE' ? at.toISOString() : null,
      ended_at: phase === 'ENDED' ? at.toISOString() : null,
    });
    return true;
  });

  return {
    /** Inserts the row for a new election, or refreshes its descriptive and policy columns. */
    upsert(input: UpsertElectionInput): CachedElection {
      upsert.run({
        blockchain_id: input.electionId,
        name: input.name,
        description: input.description,
        is_live_results: input.isLiveResults ? 1 : 0,
        expires_at: input.expiresAt ? input.expiresAt.toISOString() : null,
        created_at: new Date().toISOString(),
      });
      const row = byId.get(input.electionId);
      if (!row) {
        throw new Error(`Election ${input.electionId} missing after upsert`);
      }
      return toElection(row);
    },

    find(electionId: number): CachedElection | null {
      const row = byId.get(electionId);
      return row ? toElection(row) : null;
    },

    list(): CachedElection[] {
      return all.all().map(toElection);
    },

    /**
     * Moves the cached phase forward. Returns false, leaving the row untouched, when the row
     * is missing or the move would not be forward.
     */
    advancePhase(electionId: number, phase: LedgerPhaseName, at: Date = new Date()): boolean {
      return advance(electionId, phase, at);
    },

    count(): number {
      return count.get()?.count ?? 0;
    },
  };
}
