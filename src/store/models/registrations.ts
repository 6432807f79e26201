import type Database from 'better-sqlite3';

export interface VoterElectionRegistration {
  id: number;
  voterId: number;
  electionId: number;
  enrollment: string;
  enrollmentHash: string;
  /** Commitment submitted to the ledger at registration */
  faceHash: string;
  hasVoted: boolean;
  txHash: string;
  createdAt: string;
}

export type CreateRegistrationInput = Omit<VoterElectionRegistration, 'id' | 'hasVoted' | 'createdAt'>;

interface RegistrationRow {
  id: number;
  voter_id: number;
  election_id: number;
  enrollment: string;
  enrollment_hash: string;
  face_hash: string;
  has_voted: number;
  tx_hash: string;
  created_at: string;
}

function toRegistration(row: RegistrationRow): VoterElectionRegistration {
  return {
    id: row.id,
    voterId: row.voter_id,
    electionId: row.election_id,
    enrollment: row.enrollment,
    enrollmentHash: row.enrollment_hash,
    faceHash: row.face_hash,
    hasVoted: row.has_voted === 1,
    txHash: row.tx_hash,
    createdAt: row.created_at,
  };
}

export type RegistrationModel = ReturnType<typeof createRegistrationModel>;

export function createRegistrationModel(db: Database.Database) {
  const insert = db.prepare(`
    INSERT INTO voter_election_registrations
      (voter_id, election_id, enrollment, enrollment_hash, face_hash, tx_hash, created_at)
    VALUES (@voter_id, @election_id, @enrollment, @enrollment_hash, @face_hash, @tx_hash, @created_at)
  `);
  const selectOne = db.prepare<[number, number], RegistrationRow>(
    'SELECT * FROM voter_election_registrations WHERE voter_id = ? AND election_id = ?'
  );
  const setVoted = db.prepare(
    'UPDATE voter_election_registrations SET has_voted = 1 WHERE voter_id = ? AND election_id = ?'
  );

  return {
    create(input: CreateRegistrationInput): VoterElectionRegistration {
      const createdAt = new Date().toISOString();
      const info = insert.run({
        voter_id: input.voterId,
        election_id: input.electionId,
        enrollment: input.enrollment,
        enrollment_hash: input.enrollmentHash,
        face_hash: input.faceHash,
        tx_hash: input.txHash,
        created_at: createdAt,
      });
      return { ...input, id: Number(info.lastInsertRowid), hasVoted: false, createdAt };
    },

    find(voterId: number, electionId: number): VoterElectionRegistration | null {
      const row = selectOne.get(voterId, electionId);
      return row ? toRegistration(row) : null;
    },

    /** Returns false when no registration row exists. */
    markVoted(voterId: number, electionId: number): boolean {
      return setVoted.run(voterId, electionId).changes > 0;
    },
  };
}
