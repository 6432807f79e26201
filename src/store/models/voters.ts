import type Database from 'better-sqlite3';

export interface Voter {
  id: number;
  enrollment: string;
  name: string;
  /** Opaque biometric template produced by the verifier */
  template: Uint8Array;
  createdAt: string;
}

export type VoterSummary = Pick<Voter, 'id' | 'enrollment' | 'name'>;

export interface CreateVoterInput {
  enrollment: string;
  name: string;
  template: Uint8Array;
}

interface VoterRow {
  id: number;
  enrollment: string;
  name: string;
  template: Buffer;
  created_at: string;
}

function toVoter(row: VoterRow): Voter {
  return {
    id: row.id,
    enrollment: row.enrollment,
    name: row.name,
    template: new Uint8Array(row.template),
    createdAt: row.created_at,
  };
}

export type VoterModel = ReturnType<typeof createVoterModel>;

export function createVoterModel(db: Database.Database) {
  const insert = db.prepare(`
    INSERT INTO voters (enrollment, name, template, created_at)
    VALUES (@enrollment, @name, @template, @created_at)
  `);
  const byEnrollment = db.prepare<[string], VoterRow>(
    'SELECT id, enrollment, name, template, created_at FROM voters WHERE enrollment = ?'
  );
  const summaries = db.prepare<[], VoterSummary>('SELECT id, enrollment, name FROM voters ORDER BY id');
  const count = db.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM voters');

  return {
    create(input: CreateVoterInput): Voter {
      const createdAt = new Date().toISOString();
      const info = insert.run({
        enrollment: input.enrollment,
        name: input.name,
        template: Buffer.from(input.template),
        created_at: createdAt,
      });
      return {
        id: Number(info.lastInsertRowid),
        enrollment: input.enrollment,
        name: input.name,
        template: new Uint8Array(input.template),
        createdAt,
      };
    },

    findByEnrollment(enrollment: string): Voter | null {
      const row = byEnrollment.get(enrollment);
      return row ? toVoter(row) : null;
    },

    /** Voters without their templates. */
    list(): VoterSummary[] {
      return summaries.all();
    },

    count(): number {
      return count.get()?.count ?? 0;
    },
  };
}
