/**
 * Phase enum exactly as the ledger contract encodes it on the wire.
 */
export enum ElectionPhase {
  CREATED = 0,
  ACTIVE = 1,
  ENDED = 2,
  RESULT_DECLARED = 3,
}

export type LedgerPhaseName = 'CREATED' | 'ACTIVE' | 'ENDED' | 'RESULT_DECLARED';

/**
 * Phase as displayed and enforced. `EXPIRED` is derived locally and never sent to the ledger.
 */
export type EffectivePhase = LedgerPhaseName | 'EXPIRED';

// Indexed by wire value
const WIRE_ORDER: readonly LedgerPhaseName[] = ['CREATED', 'ACTIVE', 'ENDED', 'RESULT_DECLARED'];

const PHASE_RANK: Record<LedgerPhaseName, ElectionPhase> = {
  CREATED: ElectionPhase.CREATED,
  ACTIVE: ElectionPhase.ACTIVE,
  ENDED: ElectionPhase.ENDED,
  RESULT_DECLARED: ElectionPhase.RESULT_DECLARED,
};

export function isLedgerPhaseName(value: string): value is LedgerPhaseName {
  return Object.prototype.hasOwnProperty.call(PHASE_RANK, value);
}

/**
 * Decodes the contract's phase enum.
 * @throws RangeError for values outside the contract enum
 */
export function phaseFromWire(value: number | bigint): LedgerPhaseName {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0 || n >= WIRE_ORDER.length) {
    throw new RangeError(`Unknown election phase value ${String(value)}`);
  }
  return WIRE_ORDER[n];
}

export function phaseToWire(phase: LedgerPhaseName): ElectionPhase {
  return PHASE_RANK[phase];
}

/**
 * True when `to` is strictly later than `from` in CREATED < ACTIVE < ENDED < RESULT_DECLARED.
 */
export function isForwardTransition(from: LedgerPhaseName, to: LedgerPhaseName): boolean {
  return PHASE_RANK[to] > PHASE_RANK[from];
}

/**
 * Merges the ledger phase with the local soft deadline.
 */
export function resolveEffectivePhase(
  ledgerPhase: LedgerPhaseName,
  expiresAt: Date | null,
  now: Date = new Date()
): EffectivePhase {
  if (ledgerPhase === 'ACTIVE' && expiresAt && now.getTime() > expiresAt.getTime()) {
    return 'EXPIRED';
  }
  return ledgerPhase;
}
