import {
  ElectionPhase,
  isForwardTransition,
  isLedgerPhaseName,
  phaseFromWire,
  phaseToWire,
  resolveEffectivePhase,
} from '../../../src/core/phase';

describe('election phases', () => {
  it('should decode the contract enum', () => {
    expect([0, 1, 2, 3].map((n) => phaseFromWire(n))).toEqual(['CREATED', 'ACTIVE', 'ENDED', 'RESULT_DECLARED']);
    expect(phaseFromWire(2n)).toBe('ENDED');
  });

  it('should reject values outside the enum', () => {
    expect(() => phaseFromWire(4)).toThrow('Unknown election phase value 4');
    expect(() => phaseFromWire(-1)).toThrow(RangeError);
  });

  it('should encode phases back to the contract enum', () => {
    expect(phaseToWire('RESULT_DECLARED')).toBe(ElectionPhase.RESULT_DECLARED);
    expect(phaseToWire('CREATED')).toBe(0);
  });

  it('should not accept the derived EXPIRED phase as a ledger phase', () => {
    expect(isLedgerPhaseName('ACTIVE')).toBe(true);
    expect(isLedgerPhaseName('EXPIRED')).toBe(false);
  });

  it('should only allow forward transitions', () => {
    expect(isForwardTransition('CREATED', 'ACTIVE')).toBe(true);
    expect(isForwardTransition('ACTIVE', 'RESULT_DECLARED')).toBe(true);
    expect(isForwardTransition('ENDED', 'ACTIVE')).toBe(false);
    expect(isForwardTransition('ACTIVE', 'ACTIVE')).toBe(false);
  });

  describe('resolveEffectivePhase', () => {
    const now = new Date('2026-03-01T12:00:00Z');

    it('should report EXPIRED for an ACTIVE election past its deadline', () => {
      expect(resolveEffectivePhase('ACTIVE', new Date('2026-03-01T11:59:00Z'), now)).toBe('EXPIRED');
    });

    it('should keep ACTIVE before the deadline or without one', () => {
      expect(resolveEffectivePhase('ACTIVE', new Date('2026-03-01T12:01:00Z'), now)).toBe('ACTIVE');
      expect(resolveEffectivePhase('ACTIVE', null, now)).toBe('ACTIVE');
    });

    it('should never derive EXPIRED from another ledger phase', () => {
      const past = new Date('2026-01-01T00:00:00Z');
      expect(resolveEffectivePhase('CREATED', past, now)).toBe('CREATED');
      expect(resolveEffectivePhase('ENDED', past, now)).toBe('ENDED');
    });
  });
});
