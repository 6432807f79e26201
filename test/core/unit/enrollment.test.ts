import { enrollmentHash, visibleTag } from '../../../src/core/enrollment';

describe('enrollment hashing', () => {
  it('should hash "<enrollment>:<electionId>" with sha256', () => {
    expect(enrollmentHash('E100', 3)).toBe('0xd17023e35115bb25d1ceaccf3813404d525e2ecc32d4643a4a371b26d00ac694');
  });

  it('should produce a 66-character 0x-prefixed hash', () => {
    const hash = enrollmentHash('E100', 3);
    expect(hash).toHaveLength(66);
    expect(hash).toMatch(/^0x[0-9a-f]{64}$/);
  });

  it('should be deterministic', () => {
    expect(enrollmentHash('E100', 3)).toBe(enrollmentHash('E100', 3));
  });

  it('should differ between elections for the same voter', () => {
    expect(enrollmentHash('E100', 4)).toBe('0x40d2f0419b3577ec220397fbb8a9734dde71576c7910fb8f71bb0beb25d37253');
    expect(enrollmentHash('E100', 4)).not.toBe(enrollmentHash('E100', 3));
  });

  it('should take the first ten characters, marker included, as the visible tag', () => {
    expect(visibleTag(enrollmentHash('E100', 3))).toBe('0xd17023e3');
  });
});
