import { sha256, toUtf8Bytes } from 'ethers';

/** Separator between the enrollment id and the election id in the hash input. */
export const ENROLLMENT_HASH_SEPARATOR = ':';

/** Length of the display tag, including the `0x` marker. */
export const VISIBLE_TAG_LENGTH = 10;

/**
 * One-way commitment binding a voter to an election: `0x` + hex(sha256("<enrollment>:<electionId>")).
 * Used as the join key between ledger events and cached receipts in place of the raw identity.
 */
export function enrollmentHash(enrollment: string, electionId: number): string {
  return sha256(toUtf8Bytes(`${enrollment}${ENROLLMENT_HASH_SEPARATOR}${electionId}`));
}

/**
 * Short, non-secret display prefix of an enrollment hash.
 */
export function visibleTag(hash: string): string {
  return hash.slice(0, VISIBLE_TAG_LENGTH);
}
