/**
 * Ledger interaction layer: the JSON-RPC election contract client, the transaction
 * lifecycle it reports through, and the error normalization every mutation goes through.
 *
 * @example
 * ```typescript
 * import { JsonRpcProvider, Wallet } from 'ethers';
 * import { ElectionLedgerService } from './contracts';
 *
 * const provider = new JsonRpcProvider('http://127.0.0.1:8545');
 * const signer = new Wallet(process.env.LEDGER_SIGNER_KEY ?? '', provider);
 * const ledger = new ElectionLedgerService('0x...', signer);
 *
 * const { electionId } = await ledger.createElection('Board 2026', 'Annual board vote');
 * ```
 */

export * from './SmartContractService';
export * from './ElectionLedgerService';
export * from './SerialTaskQueue';
export * from './errors';
export * from './revert';
export * from './types';
export { ELECTION_LEDGER_ABI } from './abi';
