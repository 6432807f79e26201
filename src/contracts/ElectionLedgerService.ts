import { Contract, getBytes, toUtf8String, Utf8ErrorFuncs } from 'ethers';
import type { Log, Signer } from 'ethers';
import { ELECTION_LEDGER_ABI } from './abi';
import { normalizeLedgerError } from './revert';
import {
  SmartContractService,
  type ConfirmedTx,
  type MinedReceipt,
  type SmartContractServiceOptions,
} from './SmartContractService';
import { phaseFromWire, type LedgerPhaseName } from '../core/phase';
import { logAudit, logger } from '../utils/logger';
import type {
  ElectionCreatedResult,
  ElectionLedger,
  LedgerCandidate,
  LedgerElection,
  LedgerOperation,
  LedgerOperationKind,
  LedgerReceipt,
  LedgerSubmitOptions,
  LedgerTxResult,
  VoteTxResult,
} from './types';

/**
 * Gas budget per operation when the caller does not override it.
 */
export const DEFAULT_GAS_LIMITS: Record<LedgerOperationKind, bigint> = {
  createElection: 500_000n,
  addCandidate: 300_000n,
  startElection: 300_000n,
  endElection: 300_000n,
  declareResults: 300_000n,
  registerVoter: 500_000n,
  vote: 500_000n,
};

/**
 * Maps an operation descriptor to the contract method and its positional arguments.
 */
export function toContractCall(op: LedgerOperation): { method: string; args: unknown[] } {
  switch (op.kind) {
    case 'createElection':
      return { method: op.kind, args: [op.name, op.description] };
    case 'addCandidate':
      return { method: op.kind, args: [op.electionId, op.name] };
    case 'startElection':
    case 'endElection':
    case 'declareResults':
      return { method: op.kind, args: [op.electionId] };
    case 'registerVoter':
      return { method: op.kind, args: [op.electionId, op.enrollment, op.faceHash] };
    case 'vote':
      return { method: op.kind, args: [op.electionId, op.enrollment, op.faceHash, op.candidateId] };
  }
}

// ─── RESULT DECODING ───────────────────────────────────────────────────────

function toNumber(value: unknown): number {
  if (typeof value === 'bigint' || typeof value === 'number' || typeof value === 'string') {
    return Number(value);
  }
  throw new TypeError(`Expected a numeric ledger value, got ${typeof value}`);
}

export function toLedgerElection(row: ArrayLike<unknown>): LedgerElection {
  return {
    id: toNumber(row[0]),
    name: String(row[1]),
    description: String(row[2]),
    phase: phaseFromWire(toNumber(row[3])),
    candidateCount: toNumber(row[4]),
    totalVotes: toNumber(row[5]),
    createdAt: toNumber(row[6]),
    startedAt: toNumber(row[7]),
    endedAt: toNumber(row[8]),
  };
}

export function toLedgerCandidate(row: ArrayLike<unknown>): LedgerCandidate {
  return { id: toNumber(row[0]), name: String(row[1]), votes: toNumber(row[2]) };
}

/**
 * Decodes a fixed-width bytes field holding text: trailing zero padding is stripped,
 * then the rest is read as UTF-8 with invalid sequences replaced.
 */
export function decodeFixedBytesText(raw: unknown): string {
  if (typeof raw !== 'string' && !(raw instanceof Uint8Array)) {
    return String(raw);
  }
  const bytes = getBytes(raw);
  let end = bytes.length;
  while (end > 0 && bytes[end - 1] === 0) end--;
  return toUtf8String(bytes.subarray(0, end), Utf8ErrorFuncs.replace);
}

export function toLedgerReceipt(row: ArrayLike<unknown>): LedgerReceipt {
  return {
    receiptId: toNumber(row[0]),
    electionId: toNumber(row[1]),
    visibleTag: decodeFixedBytesText(row[2]),
    timestamp: toNumber(row[3]),
    exists: row[4] === true,
  };
}

/**
 * Ledger client over JSON-RPC. Reads are plain contract calls; every mutation is simulated,
 * signed with the configured signer and confirmed through the single-writer queue.
 */
export class ElectionLedgerService extends SmartContractService implements ElectionLedger {
  private readonly contract: Contract;

  constructor(
    private readonly contractAddress: string,
    signer: Signer,
    options: SmartContractServiceOptions = {}
  ) {
    super(signer, options);
    this.contract = new Contract(contractAddress, ELECTION_LEDGER_ABI, signer);
  }

  // ─── READS ─────────────────────────────────────────────────────────

  private async read<T>(operation: string, call: () => Promise<T>): Promise<T> {
    try {
      return await call();
    } catch (err) {
      throw normalizeLedgerError(err, operation);
    }
  }

  async getElectionCount(): Promise<number> {
    return this.read('getElectionCount', async () => toNumber(await this.contract.getFunction('getElectionCount')()));
  }

  async getElection(electionId: number): Promise<LedgerElection> {
    return this.read('getElection', async () =>
      toLedgerElection(await this.contract.getFunction('getElection')(electionId))
    );
  }

  async getCandidate(electionId: number, candidateId: number): Promise<LedgerCandidate> {
    return this.read('getCandidate', async () =>
      toLedgerCandidate(await this.contract.getFunction('getCandidate')(electionId, candidateId))
    );
  }

  async getElectionPhase(electionId: number): Promise<LedgerPhaseName> {
    return this.read('getElectionPhase', async () =>
      phaseFromWire(toNumber(await this.contract.getFunction('getElectionPhase')(electionId)))
    );
  }

  async getVoteReceipt(receiptId: number): Promise<LedgerReceipt> {
    return this.read('getVoteReceipt', async () =>
      toLedgerReceipt(await this.contract.getFunction('getVoteReceipt')(receiptId))
    );
  }

  async getGlobalReceiptCounter(): Promise<number> {
    return this.read('globalReceiptCounter', async () =>
      toNumber(await this.contract.getFunction('globalReceiptCounter')())
    );
  }

  async getBlockNumber(): Promise<number> {
    return this.read('getBlockNumber', () => this.requireProvider().getBlockNumber());
  }

  async getChainId(): Promise<string> {
    return this.read('getChainId', async () => (await this.requireProvider().getNetwork()).chainId.toString());
  }

  async hasContractCode(): Promise<boolean> {
    return this.read('getCode', async () => (await this.requireProvider().getCode(this.contractAddress)) !== '0x');
  }

  private requireProvider() {
    const provider = this.signer.provider;
    if (!provider) {
      throw new Error('Signer must have a provider attached');
    }
    return provider;
  }

  // ─── WRITES ────────────────────────────────────────────────────────

  /**
   * Submits one mutation and waits for it to be confirmed.
   */
  submit(op: LedgerOperation, options: LedgerSubmitOptions = {}): Promise<ConfirmedTx<null>> {
    return this.submitOperation(op, async () => null, options);
  }

  private submitOperation<T>(
    op: LedgerOperation,
    handleReceipt: (receipt: MinedReceipt) => Promise<T>,
    options: LedgerSubmitOptions
  ): Promise<ConfirmedTx<T>> {
    const { method, args } = toContractCall(op);
    const fn = this.contract.getFunction(method);
    return this.submitTx(
      {
        operation: method,
        gasLimit: BigInt(options.gasLimit ?? DEFAULT_GAS_LIMITS[op.kind]),
        simulate: () => fn.staticCall(...args),
        send: (overrides) => fn.send(...args, overrides),
        handleReceipt,
      },
      options.timeoutMs
    ).then((confirmed) => {
      logAudit(method, { txHash: confirmed.txHash, blockNumber: confirmed.blockNumber });
      return confirmed;
    });
  }

  async createElection(
    name: string,
    description: string,
    options: LedgerSubmitOptions = {}
  ): Promise<ElectionCreatedResult> {
    // Runs inside the writer queue, so no other creation can land between confirmation and this read
    const confirmed = await this.submitOperation(
      { kind: 'createElection', name, description },
      () => this.getElectionCount(),
      options
    );
    return { txHash: confirmed.txHash, blockNumber: confirmed.blockNumber, electionId: confirmed.result };
  }

  async addCandidate(electionId: number, name: string, options: LedgerSubmitOptions = {}): Promise<LedgerTxResult> {
    return this.toTxResult(await this.submit({ kind: 'addCandidate', electionId, name }, options));
  }

  async startElection(electionId: number, options: LedgerSubmitOptions = {}): Promise<LedgerTxResult> {
    return this.toTxResult(await this.submit({ kind: 'startElection', electionId }, options));
  }

  async endElection(electionId: number, options: LedgerSubmitOptions = {}): Promise<LedgerTxResult> {
    return this.toTxResult(await this.submit({ kind: 'endElection', electionId }, options));
  }

  async declareResults(electionId: number, options: LedgerSubmitOptions = {}): Promise<LedgerTxResult> {
    return this.toTxResult(await this.submit({ kind: 'declareResults', electionId }, options));
  }

  async registerVoter(
    electionId: number,
    enrollment: string,
    faceHash: string,
    options: LedgerSubmitOptions = {}
  ): Promise<LedgerTxResult> {
    return this.toTxResult(await this.submit({ kind: 'registerVoter', electionId, enrollment, faceHash }, options));
  }

  async vote(
    electionId: number,
    enrollment: string,
    faceHash: string,
    candidateId: number,
    options: LedgerSubmitOptions = {}
  ): Promise<VoteTxResult> {
    const confirmed = await this.submitOperation(
      { kind: 'vote', electionId, enrollment, faceHash, candidateId },
      (receipt) => this.receiptIdFrom(receipt),
      options
    );
    return { txHash: confirmed.txHash, blockNumber: confirmed.blockNumber, receiptId: confirmed.result };
  }

  /**
   * Reads the receipt id from the VoteCast log, falling back to the global counter.
   */
  private async receiptIdFrom(receipt: MinedReceipt): Promise<number> {
    try {
      const fromLog = this.findVoteCastReceiptId(receipt.logs);
      if (fromLog !== null) return fromLog;
    } catch (err) {
      logger.warn(`VoteCast log in ${receipt.hash} could not be decoded, reading globalReceiptCounter`, err);
    }
    return this.getGlobalReceiptCounter();
  }

  private findVoteCastReceiptId(logs: readonly Log[]): number | null {
    const event = this.contract.interface.getEvent('VoteCast');
    if (!event) return null;

    for (const log of logs) {
      if (log.address.toLowerCase() !== this.contractAddress.toLowerCase()) continue;
      if (log.topics[0] !== event.topicHash) continue;
      const args = this.contract.interface.decodeEventLog(event, log.data, log.topics);
      return toNumber(args[0]);
    }
    return null;
  }

  private toTxResult(confirmed: ConfirmedTx<unknown>): LedgerTxResult {
    return { txHash: confirmed.txHash, blockNumber: confirmed.blockNumber };
  }
}
