import type { ElectionLedger } from '../contracts/types';
import type { LedgerCache } from '../store';

export interface LedgerStatus {
  ok: boolean;
  detail: string;
  blockNumber: number | null;
  chainId: string | null;
}

export interface ContractStatus {
  ok: boolean;
  detail: string;
  hasCode: boolean;
  electionCount: number | null;
}

export interface CacheStatus {
  ok: boolean;
  detail: string;
  elections: number | null;
  voters: number | null;
  receipts: number | null;
}

export interface SystemStatus {
  ledger: LedgerStatus;
  contract: ContractStatus;
  cache: CacheStatus;
  overall: boolean;
}

function describe(reason: unknown): string {
  return reason instanceof Error ? reason.message : String(reason);
}

/**
 * Health of the ledger node, the election contract and the local cache. Reports failures
 * in the result rather than throwing them.
 */
export class StatusService {
  constructor(
    private readonly ledger: ElectionLedger,
    private readonly cache: LedgerCache
  ) {}

  async getStatus(): Promise<SystemStatus> {
    const [ledger, contract] = await Promise.all([this.ledgerStatus(), this.contractStatus()]);
    const cache = this.cacheStatus();
    return { ledger, contract, cache, overall: ledger.ok && contract.ok && cache.ok };
  }

  private async ledgerStatus(): Promise<LedgerStatus> {
    const [block, chain] = await Promise.allSettled([this.ledger.getBlockNumber(), this.ledger.getChainId()]);
    if (block.status === 'rejected') {
      return { ok: false, detail: describe(block.reason), blockNumber: null, chainId: null };
    }
    const chainId = chain.status === 'fulfilled' ? chain.value : null;
    return { ok: true, detail: `Connected at block ${block.value}`, blockNumber: block.value, chainId };
  }

  private async contractStatus(): Promise<ContractStatus> {
    try {
      const hasCode = await this.ledger.hasContractCode();
      if (!hasCode) {
        return { ok: false, detail: 'No contract code at the configured address', hasCode, electionCount: null };
      }
      const electionCount = await this.ledger.getElectionCount();
      return { ok: true, detail: `${electionCount} elections on the ledger`, hasCode, electionCount };
    } catch (err) {
      return { ok: false, detail: describe(err), hasCode: false, electionCount: null };
    }
  }

  private cacheStatus(): CacheStatus {
    try {
      const elections = this.cache.elections.count();
      const voters = this.cache.voters.count();
      const receipts = this.cache.receipts.count();
      return { ok: true, detail: `${voters} voters, ${elections} elections cached`, elections, voters, receipts };
    } catch (err) {
      return { ok: false, detail: describe(err), elections: null, voters: null, receipts: null };
    }
  }
}
