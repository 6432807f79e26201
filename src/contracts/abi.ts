/**
 * Human-readable ABI of the election ledger contract, limited to the members this engine uses.
 */
export const ELECTION_LEDGER_ABI = [
  'function getElectionCount() view returns (uint256)',
  'function getElection(uint256 electionId) view returns (uint256 id, string name, string description, uint8 phase, uint256 candidateCount, uint256 totalVotes, uint256 createdAt, uint256 startedAt, uint256 endedAt)',
  'function getCandidate(uint256 electionId, uint256 candidateId) view returns (uint256 id, string name, uint256 votes)',
  'function getElectionPhase(uint256 electionId) view returns (uint8)',
  'function getVoteReceipt(uint256 receiptId) view returns (uint256 receiptId, uint256 electionId, bytes32 visibleTag, uint256 timestamp, bool exists)',
  'function globalReceiptCounter() view returns (uint256)',
  'function createElection(string name, string description)',
  'function addCandidate(uint256 electionId, string name)',
  'function startElection(uint256 electionId)',
  'function endElection(uint256 electionId)',
  'function declareResults(uint256 electionId)',
  'function registerVoter(uint256 electionId, string enrollment, bytes32 faceHash)',
  'function vote(uint256 electionId, string enrollment, bytes32 faceHash, uint256 candidateId)',
  'event VoteCast(uint256 indexed receiptId, uint256 indexed electionId)',
] as const;
