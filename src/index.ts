export * from './ElectionEngine';

export * from './contracts';
export * from './core/errors';
export * from './core/phase';
export * from './core/enrollment';
export * from './core/types';
export { PhaseResolver } from './core/PhaseResolver';
export { ElectionService } from './core/ElectionService';
export { VotingService } from './core/VotingService';
export * from './core/StatusService';

export * from './store';
export * from './verification';
export * from './biometric';
export * from './config';
export { logger, logAudit, logAnomaly, logError } from './utils/logger';
