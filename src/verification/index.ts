export * from './types';
export { VerificationService, compareReceipt } from './VerificationService';
