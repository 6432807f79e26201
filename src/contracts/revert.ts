import { isError } from 'ethers';
import {
  AlreadyActedError,
  ConfirmationTimeoutError,
  LedgerError,
  LedgerRejectedError,
  TransportUnavailableError,
} from './errors';

/** Returned when no reason can be extracted from a failure. */
export const GENERIC_LEDGER_ERROR = 'Blockchain error';

/** Message shown to a voter whose duplicate vote was rejected. */
export const ALREADY_VOTED_MESSAGE = 'You already voted';

/** Message shown when a duplicate registration was rejected. */
export const ALREADY_REGISTERED_MESSAGE = 'Voter already registered for this election';

/**
 * The shapes a transport failure can take, in the order they are tried.
 */
export type DecodedTransportError =
  | { shape: 'reason'; reason: string }
  | { shape: 'message'; message: string }
  | { shape: 'text'; text: string }
  | { shape: 'none' };

const REVERT_MARKER = /revert (.+?)(?:['"]|$)/i;
const ALREADY_VOTED = /already voted/i;
const ALREADY_REGISTERED = /already registered/i;
const TRANSPORT_CODES = new Set(['ECONNREFUSED', 'ECONNRESET', 'ENOTFOUND', 'EAI_AGAIN', 'EHOSTUNREACH']);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function nonEmptyString(value: unknown): string | null {
  return typeof value === 'string' && value.trim() !== '' ? value.trim() : null;
}

/**
 * Collects the JSON-RPC style payloads nested in an error. ethers wraps node errors
 * under `error` and `info.error`; some nodes put the revert payload under `data`.
 */
function payloadsOf(err: Record<string, unknown>): Record<string, unknown>[] {
  const payloads: Record<string, unknown>[] = [err];
  if (isRecord(err.error)) payloads.push(err.error);
  if (isRecord(err.info) && isRecord(err.info.error)) payloads.push(err.info.error);
  return payloads;
}

function structuredReason(err: Record<string, unknown>): string | null {
  const direct = nonEmptyString(err.reason);
  if (direct) return direct;

  if (isRecord(err.revert) && Array.isArray(err.revert.args)) {
    const fromArgs = nonEmptyString(err.revert.args[0]);
    if (fromArgs) return fromArgs;
  }

  for (const payload of payloadsOf(err)) {
    if (isRecord(payload.data)) {
      const nested = nonEmptyString(payload.data.reason);
      if (nested) return nested;
    }
  }
  return null;
}

function structuredMessage(err: Record<string, unknown>): string | null {
  for (const payload of payloadsOf(err)) {
    if (isRecord(payload.data)) {
      const nested = nonEmptyString(payload.data.message);
      if (nested) return nested;
    }
  }
  // A bare payload object (not an Error instance) carries its own message field
  if (!(err instanceof Error)) {
    return nonEmptyString(err.message);
  }
  return null;
}

/**
 * Classifies a transport failure by shape. Fallback order:
 * structured reason field, structured message field, free text, nothing.
 */
export function decodeTransportError(err: unknown): DecodedTransportError {
  if (isRecord(err)) {
    const reason = structuredReason(err);
    if (reason) return { shape: 'reason', reason };

    const message = structuredMessage(err);
    if (message) return { shape: 'message', message };

    const text = err instanceof Error ? nonEmptyString(err.message) : null;
    if (text) return { shape: 'text', text };
  }

  const text = nonEmptyString(err);
  if (text) return { shape: 'text', text };

  return { shape: 'none' };
}

function reasonFromText(text: string): string | null {
  const match = REVERT_MARKER.exec(text);
  if (!match) return null;
  return nonEmptyString(match[1].replace(/^['"]|['"]$/g, ''));
}

/**
 * Extracts a single flat, human-readable revert reason from whatever the transport threw.
 * Returns {@link GENERIC_LEDGER_ERROR} when nothing usable is found.
 */
export function extractRevertReason(err: unknown): string {
  const decoded = decodeTransportError(err);
  switch (decoded.shape) {
    case 'reason':
      return decoded.reason;
    case 'message':
      return reasonFromText(decoded.message) ?? decoded.message;
    case 'text':
      return reasonFromText(decoded.text) ?? GENERIC_LEDGER_ERROR;
    case 'none':
      return GENERIC_LEDGER_ERROR;
  }
}

function isTransportFailure(err: unknown): boolean {
  if (isError(err, 'NETWORK_ERROR') || isError(err, 'SERVER_ERROR')) return true;
  if (isRecord(err) && typeof err.code === 'string' && TRANSPORT_CODES.has(err.code)) return true;
  return isRecord(err) && isRecord(err.cause) && isTransportFailure(err.cause);
}

/**
 * Maps any failure thrown during a ledger mutation onto the ledger error taxonomy.
 *
 * @param err - Whatever was thrown
 * @param operation - Name of the ledger operation
 * @param context - Transaction hash and timeout, for timeout reporting
 */
export function normalizeLedgerError(
  err: unknown,
  operation: string,
  context: { txHash?: string | null; timeoutMs?: number } = {}
): LedgerError {
  if (err instanceof LedgerError) return err;

  if (isError(err, 'TIMEOUT')) {
    return new ConfirmationTimeoutError(operation, context.txHash ?? null, context.timeoutMs ?? 0, {
      cause: err,
    });
  }

  if (isTransportFailure(err)) {
    return new TransportUnavailableError(operation, { cause: err });
  }

  const reason = extractRevertReason(err);
  if (ALREADY_VOTED.test(reason)) {
    return new AlreadyActedError(ALREADY_VOTED_MESSAGE, operation, reason);
  }
  if (ALREADY_REGISTERED.test(reason)) {
    return new AlreadyActedError(ALREADY_REGISTERED_MESSAGE, operation, reason);
  }
  return new LedgerRejectedError(reason, operation, { cause: err });
}
