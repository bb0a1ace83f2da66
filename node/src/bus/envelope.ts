/**
 * Envelope construction and the failure contract every worker shares.
 * Workers never leak raw provider errors; they answer with a worker.failure carrying a retryable flag.
 */
import { randomUUID } from 'crypto';
import type {
  BusMessage,
  Envelope,
  Stage,
  SubtaskTag,
  WorkerAddress,
  WorkerFailure,
} from './types';

export function createEnvelope<M extends BusMessage>(
  from: WorkerAddress,
  to: WorkerAddress,
  tag: SubtaskTag,
  message: M,
): Envelope<M> {
  return { id: randomUUID(), from, to, tag, message };
}

export function workerFailure(
  stage: Stage,
  code: string,
  message: string,
  retryable: boolean,
): WorkerFailure {
  return { kind: 'worker.failure', stage, error: { code, message, retryable } };
}

/** Thrown by adapters for failures that carry their own code. */
export class WorkerError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly retryable: boolean,
  ) {
    super(message);
    this.name = 'WorkerError';
  }
}

/** Normalize a thrown value into a retryable vs non-retryable error. */
export function toRetryable(err: unknown): boolean {
  if (err instanceof WorkerError) return err.retryable;
  if (err instanceof Error) {
    const n = err.name.toLowerCase();
    const m = err.message.toLowerCase();
    if (n === 'aggregateerror') return true;
    if (m.includes('timeout') || m.includes('econnrefused') || m.includes('network')) return true;
    if (m.includes('econnreset') || m.includes('etimedout') || m.includes('circuit breaker is open')) {
      return true;
    }
  }
  return false;
}

export function toFailure(stage: Stage, err: unknown): WorkerFailure {
  if (err instanceof WorkerError) return workerFailure(stage, err.code, err.message, err.retryable);
  const message = err instanceof Error ? err.message : String(err);
  return workerFailure(stage, 'WORKER_ERROR', message, toRetryable(err));
}
