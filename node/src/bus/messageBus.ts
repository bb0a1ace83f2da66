/**
 * In-process message bus between the coordinator and the workers.
 *
 * Delivery is asynchronous and unordered across senders: each send is handed to
 * its own macrotask and every handler invocation runs independently. Sending to
 * an address nobody listens on bounces a worker.failure back to the sender so
 * the coordinator can end the turn instead of waiting forever.
 */
import { componentLogger } from '@/services/logger';
import { createEnvelope, workerFailure } from './envelope';
import { formatLegacyTag } from './tags';
import type { Envelope, WorkerAddress } from './types';

export type EnvelopeHandler = (envelope: Envelope) => Promise<void> | void;

const log = componentLogger('bus');

export class MessageBus {
  private readonly handlers = new Map<WorkerAddress, EnvelopeHandler>();
  private inFlight = 0;
  private idleWaiters: Array<() => void> = [];
  private delivered = 0;

  /**
   * Register the single handler for an address.
   * @returns Unregister function.
   */
  register(address: WorkerAddress, handler: EnvelopeHandler): () => void {
    if (this.handlers.has(address)) {
      throw new Error(`Address already registered: ${address}`);
    }
    this.handlers.set(address, handler);
    log.debug(`registered ${address}`);
    return () => {
      if (this.handlers.get(address) === handler) this.handlers.delete(address);
    };
  }

  isRegistered(address: WorkerAddress): boolean {
    return this.handlers.has(address);
  }

  send(envelope: Envelope): void {
    this.inFlight++;
    setImmediate(() => {
      this.deliver(envelope)
        .catch((err: unknown) => {
          log.error(`delivery to ${envelope.to} failed`, {
            tag: formatLegacyTag(envelope.tag),
            kind: envelope.message.kind,
            error: err instanceof Error ? err.message : String(err),
          });
        })
        .finally(() => this.settle());
    });
  }

  /** Resolves once no delivery is pending, including those queued by handlers. */
  async drain(): Promise<void> {
    while (this.inFlight > 0) {
      await new Promise<void>((resolve) => this.idleWaiters.push(resolve));
    }
  }

  get deliveredCount(): number {
    return this.delivered;
  }

  private async deliver(envelope: Envelope): Promise<void> {
    const handler = this.handlers.get(envelope.to);
    if (!handler) {
      log.warn(`no worker at ${envelope.to}, bouncing ${envelope.message.kind}`);
      if (envelope.message.kind === 'worker.failure' || !this.handlers.has(envelope.from)) return;
      this.send(
        createEnvelope(
          envelope.to,
          envelope.from,
          envelope.tag,
          workerFailure(envelope.tag.stage, 'UNREACHABLE', `No worker registered at ${envelope.to}`, true),
        ),
      );
      return;
    }
    this.delivered++;
    await handler(envelope);
  }

  private settle(): void {
    this.inFlight--;
    if (this.inFlight === 0) {
      const waiters = this.idleWaiters;
      this.idleWaiters = [];
      waiters.forEach((resolve) => resolve());
    }
  }
}
