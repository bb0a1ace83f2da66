/**
 * Worker harness: binds a request handler to a bus address.
 * The handler sees only its own request type; replies carry the request's tag back to the sender.
 */
import type { MessageBus } from '@/bus/messageBus';
import { createEnvelope, toFailure } from '@/bus/envelope';
import { formatLegacyTag } from '@/bus/tags';
import type {
  Envelope,
  RequestKind,
  RequestOfKind,
  ResponseFor,
  SubtaskTag,
  WorkerAddress,
} from '@/bus/types';
import { componentLogger } from '@/services/logger';

export type WorkerHandler<K extends RequestKind> = (
  request: RequestOfKind<K>,
  tag: SubtaskTag,
) => Promise<ResponseFor[K]>;

export interface WorkerDefinition<K extends RequestKind> {
  address: WorkerAddress;
  accepts: K;
  handle: WorkerHandler<K>;
}

function isKind<K extends RequestKind>(
  envelope: Envelope,
  kind: K,
): envelope is Envelope<RequestOfKind<K>> {
  return envelope.message.kind === kind;
}

export function registerWorker<K extends RequestKind>(
  bus: MessageBus,
  worker: WorkerDefinition<K>,
): () => void {
  const log = componentLogger(`worker:${worker.address}`);

  return bus.register(worker.address, async (envelope) => {
    if (!isKind(envelope, worker.accepts)) {
      log.warn(`ignoring ${envelope.message.kind}, expected ${worker.accepts}`);
      return;
    }
    const started = Date.now();
    try {
      const response = await worker.handle(envelope.message, envelope.tag);
      bus.send(createEnvelope(worker.address, envelope.from, envelope.tag, response));
      log.debug(`${formatLegacyTag(envelope.tag)} answered in ${Date.now() - started}ms`);
    } catch (err: unknown) {
      const failure = toFailure(envelope.tag.stage, err);
      log.error(`${formatLegacyTag(envelope.tag)} failed: ${failure.error.message}`);
      bus.send(createEnvelope(worker.address, envelope.from, envelope.tag, failure));
    }
  });
}

/** Definition helper that keeps the request kind and handler type in sync. */
export function defineWorker<K extends RequestKind>(
  address: WorkerAddress,
  accepts: K,
  handle: WorkerHandler<K>,
): WorkerDefinition<K> {
  return { address, accepts, handle };
}
