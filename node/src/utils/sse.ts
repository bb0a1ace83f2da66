// node/src/utils/sse.ts
import type { Response } from 'express';
import { componentLogger } from '@/services/logger';

const log = componentLogger('sse');

export class SSE {
  private initialized = false;
  private closed = false;

  constructor(private readonly res: Response) {
    res.on('close', () => {
      this.closed = true;
    });
  }

  /**
   * Initialize the SSE stream with headers.
   */
  init(): void {
    if (this.initialized) return;

    this.res.setHeader('Content-Type', 'text/event-stream');
    this.res.setHeader('Cache-Control', 'no-cache, no-transform');
    this.res.setHeader('Connection', 'keep-alive');
    this.res.flushHeaders();

    this.initialized = true;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Send a named event. Objects are spread into the payload next to "type";
   * anything else goes under "data".
   *
   * event: status
   * data: {"type":"status","text":"..."}
   */
  send(type: string, data: unknown): void {
    if (this.closed) return;
    if (!this.initialized) this.init();

    const payload =
      data !== null && typeof data === 'object' && !Array.isArray(data)
        ? { type, ...data }
        : { type, data: data ?? null };

    this.res.write(`event: ${type}\ndata: ${JSON.stringify(payload)}\n\n`);
  }

  /**
   * Close the SSE stream connection.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    try {
      this.res.end();
    } catch (err: unknown) {
      log.error('error closing SSE stream', { error: err instanceof Error ? err.message : String(err) });
    }
  }
}
