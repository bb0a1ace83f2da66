import type { Server } from 'http';
import axios from 'axios';
import { afterEach, describe, expect, it } from 'vitest';
import { createApp } from '@/app';
import { loadConfig } from '@/config/app.config';
import { FALLBACK_PROMPT } from '@/coordinator/intentRouter';
import { createRuntime, type Runtime } from '@/runtime';
import { defineWorker, registerWorker } from '@/workers/worker';
import { gate, scriptedLlm } from './helpers';

interface Harness {
  runtime: Runtime;
  baseUrl: string;
  close(): Promise<void>;
}

const running: Harness[] = [];

async function startServer(env: Record<string, string> = {}): Promise<Harness> {
  const config = loadConfig({
    NODE_ENV: 'test',
    STAGE_TIMEOUT_MS: '0',
    COMMUNITY_GRACE_MS: '0',
    CHAT_TIMEOUT_MS: '2000',
    ...env,
  });
  const runtime = createRuntime(config, { withoutWorkers: true, llm: scriptedLlm(() => '') });
  const server: Server = await new Promise((resolve) => {
    const listening = createApp(config, runtime).listen(0, () => resolve(listening));
  });
  const address = server.address();
  if (address === null || typeof address === 'string') throw new Error('server has no port');

  const harness: Harness = {
    runtime,
    baseUrl: `http://127.0.0.1:${address.port}`,
    close: () =>
      new Promise<void>((resolve, reject) => {
        runtime.shutdown();
        server.close((err) => (err ? reject(err) : resolve()));
      }),
  };
  running.push(harness);
  return harness;
}

function relayScoping(runtime: Runtime, agentMessage: string): void {
  registerWorker(
    runtime.bus,
    defineWorker('scoping', 'scope.request', async () => ({
      kind: 'scope.response',
      classification: { agentMessage, isComplete: false, isGeneralQuestion: false },
    })),
  );
}

const http = axios.create({ validateStatus: () => true });

afterEach(async () => {
  const harnesses = running.splice(0);
  for (const harness of harnesses) await harness.close();
});

describe('POST /api/chat', () => {
  it('answers with the final reply and the progress updates', async () => {
    const { runtime, baseUrl } = await startServer();
    relayScoping(runtime, 'What is your budget?');

    const res = await http.post(`${baseUrl}/api/chat`, { sender: 'alice', message: 'I want a house in Oakland' });

    expect(res.status).toBe(200);
    expect(res.data).toEqual({
      success: true,
      data: {
        sessionKey: 'alice',
        turnId: 1,
        reply: 'What is your budget?',
        updates: ['🔍 Processing your request...'],
      },
    });
  });

  it('answers an empty message with the welcome prompt', async () => {
    const { baseUrl } = await startServer();

    const res = await http.post(`${baseUrl}/api/chat`, { sender: 'alice', message: '   ' });

    expect(res.status).toBe(200);
    expect(res.data.data).toEqual({ sessionKey: 'alice', turnId: 1, reply: FALLBACK_PROMPT, updates: [] });
  });

  it('rejects a request without a sender', async () => {
    const { baseUrl } = await startServer();

    const res = await http.post(`${baseUrl}/api/chat`, { message: 'hi' });

    expect(res.status).toBe(400);
    expect(res.data.success).toBe(false);
    expect(res.data.code).toBe('VALIDATION_ERROR');
    expect(res.data.errors[0].path).toBe('sender');
  });

  it('gives up with 504 when no final reply arrives in time', async () => {
    const { runtime, baseUrl } = await startServer({ CHAT_TIMEOUT_MS: '100' });
    const held = gate();
    registerWorker(
      runtime.bus,
      defineWorker('scoping', 'scope.request', async () => {
        await held.promise;
        return { kind: 'scope.response', classification: { agentMessage: 'late' } };
      }),
    );

    const res = await http.post(`${baseUrl}/api/chat`, { sender: 'carol', message: 'hello' });
    held.open();
    await runtime.bus.drain();

    expect(res.status).toBe(504);
    expect(res.data).toEqual({
      success: false,
      message: 'The assistant did not answer in time',
      code: 'CHAT_TIMEOUT',
      data: { sessionKey: 'carol', turnId: 1, updates: ['🔍 Processing your request...'] },
    });
  });

  it('streams progress and the final reply as server-sent events', async () => {
    const { runtime, baseUrl } = await startServer();
    relayScoping(runtime, 'How many bedrooms?');

    const res = await http.post(
      `${baseUrl}/api/chat`,
      { sender: 'bob', message: 'find me a home', stream: true },
      { responseType: 'text' },
    );

    expect(res.status).toBe(200);
    expect(String(res.headers['content-type'])).toContain('text/event-stream');
    expect(res.data).toBe(
      'event: status\ndata: {"type":"status","text":"🔍 Processing your request..."}\n\n' +
        'event: final\ndata: {"type":"final","sessionKey":"bob","turnId":1,"text":"How many bedrooms?"}\n\n',
    );
  });
});

describe('service routes', () => {
  it('reports health with the session count', async () => {
    const { runtime, baseUrl } = await startServer();
    relayScoping(runtime, 'Where would you like to live?');
    await http.post(`${baseUrl}/api/chat`, { sender: 'dave', message: 'hi' });

    const res = await http.get(`${baseUrl}/health`);

    expect(res.status).toBe(200);
    expect(res.data.status).toBe('OK');
    expect(res.data.sessions).toBe(1);
  });

  it('returns 404 for unknown routes', async () => {
    const { baseUrl } = await startServer();

    const res = await http.get(`${baseUrl}/api/nope`);

    expect(res.status).toBe(404);
    expect(res.data).toEqual({ success: false, message: 'Route not found: GET /api/nope', code: 'NOT_FOUND' });
  });
});
