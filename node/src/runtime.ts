/**
 * Wires the bus, the session store, the workers and the coordinator from config.
 * Providers are injectable so tests can run the whole pipeline in process.
 */
import { MessageBus } from '@/bus/messageBus';
import type { AppConfig } from '@/config/app.config';
import { Coordinator } from '@/coordinator/coordinator';
import { InMemorySessionStore } from '@/memory/InMemorySessionStore';
import type { SessionStore } from '@/memory/SessionStore';
import { axiosJsonFetcher, type JsonFetcher } from '@/services/http';
import { OpenAiLlmClient, type LlmClient } from '@/services/llm-client';
import { componentLogger } from '@/services/logger';
import { createCommunityWorker } from '@/workers/communityWorker';
import { createGeneralWorker } from '@/workers/generalWorker';
import { createGeocodeWorker } from '@/workers/geocodeWorker';
import { createPoiWorker } from '@/workers/poiWorker';
import { createScopingWorker } from '@/workers/scopingWorker';
import { createSearchWorker } from '@/workers/searchWorker';
import { registerWorker } from '@/workers/worker';

const log = componentLogger('runtime');

export interface RuntimeDeps {
  fetcher?: JsonFetcher;
  llm?: LlmClient;
  store?: SessionStore;
  /** Skip registering the bundled workers; callers register their own. */
  withoutWorkers?: boolean;
}

export interface Runtime {
  bus: MessageBus;
  store: SessionStore;
  coordinator: Coordinator;
  shutdown(): void;
}

export function createRuntime(config: AppConfig, deps: RuntimeDeps = {}): Runtime {
  const bus = new MessageBus();
  const store =
    deps.store ??
    new InMemorySessionStore({
      ttlMinutes: config.sessions.ttlMinutes,
      maxSessions: config.sessions.maxSessions,
    });
  const fetcher = deps.fetcher ?? axiosJsonFetcher;
  const llm = deps.llm ?? new OpenAiLlmClient({ apiKey: config.openai.apiKey, model: config.openai.model });

  const unregister: Array<() => void> = [];
  if (!deps.withoutWorkers) {
    unregister.push(
      registerWorker(
        bus,
        createScopingWorker({
          llm,
          maxConversations: config.sessions.maxSessions,
          historyTtlMs: config.sessions.ttlMinutes * 60 * 1000,
        }).worker,
      ),
      registerWorker(bus, createGeneralWorker(llm)),
      registerWorker(bus, createSearchWorker({ fetcher, llm, searxngUrl: config.searxng.url })),
      registerWorker(bus, createGeocodeWorker({ fetcher, token: config.mapbox.token })),
      registerWorker(
        bus,
        createPoiWorker({ fetcher, token: config.mapbox.token, limitPerCategory: config.poi.limitPerCategory }),
      ),
      registerWorker(bus, createCommunityWorker({ fetcher, llm, tavilyApiKey: config.tavily.apiKey })),
    );
    const missing = [
      !config.openai.apiKey && 'OPENAI_API_KEY',
      !config.searxng.url && 'SEARXNG_URL',
      !config.mapbox.token && 'MAPBOX_API_KEY',
      !config.tavily.apiKey && 'TAVILY_API_KEY',
    ].filter((key): key is string => typeof key === 'string');
    if (missing.length > 0) log.warn(`not configured: ${missing.join(', ')}; those stages will report failures`);
  }

  const coordinator = new Coordinator(
    bus,
    store,
    { ...config.coordinator, mapboxToken: config.mapbox.token },
    config.sessions.keyMode,
  );
  coordinator.start();

  return {
    bus,
    store,
    coordinator,
    shutdown() {
      coordinator.shutdown();
      unregister.forEach((fn) => fn());
      store.destroy();
    },
  };
}
