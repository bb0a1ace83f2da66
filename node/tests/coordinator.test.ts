import { afterEach, describe, expect, it, vi } from 'vitest';
import { createEnvelope } from '@/bus/envelope';
import { MessageBus } from '@/bus/messageBus';
import type { GeocodeResponse, PoiResponse } from '@/bus/types';
import { Coordinator, SUPERSEDED_MESSAGE, deriveSessionKey } from '@/coordinator/coordinator';
import type { CoordinatorPolicy } from '@/coordinator/effects';
import { TIMEOUT_MESSAGES, UNAVAILABLE_MESSAGES } from '@/coordinator/fanIn';
import { FALLBACK_PROMPT } from '@/coordinator/intentRouter';
import { InMemorySessionStore } from '@/memory/InMemorySessionStore';
import type { Listing } from '@/types/estate';
import { defineWorker, registerWorker } from '@/workers/worker';
import { flushBus, gate, quietPolicy, recordingChannel } from './helpers';

const oaklandRequirements = { location: 'Oakland, CA', bedrooms: 3, bathrooms: 2, budgetMax: 900000 };

const oaklandListings: Listing[] = [
  {
    title: '123 Main St, Oakland, CA',
    address: '123 Main St, Oakland, CA',
    link: 'https://listings.example.com/1',
    price: '$850,000',
    beds: 3,
    baths: 2,
    sqft: 1500,
  },
  {
    title: '456 Oak Ave, Oakland, CA',
    address: '456 Oak Ave, Oakland, CA',
    link: 'https://listings.example.com/2',
    price: '$799,000',
  },
];

const coordinates: Record<string, [number, number]> = {
  '123 Main St, Oakland, CA': [37.8, -122.27],
  '456 Oak Ave, Oakland, CA': [37.81, -122.25],
};

let bus: MessageBus;
let store: InMemorySessionStore;
let coordinator: Coordinator;

function start(policy: Partial<CoordinatorPolicy> = quietPolicy): void {
  bus = new MessageBus();
  store = new InMemorySessionStore({ sweepIntervalMs: 0 });
  coordinator = new Coordinator(bus, store, policy);
  coordinator.start();
}

afterEach(() => {
  if (coordinator) coordinator.shutdown();
  if (store) store.destroy();
  vi.useRealTimers();
});

function scopingReturns(classification: unknown): void {
  registerWorker(
    bus,
    defineWorker('scoping', 'scope.request', async () => ({ kind: 'scope.response', classification })),
  );
}

function searchReturns(listings: Listing[], summary = 'Homes in Oakland'): void {
  registerWorker(
    bus,
    defineWorker('search', 'search.request', async () => ({
      kind: 'search.response',
      listings,
      searchSummary: summary,
      totalFound: listings.length,
      images: [{ index: 0, imageUrl: 'https://img.example.com/1.jpg' }],
    })),
  );
}

function geocodeFromTable(calls: string[], hold?: Set<string>, release?: Promise<void>): void {
  registerWorker(
    bus,
    defineWorker('geocode', 'geocode.request', async (request): Promise<GeocodeResponse> => {
      calls.push(request.address);
      if (hold?.has(request.address) && release) await release;
      const hit = coordinates[request.address];
      if (!hit) {
        return { kind: 'geocode.response', latitude: null, longitude: null, resolvedAddress: null, error: 'not found' };
      }
      return { kind: 'geocode.response', latitude: hit[0], longitude: hit[1], resolvedAddress: request.address };
    }),
  );
}

function poiNamed(calls: number[]): void {
  registerWorker(
    bus,
    defineWorker('poi', 'poi.request', async (request): Promise<PoiResponse> => {
      calls.push(request.listingIndex);
      return {
        kind: 'poi.response',
        listingIndex: request.listingIndex,
        points: [
          {
            name: request.listingIndex === 0 ? 'Lincoln Elementary' : 'Oak Park',
            category: request.listingIndex === 0 ? 'school' : 'park',
            latitude: request.latitude,
            longitude: request.longitude,
            address: '',
            distanceMeters: request.listingIndex === 0 ? 350 : 1200,
          },
        ],
      };
    }),
  );
}

function communityScores(release?: Promise<void>): void {
  registerWorker(
    bus,
    defineWorker('community', 'community.request', async (request) => {
      if (release) await release;
      return {
        kind: 'community.response',
        location: request.locationName,
        overallScore: 7.5,
        overallExplanation: 'Lively and diverse',
        safetyScore: null,
        schoolScore: null,
        schoolExplanation: null,
        housingPricePerSqft: null,
        avgHouseSizeSqft: null,
        positiveStories: [],
        negativeStories: [],
      };
    }),
  );
}

// ---------------------------------------------------------------------------
// Full property search
// ---------------------------------------------------------------------------

describe('Coordinator property search', () => {
  it('answers once with listings, coordinates, nearby places and the community block', async () => {
    start({ ...quietPolicy, communityGraceMs: 1000 });
    const geocodeCalls: string[] = [];
    const poiCalls: number[] = [];
    scopingReturns({ isComplete: true, requirements: oaklandRequirements, communityName: 'Oakland' });
    searchReturns(oaklandListings);
    geocodeFromTable(geocodeCalls);
    poiNamed(poiCalls);
    communityScores();

    const recorder = recordingChannel();
    const handle = await coordinator.handleUserMessage({
      sender: 'alice',
      text: 'Find me a 3 bed 2 bath home in Oakland under 900k',
      channel: recorder.channel,
    });
    await bus.drain();

    expect(handle).toEqual({ sessionKey: 'alice', turnId: 1 });
    expect(geocodeCalls.sort()).toEqual(['123 Main St, Oakland, CA', '456 Oak Ave, Oakland, CA']);
    expect(poiCalls.sort()).toEqual([0, 1]);

    const finals = recorder.finals();
    expect(finals).toHaveLength(1);
    const [text] = finals;
    expect(text.startsWith('# 🏠 Property Search Results\n\n**Homes in Oakland**\n\nFound **2** properties')).toBe(true);
    expect(text).toContain(
      '## Property 1\n\n### 📍 123 Main St, Oakland, CA\n\n![Property Image](https://img.example.com/1.jpg)\n\n' +
        '**💰 Price:** $850,000\n\n**🏡 Details:** 3 beds | 2 baths | 1500 sqft\n\n' +
        '**📌 Coordinates:** 37.8, -122.27\n\n**🔗 Listing:** https://listings.example.com/1\n\n' +
        '**🗺️ Nearby:**\n\n- Lincoln Elementary (school, 350 m)\n\n---\n\n',
    );
    expect(text).toContain('**📌 Coordinates:** 37.81, -122.25');
    expect(text).toContain('- Oak Park (park, 1.2 km)\n');
    expect(text).toContain('## 🏘️ Community Analysis: Oakland\n\n**Overall Score:** 7.5/10\n\n**Overview:** Lively and diverse');

    const session = await store.get('alice');
    expect(session?.turn.phase).toBe('assembled');
    expect(session?.requirements).toEqual(oaklandRequirements);
    expect(coordinator.pendingDeadlines()).toBe(0);
  });

  it('answers once when a worker delivers every reply twice', async () => {
    start();
    scopingReturns({ isComplete: true, requirements: oaklandRequirements });
    searchReturns(oaklandListings);
    geocodeFromTable([]);
    bus.register('poi', (envelope) => {
      if (envelope.message.kind !== 'poi.request') return;
      const reply: PoiResponse = {
        kind: 'poi.response',
        listingIndex: envelope.message.listingIndex,
        points: [{ name: 'Oak Park', category: 'park', latitude: 37.8, longitude: -122.27, address: '' }],
      };
      bus.send(createEnvelope('poi', envelope.from, envelope.tag, reply));
      bus.send(createEnvelope('poi', envelope.from, envelope.tag, reply));
    });

    const recorder = recordingChannel();
    await coordinator.handleUserMessage({ sender: 'alice', text: 'find homes', channel: recorder.channel });
    await bus.drain();

    expect(recorder.finals()).toHaveLength(1);
    expect(recorder.finals()[0].match(/- Oak Park \(park\)/g)).toHaveLength(2);
    const session = await store.get('alice');
    expect(session?.turn.counters.arrivedPoi).toBe(2);
    expect(session?.turn.pois).toHaveLength(2);
  });

  it('sends progress updates before the final answer', async () => {
    start({ ...quietPolicy, progressUpdates: true });
    scopingReturns({ isComplete: true, requirements: oaklandRequirements });
    searchReturns(oaklandListings);
    geocodeFromTable([]);
    poiNamed([]);

    const recorder = recordingChannel();
    await coordinator.handleUserMessage({ sender: 'alice', text: 'find homes', channel: recorder.channel });
    await bus.drain();

    expect(recorder.updates()).toEqual([
      '🔍 Processing your request...',
      '🏠 Searching for properties...',
      '📍 Found 2 properties! Gathering location details...',
    ]);
    expect(recorder.replies[recorder.replies.length - 1].final).toBe(true);
  });

  it('renders an empty result straight from the search summary', async () => {
    start();
    const geocodeCalls: string[] = [];
    scopingReturns({ isComplete: true, requirements: oaklandRequirements });
    searchReturns([], 'No properties found matching your search. Try adjusting your search terms.');
    geocodeFromTable(geocodeCalls);

    const recorder = recordingChannel();
    await coordinator.handleUserMessage({ sender: 'alice', text: 'find homes', channel: recorder.channel });
    await bus.drain();

    expect(geocodeCalls).toEqual([]);
    expect(recorder.finals()).toEqual(['No properties found matching your search. Try adjusting your search terms.']);
  });

  it('fans out to at most the cap', async () => {
    start({ ...quietPolicy, fanOutCap: 5 });
    const many: Listing[] = Array.from({ length: 7 }, (_, i) => ({
      title: `${i} Elm St`,
      address: `${i} Elm St, Oakland, CA`,
    }));
    const geocodeCalls: string[] = [];
    scopingReturns({ isComplete: true, requirements: oaklandRequirements });
    searchReturns(many);
    geocodeFromTable(geocodeCalls);

    const recorder = recordingChannel();
    await coordinator.handleUserMessage({ sender: 'alice', text: 'find homes', channel: recorder.channel });
    await bus.drain();

    expect(geocodeCalls).toHaveLength(5);
    const [text] = recorder.finals();
    expect(text).toContain('## Property 5');
    expect(text).not.toContain('## Property 6');
    expect(text).toContain('Found **7** properties');
  });
});

// ---------------------------------------------------------------------------
// Other routes
// ---------------------------------------------------------------------------

describe('Coordinator routes', () => {
  it('answers general questions through the general worker', async () => {
    start({ ...quietPolicy, progressUpdates: true });
    scopingReturns({ isGeneralQuestion: true, generalQuestion: 'Is Oakland safe?' });
    registerWorker(
      bus,
      defineWorker('general', 'general.request', async (request) => ({
        kind: 'general.response',
        answer: `About "${request.question}": mostly, depending on the neighbourhood.`,
      })),
    );

    const recorder = recordingChannel();
    await coordinator.handleUserMessage({ sender: 'bob', text: 'Is Oakland safe?', channel: recorder.channel });
    await bus.drain();

    expect(recorder.updates()).toEqual(['🔍 Processing your request...', '💬 Answering your question...']);
    expect(recorder.finals()).toEqual(['About "Is Oakland safe?": mostly, depending on the neighbourhood.']);
  });

  it('relays the scoping question while requirements are incomplete', async () => {
    start();
    scopingReturns({ isComplete: false, agentMessage: 'What is your budget?' });

    const recorder = recordingChannel();
    await coordinator.handleUserMessage({ sender: 'bob', text: 'I want a house', channel: recorder.channel });
    await bus.drain();

    expect(recorder.finals()).toEqual(['What is your budget?']);
  });

  it('prompts for details on an empty message without calling scoping', async () => {
    start();
    let scoped = 0;
    registerWorker(
      bus,
      defineWorker('scoping', 'scope.request', async () => {
        scoped++;
        return { kind: 'scope.response', classification: {} };
      }),
    );

    const recorder = recordingChannel();
    await coordinator.handleUserMessage({ sender: 'bob', text: '   ', channel: recorder.channel });
    await bus.drain();

    expect(scoped).toBe(0);
    expect(recorder.finals()).toEqual([FALLBACK_PROMPT]);
  });

  it('tells the user when scoping is unreachable', async () => {
    start();
    const recorder = recordingChannel();
    await coordinator.handleUserMessage({ sender: 'bob', text: 'hello', channel: recorder.channel });
    await bus.drain();

    expect(recorder.finals()).toEqual([UNAVAILABLE_MESSAGES.scope]);
  });

  it('tells the user when the search worker fails', async () => {
    start();
    scopingReturns({ isComplete: true, requirements: oaklandRequirements });
    registerWorker(
      bus,
      defineWorker('search', 'search.request', async () => {
        throw new Error('searxng down');
      }),
    );

    const recorder = recordingChannel();
    await coordinator.handleUserMessage({ sender: 'bob', text: 'find homes', channel: recorder.channel });
    await bus.drain();

    expect(recorder.finals()).toEqual([UNAVAILABLE_MESSAGES.search]);
  });
});

// ---------------------------------------------------------------------------
// Turns
// ---------------------------------------------------------------------------

describe('Coordinator turns', () => {
  it('supersedes an unfinished turn and ignores its stale reply', async () => {
    start();
    const firstScope = gate();
    let calls = 0;
    registerWorker(
      bus,
      defineWorker('scoping', 'scope.request', async () => {
        calls++;
        if (calls === 1) {
          await firstScope.promise;
          return { kind: 'scope.response', classification: { agentMessage: 'answer to the first message' } };
        }
        return { kind: 'scope.response', classification: { agentMessage: 'How many bedrooms?' } };
      }),
    );

    const first = recordingChannel();
    const second = recordingChannel();
    await coordinator.handleUserMessage({ sender: 'carol', text: 'first', channel: first.channel });
    await flushBus();
    const handle = await coordinator.handleUserMessage({ sender: 'carol', text: 'second', channel: second.channel });
    await flushBus();

    firstScope.open();
    await bus.drain();

    expect(handle.turnId).toBe(2);
    expect(first.finals()).toEqual([SUPERSEDED_MESSAGE]);
    expect(second.finals()).toEqual(['How many bedrooms?']);
  });

  it('keeps sessions of different senders apart', async () => {
    start();
    scopingReturns({ agentMessage: 'Which city?' });

    const alice = recordingChannel();
    const bob = recordingChannel();
    await Promise.all([
      coordinator.handleUserMessage({ sender: 'alice', text: 'hi', channel: alice.channel }),
      coordinator.handleUserMessage({ sender: 'bob', text: 'hi', channel: bob.channel }),
    ]);
    await bus.drain();

    expect(alice.finals()).toEqual(['Which city?']);
    expect(bob.finals()).toEqual(['Which city?']);
    expect(store.size()).toBe(2);
  });

  it('derives per-turn session keys in sender-timestamp mode', () => {
    expect(deriveSessionKey('alice', 'sender', 1700000000000)).toBe('alice');
    expect(deriveSessionKey('alice', 'sender-timestamp', 1700000000000)).toBe('alice@1700000000000');
  });
});

// ---------------------------------------------------------------------------
// Deadlines
// ---------------------------------------------------------------------------

describe('Coordinator deadlines', () => {
  it('ends a turn whose scoping never answers', async () => {
    vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout'] });
    start({ ...quietPolicy, stageTimeoutMs: 1000 });
    const never = gate();
    registerWorker(
      bus,
      defineWorker('scoping', 'scope.request', async () => {
        await never.promise;
        return { kind: 'scope.response', classification: {} };
      }),
    );

    const recorder = recordingChannel();
    await coordinator.handleUserMessage({ sender: 'dave', text: 'hello', channel: recorder.channel });
    await flushBus();
    expect(coordinator.pendingDeadlines()).toBe(1);

    vi.advanceTimersByTime(1000);
    await flushBus();

    expect(recorder.finals()).toEqual([TIMEOUT_MESSAGES.scope]);
    expect(coordinator.pendingDeadlines()).toBe(0);
    never.open();
  });

  it('finishes with partial data when a geocode stalls', async () => {
    vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout'] });
    start({ ...quietPolicy, stageTimeoutMs: 1000 });
    const stalled = gate();
    scopingReturns({ isComplete: true, requirements: oaklandRequirements });
    searchReturns(oaklandListings);
    geocodeFromTable([], new Set(['456 Oak Ave, Oakland, CA']), stalled.promise);
    poiNamed([]);

    const recorder = recordingChannel();
    await coordinator.handleUserMessage({ sender: 'dave', text: 'find homes', channel: recorder.channel });
    await flushBus();
    expect(recorder.finals()).toEqual([]);

    vi.advanceTimersByTime(1000);
    await flushBus();

    const [text] = recorder.finals();
    expect(text).toContain('**📌 Coordinates:** 37.8, -122.27');
    expect(text).not.toContain('37.81');
    expect(text).toContain('## Property 2');

    stalled.open();
    await bus.drain();
    expect(recorder.finals()).toHaveLength(1);
    const session = await store.get('dave');
    expect(session?.turn.geocoded).toHaveLength(2);
  });

  it('stops waiting for the community analysis after the grace window', async () => {
    vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout'] });
    start({ ...quietPolicy, communityGraceMs: 500 });
    const slow = gate();
    scopingReturns({ isComplete: true, requirements: oaklandRequirements, communityName: 'Oakland' });
    searchReturns([]);
    communityScores(slow.promise);

    const recorder = recordingChannel();
    await coordinator.handleUserMessage({ sender: 'erin', text: 'find homes', channel: recorder.channel });
    await flushBus();
    expect(recorder.finals()).toEqual([]);
    expect(coordinator.pendingDeadlines()).toBe(1);

    vi.advanceTimersByTime(500);
    await flushBus();
    expect(recorder.finals()).toEqual(['Homes in Oakland']);

    slow.open();
    await bus.drain();
    expect(recorder.finals()).toHaveLength(1);
    const session = await store.get('erin');
    expect(session?.turn.communityAnalysis?.overallScore).toBe(7.5);
  });
});
