import { describe, expect, it } from 'vitest';
import { type JSONRPCMessage } from '@modelcontextprotocol/sdk/types.js';
import { InMemoryEventStore } from './inMemoryEventStore.js';

const message = (id: number): JSONRPCMessage => ({ jsonrpc: '2.0', id, method: 'ping' });

const replay = async (store: InMemoryEventStore, lastEventId: string): Promise<{ streamId: string, sent: string[] }> => {
  const sent: string[] = [];
  const streamId = await store.replayEventsAfter(lastEventId, {
    send: async eventId => { sent.push(eventId); }
  });
  return { streamId, sent };
};

describe('InMemoryEventStore', () => {
  it('replays the events of the same stream after the given id', async () => {
    const store = new InMemoryEventStore();
    const first = await store.storeEvent('stream-a', message(1));
    await store.storeEvent('stream-b', message(2));
    const third = await store.storeEvent('stream-a', message(3));
    const fourth = await store.storeEvent('stream-a', message(4));

    expect(first).toBe('stream-a:1');
    expect(await replay(store, first)).toEqual({ streamId: 'stream-a', sent: [third, fourth] });
    expect(await replay(store, fourth)).toEqual({ streamId: 'stream-a', sent: [] });
  });

  it('returns an empty stream id for unknown events', async () => {
    const store = new InMemoryEventStore();
    await store.storeEvent('stream-a', message(1));

    expect(await replay(store, 'stream-a:99')).toEqual({ streamId: '', sent: [] });
    expect(await replay(store, 'other:1')).toEqual({ streamId: '', sent: [] });
    expect(await replay(store, 'garbage')).toEqual({ streamId: '', sent: [] });
  });

  it('keeps only the newest events of each stream', async () => {
    const store = new InMemoryEventStore(2);
    const first = await store.storeEvent('s', message(1));
    const second = await store.storeEvent('s', message(2));
    const third = await store.storeEvent('s', message(3));

    expect(await replay(store, first)).toEqual({ streamId: '', sent: [] });
    expect(await replay(store, second)).toEqual({ streamId: 's', sent: [third] });

    store.clear();
    expect(await replay(store, second)).toEqual({ streamId: '', sent: [] });
  });
});
