import { type JSONRPCMessage } from '@modelcontextprotocol/sdk/types.js';
import { type EventStore } from '@modelcontextprotocol/sdk/server/streamableHttp.js';

interface StoredEvent {
  eventId: string
  message: JSONRPCMessage
}

/**
 * Keeps the most recent events of each SSE stream so a reconnecting client
 * can resume from its Last-Event-ID. Event ids are `<streamId>:<sequence>`.
 */
export class InMemoryEventStore implements EventStore {
  private readonly streams = new Map<string, StoredEvent[]>();
  private sequence = 0;

  constructor (private readonly maxEventsPerStream = 500) {}

  private static streamIdOf (eventId: string): string {
    const separator = eventId.lastIndexOf(':');
    return separator > 0 ? eventId.slice(0, separator) : '';
  }

  async storeEvent (streamId: string, message: JSONRPCMessage): Promise<string> {
    this.sequence += 1;
    const eventId = `${streamId}:${this.sequence}`;
    const events = this.streams.get(streamId) ?? [];
    events.push({ eventId, message });
    if (events.length > this.maxEventsPerStream) {
      events.splice(0, events.length - this.maxEventsPerStream);
    }
    this.streams.set(streamId, events);
    return eventId;
  }

  async replayEventsAfter (
    lastEventId: string,
    { send }: { send: (eventId: string, message: JSONRPCMessage) => Promise<void> }
  ): Promise<string> {
    const streamId = InMemoryEventStore.streamIdOf(lastEventId);
    const events = this.streams.get(streamId);
    if (events === undefined) {
      return '';
    }

    const position = events.findIndex(event => event.eventId === lastEventId);
    if (position === -1) {
      return '';
    }

    for (const { eventId, message } of events.slice(position + 1)) {
      await send(eventId, message);
    }
    return streamId;
  }

  clear (): void {
    this.streams.clear();
  }
}
