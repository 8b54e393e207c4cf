/**
 * Diagnostics and observability for the checker
 *
 * Uses Node.js diagnostics_channel for emitting fetch and state events.
 */
import diagnostics_channel from 'node:diagnostics_channel';
import type { DiagnosisState, RelationKind } from './types.mjs';
import type { TransportError } from './errors.mjs';

/**
 * Channel names
 */
export const CHANNELS = {
  FETCH_START: 'http-conformance:fetch:start',
  FETCH_END: 'http-conformance:fetch:end',
  FETCH_ERROR: 'http-conformance:fetch:error',
  STATE_CHANGE: 'http-conformance:diagnosis:state',
} as const;

interface FetchEventBase {
  timestamp: number;
  uri: string;
  method: string;
  relation?: RelationKind;
}

export interface FetchStartEvent extends FetchEventBase {
  name: 'fetch:start';
}

export interface FetchEndEvent extends FetchEventBase {
  name: 'fetch:end';
  duration: number;
  /** Response bytes received */
  bytes: number;
}

export interface FetchErrorEvent extends FetchEventBase {
  name: 'fetch:error';
  duration: number;
  error: TransportError;
}

export interface StateChangeEvent {
  name: 'diagnosis:state';
  timestamp: number;
  uri: string;
  relation?: RelationKind;
  from?: DiagnosisState;
  to: DiagnosisState;
}

export type DiagnosticsEvent = FetchStartEvent | FetchEndEvent | FetchErrorEvent | StateChangeEvent;

type EventName = DiagnosticsEvent['name'];
type EventOf<N extends EventName> = Extract<DiagnosticsEvent, { name: N }>;

const CHANNEL_FOR: { [N in EventName]: string } = {
  'fetch:start': CHANNELS.FETCH_START,
  'fetch:end': CHANNELS.FETCH_END,
  'fetch:error': CHANNELS.FETCH_ERROR,
  'diagnosis:state': CHANNELS.STATE_CHANGE,
};

function isEvent<N extends EventName>(message: unknown, name: N): message is EventOf<N> {
  return typeof message === 'object' && message !== null && 'name' in message && message.name === name;
}

/**
 * Publish an event on its channel when anyone is listening
 */
export function publish(event: DiagnosticsEvent): void {
  const channel = diagnostics_channel.channel(CHANNEL_FOR[event.name]);
  if (channel.hasSubscribers) {
    channel.publish(event);
  }
}

function subscribe<N extends EventName>(name: N, handler: (event: EventOf<N>) => void): () => void {
  const channel = diagnostics_channel.channel(CHANNEL_FOR[name]);
  const listener = (message: unknown) => {
    if (isEvent(message, name)) {
      handler(message);
    }
  };
  channel.subscribe(listener);
  return () => {
    channel.unsubscribe(listener);
  };
}

/**
 * Subscribe to fetch start events
 */
export function onFetchStart(handler: (event: FetchStartEvent) => void): () => void {
  return subscribe('fetch:start', handler);
}

/**
 * Subscribe to fetch end events
 */
export function onFetchEnd(handler: (event: FetchEndEvent) => void): () => void {
  return subscribe('fetch:end', handler);
}

/**
 * Subscribe to fetch error events
 */
export function onFetchError(handler: (event: FetchErrorEvent) => void): () => void {
  return subscribe('fetch:error', handler);
}

/**
 * Subscribe to diagnosis state transitions
 */
export function onStateChange(handler: (event: StateChangeEvent) => void): () => void {
  return subscribe('diagnosis:state', handler);
}

/**
 * Subscribe to all events
 */
export function onAllEvents(handler: (event: DiagnosticsEvent) => void): () => void {
  const unsubscribes = [
    onFetchStart(handler),
    onFetchEnd(handler),
    onFetchError(handler),
    onStateChange(handler),
  ];

  return () => {
    for (const unsubscribe of unsubscribes) {
      unsubscribe();
    }
  };
}
