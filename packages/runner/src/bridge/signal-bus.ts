type SignalListener<TPayload> = (payload: TPayload) => void;

interface RegisteredListener<TPayload> {
  readonly id: number;
  readonly listener: SignalListener<TPayload>;
}

type ListenerTable<TSignalMap> = {
  [K in keyof TSignalMap]?: RegisteredListener<TSignalMap[K]>[];
};

export interface SignalBus<TSignalMap> {
  subscribe<K extends keyof TSignalMap>(signal: K, listener: SignalListener<TSignalMap[K]>): () => void;
  emit<K extends keyof TSignalMap>(signal: K, payload: TSignalMap[K]): void;
  listenerCount(signal: keyof TSignalMap): number;
  clear(): void;
}

/**
 * One append-only listener list per signal. `emit` calls the listeners
 * synchronously in registration order, over a copy taken before the first
 * call so a listener that unsubscribes mid-emit does not skip its neighbours.
 */
export function createSignalBus<TSignalMap>(): SignalBus<TSignalMap> {
  let nextId = 0;
  let listeners: ListenerTable<TSignalMap> = {};

  const listFor = <K extends keyof TSignalMap>(signal: K): RegisteredListener<TSignalMap[K]>[] => {
    const existing = listeners[signal];
    if (existing !== undefined) {
      return existing;
    }
    const created: RegisteredListener<TSignalMap[K]>[] = [];
    listeners[signal] = created;
    return created;
  };

  return {
    subscribe(signal, listener) {
      const entries = listFor(signal);
      const entry = { id: nextId, listener };
      nextId += 1;
      entries.push(entry);
      return (): void => {
        const index = entries.findIndex((candidate) => candidate.id === entry.id);
        if (index >= 0) {
          entries.splice(index, 1);
        }
      };
    },

    emit(signal, payload) {
      for (const entry of [...listFor(signal)]) {
        entry.listener(payload);
      }
    },

    listenerCount(signal) {
      return listeners[signal]?.length ?? 0;
    },

    clear() {
      listeners = {};
    },
  };
}
