/**
 * Channel transport abstraction.
 *
 * This module defines the ChannelTransport interface over a message channel
 * and the ReadinessNotifier used to wait for it to become readable.
 *
 * Implementations:
 * - MemoryChannel (@wirebind/memory) for in-process channel pairs
 */

import type { WireMessage } from "./codec.ts";

/** Outcome of a non-blocking read. */
export type ReadResult =
  | { kind: "message"; message: WireMessage }
  | { kind: "wouldBlock" }
  | { kind: "peerClosed" };

/**
 * One end of a message channel.
 *
 * Reads never block: an empty channel reports `wouldBlock` and the caller
 * waits on its ReadinessNotifier before reading again.
 */
export interface ChannelTransport {
  read(): ReadResult;

  write(message: WireMessage): void;

  /** Close this end. The peer reads `peerClosed` once drained. */
  close(): void;

  /**
   * Subscribe to readability changes (a message arrived or the peer closed).
   * Returns an unsubscribe function.
   */
  onReadable(listener: () => void): () => void;
}

/** Readiness notification for channels. */
export interface ReadinessNotifier {
  register(channel: ChannelTransport): void;
  unregister(channel: ChannelTransport): void;
  /** Resolves once the channel may be readable. Spurious wakeups are allowed. */
  waitReady(channel: ChannelTransport): Promise<void>;
}

interface Registration {
  unsubscribe: () => void;
  ready: boolean;
  waiters: Array<() => void>;
}

/**
 * ReadinessNotifier built on ChannelTransport.onReadable.
 *
 * A notification that arrives while nobody waits is remembered and consumed
 * by the next waitReady call.
 */
export class ChannelWaker implements ReadinessNotifier {
  private registrations = new Map<ChannelTransport, Registration>();

  register(channel: ChannelTransport): void {
    if (this.registrations.has(channel)) return;

    const registration: Registration = {
      unsubscribe: () => {},
      ready: false,
      waiters: [],
    };
    registration.unsubscribe = channel.onReadable(() => {
      const waiters = registration.waiters.splice(0);
      if (waiters.length === 0) {
        registration.ready = true;
        return;
      }
      for (const wake of waiters) wake();
    });
    this.registrations.set(channel, registration);
  }

  unregister(channel: ChannelTransport): void {
    const registration = this.registrations.get(channel);
    if (!registration) return;
    registration.unsubscribe();
    this.registrations.delete(channel);
    for (const wake of registration.waiters.splice(0)) wake();
  }

  isRegistered(channel: ChannelTransport): boolean {
    return this.registrations.has(channel);
  }

  waitReady(channel: ChannelTransport): Promise<void> {
    this.register(channel);
    const registration = this.registrations.get(channel);
    if (!registration || registration.ready) {
      if (registration) registration.ready = false;
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      registration.waiters.push(resolve);
    });
  }
}
