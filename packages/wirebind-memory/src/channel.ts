// In-process channel pairs.

import { createLogger, type ChannelTransport, type Logger, type ReadResult, type WireMessage } from "@wirebind/core";

let nextId = 1;

/**
 * One end of an in-process channel.
 *
 * Written messages are queued on the peer. Closing either end drops this
 * end's queue and makes the peer read `peerClosed` once it has drained.
 */
export class MemoryChannel implements ChannelTransport {
  readonly id = nextId++;
  private queue: WireMessage[] = [];
  private peer: MemoryChannel | null = null;
  private closed = false;
  private peerGone = false;
  private readonly listeners = new Set<() => void>();
  private readonly log: Logger;

  constructor(logger?: Logger) {
    this.log = logger ?? createLogger("wirebind:memory");
  }

  /** Link two fresh ends. */
  static pair(logger?: Logger): [MemoryChannel, MemoryChannel] {
    const a = new MemoryChannel(logger);
    const b = new MemoryChannel(logger);
    a.peer = b;
    b.peer = a;
    return [a, b];
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Messages waiting to be read on this end. */
  get pending(): number {
    return this.queue.length;
  }

  read(): ReadResult {
    const message = this.queue.shift();
    if (message) return { kind: "message", message };
    if (this.closed || this.peerGone) return { kind: "peerClosed" };
    return { kind: "wouldBlock" };
  }

  write(message: WireMessage): void {
    if (this.closed) throw new Error(`${this} is closed`);
    if (!this.peer || this.peerGone) throw new Error(`${this} peer closed`);
    this.peer.deliver({ bytes: message.bytes.slice(), handles: [...message.handles] });
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.queue = [];
    this.log.debug("closed", { channel: String(this) });
    this.notify();
    this.peer?.peerClosed();
    this.peer = null;
  }

  onReadable(listener: () => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  toString(): string {
    return `memory:${this.id}`;
  }

  private deliver(message: WireMessage): void {
    this.queue.push(message);
    this.notify();
  }

  private peerClosed(): void {
    this.peerGone = true;
    this.peer = null;
    this.notify();
  }

  private notify(): void {
    for (const listener of [...this.listeners]) listener();
  }
}

/** Create a linked pair of in-process channel ends. */
export function channelPair(logger?: Logger): [MemoryChannel, MemoryChannel] {
  return MemoryChannel.pair(logger);
}
