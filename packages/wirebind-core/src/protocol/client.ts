// Client runtime.
//
// Requests are written straight to the channel. Reads go through a single
// shared pump: whoever needs a message next drives one read, responses are
// filed by transaction id, and events (txid 0) are buffered for nextEvent().

import { createLogger, type Logger } from "@wirebind/ir";
import type { DecodedMessage, WireCodec } from "../codec.ts";
import { ConstructionError, DispatchError } from "../errors.ts";
import type { ChannelTransport, ReadinessNotifier } from "../transport.ts";
import type { MethodInfo } from "./method.ts";
import type { ProtocolType } from "./protocol.ts";
import { roleCodec, type RoleOptions } from "./server.ts";

/** An event read by a client, with its payload constructed. */
export interface ReceivedEvent {
  ordinal: bigint;
  info: MethodInfo;
  payload: unknown;
}

const MAX_TXID = 0xffff_ffff;

let nextClientId = 0;

/** Base of every generated Client class. */
export class ClientBase {
  readonly id: number;
  protected readonly codec: WireCodec;
  protected readonly notifier: ReadinessNotifier;
  protected readonly log: Logger;
  private _channel: ChannelTransport | null;
  private nextTxid = 1;
  private peerClosed = false;
  private readonly responses = new Map<number, DecodedMessage>();
  private readonly events: DecodedMessage[] = [];
  private pump: Promise<boolean> | null = null;

  constructor(
    readonly protocol: ProtocolType,
    channel: ChannelTransport,
    options: RoleOptions = {},
  ) {
    this.id = nextClientId++;
    this._channel = channel;
    this.codec = roleCodec(protocol.name, options.codec ?? protocol.context.codec);
    this.notifier = options.notifier ?? protocol.context.notifier;
    this.log = options.logger ?? protocol.context.logger ?? createLogger("wirebind:client");
  }

  toString(): string {
    return `client:${this.constructor.name}:${this.id}`;
  }

  get channel(): ChannelTransport | null {
    return this._channel;
  }

  /** Whether the peer has closed its end. */
  get closed(): boolean {
    return this.peerClosed || this._channel === null;
  }

  /** Call a method by name with keyword arguments. */
  call(method: string, args?: Record<string, unknown>): Promise<unknown> | void {
    const signature = this.protocol.signature(method);
    if (!signature || signature.isEvent) throw ConstructionError.unknownField(this.protocol.name, method);
    const info = this.protocol.methodMap.get(signature.ordinal);
    const payload = signature.buildPayload(args);
    const typeName = signature.method.requestIdentifier;
    if (!info || !signature.method.hasResponse) {
      this.sendOneWay(signature.ordinal, payload, typeName);
      return;
    }
    return this.sendTwoWay(signature.ordinal, payload, typeName, info.responseIdentifier);
  }

  /** Write a request that expects no response. */
  sendOneWay(ordinal: bigint, payload: unknown, typeName: string | null): void {
    this.write(ordinal, 0, payload, typeName);
  }

  /**
   * Write a request and wait for its response.
   *
   * Resolves with the response constructed through `responseIdent`, or null
   * for methods with an empty response.
   */
  async sendTwoWay(
    ordinal: bigint,
    payload: unknown,
    typeName: string | null,
    responseIdent: string | null,
  ): Promise<unknown> {
    const txid = this.allocateTxid();
    this.write(ordinal, txid, payload, typeName);

    for (;;) {
      const response = this.responses.get(txid);
      if (response) {
        this.responses.delete(txid);
        return responseIdent === null ? null : this.protocol.constructPayload(responseIdent, response.body);
      }
      if (!(await this.pumpOnce())) {
        throw DispatchError.closed(String(this), this.methodName(ordinal));
      }
    }
  }

  /** The next event sent by the server, or null once the peer closed. */
  async nextEvent(): Promise<ReceivedEvent | null> {
    for (;;) {
      const event = this.events.shift();
      if (event) {
        const info = this.protocol.eventMap.get(event.ordinal);
        if (!info) throw DispatchError.unknownOrdinal(String(this), event.ordinal);
        const payload = info.requestIdent ? this.protocol.constructPayload(info.requestIdent, event.body) : null;
        return { ordinal: event.ordinal, info, payload };
      }
      if (!(await this.pumpOnce())) return null;
    }
  }

  close(): void {
    const channel = this._channel;
    if (channel === null) return;
    this._channel = null;
    channel.close();
    this.notifier.unregister(channel);
  }

  private write(ordinal: bigint, txid: number, object: unknown, typeName: string | null): void {
    const channel = this._channel;
    if (channel === null || this.peerClosed) {
      throw DispatchError.closed(String(this), this.methodName(ordinal));
    }
    channel.write(
      this.codec.encodeMessage({ ordinal, txid, library: this.protocol.library, typeName, object }),
    );
  }

  private allocateTxid(): number {
    const txid = this.nextTxid;
    this.nextTxid = txid === MAX_TXID ? 1 : txid + 1;
    return txid;
  }

  private methodName(ordinal: bigint): string {
    return this.protocol.methodMap.get(ordinal)?.name ?? String(ordinal);
  }

  /** Drive one shared read. Resolves false once no more messages will arrive. */
  private pumpOnce(): Promise<boolean> {
    if (!this.pump) {
      this.pump = this.readOne().finally(() => {
        this.pump = null;
      });
    }
    return this.pump;
  }

  private async readOne(): Promise<boolean> {
    for (;;) {
      const channel = this._channel;
      if (channel === null || this.peerClosed) return false;
      const read = channel.read();
      switch (read.kind) {
        case "message": {
          const decoded = this.codec.decodeMessage(read.message);
          if (decoded.txid === 0) {
            this.events.push(decoded);
          } else {
            this.responses.set(decoded.txid, decoded);
          }
          return true;
        }
        case "peerClosed":
          this.log.debug(`${this} shutting down. peer closed`);
          this.peerClosed = true;
          this.notifier.unregister(channel);
          return false;
        case "wouldBlock":
          await this.notifier.waitReady(channel);
          break;
      }
    }
  }
}
