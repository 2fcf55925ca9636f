// Server dispatch engine.
//
// Drives one channel's request/response exchange, one request at a time:
// read a message (waiting for readiness on would-block), decode it, call the
// handler bound to its ordinal, check the result against the method's
// contract, and write the response with the request's transaction id.

import { createLogger, type Logger } from "@wirebind/ir";
import type { WireCodec, WireMessage } from "../codec.ts";
import {
  ConstructionError,
  DispatchError,
  DomainError,
  FrameworkError,
  NotImplementedError,
  StopServer,
} from "../errors.ts";
import type { ChannelTransport, ReadinessNotifier } from "../transport.ts";
import type { MethodInfo } from "./method.ts";
import type { ProtocolType } from "./protocol.ts";

export type ServerState = "idle" | "reading" | "dispatching" | "terminated";

/** Collaborators of a role instance; each defaults to the registry's. */
export interface RoleOptions {
  codec?: WireCodec;
  notifier?: ReadinessNotifier;
  logger?: Logger;
}

/** Codec of a role, or an error naming the role when there is none. */
export function roleCodec(owner: string, codec: WireCodec | null | undefined): WireCodec {
  if (!codec) {
    throw new TypeError(`${owner} needs a wire codec; pass one to the Registry or the role options`);
  }
  return codec;
}

// Monotonic id to tell servers apart in logs.
let nextServerId = 0;

/**
 * Base of every generated Server class.
 *
 * Subclasses override one method per request-bearing protocol method; the
 * generated defaults throw NotImplementedError.
 */
export class ServerBase {
  readonly id: number;
  protected readonly codec: WireCodec;
  protected readonly notifier: ReadinessNotifier;
  protected readonly log: Logger;
  private _channel: ChannelTransport | null;
  private _state: ServerState = "idle";

  constructor(
    readonly protocol: ProtocolType,
    channel: ChannelTransport,
    options: RoleOptions = {},
  ) {
    this.id = nextServerId++;
    this._channel = channel;
    this.codec = roleCodec(protocol.name, options.codec ?? protocol.context.codec);
    this.notifier = options.notifier ?? protocol.context.notifier;
    this.log = options.logger ?? protocol.context.logger ?? createLogger("wirebind:server");
    this.log.debug(`${this} instantiated`, { protocol: protocol.name });
  }

  toString(): string {
    return `server:${this.constructor.name}:${this.id}`;
  }

  get state(): ServerState {
    return this._state;
  }

  /** The channel being served, or null once terminated. */
  get channel(): ChannelTransport | null {
    return this._channel;
  }

  /** Serve requests until the peer closes, a handler stops the server, or a request fails. */
  async serve(): Promise<void> {
    const channel = this._channel;
    if (channel === null) return;
    this.notifier.register(channel);
    let more = true;
    while (more) {
      more = await this.handleNextRequest();
    }
  }

  /**
   * Handle one request.
   *
   * Resolves true when a request was handled and false when there will be no
   * more (peer closed or StopServer). Any other failure closes the channel
   * and rejects.
   */
  async handleNextRequest(): Promise<boolean> {
    const channel = this._channel;
    if (channel === null) return false;
    try {
      return await this.handleRequest(channel);
    } catch (e) {
      this.terminate(channel);
      if (e instanceof StopServer) {
        this.log.debug(`${this} stopped by handler`);
        return false;
      }
      this.log.debug(`${this} request handling error: ${e instanceof Error ? e.message : String(e)}`);
      throw e;
    }
  }

  /** Send an event (a method without a request) with transaction id 0. */
  sendEvent(ordinal: bigint, payload: unknown): void {
    const channel = this._channel;
    if (channel === null) throw DispatchError.closed(String(this));
    const info = this.protocol.eventMap.get(ordinal);
    if (!info) throw DispatchError.unknownOrdinal(String(this), ordinal);
    const object = info.requestIdent ? this.protocol.constructPayload(info.requestIdent, payload) : null;
    channel.write(
      this.codec.encodeMessage({
        ordinal,
        txid: 0,
        library: this.protocol.library,
        typeName: info.requestIdent || null,
        object,
      }),
    );
  }

  /** Send an event by method name with keyword arguments. */
  send(method: string, args?: Record<string, unknown>): void {
    const signature = this.protocol.signature(method);
    if (!signature || !signature.isEvent) throw ConstructionError.unknownField(this.protocol.name, method);
    this.sendEvent(signature.ordinal, signature.buildPayload(args));
  }

  /** Close the channel and stop serving. */
  close(): void {
    const channel = this._channel;
    if (channel !== null) this.terminate(channel);
  }

  private terminate(channel: ChannelTransport): void {
    this._state = "terminated";
    this._channel = null;
    channel.close();
    this.notifier.unregister(channel);
  }

  private async handleRequest(channel: ChannelTransport): Promise<boolean> {
    this._state = "reading";
    const message = await this.readMessage(channel);
    if (message === null) {
      this.log.debug(`${this} shutting down. peer closed`);
      this.terminate(channel);
      return false;
    }

    const decoded = this.codec.decodeMessage(message);
    const info = this.protocol.methodMap.get(decoded.ordinal);
    if (!info) throw DispatchError.unknownOrdinal(String(this), decoded.ordinal);
    const request = info.requestIdent ? this.protocol.constructPayload(info.requestIdent, decoded.body) : null;

    this._state = "dispatching";
    const result = await this.invoke(info, request);

    if (result !== null && result !== undefined && !info.requiresResponse) {
      throw DispatchError.oneWayResponse(String(this), info.name);
    }
    if ((result === null || result === undefined) && info.requiresResponse && !info.emptyResponse) {
      throw DispatchError.missingResponse(String(this), info.name);
    }

    const object = this.responseObject(info, result);
    if (object !== null) {
      channel.write(
        this.codec.encodeMessage({
          ordinal: decoded.ordinal,
          txid: decoded.txid,
          library: this.protocol.library,
          typeName: info.responseIdentifier,
          object,
        }),
      );
    } else if (info.emptyResponse) {
      channel.write(
        this.codec.encodeMessage({
          ordinal: decoded.ordinal,
          txid: decoded.txid,
          library: this.protocol.library,
          typeName: null,
          object: null,
        }),
      );
    }
    this._state = "idle";
    return true;
  }

  private async invoke(info: MethodInfo, request: unknown): Promise<unknown> {
    const handler: unknown = Reflect.get(this, info.name);
    if (typeof handler !== "function") throw new NotImplementedError(info.name);
    try {
      const result: unknown = await Reflect.apply(handler, this, request === null ? [] : [request]);
      return result;
    } catch (e) {
      if (info.hasResult && (e instanceof DomainError || e instanceof FrameworkError)) return e;
      throw e;
    }
  }

  /** The value to encode for a handler result, or null when nothing is sent. */
  private responseObject(info: MethodInfo, result: unknown): unknown {
    const identifier = info.responseIdentifier;
    if (identifier === null) return null;
    if (info.hasResult) {
      if (result instanceof DomainError) return this.protocol.resultVariant(identifier, "err", result.error);
      if (result instanceof FrameworkError) {
        return this.protocol.resultVariant(identifier, "framework_err", result.error);
      }
      return this.protocol.resultVariant(identifier, "response", result ?? {});
    }
    if (result === null || result === undefined) return null;
    return this.protocol.constructPayload(identifier, result);
  }

  private async readMessage(channel: ChannelTransport): Promise<WireMessage | null> {
    for (;;) {
      const read = channel.read();
      switch (read.kind) {
        case "message":
          return read.message;
        case "peerClosed":
          return null;
        case "wouldBlock":
          this.log.debug(`${this} channel spurious wakeup`);
          await this.notifier.waitReady(channel);
          break;
      }
    }
  }
}
