// Event handler runtime: reads events through a client and dispatches them
// to the handler method bound to each event's ordinal.

import { createLogger, type Logger } from "@wirebind/ir";
import { NotImplementedError, StopEventHandler } from "../errors.ts";
import type { ClientBase } from "./client.ts";
import type { ProtocolType } from "./protocol.ts";
import type { RoleOptions } from "./server.ts";

let nextHandlerId = 0;

/**
 * Base of every generated EventHandler class.
 *
 * Subclasses override one method per event; the generated defaults throw
 * NotImplementedError. Throw StopEventHandler from a handler to stop.
 */
export class EventHandlerBase {
  readonly id: number;
  protected readonly log: Logger;

  constructor(
    readonly protocol: ProtocolType,
    readonly client: ClientBase,
    options: RoleOptions = {},
  ) {
    this.id = nextHandlerId++;
    this.log = options.logger ?? protocol.context.logger ?? createLogger("wirebind:events");
  }

  toString(): string {
    return `event_handler:${this.constructor.name}:${this.id}`;
  }

  /**
   * Handle one event. Resolves false once there are no more events to handle.
   *
   * Any failure other than StopEventHandler closes the client before it is
   * rethrown.
   */
  async handleNextEvent(): Promise<boolean> {
    try {
      return await this.dispatchNextEvent();
    } catch (e) {
      if (e instanceof StopEventHandler) {
        this.log.debug(`${this} stopped by handler`);
        return false;
      }
      this.log.debug(`${this} closing client after failure`, { error: String(e) });
      this.client.close();
      throw e;
    }
  }

  private async dispatchNextEvent(): Promise<boolean> {
    const event = await this.client.nextEvent();
    if (event === null) {
      this.log.debug(`${this} shutting down. peer closed`);
      return false;
    }
    const handler: unknown = Reflect.get(this, event.info.name);
    if (typeof handler !== "function") throw new NotImplementedError(event.info.name);
    await Reflect.apply(handler, this, event.payload === null ? [] : [event.payload]);
    return true;
  }

  /** Handle events until the peer closes or a handler stops. */
  async serve(): Promise<void> {
    let more = true;
    while (more) {
      more = await this.handleNextEvent();
    }
  }
}
