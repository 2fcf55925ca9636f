// Error types and control signals for compiled bindings and dispatch.

import { inspect } from "node:util";

function show(value: unknown): string {
  return typeof value === "string" ? value : inspect(value, { depth: 4, breakLength: Infinity });
}

/** Error raised while building a value of a compiled type. */
export class ConstructionError extends Error {
  constructor(
    public kind: "arity" | "missingField" | "unknownField" | "invalidValue",
    message: string,
  ) {
    super(message);
    this.name = "ConstructionError";
  }

  static arity(owner: string, count: number): ConstructionError {
    return new ConstructionError("arity", `${owner} accepts exactly one variant, got ${count}`);
  }

  static missingField(owner: string, field: string): ConstructionError {
    return new ConstructionError("missingField", `${owner} missing required field ${field}`);
  }

  static unknownField(owner: string, field: string): ConstructionError {
    return new ConstructionError("unknownField", `${owner} has no field ${field}`);
  }

  static invalidValue(owner: string, detail: string): ConstructionError {
    return new ConstructionError("invalidValue", `Invalid value for ${owner}: ${detail}`);
  }
}

/**
 * Contract violation while serving or calling a protocol.
 *
 * Fatal to the channel it happened on.
 */
export class DispatchError extends Error {
  constructor(
    public kind: "oneWayResponse" | "missingResponse" | "unknownOrdinal" | "closed",
    message: string,
  ) {
    super(message);
    this.name = "DispatchError";
  }

  static oneWayResponse(owner: string, method: string): DispatchError {
    return new DispatchError(
      "oneWayResponse",
      `${owner} method ${method} received a response but is one-way method`,
    );
  }

  static missingResponse(owner: string, method: string): DispatchError {
    return new DispatchError(
      "missingResponse",
      `${owner} method ${method} returned nothing when a response was expected`,
    );
  }

  static unknownOrdinal(owner: string, ordinal: bigint): DispatchError {
    return new DispatchError("unknownOrdinal", `${owner} received unknown method ordinal ${ordinal}`);
  }

  static closed(owner: string, method?: string): DispatchError {
    const suffix = method ? ` while calling ${method}` : "";
    return new DispatchError("closed", `${owner} channel closed${suffix}`);
  }
}

/** Fault while reading a result union. */
export class ResultError extends Error {
  constructor(
    public kind: "frameworkErr" | "err" | "noValue" | "notResult",
    message: string,
    /** The error payload, for `err` and `frameworkErr`. */
    public readonly value?: unknown,
  ) {
    super(message);
    this.name = "ResultError";
  }

  static frameworkErr(type: string, value: unknown): ResultError {
    return new ResultError("frameworkErr", `${type} framework error ${show(value)}`, value);
  }

  static err(type: string, value: unknown): ResultError {
    return new ResultError("err", `${type} error ${show(value)}`, value);
  }

  static noValue(type: string): ResultError {
    return new ResultError("noValue", `Failed to unwrap ${type} with no error or response.`);
  }

  static notResult(type: string): ResultError {
    return new ResultError("notResult", `${type} is not a result union`);
  }
}

/** Raised by role methods that have not been overridden. */
export class NotImplementedError extends Error {
  constructor(readonly method: string) {
    super(`Method ${method} not implemented`);
    this.name = "NotImplementedError";
  }
}

/** Thrown by a server handler to close its channel and stop serving. */
export class StopServer extends Error {
  constructor(message = "server stopped") {
    super(message);
    this.name = "StopServer";
  }
}

/** Thrown by an event handler to stop handling events. */
export class StopEventHandler extends Error {
  constructor(message = "event handler stopped") {
    super(message);
    this.name = "StopEventHandler";
  }
}

/**
 * Domain error result of a method declared with an error type.
 *
 * Returned or thrown by a server handler; sent as the `err` variant.
 */
export class DomainError extends Error {
  constructor(readonly error: unknown) {
    super(`domain error ${show(error)}`);
    this.name = "DomainError";
  }
}

/** Framework error result; sent as the `framework_err` variant. */
export class FrameworkError extends Error {
  constructor(readonly error: unknown) {
    super(`framework error ${show(error)}`);
    this.name = "FrameworkError";
  }
}
