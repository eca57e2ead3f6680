/**
 * Message shapes exchanged with the bus engine, and helpers to build them.
 *
 * A body is always the list of positional values described by its signature;
 * bodies are validated here so that a malformed payload never reaches the bus.
 */

import { validateBody } from './validation.ts';
import { countCompleteTypes } from './signature.ts';

export const PROPERTIES_INTERFACE = 'org.freedesktop.DBus.Properties';
export const PEER_INTERFACE = 'org.freedesktop.DBus.Peer';
export const INTROSPECTABLE_INTERFACE = 'org.freedesktop.DBus.Introspectable';

/**
 * A value tagged with its own signature (`v`).
 */
export class Variant<T = unknown> {
  readonly signature: string;
  readonly value: T;

  constructor(signature: string, value: T) {
    this.signature = signature;
    this.value = value;
  }
}

export interface MethodCallMessage {
  destination: string;
  path: string;
  interface: string;
  member: string;
  signature: string;
  body: unknown[];
  /** Filled in by the engine on delivery. */
  sender?: string;
}

export interface MethodReturnMessage {
  type: 'return';
  signature: string;
  body: unknown[];
}

export interface ErrorReplyMessage {
  type: 'error';
  errorName: string;
  errorMessage: string;
}

export type ReplyMessage = MethodReturnMessage | ErrorReplyMessage;

export interface SignalMessage {
  path: string;
  interface: string;
  member: string;
  signature: string;
  body: unknown[];
  /** Filled in by the engine on delivery. */
  sender?: string;
}

/**
 * Build the body for a signature from positional values, validating it.
 *
 * @throws ValidationError if the values do not match the signature
 */
export function encodeBody(signature: string, values: readonly unknown[]): unknown[] {
  const body = [...values];
  validateBody(signature, body);
  return body;
}

/**
 * Build the body for a single result value.
 *
 * `undefined`/`null` produce an empty body. When the signature holds several
 * complete types and the value is an array, the elements become the body;
 * otherwise the value is the only element.
 */
export function encodeResult(signature: string, value: unknown): unknown[] {
  if (value === undefined || value === null) {
    return encodeBody(signature, []);
  }
  if (countCompleteTypes(signature) > 1 && Array.isArray(value)) {
    return encodeBody(signature, value);
  }
  return encodeBody(signature, [value]);
}

/**
 * Turn a body back into a single value: nothing → `undefined`, one value → the
 * value, several → the array of values.
 */
export function decodeContents(body: readonly unknown[]): unknown {
  if (body.length === 0) return undefined;
  if (body.length === 1) return body[0];
  return [...body];
}

export function methodCallMessage(
  destination: string,
  path: string,
  interfaceName: string,
  member: string,
  signature = '',
  values: readonly unknown[] = []
): MethodCallMessage {
  return {
    destination,
    path,
    interface: interfaceName,
    member,
    signature,
    body: encodeBody(signature, values),
  };
}

export function propertyGetMessage(
  destination: string,
  path: string,
  interfaceName: string,
  propertyName: string
): MethodCallMessage {
  return methodCallMessage(destination, path, PROPERTIES_INTERFACE, 'Get', 'ss', [
    interfaceName,
    propertyName,
  ]);
}

export function propertySetMessage(
  destination: string,
  path: string,
  interfaceName: string,
  propertyName: string,
  signature: string,
  value: unknown
): MethodCallMessage {
  validateBody(signature, [value]);
  return methodCallMessage(destination, path, PROPERTIES_INTERFACE, 'Set', 'ssv', [
    interfaceName,
    propertyName,
    new Variant(signature, value),
  ]);
}

export function signalMessage(
  path: string,
  interfaceName: string,
  member: string,
  signature: string,
  body: unknown[]
): SignalMessage {
  return { path, interface: interfaceName, member, signature, body };
}
