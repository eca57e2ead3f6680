/**
 * Core type definitions for the binding layer.
 */

import type { BusConnection, InterfaceHandle } from './bus/BusConnection.ts';

/**
 * Binding state of an interface object.
 *
 * - `unbound`: members run locally.
 * - `proxy`: members forward to a remote object.
 * - `serving`: the object is exported and answers bus requests.
 */
export type BindingState =
  | { mode: 'unbound' }
  | { mode: 'proxy'; bus: BusConnection; serviceName: string; objectPath: string }
  | { mode: 'serving'; bus: BusConnection; objectPath: string; handles: InterfaceHandle[] };

export type BindingMode = BindingState['mode'];

/**
 * Options for a method declaration.
 */
export interface MethodOptions {
  /** Wire name. Default: derived from the member key. */
  methodName?: string;
  /** Signature of the arguments. Default: `''` */
  inputSignature?: string;
  /** Signature of the results. Default: `''` */
  resultSignature?: string;
  /** Argument names. Default: `arg0`…`argN` from the input signature. */
  inputArgNames?: readonly string[];
  resultArgNames?: readonly string[];
  /** Values for the trailing arguments that may be omitted. */
  defaults?: readonly unknown[];
  flags?: number;
}

/**
 * Options for a property declaration.
 */
export interface PropertyOptions<TSelf, TValue> {
  signature: string;
  /** Wire name. Default: derived from the member key. */
  propertyName?: string;
  flags?: number;
  get(self: TSelf): TValue;
  set?(self: TSelf, value: TValue): void;
}

/**
 * Options for a signal declaration.
 */
export interface SignalOptions {
  /** Signature of the payload. Default: `''` */
  signature?: string;
  /** Wire name. Default: derived from the member key. */
  signalName?: string;
  argNames?: readonly string[];
  flags?: number;
}

export interface MethodDeclaration {
  kind: 'method';
  options: MethodOptions;
}

export interface PropertyDeclaration<TSelf, TValue> {
  kind: 'property';
  options: PropertyOptions<TSelf, TValue>;
}

export interface SignalDeclaration {
  kind: 'signal';
  options: SignalOptions;
}

/**
 * Marks a class's own method as the new implementation of an inherited method,
 * keeping the inherited wire contract.
 */
export interface OverrideMarker {
  kind: 'override';
}

export type MemberDeclaration<TSelf> =
  | MethodDeclaration
  | PropertyDeclaration<TSelf, unknown>
  | SignalDeclaration
  | OverrideMarker;

type AsyncMethod = (...args: never[]) => Promise<unknown>;

/**
 * Member table keyed by instance member names.
 *
 * Method keys must name functions returning a Promise: on a proxy every call
 * goes over the bus, so the local signature has to be asynchronous as well.
 */
export type MemberTable<TSelf> = {
  [K in keyof TSelf & string]?: TSelf[K] extends AsyncMethod
    ? MethodDeclaration | OverrideMarker
    : PropertyDeclaration<TSelf, unknown> | SignalDeclaration | OverrideMarker;
};

/**
 * One interface declared on a class.
 */
export interface InterfaceDefinition<TSelf> {
  /** Wire interface name. Absent for non-serving mix-ins. */
  interfaceName?: string;
  /** Whether `startServing` exports these members. Default: true */
  servingEnabled?: boolean;
  members: MemberTable<TSelf>;
}

/**
 * Registered view of an interface declaration.
 */
export interface InterfaceInfo {
  interfaceName: string | undefined;
  servingEnabled: boolean;
  keys: readonly string[];
}
