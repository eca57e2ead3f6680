/**
 * Bus engine contract.
 *
 * The binding layer never marshals bytes or owns sockets; it talks to an
 * engine through this interface. `MemoryBus` is the in-process implementation.
 */

import type { MethodCallMessage, ReplyMessage, SignalMessage } from '../wire.ts';

/**
 * Incoming method call handed to a served method.
 *
 * Exactly one of `reply` / `replyError` must be called.
 */
export interface IncomingCall {
  readonly message: MethodCallMessage;
  reply(signature: string, body: unknown[]): void;
  replyError(errorName: string, errorMessage: string): void;
}

export interface ExportedMethod {
  name: string;
  inputSignature: string;
  inputArgNames: readonly string[];
  resultSignature: string;
  resultArgNames: readonly string[];
  flags: number;
  handler: (call: IncomingCall) => Promise<void>;
}

export interface ExportedProperty {
  name: string;
  signature: string;
  flags: number;
  get: () => unknown;
  set?: (value: unknown) => void;
}

export interface ExportedSignal {
  name: string;
  signature: string;
  argNames: readonly string[];
  flags: number;
}

/**
 * One interface served at an object path.
 */
export interface InterfaceRegistration {
  name: string;
  methods: ExportedMethod[];
  properties: ExportedProperty[];
  signals: ExportedSignal[];
}

export interface InterfaceHandle {
  readonly objectPath: string;
  readonly interfaceName: string;
  readonly active: boolean;
  unregister(): void;
}

export interface SignalMatch {
  sender: string;
  path: string;
  interface: string;
  member: string;
}

/**
 * Per-subscriber queue of incoming signal messages, in arrival order.
 */
export interface SignalQueue {
  readonly closed: boolean;
  /**
   * Wait for the next message. Resolves with `null` once the queue is closed.
   * Aborting `signal` rejects this read only; the queue keeps every message.
   */
  next(signal?: AbortSignal): Promise<SignalMessage | null>;
  close(): void;
}

export interface BusConnection {
  readonly uniqueName: string;
  readonly connected: boolean;

  /**
   * Send a method call and wait for its single reply.
   */
  call(message: MethodCallMessage): Promise<ReplyMessage>;

  /**
   * Broadcast a signal from this connection.
   */
  emitSignal(message: SignalMessage): void;

  /**
   * Start receiving signals matching `match`. Every call returns an
   * independent queue whose backlog starts now.
   */
  getSignalQueue(match: SignalMatch): Promise<SignalQueue>;

  /**
   * Serve an interface at an object path.
   */
  addInterface(objectPath: string, registration: InterfaceRegistration): InterfaceHandle;

  /**
   * Own a well-known name.
   */
  requestName(name: string): Promise<void>;

  close(): void;
}
