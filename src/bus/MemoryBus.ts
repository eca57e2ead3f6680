/**
 * In-process bus engine.
 *
 * A `MemoryBusRouter` plays the part of the bus daemon: it hands out unique
 * names, keeps the well-known name registry and routes messages between the
 * `MemoryBus` connections attached to it. Bodies are deep-copied whenever they
 * cross from one connection to another, so peers never share mutable state.
 */

import { randomUUID } from 'crypto';
import createDebug from 'debug';
import copy from 'fast-copy';
import {
  BindingStateError,
  DbusErrorName,
  RemoteCallError,
  ServerDispatchError,
} from '../errors.ts';
import { assertBusName, assertObjectPath } from '../names.ts';
import { AsyncQueue } from '../queue.ts';
import { isBodyValid } from '../validation.ts';
import {
  INTROSPECTABLE_INTERFACE,
  PEER_INTERFACE,
  PROPERTIES_INTERFACE,
  Variant,
} from '../wire.ts';
import type { MethodCallMessage, ReplyMessage, SignalMessage } from '../wire.ts';
import { buildIntrospectionXml } from './introspection.ts';
import type {
  BusConnection,
  ExportedProperty,
  IncomingCall,
  InterfaceHandle,
  InterfaceRegistration,
  SignalMatch,
  SignalQueue,
} from './BusConnection.ts';

const debug = createDebug('dbus-bind:memory-bus');

const DEFAULT_CALL_TIMEOUT_MS = 25000;

export interface MemoryBusRouterOptions {
  /**
   * Answer of `org.freedesktop.DBus.Peer.GetMachineId`.
   * Default: random 32 hex digits
   */
  machineId?: string;
}

export interface MemoryBusOptions {
  /** Router to attach to. Default: a new private router */
  router?: MemoryBusRouter;
  /** Overrides the router's machine id for objects served by this connection. */
  machineId?: string;
  /** Time to wait for a method reply before answering `NoReply`. Default: 25000 */
  callTimeoutMs?: number;
}

/**
 * The shared medium connections attach to.
 */
export class MemoryBusRouter {
  readonly machineId: string;

  private _nextId = 1;
  private _connections = new Map<string, MemoryBus>();
  private _owners = new Map<string, string>();

  constructor(options: MemoryBusRouterOptions = {}) {
    this.machineId = options.machineId ?? randomUUID().replace(/-/g, '');
  }

  get connectionCount(): number {
    return this._connections.size;
  }

  /**
   * @internal
   */
  attach(connection: MemoryBus): string {
    const uniqueName = `:1.${this._nextId++}`;
    this._connections.set(uniqueName, connection);
    debug('%s attached (total=%d)', uniqueName, this._connections.size);
    return uniqueName;
  }

  /**
   * @internal
   */
  detach(uniqueName: string): void {
    this._connections.delete(uniqueName);
    for (const [name, owner] of this._owners) {
      if (owner === uniqueName) this._owners.delete(name);
    }
    debug('%s detached (total=%d)', uniqueName, this._connections.size);
  }

  /**
   * @internal
   */
  claim(name: string, uniqueName: string): void {
    const owner = this._owners.get(name);
    if (owner !== undefined && owner !== uniqueName) {
      throw new RemoteCallError(DbusErrorName.FAILED, `${name} is already owned by ${owner}`);
    }
    this._owners.set(name, uniqueName);
    debug('%s owns %s', uniqueName, name);
  }

  /**
   * Unique name behind a unique or well-known name.
   */
  resolveName(name: string): string | undefined {
    if (name.startsWith(':')) {
      return this._connections.has(name) ? name : undefined;
    }
    return this._owners.get(name);
  }

  /**
   * @internal
   */
  connectionFor(name: string): MemoryBus | undefined {
    const uniqueName = this.resolveName(name);
    return uniqueName === undefined ? undefined : this._connections.get(uniqueName);
  }

  /**
   * @internal
   */
  broadcast(message: SignalMessage): void {
    for (const connection of this._connections.values()) {
      connection.deliverSignal(message);
    }
  }
}

let defaultRouter: MemoryBusRouter | undefined;

/**
 * Process-wide router shared by connections that do not name one.
 */
export function getDefaultRouter(): MemoryBusRouter {
  defaultRouter ??= new MemoryBusRouter();
  return defaultRouter;
}

class MemoryInterfaceHandle implements InterfaceHandle {
  readonly objectPath: string;
  readonly interfaceName: string;
  readonly registration: InterfaceRegistration;

  private _active = true;
  private _onUnregister: (handle: MemoryInterfaceHandle) => void;

  constructor(
    objectPath: string,
    registration: InterfaceRegistration,
    onUnregister: (handle: MemoryInterfaceHandle) => void
  ) {
    this.objectPath = objectPath;
    this.interfaceName = registration.name;
    this.registration = registration;
    this._onUnregister = onUnregister;
  }

  get active(): boolean {
    return this._active;
  }

  unregister(): void {
    if (!this._active) return;
    this._active = false;
    this._onUnregister(this);
  }
}

class MemorySignalQueue implements SignalQueue {
  readonly match: SignalMatch;

  private _queue = new AsyncQueue<SignalMessage>();
  private _onClose: (queue: MemorySignalQueue) => void;

  constructor(match: SignalMatch, onClose: (queue: MemorySignalQueue) => void) {
    this.match = match;
    this._onClose = onClose;
  }

  get closed(): boolean {
    return this._queue.closed;
  }

  push(message: SignalMessage): void {
    this._queue.push(message);
  }

  async next(signal?: AbortSignal): Promise<SignalMessage | null> {
    const result = await this._queue.shift(signal);
    return result.done ? null : result.value;
  }

  close(): void {
    if (this._queue.closed) return;
    this._queue.close();
    this._onClose(this);
  }
}

/**
 * One connection to a `MemoryBusRouter`.
 *
 * @example
 * ```ts
 * const router = new MemoryBusRouter();
 * const serverBus = new MemoryBus({ router });
 * const clientBus = new MemoryBus({ router });
 * await serverBus.requestName('org.example.Notes');
 * ```
 */
export class MemoryBus implements BusConnection {
  readonly uniqueName: string;
  readonly router: MemoryBusRouter;

  private _machineId: string;
  private _callTimeoutMs: number;
  private _connected = true;
  private _objects = new Map<string, Map<string, MemoryInterfaceHandle>>();
  private _queues = new Set<MemorySignalQueue>();

  constructor(options: MemoryBusOptions = {}) {
    this.router = options.router ?? new MemoryBusRouter();
    this._machineId = options.machineId ?? this.router.machineId;
    this._callTimeoutMs = options.callTimeoutMs ?? DEFAULT_CALL_TIMEOUT_MS;
    this.uniqueName = this.router.attach(this);
  }

  get connected(): boolean {
    return this._connected;
  }

  async call(message: MethodCallMessage): Promise<ReplyMessage> {
    if (!this._connected) {
      return errorReply(DbusErrorName.DISCONNECTED, 'Connection is closed');
    }

    const target = this.router.connectionFor(message.destination);
    if (!target) {
      return errorReply(
        DbusErrorName.SERVICE_UNKNOWN,
        `The name ${message.destination} was not provided by any service`
      );
    }

    const delivered: MethodCallMessage = { ...message, body: copy(message.body), sender: this.uniqueName };
    debug('%s -> %s %s %s.%s', this.uniqueName, message.destination, message.path, message.interface, message.member);
    return target.dispatchCall(delivered, this._callTimeoutMs);
  }

  emitSignal(message: SignalMessage): void {
    this._assertConnected('emitSignal');
    this.router.broadcast({ ...message, sender: this.uniqueName });
  }

  async getSignalQueue(match: SignalMatch): Promise<SignalQueue> {
    this._assertConnected('getSignalQueue');
    const queue = new MemorySignalQueue(match, (closed) => {
      this._queues.delete(closed);
    });
    this._queues.add(queue);
    return queue;
  }

  addInterface(objectPath: string, registration: InterfaceRegistration): InterfaceHandle {
    this._assertConnected('addInterface');
    assertObjectPath(objectPath);

    let interfaces = this._objects.get(objectPath);
    if (!interfaces) {
      interfaces = new Map();
      this._objects.set(objectPath, interfaces);
    }
    if (interfaces.has(registration.name)) {
      throw new BindingStateError(`${registration.name} is already served at ${objectPath}`);
    }

    const handle = new MemoryInterfaceHandle(objectPath, registration, (released) => {
      this._release(released);
    });
    interfaces.set(registration.name, handle);
    debug('%s serves %s at %s', this.uniqueName, registration.name, objectPath);
    return handle;
  }

  async requestName(name: string): Promise<void> {
    this._assertConnected('requestName');
    assertBusName(name);
    if (name.startsWith(':')) {
      throw new RemoteCallError(DbusErrorName.INVALID_ARGS, `Cannot request unique name ${name}`);
    }
    this.router.claim(name, this.uniqueName);
  }

  /**
   * Detach from the router, withdraw every served interface and end every
   * signal queue.
   */
  close(): void {
    if (!this._connected) return;
    this._connected = false;

    for (const interfaces of [...this._objects.values()]) {
      for (const handle of [...interfaces.values()]) {
        handle.unregister();
      }
    }
    for (const queue of [...this._queues]) {
      queue.close();
    }
    this.router.detach(this.uniqueName);
  }

  /**
   * Route a method call to the object it addresses and wait for the reply.
   *
   * @internal
   */
  dispatchCall(message: MethodCallMessage, timeoutMs: number): Promise<ReplyMessage> {
    return new Promise((resolve) => {
      let settled = false;
      const settle = (reply: ReplyMessage): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        resolve(reply);
      };

      const timer = setTimeout(() => {
        debug('%s.%s got no reply within %dms', message.interface, message.member, timeoutMs);
        settle(errorReply(DbusErrorName.NO_REPLY, `No reply within ${timeoutMs}ms`));
      }, timeoutMs);

      const call: IncomingCall = {
        message,
        reply: (signature, body) => settle({ type: 'return', signature, body: copy(body) }),
        replyError: (errorName, errorMessage) => settle(errorReply(errorName, errorMessage)),
      };
      this._route(call);
    });
  }

  /**
   * Queue a broadcast signal on every matching signal queue.
   *
   * @internal
   */
  deliverSignal(message: SignalMessage): void {
    for (const queue of this._queues) {
      if (this._matches(queue.match, message)) {
        queue.push({ ...message, body: copy(message.body) });
      }
    }
  }

  private _matches(match: SignalMatch, message: SignalMessage): boolean {
    return (
      match.path === message.path &&
      match.interface === message.interface &&
      match.member === message.member &&
      this.router.resolveName(match.sender) === message.sender
    );
  }

  private _assertConnected(operation: string): void {
    if (!this._connected) {
      throw new BindingStateError(`${operation}: connection ${this.uniqueName} is closed`);
    }
  }

  private _release(handle: MemoryInterfaceHandle): void {
    const interfaces = this._objects.get(handle.objectPath);
    if (interfaces?.get(handle.interfaceName) !== handle) return;
    interfaces.delete(handle.interfaceName);
    if (interfaces.size === 0) {
      this._objects.delete(handle.objectPath);
    }
    debug('%s withdrew %s at %s', this.uniqueName, handle.interfaceName, handle.objectPath);
  }

  private _route(call: IncomingCall): void {
    const { path, interface: interfaceName, member } = call.message;

    switch (interfaceName) {
      case PEER_INTERFACE:
        this._answerPeer(call);
        return;
      case INTROSPECTABLE_INTERFACE:
        this._answerIntrospectable(call);
        return;
    }

    const interfaces = this._objects.get(path);
    if (!interfaces) {
      call.replyError(DbusErrorName.UNKNOWN_OBJECT, `No object at ${path}`);
      return;
    }

    if (interfaceName === PROPERTIES_INTERFACE) {
      this._answerProperties(call, interfaces);
      return;
    }

    const handle = interfaces.get(interfaceName);
    if (!handle) {
      call.replyError(DbusErrorName.UNKNOWN_INTERFACE, `No interface ${interfaceName} at ${path}`);
      return;
    }

    const method = handle.registration.methods.find((candidate) => candidate.name === member);
    if (!method) {
      call.replyError(DbusErrorName.UNKNOWN_METHOD, `No method ${member} in ${interfaceName}`);
      return;
    }

    Promise.resolve()
      .then(() => method.handler(call))
      .catch((err) => {
        const failure = new ServerDispatchError(`${interfaceName}.${member}`, err);
        debug('Handler rejected: %s', failure.message);
        call.replyError(failure.dbusErrorName, failure.replyText);
      });
  }

  private _answerPeer(call: IncomingCall): void {
    switch (call.message.member) {
      case 'Ping':
        call.reply('', []);
        return;
      case 'GetMachineId':
        call.reply('s', [this._machineId]);
        return;
      default:
        call.replyError(DbusErrorName.UNKNOWN_METHOD, `No method ${call.message.member} in ${PEER_INTERFACE}`);
    }
  }

  private _answerIntrospectable(call: IncomingCall): void {
    if (call.message.member !== 'Introspect') {
      call.replyError(
        DbusErrorName.UNKNOWN_METHOD,
        `No method ${call.message.member} in ${INTROSPECTABLE_INTERFACE}`
      );
      return;
    }

    const path = call.message.path;
    const registrations = [...(this._objects.get(path)?.values() ?? [])].map((handle) => handle.registration);
    call.reply('s', [buildIntrospectionXml(registrations, this._childNodes(path))]);
  }

  private _childNodes(path: string): string[] {
    const prefix = path === '/' ? '/' : `${path}/`;
    const children = new Set<string>();
    for (const objectPath of this._objects.keys()) {
      if (objectPath !== path && objectPath.startsWith(prefix)) {
        const [child] = objectPath.slice(prefix.length).split('/');
        if (child) children.add(child);
      }
    }
    return [...children].sort();
  }

  private _answerProperties(call: IncomingCall, interfaces: Map<string, MemoryInterfaceHandle>): void {
    const { member, body } = call.message;

    const signature = member === 'Get' ? 'ss' : member === 'Set' ? 'ssv' : member === 'GetAll' ? 's' : undefined;
    if (signature === undefined) {
      call.replyError(DbusErrorName.UNKNOWN_METHOD, `No method ${member} in ${PROPERTIES_INTERFACE}`);
      return;
    }
    const [interfaceName, propertyName, variant] = body;
    if (!isBodyValid(signature, body) || typeof interfaceName !== 'string') {
      call.replyError(DbusErrorName.INVALID_ARGS, `Expected arguments of signature "${signature}"`);
      return;
    }

    const handle = interfaces.get(interfaceName);
    if (!handle) {
      call.replyError(DbusErrorName.UNKNOWN_INTERFACE, `No interface ${interfaceName} at ${call.message.path}`);
      return;
    }
    const properties = handle.registration.properties;

    if (member === 'GetAll') {
      const all: Record<string, Variant> = {};
      for (const property of properties) {
        const value = this._readProperty(call, interfaceName, property);
        if (value === undefined) return;
        all[property.name] = value;
      }
      call.reply('a{sv}', [all]);
      return;
    }

    const property = properties.find((candidate) => candidate.name === propertyName);
    if (!property) {
      call.replyError(DbusErrorName.UNKNOWN_PROPERTY, `No property ${String(propertyName)} in ${interfaceName}`);
      return;
    }

    if (member === 'Get') {
      const value = this._readProperty(call, interfaceName, property);
      if (value !== undefined) call.reply('v', [value]);
      return;
    }

    if (!property.set) {
      call.replyError(DbusErrorName.PROPERTY_READ_ONLY, `Property ${property.name} is read-only`);
      return;
    }
    try {
      property.set(variant instanceof Variant ? variant.value : variant);
    } catch (err) {
      const failure = new ServerDispatchError(`${interfaceName}.${property.name}`, err);
      debug('Property set failed: %s', failure.message);
      call.replyError(failure.dbusErrorName, failure.replyText);
      return;
    }
    call.reply('', []);
  }

  /**
   * Read a property into a variant, answering the call with an error reply
   * when the getter throws.
   */
  private _readProperty(call: IncomingCall, interfaceName: string, property: ExportedProperty): Variant | undefined {
    try {
      return new Variant(property.signature, property.get());
    } catch (err) {
      const failure = new ServerDispatchError(`${interfaceName}.${property.name}`, err);
      debug('Property get failed: %s', failure.message);
      call.replyError(failure.dbusErrorName, failure.replyText);
      return undefined;
    }
  }
}

function errorReply(errorName: string, errorMessage: string): ReplyMessage {
  return { type: 'error', errorName, errorMessage };
}
