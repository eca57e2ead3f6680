/**
 * Signal descriptor, its bound form and subscriptions.
 *
 * Proxies receive signals from the bus. Everyone else receives them through
 * local subscriptions fed by `emit()`, so an object never exported on a bus
 * still delivers its signals in-process.
 */

import createDebug from 'debug';
import { BindingStateError, DeclarationError, ValidationError } from '../errors.ts';
import { assertMemberName } from '../names.ts';
import { AsyncQueue } from '../queue.ts';
import { compileSignature } from '../validation.ts';
import { decodeContents, encodeResult, signalMessage } from '../wire.ts';
import type { SignalQueue } from '../bus/BusConnection.ts';
import type { DbusInterfaceBase } from '../DbusInterfaceBase.ts';

const debug = createDebug('dbus-bind:signal');

export interface DbusSignalInit {
  key: string;
  interfaceName: string | undefined;
  servingEnabled: boolean;
  signalName: string;
  signature: string;
  argNames: readonly string[];
  flags: number;
}

/**
 * Immutable definition of one exposed signal.
 */
export class DbusSignal {
  readonly kind = 'signal' as const;
  readonly key: string;
  readonly interfaceName: string | undefined;
  readonly servingEnabled: boolean;
  readonly signalName: string;
  readonly signature: string;
  readonly argNames: readonly string[];
  readonly flags: number;

  constructor(init: DbusSignalInit) {
    assertMemberName('signal', init.signalName);
    const arity = compileSignature(init.signature).arity;
    if (init.argNames.length > 0 && init.argNames.length !== arity) {
      throw new DeclarationError(
        `${init.signalName}: ${init.argNames.length} argument name(s) for signature "${init.signature}"`
      );
    }

    this.key = init.key;
    this.interfaceName = init.interfaceName;
    this.servingEnabled = init.servingEnabled;
    this.signalName = init.signalName;
    this.signature = init.signature;
    this.argNames = Object.freeze([...init.argNames]);
    this.flags = init.flags;
    Object.freeze(this);
  }

  bind(owner: DbusInterfaceBase): BoundSignal {
    return new BoundSignal(this, owner);
  }
}

/**
 * Handle on one stream of signal payloads.
 *
 * Payloads arrive in order. Closing the handle stops delivery; leaving a
 * `for await` loop over it closes it as well. Aborting the signal given to
 * `next()` gives up that read without losing the payload it would have taken.
 */
export interface SignalSubscription<T> extends AsyncIterable<T> {
  readonly closed: boolean;
  next(signal?: AbortSignal): Promise<IteratorResult<T, undefined>>;
  close(): void;
}

/**
 * Receiving end of local emissions, as held by the owning object.
 */
export interface SignalSink {
  readonly closed: boolean;
  push(value: unknown): void;
}

abstract class BaseSubscription<T> implements SignalSubscription<T> {
  abstract readonly closed: boolean;
  abstract next(signal?: AbortSignal): Promise<IteratorResult<T, undefined>>;
  abstract close(): void;

  async *[Symbol.asyncIterator](): AsyncGenerator<T, void, undefined> {
    try {
      for (;;) {
        const result = await this.next();
        if (result.done) return;
        yield result.value;
      }
    } finally {
      this.close();
    }
  }
}

/**
 * Subscription fed by `emit()` on the same object.
 */
export class LocalSignalSubscription<T> extends BaseSubscription<T> implements SignalSink {
  private _queue = new AsyncQueue<T>();
  private _onClose: () => void;

  constructor(onClose: () => void) {
    super();
    this._onClose = onClose;
  }

  get closed(): boolean {
    return this._queue.closed;
  }

  push(value: T): void {
    this._queue.push(value);
  }

  next(signal?: AbortSignal): Promise<IteratorResult<T, undefined>> {
    return this._queue.shift(signal);
  }

  close(): void {
    if (this._queue.closed) return;
    this._queue.close();
    this._onClose();
  }
}

/**
 * Subscription fed by a bus signal queue.
 */
export class RemoteSignalSubscription<T> extends BaseSubscription<T> {
  private _queue: SignalQueue;
  private _decode: (body: unknown[]) => T;

  constructor(queue: SignalQueue, decode: (body: unknown[]) => T) {
    super();
    this._queue = queue;
    this._decode = decode;
  }

  get closed(): boolean {
    return this._queue.closed;
  }

  async next(signal?: AbortSignal): Promise<IteratorResult<T, undefined>> {
    const message = await this._queue.next(signal);
    if (message === null) {
      return { done: true, value: undefined };
    }
    return { done: false, value: this._decode(message.body) };
  }

  close(): void {
    this._queue.close();
  }
}

/**
 * A signal descriptor paired with one owner instance.
 */
export class BoundSignal<T = unknown> implements AsyncIterable<T> {
  readonly descriptor: DbusSignal;
  readonly owner: DbusInterfaceBase;

  constructor(descriptor: DbusSignal, owner: DbusInterfaceBase) {
    this.descriptor = descriptor;
    this.owner = owner;
  }

  /**
   * Live local subscriptions of this signal on the owner.
   */
  get subscriberCount(): number {
    return this.owner.localSignalSubscriptions(this.descriptor).size;
  }

  /**
   * Start receiving payloads.
   *
   * On a proxy this asks the bus for a queue of the remote object's signals.
   * Otherwise the subscription is registered locally before this returns, so
   * it sees every later `emit()`.
   */
  async subscribe(): Promise<SignalSubscription<T>> {
    const binding = this.owner.dbusBinding;
    if (binding.mode !== 'proxy') {
      return this._subscribeLocal();
    }

    const { interfaceName, signalName } = this.descriptor;
    if (interfaceName === undefined) {
      throw new BindingStateError(`${signalName} has no interface name and cannot be received remotely`);
    }

    debug('Subscribing to %s.%s from %s%s', interfaceName, signalName, binding.serviceName, binding.objectPath);
    const queue = await binding.bus.getSignalQueue({
      sender: binding.serviceName,
      path: binding.objectPath,
      interface: interfaceName,
      member: signalName,
    });
    return new RemoteSignalSubscription<T>(queue, (body) => this._decode(body));
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<T, void, undefined> {
    const subscription = await this.subscribe();
    yield* subscription;
  }

  /**
   * Broadcast a payload.
   *
   * The payload goes on the bus when the owner serves at least one active
   * interface, and to every live local subscription in any case. A payload
   * for a signature of several complete types is given as an array.
   *
   * @throws ValidationError if the payload does not match the signature
   */
  emit(value: T): void {
    const { interfaceName, signalName, signature } = this.descriptor;
    const body = encodeResult(signature, value);
    const binding = this.owner.dbusBinding;

    if (
      binding.mode === 'serving' &&
      interfaceName !== undefined &&
      binding.handles.some((handle) => handle.active)
    ) {
      debug('Emitting %s.%s at %s', interfaceName, signalName, binding.objectPath);
      binding.bus.emitSignal(signalMessage(binding.objectPath, interfaceName, signalName, signature, body));
    }

    for (const subscription of this.owner.localSignalSubscriptions(this.descriptor)) {
      subscription.push(value);
    }
  }

  private _subscribeLocal(): LocalSignalSubscription<T> {
    const subscriptions = this.owner.localSignalSubscriptions(this.descriptor);
    const subscription: LocalSignalSubscription<T> = new LocalSignalSubscription<T>(() => {
      subscriptions.delete(subscription);
    });
    subscriptions.add(subscription);
    return subscription;
  }

  private _decode(body: unknown[]): T {
    const contents = decodeContents(body);
    if (!this._isPayload(contents)) {
      throw new ValidationError(
        `signal ${this.descriptor.signalName} carried a body not matching "${this.descriptor.signature}"`
      );
    }
    return contents;
  }

  /**
   * Check a decoded payload against the signal's signature, in the shape
   * `emit()` accepts: nothing, the single value, or the array of values.
   */
  private _isPayload(value: unknown): value is T {
    const validator = compileSignature(this.descriptor.signature);
    if (validator.arity === 0) return value === undefined;
    if (validator.arity === 1) return validator.check([value]);
    return Array.isArray(value) && value.length === validator.arity && validator.check(value);
  }
}
