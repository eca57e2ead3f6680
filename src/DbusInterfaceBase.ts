/**
 * Base class of every interface object.
 *
 * An instance starts unbound: declared members run locally. `connect()` turns
 * it into a proxy of a remote object, `startServing()` exports it on a bus.
 * Both transitions are one-way.
 */

import createDebug from 'debug';
import { BindingStateError } from './errors.ts';
import { assertBusName, assertObjectPath } from './names.ts';
import { ensureRegistered, instanceMembers, registerRoot } from './registry.ts';
import type { MemberDescriptor } from './registry.ts';
import { getDefaultBus } from './bus/defaultBus.ts';
import type {
  BusConnection,
  ExportedProperty,
  InterfaceHandle,
  InterfaceRegistration,
} from './bus/BusConnection.ts';
import type { DbusSignal, SignalSink } from './members/DbusSignal.ts';
import type { BindingState } from './types.ts';

const debug = createDebug('dbus-bind:interface');

export class DbusInterfaceBase {
  private _binding: BindingState = { mode: 'unbound' };
  private _localSubscriptions = new Map<DbusSignal, Set<SignalSink>>();

  static {
    registerRoot(this);
  }

  constructor() {
    ensureRegistered(new.target);
  }

  /**
   * Create an instance already connected to a remote object.
   */
  static newProxy<T extends DbusInterfaceBase>(
    this: new () => T,
    serviceName: string,
    objectPath: string,
    bus?: BusConnection
  ): T {
    const proxy = new this();
    proxy.connect(serviceName, objectPath, bus);
    return proxy;
  }

  get dbusBinding(): BindingState {
    return this._binding;
  }

  get isProxy(): boolean {
    return this._binding.mode === 'proxy';
  }

  get isServing(): boolean {
    return this._binding.mode === 'serving';
  }

  /**
   * Route every declared member to the object at `objectPath` owned by
   * `serviceName`.
   *
   * @throws BindingStateError if the instance is already a proxy or served
   * @throws InvalidNameError on a malformed service name or object path
   */
  connect(serviceName: string, objectPath: string, bus: BusConnection = getDefaultBus()): void {
    this._assertUnbound('connect');
    assertBusName(serviceName);
    assertObjectPath(objectPath);

    this._binding = { mode: 'proxy', bus, serviceName, objectPath };
    debug('%s proxies %s%s', this.constructor.name, serviceName, objectPath);
  }

  /**
   * Export every serving-enabled interface of this object at `objectPath`.
   *
   * @throws BindingStateError if the instance is already a proxy or served
   * @throws InvalidNameError on a malformed object path
   */
  startServing(objectPath: string, bus: BusConnection = getDefaultBus()): void {
    this._assertUnbound('startServing');
    assertObjectPath(objectPath);

    const registrations = this._buildRegistrations();
    const handles: InterfaceHandle[] = [];
    try {
      for (const registration of registrations) {
        handles.push(bus.addInterface(objectPath, registration));
      }
    } catch (err) {
      for (const handle of handles) {
        handle.unregister();
      }
      throw err;
    }

    this._binding = { mode: 'serving', bus, objectPath, handles };
    debug(
      '%s serves %s at %s',
      this.constructor.name,
      registrations.map((registration) => registration.name).join(', ') || '(nothing)',
      objectPath
    );
  }

  /**
   * Withdraw every interface exported by `startServing`. Emissions keep
   * reaching local subscribers.
   */
  stopServing(): void {
    const binding = this._binding;
    if (binding.mode !== 'serving') {
      throw new BindingStateError(`stopServing: ${this.constructor.name} is ${binding.mode}`);
    }
    for (const handle of binding.handles) {
      handle.unregister();
    }
    debug('%s stopped serving at %s', this.constructor.name, binding.objectPath);
  }

  /**
   * Live local subscriptions of a signal, for fan-out by `emit()`.
   *
   * @internal
   */
  localSignalSubscriptions(signal: DbusSignal): Set<SignalSink> {
    let subscriptions = this._localSubscriptions.get(signal);
    if (!subscriptions) {
      subscriptions = new Set();
      this._localSubscriptions.set(signal, subscriptions);
    }
    return subscriptions;
  }

  private _assertUnbound(operation: string): void {
    if (this._binding.mode !== 'unbound') {
      throw new BindingStateError(`${operation}: ${this.constructor.name} is already ${this._binding.mode}`);
    }
  }

  private _buildRegistrations(): InterfaceRegistration[] {
    const byInterface = new Map<string, InterfaceRegistration>();
    const registrationFor = (name: string): InterfaceRegistration => {
      let registration = byInterface.get(name);
      if (!registration) {
        registration = { name, methods: [], properties: [], signals: [] };
        byInterface.set(name, registration);
      }
      return registration;
    };

    for (const descriptor of instanceMembers(this).values()) {
      const { interfaceName } = descriptor;
      if (!descriptor.servingEnabled || interfaceName === undefined) continue;
      this._export(registrationFor(interfaceName), descriptor);
    }
    return [...byInterface.values()];
  }

  private _export(registration: InterfaceRegistration, descriptor: MemberDescriptor): void {
    switch (descriptor.kind) {
      case 'method': {
        const bound = descriptor.bind(this);
        registration.methods.push({
          name: descriptor.methodName,
          inputSignature: descriptor.inputSignature,
          inputArgNames: descriptor.inputArgNames,
          resultSignature: descriptor.resultSignature,
          resultArgNames: descriptor.resultArgNames,
          flags: descriptor.flags,
          handler: (call) => bound.callFromBus(call),
        });
        return;
      }

      case 'property': {
        const bound = descriptor.bind(this);
        const exported: ExportedProperty = {
          name: descriptor.propertyName,
          signature: descriptor.signature,
          flags: descriptor.flags,
          get: () => bound.getSync(),
        };
        if (descriptor.hasSetter) {
          exported.set = (value) => bound.setSync(value);
        }
        registration.properties.push(exported);
        return;
      }

      case 'signal':
        registration.signals.push({
          name: descriptor.signalName,
          signature: descriptor.signature,
          argNames: descriptor.argNames,
          flags: descriptor.flags,
        });
        return;
    }
  }
}
