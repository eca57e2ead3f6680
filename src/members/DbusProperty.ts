/**
 * Property descriptor and its bound form.
 */

import createDebug from 'debug';
import {
  BindingStateError,
  DeclarationError,
  NoSetterError,
  RemoteCallError,
  ValidationError,
} from '../errors.ts';
import { assertMemberName } from '../names.ts';
import { compileSignature } from '../validation.ts';
import { Variant, propertyGetMessage, propertySetMessage } from '../wire.ts';
import type { DbusInterfaceBase } from '../DbusInterfaceBase.ts';
import type { BindingState } from '../types.ts';

const debug = createDebug('dbus-bind:property');

export interface PropertyAccessors<T> {
  get(self: DbusInterfaceBase): T;
  set?(self: DbusInterfaceBase, value: T): void;
}

export interface DbusPropertyInit<T> {
  key: string;
  interfaceName: string | undefined;
  servingEnabled: boolean;
  propertyName: string;
  signature: string;
  accessors: PropertyAccessors<T>;
  flags: number;
}

/**
 * Immutable definition of one exposed property.
 */
export class DbusProperty<T = unknown> {
  readonly kind = 'property' as const;
  readonly key: string;
  readonly interfaceName: string | undefined;
  readonly servingEnabled: boolean;
  readonly propertyName: string;
  readonly signature: string;
  readonly accessors: PropertyAccessors<T>;
  readonly flags: number;

  constructor(init: DbusPropertyInit<T>) {
    assertMemberName('property', init.propertyName);
    if (compileSignature(init.signature).arity !== 1) {
      throw new DeclarationError(
        `property ${init.propertyName} needs a single complete type, got "${init.signature}"`
      );
    }

    this.key = init.key;
    this.interfaceName = init.interfaceName;
    this.servingEnabled = init.servingEnabled;
    this.propertyName = init.propertyName;
    this.signature = init.signature;
    this.accessors = init.accessors;
    this.flags = init.flags;
    Object.freeze(this);
  }

  get hasSetter(): boolean {
    return this.accessors.set !== undefined;
  }

  bind(owner: DbusInterfaceBase): BoundProperty<T> {
    return new BoundProperty(this, owner);
  }
}

/**
 * A property descriptor paired with one owner instance.
 *
 * `get()`/`set()` work the same on local objects and proxies and are what
 * application code should use. `getSync()`/`setSync()` always use the local
 * accessors; the bus uses them to serve the property.
 */
export class BoundProperty<T = unknown> {
  readonly descriptor: DbusProperty<T>;
  readonly owner: DbusInterfaceBase;

  constructor(descriptor: DbusProperty<T>, owner: DbusInterfaceBase) {
    this.descriptor = descriptor;
    this.owner = owner;
  }

  getSync(): T {
    return this.descriptor.accessors.get(this.owner);
  }

  /**
   * @throws NoSetterError if the property is read-only
   * @throws ValidationError if the value does not match the signature
   */
  setSync(value: T): void {
    const { accessors, propertyName, signature } = this.descriptor;
    if (!accessors.set) {
      throw new NoSetterError(propertyName);
    }
    compileSignature(signature).validate([value]);
    accessors.set(this.owner, value);
  }

  async get(): Promise<T> {
    const binding = this.owner.dbusBinding;
    if (binding.mode !== 'proxy') {
      return this.getSync();
    }

    const reply = await binding.bus.call(
      propertyGetMessage(binding.serviceName, binding.objectPath, this._interfaceName(), this.descriptor.propertyName)
    );
    if (reply.type === 'error') {
      throw new RemoteCallError(reply.errorName, reply.errorMessage);
    }

    const [variant] = reply.body;
    const value = variant instanceof Variant ? variant.value : variant;
    if (!this._isValue(value)) {
      throw new ValidationError(
        `property ${this.descriptor.propertyName} returned a value not matching "${this.descriptor.signature}"`
      );
    }
    return value;
  }

  async set(value: T): Promise<void> {
    const binding = this.owner.dbusBinding;
    if (binding.mode !== 'proxy') {
      this.setSync(value);
      return;
    }

    await this._setRemote(binding, value);
  }

  private async _setRemote(binding: Extract<BindingState, { mode: 'proxy' }>, value: T): Promise<void> {
    const { propertyName, signature } = this.descriptor;
    debug('Setting %s on %s%s', propertyName, binding.serviceName, binding.objectPath);

    const reply = await binding.bus.call(
      propertySetMessage(
        binding.serviceName,
        binding.objectPath,
        this._interfaceName(),
        propertyName,
        signature,
        value
      )
    );
    if (reply.type === 'error') {
      throw new RemoteCallError(reply.errorName, reply.errorMessage);
    }
  }

  private _interfaceName(): string {
    const { interfaceName, propertyName } = this.descriptor;
    if (interfaceName === undefined) {
      throw new BindingStateError(`${propertyName} has no interface name and cannot be accessed remotely`);
    }
    return interfaceName;
  }

  private _isValue(value: unknown): value is T {
    return compileSignature(this.descriptor.signature).check([value]);
  }
}
