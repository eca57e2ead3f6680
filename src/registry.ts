/**
 * Interface registry.
 *
 * Every class of a bindable hierarchy owns one record: the interfaces it
 * declared, the descriptors it introduced or overrode, and the union of member
 * keys declared along its ancestry. Records are built by `defineInterface` or,
 * for classes that declare nothing, on first instantiation. Once a class has
 * a record its declarations are final.
 */

import createDebug from 'debug';
import { DeclarationError, IllegalOverrideError } from './errors.ts';
import { assertInterfaceName, toWireName } from './names.ts';
import { BoundMethod, DbusMethod } from './members/DbusMethod.ts';
import type { MethodImplementation } from './members/DbusMethod.ts';
import { BoundProperty, DbusProperty } from './members/DbusProperty.ts';
import { BoundSignal, DbusSignal } from './members/DbusSignal.ts';
import type { DbusInterfaceBase } from './DbusInterfaceBase.ts';
import type {
  InterfaceDefinition,
  InterfaceInfo,
  MemberDeclaration,
  MethodDeclaration,
  PropertyDeclaration,
  SignalDeclaration,
} from './types.ts';

const debug = createDebug('dbus-bind:registry');

export type MemberDescriptor = DbusMethod | DbusProperty | DbusSignal;
export type BoundMember = BoundMethod | BoundProperty | BoundSignal;

/**
 * Any class whose instances are interface objects.
 */
export type InterfaceClass<T extends DbusInterfaceBase = DbusInterfaceBase> = abstract new (
  ...args: never[]
) => T;

type Constructor = abstract new (...args: never[]) => unknown;

interface ClassRecord {
  readonly className: string;
  readonly parent: ClassRecord | undefined;
  readonly declarations: readonly InterfaceInfo[];
  readonly declaredKeys: ReadonlySet<string>;
  readonly members: ReadonlyMap<string, MemberDescriptor>;
}

interface RawDefinition {
  interfaceName?: string;
  servingEnabled?: boolean;
  members: object;
}

interface InterfaceScope {
  interfaceName: string | undefined;
  servingEnabled: boolean;
}

const records = new WeakMap<object, ClassRecord>();

const MEMBER_KINDS: ReadonlySet<unknown> = new Set(['method', 'property', 'signal', 'override']);

function isConstructor(value: unknown): value is Constructor {
  return typeof value === 'function';
}

function isImplementation(value: unknown): value is MethodImplementation {
  return typeof value === 'function';
}

function isMemberDeclaration(value: unknown): value is MemberDeclaration<never> {
  if (typeof value !== 'object' || value === null || !('kind' in value)) return false;
  if (!MEMBER_KINDS.has(value.kind)) return false;
  if (value.kind === 'override') return true;
  return 'options' in value && typeof value.options === 'object' && value.options !== null;
}

function prototypeOf(ctor: Constructor): object {
  const proto: unknown = ctor.prototype;
  if (typeof proto !== 'object' || proto === null) {
    throw new DeclarationError(`${ctor.name} has no prototype`);
  }
  return proto;
}

function ownPrototypeValue(proto: object, key: string): unknown {
  const descriptor = Object.getOwnPropertyDescriptor(proto, key);
  if (descriptor === undefined || !('value' in descriptor)) return undefined;
  const value: unknown = descriptor.value;
  return value;
}

/**
 * Register the root of a bindable hierarchy.
 */
export function registerRoot(ctor: Constructor): void {
  if (records.has(ctor)) return;
  records.set(ctor, {
    className: ctor.name,
    parent: undefined,
    declarations: [],
    declaredKeys: new Set(),
    members: new Map(),
  });
}

/**
 * Declare the D-Bus interfaces a class implements.
 *
 * Call once per class, from its `static {}` block, with every interface the
 * class introduces. Method members are implemented by the class's own method
 * of the same key; property and signal members become instance accessors.
 *
 * @throws DeclarationError on invalid names or signatures, a method key
 *   without an implementation, or an illegal redefinition of an inherited member
 */
export function defineInterface<C extends InterfaceClass>(
  target: C,
  ...definitions: InterfaceDefinition<InstanceType<C>>[]
): void {
  const existing = records.get(target);
  if (existing) {
    throw new DeclarationError(
      `${existing.className} is already registered; declare all its interfaces in one defineInterface call`
    );
  }
  createRecord(target, parentRecordOf(target), definitions);
}

/**
 * Make sure a class and its ancestors are registered.
 */
export function ensureRegistered(ctor: Constructor): void {
  recordFor(ctor);
}

function recordFor(ctor: Constructor): ClassRecord {
  return records.get(ctor) ?? createRecord(ctor, parentRecordOf(ctor), []);
}

function parentRecordOf(ctor: Constructor): ClassRecord {
  const parent: unknown = Object.getPrototypeOf(ctor);
  if (!isConstructor(parent) || parent === Function.prototype) {
    throw new DeclarationError(`${ctor.name} does not extend DbusInterfaceBase`);
  }
  return recordFor(parent);
}

function createRecord(
  ctor: Constructor,
  parent: ClassRecord,
  definitions: readonly RawDefinition[]
): ClassRecord {
  const className = ctor.name;
  const proto = prototypeOf(ctor);
  const inherited = parent.declaredKeys;
  const members = new Map<string, MemberDescriptor>();
  const declarations: InterfaceInfo[] = [];

  for (const definition of definitions) {
    const scope: InterfaceScope = {
      interfaceName: definition.interfaceName,
      servingEnabled: definition.servingEnabled ?? true,
    };
    if (scope.interfaceName !== undefined) {
      assertInterfaceName(scope.interfaceName);
    }

    const keys: string[] = [];
    for (const key of Object.keys(definition.members)) {
      const entry: unknown = Reflect.get(definition.members, key);
      if (entry === undefined) continue;
      if (!isMemberDeclaration(entry)) {
        throw new DeclarationError(`${className}.${key}: not a member declaration`);
      }
      if (members.has(key)) {
        throw new DeclarationError(`${className}.${key}: declared more than once`);
      }

      if (inherited.has(key)) {
        members.set(key, overrideMember(className, proto, parent, key, entry));
      } else if (entry.kind === 'override') {
        throw new IllegalOverrideError(className, key, 'dbusOverride() but no inherited member of that name');
      } else {
        members.set(key, buildMember(className, proto, key, entry, scope));
      }
      keys.push(key);
    }

    declarations.push({ ...scope, keys });
  }

  for (const key of Object.getOwnPropertyNames(proto)) {
    if (inherited.has(key) && !members.has(key)) {
      throw new IllegalOverrideError(
        className,
        key,
        'shadows an inherited D-Bus member; use dbusOverride() to replace a method'
      );
    }
  }

  for (const [key, descriptor] of members) {
    installAccessor(proto, key, descriptor);
  }

  const record: ClassRecord = {
    className,
    parent,
    declarations,
    declaredKeys: new Set([...inherited, ...members.keys()]),
    members,
  };
  records.set(ctor, record);

  debug('Registered %s: %d interface(s), %d member(s)', className, declarations.length, members.size);
  return record;
}

function overrideMember(
  className: string,
  proto: object,
  parent: ClassRecord,
  key: string,
  entry: MemberDeclaration<never>
): DbusMethod {
  if (entry.kind !== 'override') {
    throw new IllegalOverrideError(
      className,
      key,
      'redeclares an inherited D-Bus member; mark it with dbusOverride() to replace a method'
    );
  }

  const base = lookupMember(parent, key);
  if (!(base instanceof DbusMethod)) {
    throw new IllegalOverrideError(className, key, 'dbusOverride() applies to methods only');
  }

  const implementation = ownPrototypeValue(proto, key);
  if (!isImplementation(implementation)) {
    throw new IllegalOverrideError(className, key, 'dbusOverride() needs a method of that name on the class');
  }
  return base.withImplementation(implementation);
}

function buildMember(
  className: string,
  proto: object,
  key: string,
  entry: MethodDeclaration | PropertyDeclaration<never, unknown> | SignalDeclaration,
  scope: InterfaceScope
): MemberDescriptor {
  switch (entry.kind) {
    case 'method': {
      const implementation = ownPrototypeValue(proto, key);
      if (!isImplementation(implementation)) {
        throw new DeclarationError(`${className}.${key} is declared as a method but is not a function`);
      }
      const options = entry.options;
      return new DbusMethod({
        key,
        ...scope,
        implementation,
        methodName: options.methodName ?? toWireName(key),
        inputSignature: options.inputSignature ?? '',
        resultSignature: options.resultSignature ?? '',
        inputArgNames: options.inputArgNames,
        resultArgNames: options.resultArgNames ?? [],
        defaults: options.defaults ?? [],
        flags: options.flags ?? 0,
      });
    }

    case 'property': {
      assertNoOwnMember(className, proto, key, 'property');
      const options = entry.options;
      if (typeof options.get !== 'function') {
        throw new DeclarationError(`${className}.${key}: property needs a getter`);
      }
      return new DbusProperty({
        key,
        ...scope,
        propertyName: options.propertyName ?? toWireName(key),
        signature: options.signature,
        accessors: { get: options.get, set: options.set },
        flags: options.flags ?? 0,
      });
    }

    case 'signal': {
      assertNoOwnMember(className, proto, key, 'signal');
      const options = entry.options;
      return new DbusSignal({
        key,
        ...scope,
        signalName: options.signalName ?? toWireName(key),
        signature: options.signature ?? '',
        argNames: options.argNames ?? [],
        flags: options.flags ?? 0,
      });
    }
  }
}

function assertNoOwnMember(className: string, proto: object, key: string, kind: string): void {
  if (Object.hasOwn(proto, key)) {
    throw new DeclarationError(`${className}.${key}: ${kind} key conflicts with a class member`);
  }
}

function installAccessor(proto: object, key: string, descriptor: MemberDescriptor): void {
  Object.defineProperty(proto, key, {
    configurable: true,
    enumerable: false,
    get(this: DbusInterfaceBase) {
      return descriptor instanceof DbusMethod ? descriptor.bind(this).asCallable() : descriptor.bind(this);
    },
  });
}

function lookupMember(record: ClassRecord | undefined, key: string): MemberDescriptor | undefined {
  for (let current = record; current; current = current.parent) {
    const member = current.members.get(key);
    if (member) return member;
  }
  return undefined;
}

function chainOf(ctor: Constructor): ClassRecord[] {
  const chain: ClassRecord[] = [];
  for (let current: ClassRecord | undefined = recordFor(ctor); current; current = current.parent) {
    chain.unshift(current);
  }
  return chain;
}

/**
 * Descriptor in effect for a member key on a class.
 */
export function getMemberDescriptor(ctor: Constructor, key: string): MemberDescriptor | undefined {
  return lookupMember(recordFor(ctor), key);
}

/**
 * Every descriptor in effect on a class, keyed by member key; subclass
 * overrides replace their base entries.
 */
export function collectMembers(ctor: Constructor): Map<string, MemberDescriptor> {
  const members = new Map<string, MemberDescriptor>();
  for (const record of chainOf(ctor)) {
    for (const [key, descriptor] of record.members) {
      members.set(key, descriptor);
    }
  }
  return members;
}

/**
 * Interface declarations along a class's ancestry, base classes first.
 */
export function getDeclaredInterfaces(ctor: Constructor): InterfaceInfo[] {
  return chainOf(ctor).flatMap((record) => record.declarations);
}

/**
 * Union of member keys declared by a class and its ancestors.
 */
export function getDeclaredKeys(ctor: Constructor): ReadonlySet<string> {
  return recordFor(ctor).declaredKeys;
}

/**
 * Every descriptor in effect on an instance's class.
 */
export function instanceMembers(instance: DbusInterfaceBase): Map<string, MemberDescriptor> {
  return collectMembers(instanceClass(instance));
}

/**
 * Bound member of an instance, or `undefined` if the key is not a D-Bus member.
 */
export function boundMember(instance: DbusInterfaceBase, key: string): BoundMember | undefined {
  const descriptor = getMemberDescriptor(instanceClass(instance), key);
  return descriptor?.bind(instance);
}

function instanceClass(instance: DbusInterfaceBase): Constructor {
  const ctor: unknown = instance.constructor;
  if (!isConstructor(ctor)) {
    throw new DeclarationError('Interface object has no constructor');
  }
  return ctor;
}
