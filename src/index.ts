/**
 * dbus-bind: declare D-Bus interfaces once on a class, then use the same class
 * locally, as a proxy of a remote object, or as a served object.
 *
 * ## Example
 * ```ts
 * import {
 *   DbusInterfaceCommon,
 *   MemoryBus,
 *   MemoryBusRouter,
 *   dbusMethod,
 *   dbusProperty,
 *   dbusSignal,
 *   defineInterface,
 * } from 'dbus-bind';
 * import type { BoundProperty, BoundSignal } from 'dbus-bind';
 *
 * class Thermostat extends DbusInterfaceCommon {
 *   declare readonly target: BoundProperty<number>;
 *   declare readonly targetChanged: BoundSignal<number>;
 *
 *   private _target = 20;
 *
 *   static {
 *     defineInterface(this, {
 *       interfaceName: 'org.example.Thermostat',
 *       members: {
 *         bump: dbusMethod({ inputSignature: 'i', resultSignature: 'i', inputArgNames: ['delta'] }),
 *         target: dbusProperty({
 *           signature: 'i',
 *           get: (self: Thermostat) => self._target,
 *           set: (self: Thermostat, value: number) => { self._target = value; },
 *         }),
 *         targetChanged: dbusSignal({ signature: 'i' }),
 *       },
 *     });
 *   }
 *
 *   async bump(delta: number): Promise<number> {
 *     this._target += delta;
 *     this.targetChanged.emit(this._target);
 *     return this._target;
 *   }
 * }
 *
 * const router = new MemoryBusRouter();
 * const serverBus = new MemoryBus({ router });
 * await serverBus.requestName('org.example.Heating');
 * new Thermostat().startServing('/org/example/Thermostat', serverBus);
 *
 * const remote = Thermostat.newProxy('org.example.Heating', '/org/example/Thermostat', new MemoryBus({ router }));
 * console.log(await remote.bump(2)); // 22
 * console.log(await remote.target.get()); // 22
 * ```
 *
 * @packageDocumentation
 */

// Runtime exports
export { DbusInterfaceBase } from './DbusInterfaceBase.ts';
export { DbusInterfaceCommon } from './standard.ts';
export { dbusMethod, dbusOverride, dbusProperty, dbusSignal } from './members/declarations.ts';
export {
  boundMember,
  collectMembers,
  defineInterface,
  getDeclaredInterfaces,
  getDeclaredKeys,
  getMemberDescriptor,
} from './registry.ts';
export { DbusMethod, BoundMethod } from './members/DbusMethod.ts';
export { DbusProperty, BoundProperty } from './members/DbusProperty.ts';
export { DbusSignal, BoundSignal } from './members/DbusSignal.ts';
export {
  toWireName,
  isInterfaceNameValid,
  isMemberNameValid,
  isObjectPathValid,
  isBusNameValid,
} from './names.ts';
export { parseSignature, countCompleteTypes, isSignatureValid } from './signature.ts';
export { compileSignature } from './validation.ts';
export {
  Variant,
  PROPERTIES_INTERFACE,
  PEER_INTERFACE,
  INTROSPECTABLE_INTERFACE,
  encodeBody,
  encodeResult,
  decodeContents,
  methodCallMessage,
  propertyGetMessage,
  propertySetMessage,
  signalMessage,
} from './wire.ts';
export { MemoryBus, MemoryBusRouter, getDefaultRouter } from './bus/MemoryBus.ts';
export { getDefaultBus, setDefaultBusFactory, resetDefaultBus } from './bus/defaultBus.ts';
export { buildIntrospectionXml } from './bus/introspection.ts';
export {
  ErrorCode,
  DbusErrorName,
  hasErrorCode,
  getErrorCode,
  getDbusErrorName,
  DeclarationError,
  InvalidNameError,
  InvalidSignatureError,
  IllegalOverrideError,
  ArgumentError,
  ValidationError,
  NoSetterError,
  RemoteCallError,
  ServerDispatchError,
  BindingStateError,
  NotImplementedError,
  DbusFailedError,
} from './errors.ts';

// Type-only exports
export type {
  BindingState,
  BindingMode,
  MethodOptions,
  PropertyOptions,
  SignalOptions,
  MemberDeclaration,
  MemberTable,
  InterfaceDefinition,
  InterfaceInfo,
} from './types.ts';

export type { BoundMember, MemberDescriptor, InterfaceClass } from './registry.ts';
export type { BoundMethodFunction, MethodImplementation } from './members/DbusMethod.ts';
export type { PropertyAccessors } from './members/DbusProperty.ts';
export type { SignalSubscription } from './members/DbusSignal.ts';
export type { SignatureNode, BasicTypeCode } from './signature.ts';
export type { SignatureValidator } from './validation.ts';
export type {
  MethodCallMessage,
  MethodReturnMessage,
  ErrorReplyMessage,
  ReplyMessage,
  SignalMessage,
} from './wire.ts';
export type {
  BusConnection,
  IncomingCall,
  ExportedMethod,
  ExportedProperty,
  ExportedSignal,
  InterfaceRegistration,
  InterfaceHandle,
  SignalMatch,
  SignalQueue,
} from './bus/BusConnection.ts';
export type { MemoryBusOptions, MemoryBusRouterOptions } from './bus/MemoryBus.ts';
export type { BusFactory } from './bus/defaultBus.ts';
export type { ErrorCodeType } from './errors.ts';
