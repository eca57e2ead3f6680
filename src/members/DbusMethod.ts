/**
 * Method descriptor and its bound form.
 *
 * A bound method runs the implementation directly while its owner is not a
 * proxy, and turns into a bus call once the owner is connected to a remote
 * object. The same bound form also answers incoming calls when the owner is
 * served.
 */

import createDebug from 'debug';
import {
  ArgumentError,
  BindingStateError,
  DbusErrorName,
  DeclarationError,
  RemoteCallError,
  ServerDispatchError,
} from '../errors.ts';
import { assertMemberName } from '../names.ts';
import { countCompleteTypes } from '../signature.ts';
import { compileSignature } from '../validation.ts';
import { decodeContents, encodeResult, methodCallMessage } from '../wire.ts';
import type { IncomingCall } from '../bus/BusConnection.ts';
import type { DbusInterfaceBase } from '../DbusInterfaceBase.ts';
import type { BindingState } from '../types.ts';

const debug = createDebug('dbus-bind:method');

export type MethodImplementation = (...args: never[]) => unknown;

export interface DbusMethodInit {
  key: string;
  interfaceName: string | undefined;
  servingEnabled: boolean;
  implementation: MethodImplementation;
  methodName: string;
  inputSignature: string;
  resultSignature: string;
  inputArgNames: readonly string[] | undefined;
  resultArgNames: readonly string[];
  defaults: readonly unknown[];
  flags: number;
}

/**
 * Immutable definition of one exposed method.
 */
export class DbusMethod {
  readonly kind = 'method' as const;
  readonly key: string;
  readonly interfaceName: string | undefined;
  readonly servingEnabled: boolean;
  readonly implementation: MethodImplementation;
  readonly methodName: string;
  readonly inputSignature: string;
  readonly resultSignature: string;
  readonly inputArgNames: readonly string[];
  readonly resultArgNames: readonly string[];
  /** Number of positional arguments. */
  readonly argCount: number;
  /** Values of the trailing arguments that have defaults. */
  readonly defaults: readonly unknown[];
  /** Index of the first argument that has a default. */
  readonly defaultsStartAt: number;
  readonly flags: number;

  constructor(init: DbusMethodInit) {
    assertMemberName('method', init.methodName);
    const signatureArity = countCompleteTypes(init.inputSignature);
    countCompleteTypes(init.resultSignature);

    const argNames =
      init.inputArgNames ?? Array.from({ length: signatureArity }, (_, index) => `arg${index}`);
    if (init.inputSignature !== '' && argNames.length !== signatureArity) {
      throw new DeclarationError(
        `${init.methodName}: ${argNames.length} argument name(s) for input signature "${init.inputSignature}"`
      );
    }
    if (init.defaults.length > argNames.length) {
      throw new DeclarationError(
        `${init.methodName}: ${init.defaults.length} default(s) for ${argNames.length} argument(s)`
      );
    }

    this.key = init.key;
    this.interfaceName = init.interfaceName;
    this.servingEnabled = init.servingEnabled;
    this.implementation = init.implementation;
    this.methodName = init.methodName;
    this.inputSignature = init.inputSignature;
    this.resultSignature = init.resultSignature;
    this.inputArgNames = Object.freeze([...argNames]);
    this.resultArgNames = Object.freeze([...init.resultArgNames]);
    this.argCount = argNames.length;
    this.defaults = Object.freeze([...init.defaults]);
    this.defaultsStartAt = this.argCount - this.defaults.length;
    this.flags = init.flags;
    Object.freeze(this);
  }

  /**
   * Same wire contract, different implementation.
   */
  withImplementation(implementation: MethodImplementation): DbusMethod {
    return new DbusMethod({
      key: this.key,
      interfaceName: this.interfaceName,
      servingEnabled: this.servingEnabled,
      implementation,
      methodName: this.methodName,
      inputSignature: this.inputSignature,
      resultSignature: this.resultSignature,
      inputArgNames: this.inputArgNames,
      resultArgNames: this.resultArgNames,
      defaults: this.defaults,
      flags: this.flags,
    });
  }

  /**
   * Build a complete positional argument list.
   *
   * Each slot takes, in order: the positional value, the named value, the
   * declared default. `undefined` counts as not supplied.
   *
   * @throws ArgumentError if a slot cannot be filled
   */
  rebuildArgs(args: readonly unknown[], named: Readonly<Record<string, unknown>> = {}): unknown[] {
    if (args.length > this.argCount) {
      throw new ArgumentError(
        `${this.methodName} takes ${this.argCount} argument(s), ${args.length} given`
      );
    }
    for (const name of Object.keys(named)) {
      if (!this.inputArgNames.includes(name)) {
        throw new ArgumentError(`${this.methodName} has no argument named "${name}"`);
      }
    }

    return this.inputArgNames.map((name, index) => {
      const positional = args[index];
      if (positional !== undefined) return positional;

      const byName = named[name];
      if (byName !== undefined) return byName;

      if (index >= this.defaultsStartAt) {
        const fallback = this.defaults[index - this.defaultsStartAt];
        if (fallback !== undefined) return fallback;
      }

      throw new ArgumentError(`${this.methodName}: missing value for argument "${name}"`);
    });
  }

  bind(owner: DbusInterfaceBase): BoundMethod {
    return new BoundMethod(this, owner);
  }
}

/**
 * What a method member evaluates to on an instance: a plain callable that
 * carries its bound method.
 */
export type BoundMethodFunction = ((...args: unknown[]) => unknown) & { readonly bound: BoundMethod };

/**
 * A method descriptor paired with one owner instance.
 */
export class BoundMethod {
  readonly descriptor: DbusMethod;
  readonly owner: DbusInterfaceBase;

  constructor(descriptor: DbusMethod, owner: DbusInterfaceBase) {
    this.descriptor = descriptor;
    this.owner = owner;
  }

  /**
   * Invoke with positional arguments.
   *
   * Local owners run the implementation and return whatever it returns.
   * Proxy owners send a method call; argument errors throw before anything
   * is sent.
   */
  call(...args: unknown[]): unknown {
    const binding = this.owner.dbusBinding;
    if (binding.mode !== 'proxy') {
      return Reflect.apply(this.descriptor.implementation, this.owner, args);
    }

    const positional =
      args.length === this.descriptor.argCount ? args : this.descriptor.rebuildArgs(args);
    return this._callRemote(binding, positional);
  }

  /**
   * Invoke with positional and named arguments.
   */
  callNamed(args: readonly unknown[], named: Readonly<Record<string, unknown>>): unknown {
    const positional = this.descriptor.rebuildArgs(args, named);
    const binding = this.owner.dbusBinding;
    if (binding.mode !== 'proxy') {
      return Reflect.apply(this.descriptor.implementation, this.owner, positional);
    }
    return this._callRemote(binding, positional);
  }

  asCallable(): BoundMethodFunction {
    return Object.assign((...args: unknown[]) => this.call(...args), { bound: this });
  }

  private _callRemote(
    binding: Extract<BindingState, { mode: 'proxy' }>,
    args: readonly unknown[]
  ): Promise<unknown> {
    const { interfaceName, methodName, inputSignature } = this.descriptor;
    if (interfaceName === undefined) {
      throw new BindingStateError(`${methodName} has no interface name and cannot be called remotely`);
    }

    const message = methodCallMessage(
      binding.serviceName,
      binding.objectPath,
      interfaceName,
      methodName,
      inputSignature,
      args
    );

    debug('Calling %s.%s on %s%s', interfaceName, methodName, binding.serviceName, binding.objectPath);

    return binding.bus.call(message).then((reply) => {
      if (reply.type === 'error') {
        debug('%s.%s failed: %s', interfaceName, methodName, reply.errorName);
        throw new RemoteCallError(reply.errorName, reply.errorMessage);
      }
      return decodeContents(reply.body);
    });
  }

  /**
   * Answer an incoming bus call with the local implementation.
   *
   * Never rejects: every failure becomes an error reply. A result that does
   * not match the result signature is the implementation's fault and is
   * answered with `Failed`, not `InvalidArgs`.
   */
  async callFromBus(call: IncomingCall): Promise<void> {
    const { interfaceName, methodName, inputSignature, resultSignature } = this.descriptor;
    const member = `${interfaceName ?? ''}.${methodName}`;
    const args = call.message.body;

    if (!compileSignature(inputSignature).check(args)) {
      debug('Rejecting %s: body does not match "%s"', member, inputSignature);
      call.replyError(
        DbusErrorName.INVALID_ARGS,
        `Expected arguments of signature "${inputSignature}"`
      );
      return;
    }

    let result: unknown;
    try {
      result = await Reflect.apply(this.descriptor.implementation, this.owner, args);
    } catch (err) {
      const failure = new ServerDispatchError(member, err);
      debug('%s', failure.message);
      call.replyError(failure.dbusErrorName, failure.replyText);
      return;
    }

    // An absent result is an empty reply, whatever the declared result signature.
    if (result === undefined || result === null) {
      call.reply('', []);
      return;
    }

    let replyBody: unknown[];
    try {
      replyBody = encodeResult(resultSignature, result);
    } catch (err) {
      const text = err instanceof Error ? err.message : String(err);
      debug('%s returned a result not matching "%s": %s', member, resultSignature, text);
      call.replyError(DbusErrorName.FAILED, text);
      return;
    }
    call.reply(resultSignature, replyBody);
  }
}
