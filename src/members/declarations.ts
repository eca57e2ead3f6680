/**
 * Factories for the entries of a member table passed to `defineInterface`.
 *
 * @example
 * ```ts
 * class Notes extends DbusInterfaceBase {
 *   declare readonly count: BoundProperty<number>;
 *   declare readonly added: BoundSignal<string>;
 *
 *   private _notes: string[] = [];
 *
 *   static {
 *     defineInterface(this, {
 *       interfaceName: 'org.example.Notes',
 *       members: {
 *         add: dbusMethod({ inputSignature: 's', resultSignature: 'u' }),
 *         count: dbusProperty({ signature: 'u', get: (self: Notes) => self._notes.length }),
 *         added: dbusSignal({ signature: 's' }),
 *       },
 *     });
 *   }
 *
 *   async add(text: string): Promise<number> {
 *     this._notes.push(text);
 *     this.added.emit(text);
 *     return this._notes.length;
 *   }
 * }
 * ```
 */

import type {
  MethodDeclaration,
  MethodOptions,
  OverrideMarker,
  PropertyDeclaration,
  PropertyOptions,
  SignalDeclaration,
  SignalOptions,
} from '../types.ts';

/**
 * Expose the class's own method of the same key.
 */
export function dbusMethod(options: MethodOptions = {}): MethodDeclaration {
  return { kind: 'method', options };
}

/**
 * Expose a property backed by the given accessors.
 */
export function dbusProperty<TSelf, TValue>(
  options: PropertyOptions<TSelf, TValue>
): PropertyDeclaration<TSelf, TValue> {
  return { kind: 'property', options };
}

export function dbusSignal(options: SignalOptions = {}): SignalDeclaration {
  return { kind: 'signal', options };
}

/**
 * Replace the implementation of an inherited method, keeping its wire contract.
 */
export function dbusOverride(): OverrideMarker {
  return { kind: 'override' };
}
