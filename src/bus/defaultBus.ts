/**
 * Process-wide default bus connection.
 */

import createDebug from 'debug';
import { MemoryBus, getDefaultRouter } from './MemoryBus.ts';
import type { BusConnection } from './BusConnection.ts';

const debug = createDebug('dbus-bind:default-bus');

export type BusFactory = () => BusConnection;

const memoryBusFactory: BusFactory = () => new MemoryBus({ router: getDefaultRouter() });

let factory: BusFactory = memoryBusFactory;
let defaultBus: BusConnection | undefined;

/**
 * The connection used when `connect()` or `startServing()` are given none.
 * Created on first use.
 */
export function getDefaultBus(): BusConnection {
  if (!defaultBus) {
    defaultBus = factory();
    debug('Opened default bus %s', defaultBus.uniqueName);
  }
  return defaultBus;
}

/**
 * Choose how the default connection is created. Takes effect for the next
 * `getDefaultBus()` that has to create one.
 */
export function setDefaultBusFactory(next: BusFactory = memoryBusFactory): void {
  factory = next;
}

/**
 * Close and forget the default connection.
 */
export function resetDefaultBus(): void {
  if (!defaultBus) return;
  debug('Closing default bus %s', defaultBus.uniqueName);
  defaultBus.close();
  defaultBus = undefined;
}
