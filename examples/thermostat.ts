/**
 * Thermostat Example
 *
 * Demonstrates one interface class used three ways: locally, served on a bus,
 * and as a proxy of the served object.
 *
 * Run with: node --import tsx examples/thermostat.ts
 */

import {
  DbusFailedError,
  DbusInterfaceCommon,
  MemoryBus,
  MemoryBusRouter,
  RemoteCallError,
  dbusMethod,
  dbusProperty,
  dbusSignal,
  defineInterface,
} from '../src/index.ts';
import type { BoundProperty, BoundSignal } from '../src/index.ts';

class TooHotError extends DbusFailedError {
  override readonly dbusErrorName = 'org.example.Thermostat.Error.TooHot';
}

class Thermostat extends DbusInterfaceCommon {
  declare readonly target: BoundProperty<number>;
  declare readonly targetChanged: BoundSignal<number>;

  private _target = 20;

  static {
    defineInterface(this, {
      interfaceName: 'org.example.Thermostat',
      members: {
        bump: dbusMethod({ inputSignature: 'i', resultSignature: 'i', inputArgNames: ['delta'] }),
        target: dbusProperty({
          signature: 'i',
          get: (self: Thermostat) => self._target,
          set: (self: Thermostat, value: number) => {
            self._update(value);
          },
        }),
        targetChanged: dbusSignal({ signature: 'i', argNames: ['value'] }),
      },
    });
  }

  async bump(delta: number): Promise<number> {
    this._update(this._target + delta);
    return this._target;
  }

  private _update(value: number): void {
    if (value > 30) {
      throw new TooHotError(`${value} is above 30`);
    }
    this._target = value;
    this.targetChanged.emit(value);
  }
}

async function main() {
  // 1. Local use: no bus involved, signals reach local subscribers
  const local = new Thermostat();
  const localChanges = await local.targetChanged.subscribe();
  await local.bump(1);
  console.log(`[Local] Target: ${local.target.getSync()}`);
  console.log(`[Local] Change: ${JSON.stringify(await localChanges.next())}`);
  localChanges.close();

  // 2. Serve an instance under a well-known name
  const router = new MemoryBusRouter();
  const serverBus = new MemoryBus({ router });
  await serverBus.requestName('org.example.Heating');
  const served = new Thermostat();
  served.startServing('/org/example/Thermostat', serverBus);
  console.log(`[Service] Serving as ${serverBus.uniqueName}`);

  // 3. Use it through a proxy on another connection
  const clientBus = new MemoryBus({ router });
  const remote = Thermostat.newProxy('org.example.Heating', '/org/example/Thermostat', clientBus);
  const changes = await remote.targetChanged.subscribe();

  try {
    console.log(`[Client] Bumped to ${await remote.bump(2)}`);
    await remote.target.set(25);
    console.log(`[Client] Target: ${await remote.target.get()}`);
    for (let i = 0; i < 2; i++) {
      const change = await changes.next();
      if (!change.done) console.log(`[Client] TargetChanged: ${change.value}`);
    }

    await remote.bump(10);
  } catch (err) {
    if (err instanceof RemoteCallError) {
      console.log(`[Client] Remote error ${err.errorName}: ${err.remoteMessage}`);
    } else {
      console.error('[Client] Error:', err);
    }
  }

  console.log(await remote.introspect());

  // 4. Cleanup
  changes.close();
  served.stopServing();
  clientBus.close();
  serverBus.close();
  console.log('Done!');
}

main().catch(console.error);
