/**
 * Binding transitions and serving of interface objects.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { DbusInterfaceBase } from '../src/DbusInterfaceBase.ts';
import { dbusMethod, dbusProperty, dbusSignal } from '../src/members/declarations.ts';
import type { BoundProperty } from '../src/members/DbusProperty.ts';
import type { BoundSignal } from '../src/members/DbusSignal.ts';
import { defineInterface } from '../src/registry.ts';
import { BindingStateError, InvalidNameError } from '../src/errors.ts';
import { MemoryBus } from '../src/bus/MemoryBus.ts';
import type { IncomingCall } from '../src/bus/BusConnection.ts';
import { RecordingBus } from './helpers.ts';

class Lamp extends DbusInterfaceBase {
  declare readonly brightness: BoundProperty<number>;
  declare readonly toggled: BoundSignal<boolean>;

  lit = false;
  level = 50;

  static {
    defineInterface(
      this,
      {
        interfaceName: 'org.example.Lamp',
        members: {
          toggle: dbusMethod({ resultSignature: 'b', resultArgNames: ['lit'] }),
          brightness: dbusProperty({
            signature: 'u',
            get: (self: Lamp) => self.level,
            set: (self: Lamp, value: number) => {
              self.level = value;
            },
          }),
          toggled: dbusSignal({ signature: 'b' }),
        },
      },
      {
        interfaceName: 'org.example.Maintenance',
        servingEnabled: false,
        members: {
          reset: dbusMethod(),
        },
      }
    );
  }

  async toggle(): Promise<boolean> {
    this.lit = !this.lit;
    this.toggled.emit(this.lit);
    return this.lit;
  }

  async reset(): Promise<void> {
    this.lit = false;
  }
}

class Dimmer extends Lamp {
  static {
    defineInterface(this, {
      interfaceName: 'org.example.Dimmer',
      members: {
        fade: dbusMethod({ inputSignature: 'u' }),
      },
    });
  }

  async fade(target: number): Promise<void> {
    this.level = target;
  }
}

class Fader extends DbusInterfaceBase {
  static {
    defineInterface(this, {
      interfaceName: 'org.example.Dimmer',
      members: {
        fade: dbusMethod({ inputSignature: 'u' }),
      },
    });
  }

  async fade(): Promise<void> {}
}

const PATH = '/org/example/Lamp';

function incomingCall(member: string, replies: unknown[]): IncomingCall {
  return {
    message: { destination: ':1.900', path: PATH, interface: 'org.example.Lamp', member, signature: '', body: [] },
    reply: (signature, body) => {
      replies.push({ signature, body });
    },
    replyError: (errorName, errorMessage) => {
      replies.push({ errorName, errorMessage });
    },
  };
}

describe('DbusInterfaceBase', () => {
  describe('binding state', () => {
    it('should start unbound', () => {
      const lamp = new Lamp();
      assert.deepStrictEqual(lamp.dbusBinding, { mode: 'unbound' });
      assert.strictEqual(lamp.isProxy, false);
      assert.strictEqual(lamp.isServing, false);
    });

    it('should become a proxy through connect()', () => {
      const bus = new RecordingBus();
      const lamp = new Lamp();
      lamp.connect('org.example.Lamps', PATH, bus);

      assert.deepStrictEqual(lamp.dbusBinding, {
        mode: 'proxy',
        bus,
        serviceName: 'org.example.Lamps',
        objectPath: PATH,
      });
      assert.strictEqual(lamp.isProxy, true);
    });

    it('should create connected instances with newProxy()', () => {
      const bus = new RecordingBus();
      const dimmer = Dimmer.newProxy(':1.7', PATH, bus);
      assert.ok(dimmer instanceof Dimmer);
      assert.strictEqual(dimmer.isProxy, true);
    });

    it('should reject malformed names without changing state', () => {
      const bus = new RecordingBus();
      const lamp = new Lamp();
      assert.throws(() => lamp.connect('nodots', PATH, bus), InvalidNameError);
      assert.throws(() => lamp.connect('org.example.Lamps', 'relative', bus), InvalidNameError);
      assert.throws(() => lamp.startServing('/trailing/', bus), InvalidNameError);
      assert.strictEqual(lamp.dbusBinding.mode, 'unbound');
    });

    it('should allow only one transition', () => {
      const bus = new RecordingBus();

      const proxy = Lamp.newProxy('org.example.Lamps', PATH, bus);
      assert.throws(() => proxy.connect('org.example.Lamps', PATH, bus), {
        name: 'BindingStateError',
        message: 'connect: Lamp is already proxy',
      });
      assert.throws(() => proxy.startServing(PATH, bus), BindingStateError);

      const served = new Lamp();
      served.startServing(PATH, bus);
      assert.throws(() => served.startServing(PATH, bus), {
        message: 'startServing: Lamp is already serving',
      });
      assert.throws(() => served.connect('org.example.Lamps', PATH, bus), BindingStateError);
    });

    it('should refuse stopServing() on an object that is not served', () => {
      assert.throws(() => new Lamp().stopServing(), {
        name: 'BindingStateError',
        message: 'stopServing: Lamp is unbound',
      });
    });
  });

  describe('startServing', () => {
    it('should export serving-enabled interfaces only', () => {
      const bus = new RecordingBus();
      const lamp = new Lamp();
      lamp.startServing(PATH, bus);

      assert.strictEqual(lamp.isServing, true);
      assert.deepStrictEqual(
        bus.served.map(({ objectPath, registration }) => [objectPath, registration.name]),
        [[PATH, 'org.example.Lamp']]
      );

      const registration = bus.served[0]?.registration;
      assert.ok(registration);
      assert.deepStrictEqual(
        registration.methods.map(({ name, resultSignature, resultArgNames }) => ({ name, resultSignature, resultArgNames })),
        [{ name: 'Toggle', resultSignature: 'b', resultArgNames: ['lit'] }]
      );
      assert.deepStrictEqual(
        registration.properties.map(({ name, signature }) => ({ name, signature })),
        [{ name: 'Brightness', signature: 'u' }]
      );
      assert.deepStrictEqual(registration.signals, [{ name: 'Toggled', signature: 'b', argNames: [], flags: 0 }]);
    });

    it('should export inherited interfaces before the subclass ones', () => {
      const bus = new RecordingBus();
      new Dimmer().startServing(PATH, bus);
      assert.deepStrictEqual(
        bus.served.map(({ registration }) => registration.name),
        ['org.example.Lamp', 'org.example.Dimmer']
      );
    });

    it('should answer exported methods with the local implementation', async () => {
      const bus = new RecordingBus();
      const lamp = new Lamp();
      lamp.startServing(PATH, bus);
      const subscription = await lamp.toggled.subscribe();

      const toggle = bus.served[0]?.registration.methods[0];
      assert.ok(toggle);
      const replies: unknown[] = [];
      await toggle.handler(incomingCall('Toggle', replies));

      assert.deepStrictEqual(replies, [{ signature: 'b', body: [true] }]);
      assert.strictEqual(lamp.lit, true);
      assert.deepStrictEqual(bus.signals.map(({ member, body }) => [member, body]), [['Toggled', [true]]]);
      assert.deepStrictEqual(await subscription.next(), { done: false, value: true });
      subscription.close();
    });

    it('should serve properties through the local accessors', () => {
      const bus = new RecordingBus();
      const lamp = new Lamp();
      lamp.startServing(PATH, bus);

      const brightness = bus.served[0]?.registration.properties[0];
      assert.ok(brightness && brightness.set);
      assert.strictEqual(brightness.get(), 50);
      brightness.set(80);
      assert.strictEqual(lamp.level, 80);
    });

    it('should serve nothing for a class without named interfaces', () => {
      class Silent extends DbusInterfaceBase {}
      const bus = new RecordingBus();
      const silent = new Silent();
      silent.startServing(PATH, bus);
      assert.strictEqual(bus.served.length, 0);
      assert.strictEqual(silent.isServing, true);
    });

    it('should withdraw already added interfaces when one fails', () => {
      const bus = new MemoryBus();
      new Fader().startServing(PATH, bus);

      const dimmer = new Dimmer();
      assert.throws(() => dimmer.startServing(PATH, bus), {
        name: 'BindingStateError',
        message: `org.example.Dimmer is already served at ${PATH}`,
      });
      assert.strictEqual(dimmer.dbusBinding.mode, 'unbound');

      assert.doesNotThrow(() => new Lamp().startServing(PATH, bus));
      bus.close();
    });
  });

  describe('stopServing', () => {
    it('should unregister every handle', () => {
      const bus = new RecordingBus();
      const dimmer = new Dimmer();
      dimmer.startServing(PATH, bus);
      dimmer.stopServing();

      assert.deepStrictEqual(
        bus.served.map(({ handle }) => handle.active),
        [false, false]
      );
    });
  });

  describe('proxy dispatch', () => {
    it('should call methods of interfaces that are not served locally', async () => {
      const bus = new RecordingBus();
      const lamp = Lamp.newProxy('org.example.Lamps', PATH, bus);

      await lamp.reset();
      assert.deepStrictEqual(
        bus.calls.map(({ interface: interfaceName, member }) => [interfaceName, member]),
        [['org.example.Maintenance', 'Reset']]
      );
    });
  });
});
