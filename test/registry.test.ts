/**
 * Interface registry tests.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { DbusInterfaceBase } from '../src/DbusInterfaceBase.ts';
import { dbusMethod, dbusOverride, dbusProperty, dbusSignal } from '../src/members/declarations.ts';
import { BoundMethod, DbusMethod } from '../src/members/DbusMethod.ts';
import { BoundProperty } from '../src/members/DbusProperty.ts';
import type { BoundSignal } from '../src/members/DbusSignal.ts';
import {
  boundMember,
  collectMembers,
  defineInterface,
  getDeclaredInterfaces,
  getDeclaredKeys,
  getMemberDescriptor,
} from '../src/registry.ts';
import { DeclarationError, IllegalOverrideError, InvalidNameError } from '../src/errors.ts';
import { RecordingBus } from './helpers.ts';

class Worker extends DbusInterfaceBase {
  declare readonly level: BoundProperty<number>;
  declare readonly done: BoundSignal<string>;

  static {
    defineInterface(this, {
      interfaceName: 'org.example.Worker',
      members: {
        work: dbusMethod({ inputSignature: 'i', resultSignature: 'i' }),
        level: dbusProperty({ signature: 'i', get: () => 1 }),
        done: dbusSignal({ signature: 's' }),
      },
    });
  }

  async work(value: number): Promise<number> {
    return value + 1;
  }
}

class Foreman extends Worker {
  static {
    defineInterface(this, {
      interfaceName: 'org.example.Foreman',
      members: {
        assign: dbusMethod({ inputSignature: 's' }),
      },
    });
  }

  async assign(task: string): Promise<string> {
    return `assigned ${task}`;
  }
}

describe('Registry', () => {
  describe('declaration', () => {
    it('should build descriptors with wire names derived from keys', () => {
      const work = getMemberDescriptor(Worker, 'work');
      assert.ok(work instanceof DbusMethod);
      assert.strictEqual(work.methodName, 'Work');
      assert.strictEqual(work.interfaceName, 'org.example.Worker');
      assert.strictEqual(work.servingEnabled, true);
      assert.deepStrictEqual(work.inputArgNames, ['arg0']);

      const done = getMemberDescriptor(Worker, 'done');
      assert.ok(done && done.kind === 'signal');
      assert.strictEqual(done.signalName, 'Done');
    });

    it('should record interface declarations along the ancestry', () => {
      assert.deepStrictEqual(getDeclaredInterfaces(Foreman), [
        { interfaceName: 'org.example.Worker', servingEnabled: true, keys: ['work', 'level', 'done'] },
        { interfaceName: 'org.example.Foreman', servingEnabled: true, keys: ['assign'] },
      ]);
      assert.deepStrictEqual([...getDeclaredKeys(Foreman)], ['work', 'level', 'done', 'assign']);
    });

    it('should merge inherited members with new ones', async () => {
      assert.deepStrictEqual([...collectMembers(Foreman).keys()], ['work', 'level', 'done', 'assign']);
      assert.strictEqual(await new Foreman().assign('paint'), 'assigned paint');
      assert.strictEqual(await new Foreman().work(1), 2);
    });

    it('should return undefined for keys that are not D-Bus members', () => {
      assert.strictEqual(getMemberDescriptor(Worker, 'connect'), undefined);
      assert.strictEqual(boundMember(new Worker(), 'isProxy'), undefined);
    });

    it('should reject a non-function declared as method', () => {
      assert.throws(() => {
        class NotCallable extends DbusInterfaceBase {
          declare readonly count: () => Promise<void>;
          static {
            defineInterface(this, { interfaceName: 'org.example.Bad', members: { count: dbusMethod() } });
          }
        }
        return NotCallable;
      }, {
        name: 'DeclarationError',
        message: 'NotCallable.count is declared as a method but is not a function',
      });
    });

    it('should reject invalid interface and member names', () => {
      assert.throws(() => {
        class BadInterface extends DbusInterfaceBase {
          static {
            defineInterface(this, { interfaceName: 'nodots', members: {} });
          }
        }
        return BadInterface;
      }, InvalidNameError);

      assert.throws(() => {
        class BadMember extends DbusInterfaceBase {
          static {
            defineInterface(this, {
              interfaceName: 'org.example.Bad',
              members: { run: dbusMethod({ methodName: 'Run-Now' }) },
            });
          }
          async run(): Promise<void> {}
        }
        return BadMember;
      }, { message: 'Invalid method name: "Run-Now"' });
    });

    it('should reject a key declared by two interfaces of the same class', () => {
      assert.throws(() => {
        class Twice extends DbusInterfaceBase {
          static {
            defineInterface(
              this,
              { interfaceName: 'org.example.One', members: { run: dbusMethod() } },
              { interfaceName: 'org.example.Two', members: { run: dbusMethod() } }
            );
          }
          async run(): Promise<void> {}
        }
        return Twice;
      }, /Twice\.run: declared more than once/);
    });

    it('should reject a property key that collides with a class member', () => {
      assert.throws(() => {
        class Collides extends DbusInterfaceBase {
          static {
            defineInterface(this, {
              interfaceName: 'org.example.Bad',
              members: { size: dbusProperty({ signature: 'u', get: () => 0 }) },
            });
          }
          size(): number {
            return 0;
          }
        }
        return Collides;
      }, /conflicts with a class member/);
    });

    it('should reject a second defineInterface call on the same class', () => {
      class Once extends DbusInterfaceBase {
        static {
          defineInterface(this, { interfaceName: 'org.example.Once', members: {} });
        }
      }
      assert.throws(
        () => defineInterface(Once, { interfaceName: 'org.example.Again', members: {} }),
        /already registered/
      );
    });
  });

  describe('redefinition of inherited members', () => {
    it('should reject a plain method shadowing an inherited method', () => {
      class PlainMethod extends Worker {
        override async work(value: number): Promise<number> {
          return value;
        }
      }
      assert.throws(() => new PlainMethod(), IllegalOverrideError);
    });

    it('should reject a re-declared inherited method', () => {
      assert.throws(() => {
        class RedeclaredMethod extends Worker {
          static {
            defineInterface(this, {
              interfaceName: 'org.example.Other',
              members: { work: dbusMethod({ inputSignature: 'i', resultSignature: 'i' }) },
            });
          }
          override async work(value: number): Promise<number> {
            return value;
          }
        }
        return RedeclaredMethod;
      }, IllegalOverrideError);
    });

    it('should reject a plain member shadowing an inherited property', () => {
      class PlainProperty extends Worker {
        static {
          Object.defineProperty(this.prototype, 'level', { value: 5, configurable: true });
        }
      }
      assert.throws(() => new PlainProperty(), {
        name: 'IllegalOverrideError',
        message: 'PlainProperty.level: shadows an inherited D-Bus member; use dbusOverride() to replace a method',
      });
    });

    it('should reject a re-declared inherited property', () => {
      assert.throws(() => {
        class RedeclaredProperty extends Worker {
          static {
            defineInterface(this, {
              interfaceName: 'org.example.Other',
              members: { level: dbusProperty({ signature: 'i', get: () => 2 }) },
            });
          }
        }
        return RedeclaredProperty;
      }, IllegalOverrideError);
    });

    it('should reject dbusOverride() on a property', () => {
      assert.throws(() => {
        class OverriddenProperty extends Worker {
          static {
            defineInterface(this, { members: { level: dbusOverride() } });
          }
        }
        return OverriddenProperty;
      }, { message: 'OverriddenProperty.level: dbusOverride() applies to methods only' });
    });

    it('should reject dbusOverride() without an inherited member', () => {
      assert.throws(() => {
        class NothingToOverride extends Worker {
          static {
            defineInterface(this, { members: { rest: dbusOverride() } });
          }
          async rest(): Promise<void> {}
        }
        return NothingToOverride;
      }, /no inherited member of that name/);
    });

    it('should reject dbusOverride() without an own implementation', () => {
      assert.throws(() => {
        class MissingImplementation extends Worker {
          static {
            defineInterface(this, { members: { work: dbusOverride() } });
          }
        }
        return MissingImplementation;
      }, /needs a method of that name on the class/);
    });

    it('should replace the implementation and keep the wire contract with dbusOverride()', async () => {
      class Faster extends Worker {
        static {
          defineInterface(this, { members: { work: dbusOverride() } });
        }
        override async work(value: number): Promise<number> {
          return value * 10;
        }
      }

      assert.strictEqual(await new Faster().work(2), 20);
      assert.strictEqual(await new Worker().work(2), 3);

      const base = getMemberDescriptor(Worker, 'work');
      const derived = getMemberDescriptor(Faster, 'work');
      assert.ok(base instanceof DbusMethod && derived instanceof DbusMethod);
      assert.notStrictEqual(derived, base);
      assert.notStrictEqual(derived.implementation, base.implementation);
      assert.strictEqual(derived.methodName, base.methodName);
      assert.strictEqual(derived.inputSignature, 'i');
      assert.strictEqual(derived.interfaceName, 'org.example.Worker');
    });

    it('should register classes without declarations on first instantiation', async () => {
      class Plain extends Worker {
        extra(): string {
          return 'extra';
        }
      }
      const plain = new Plain();
      assert.strictEqual(plain.extra(), 'extra');
      assert.strictEqual(await plain.work(4), 5);
      assert.deepStrictEqual(getDeclaredInterfaces(Plain), getDeclaredInterfaces(Worker));
    });
  });

  describe('bound members', () => {
    it('should produce a fresh bound member on every access', () => {
      const worker = new Worker();
      assert.notStrictEqual(worker.level, worker.level);
      assert.strictEqual(worker.level.descriptor, worker.level.descriptor);
    });

    it('should bind the same descriptor to different owners', () => {
      const first = new Worker();
      const second = new Worker();

      const a = boundMember(first, 'work');
      const b = boundMember(second, 'work');
      assert.ok(a instanceof BoundMethod && b instanceof BoundMethod);
      assert.strictEqual(a.descriptor, b.descriptor);
      assert.strictEqual(a.owner, first);
      assert.strictEqual(b.owner, second);

      assert.ok(first.level instanceof BoundProperty);
      assert.strictEqual(first.level.owner, first);
      assert.strictEqual(second.level.owner, second);
    });

    it('should keep dispatch per instance when one instance becomes a proxy', async () => {
      const bus = new RecordingBus();
      bus.replies.push({ type: 'return', signature: 'i', body: [7] });

      const remote = new Worker();
      const local = new Worker();
      remote.connect('org.example.Workers', '/org/example/Worker', bus);

      const localResult = local.work(1);
      const remoteResult = remote.work(1);
      assert.ok(localResult instanceof Promise);
      assert.ok(remoteResult instanceof Promise);
      assert.strictEqual(await localResult, 2);
      assert.strictEqual(await remoteResult, 7);
      assert.strictEqual(bus.calls.length, 1);
      assert.strictEqual(local.isProxy, false);
      assert.strictEqual(remote.isProxy, true);
    });
  });
});
