/**
 * Test utilities: timing helpers, a recording bus and a connected bus pair.
 */

import { AsyncQueue } from '../src/queue.ts';
import { MemoryBus, MemoryBusRouter } from '../src/bus/MemoryBus.ts';
import type {
  BusConnection,
  InterfaceHandle,
  InterfaceRegistration,
  SignalMatch,
  SignalQueue,
} from '../src/bus/BusConnection.ts';
import type { SignalSubscription } from '../src/members/DbusSignal.ts';
import type { MethodCallMessage, ReplyMessage, SignalMessage } from '../src/wire.ts';

/**
 * Promise-based delay.
 */
export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Wait until a condition becomes true, with polling and timeout.
 */
export async function waitUntil(
  condition: () => boolean,
  timeout = 2000,
  pollInterval = 5
): Promise<void> {
  const start = Date.now();
  while (!condition()) {
    if (Date.now() - start > timeout) {
      throw new Error(`Timeout waiting for condition after ${timeout}ms`);
    }
    await delay(pollInterval);
  }
}

/**
 * Read the next `count` payloads of a subscription, failing after `timeout`.
 * An expired read is withdrawn, so later reads still see every payload.
 */
export async function take<T>(subscription: SignalSubscription<T>, count: number, timeout = 2000): Promise<T[]> {
  const values: T[] = [];
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeout);

  try {
    while (values.length < count) {
      const result = await subscription.next(controller.signal);
      if (result.done) break;
      values.push(result.value);
    }
  } catch (err) {
    if (controller.signal.aborted) {
      throw new Error(`Timeout after ${values.length}/${count} values`);
    }
    throw err;
  } finally {
    clearTimeout(timer);
  }
  return values;
}

/**
 * Two connections on one private router.
 */
export interface BusPair {
  router: MemoryBusRouter;
  server: MemoryBus;
  client: MemoryBus;
  close(): void;
}

export function createBusPair(options: { callTimeoutMs?: number; machineId?: string } = {}): BusPair {
  const router = new MemoryBusRouter({ machineId: options.machineId });
  const server = new MemoryBus({ router });
  const client = new MemoryBus({ router, callTimeoutMs: options.callTimeoutMs });
  return {
    router,
    server,
    client,
    close() {
      client.close();
      server.close();
    },
  };
}

interface RecordedQueue {
  match: SignalMatch;
  queue: AsyncQueue<SignalMessage>;
}

/**
 * Bus stand-in that records outgoing traffic and answers calls with scripted
 * replies (an empty return when none is queued).
 */
export class RecordingBus implements BusConnection {
  readonly uniqueName = ':1.900';
  readonly calls: MethodCallMessage[] = [];
  readonly signals: SignalMessage[] = [];
  readonly served: { objectPath: string; registration: InterfaceRegistration; handle: InterfaceHandle }[] = [];
  readonly replies: ReplyMessage[] = [];

  private _connected = true;
  private _queues: RecordedQueue[] = [];

  get connected(): boolean {
    return this._connected;
  }

  async call(message: MethodCallMessage): Promise<ReplyMessage> {
    this.calls.push(message);
    return this.replies.shift() ?? { type: 'return', signature: '', body: [] };
  }

  emitSignal(message: SignalMessage): void {
    this.signals.push(message);
  }

  async getSignalQueue(match: SignalMatch): Promise<SignalQueue> {
    const queue = new AsyncQueue<SignalMessage>();
    this._queues.push({ match, queue });
    return {
      get closed() {
        return queue.closed;
      },
      next: async (signal?: AbortSignal) => {
        const result = await queue.shift(signal);
        return result.done ? null : result.value;
      },
      close: () => queue.close(),
    };
  }

  /**
   * Feed a signal to every queue whose match equals the message.
   */
  inject(message: SignalMessage & { sender: string }): void {
    for (const { match, queue } of this._queues) {
      if (
        match.sender === message.sender &&
        match.path === message.path &&
        match.interface === message.interface &&
        match.member === message.member
      ) {
        queue.push(message);
      }
    }
  }

  get queueMatches(): SignalMatch[] {
    return this._queues.map(({ match }) => match);
  }

  addInterface(objectPath: string, registration: InterfaceRegistration): InterfaceHandle {
    let active = true;
    const handle: InterfaceHandle = {
      objectPath,
      interfaceName: registration.name,
      get active() {
        return active;
      },
      unregister() {
        active = false;
      },
    };
    this.served.push({ objectPath, registration, handle });
    return handle;
  }

  async requestName(): Promise<void> {}

  close(): void {
    this._connected = false;
  }
}
