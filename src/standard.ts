/**
 * Standard interfaces every bus peer answers.
 *
 * Serving is disabled: the bus engine implements both interfaces for every
 * exported object. On a proxy the calls reach the remote engine.
 */

import { NotImplementedError } from './errors.ts';
import { DbusInterfaceBase } from './DbusInterfaceBase.ts';
import { dbusMethod } from './members/declarations.ts';
import { defineInterface } from './registry.ts';
import { INTROSPECTABLE_INTERFACE, PEER_INTERFACE } from './wire.ts';

export class DbusInterfaceCommon extends DbusInterfaceBase {
  static {
    defineInterface(
      this,
      {
        interfaceName: PEER_INTERFACE,
        servingEnabled: false,
        members: {
          ping: dbusMethod(),
          getMachineId: dbusMethod({ resultSignature: 's', resultArgNames: ['machine_uuid'] }),
        },
      },
      {
        interfaceName: INTROSPECTABLE_INTERFACE,
        servingEnabled: false,
        members: {
          introspect: dbusMethod({ resultSignature: 's', resultArgNames: ['xml_data'] }),
        },
      }
    );
  }

  ping(): Promise<void> {
    throw new NotImplementedError(`${PEER_INTERFACE}.Ping`);
  }

  getMachineId(): Promise<string> {
    throw new NotImplementedError(`${PEER_INTERFACE}.GetMachineId`);
  }

  introspect(): Promise<string> {
    throw new NotImplementedError(`${INTROSPECTABLE_INTERFACE}.Introspect`);
  }
}
