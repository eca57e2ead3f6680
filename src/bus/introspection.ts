/**
 * Introspection XML for an object path.
 */

import { parseSignature } from '../signature.ts';
import { INTROSPECTABLE_INTERFACE, PEER_INTERFACE, PROPERTIES_INTERFACE } from '../wire.ts';
import type { ExportedMethod, ExportedProperty, ExportedSignal } from './BusConnection.ts';

/**
 * What introspection needs to know about one interface.
 */
export interface IntrospectedInterface {
  name: string;
  methods: readonly Omit<ExportedMethod, 'handler' | 'flags'>[];
  properties: readonly Pick<ExportedProperty, 'name' | 'signature' | 'set'>[];
  signals: readonly Pick<ExportedSignal, 'name' | 'signature' | 'argNames'>[];
}

const DOCTYPE =
  '<!DOCTYPE node PUBLIC "-//freedesktop//DTD D-BUS Object Introspection 1.0//EN"\n' +
  ' "http://www.freedesktop.org/standards/dbus/1.0/introspect.dtd">';

/**
 * Interfaces the bus engine answers on every exported object.
 */
export const BUILTIN_INTERFACES: readonly IntrospectedInterface[] = [
  {
    name: PEER_INTERFACE,
    methods: [
      builtinMethod('Ping', '', [], '', []),
      builtinMethod('GetMachineId', '', [], 's', ['machine_uuid']),
    ],
    properties: [],
    signals: [],
  },
  {
    name: INTROSPECTABLE_INTERFACE,
    methods: [builtinMethod('Introspect', '', [], 's', ['xml_data'])],
    properties: [],
    signals: [],
  },
  {
    name: PROPERTIES_INTERFACE,
    methods: [
      builtinMethod('Get', 'ss', ['interface_name', 'property_name'], 'v', ['value']),
      builtinMethod('Set', 'ssv', ['interface_name', 'property_name', 'value'], '', []),
      builtinMethod('GetAll', 's', ['interface_name'], 'a{sv}', ['props']),
    ],
    properties: [],
    signals: [
      {
        name: 'PropertiesChanged',
        signature: 'sa{sv}as',
        argNames: ['interface_name', 'changed_properties', 'invalidated_properties'],
      },
    ],
  },
];

function builtinMethod(
  name: string,
  inputSignature: string,
  inputArgNames: string[],
  resultSignature: string,
  resultArgNames: string[]
): IntrospectedInterface['methods'][number] {
  return { name, inputSignature, inputArgNames, resultSignature, resultArgNames };
}

function escapeAttribute(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/"/g, '&quot;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;');
}

function argLines(signature: string, names: readonly string[], direction: 'in' | 'out' | undefined): string[] {
  return parseSignature(signature).map((node, index) => {
    const name = names[index];
    const nameAttr = name === undefined ? '' : ` name="${escapeAttribute(name)}"`;
    const directionAttr = direction === undefined ? '' : ` direction="${direction}"`;
    return `      <arg${nameAttr} type="${escapeAttribute(node.signature)}"${directionAttr}/>`;
  });
}

function interfaceLines(registration: IntrospectedInterface): string[] {
  const lines = [`  <interface name="${escapeAttribute(registration.name)}">`];

  for (const method of registration.methods) {
    const args = [
      ...argLines(method.inputSignature, method.inputArgNames, 'in'),
      ...argLines(method.resultSignature, method.resultArgNames, 'out'),
    ];
    if (args.length === 0) {
      lines.push(`    <method name="${escapeAttribute(method.name)}"/>`);
    } else {
      lines.push(`    <method name="${escapeAttribute(method.name)}">`, ...args, '    </method>');
    }
  }

  for (const property of registration.properties) {
    const access = property.set ? 'readwrite' : 'read';
    lines.push(
      `    <property name="${escapeAttribute(property.name)}" type="${escapeAttribute(property.signature)}" access="${access}"/>`
    );
  }

  for (const signal of registration.signals) {
    const args = argLines(signal.signature, signal.argNames, undefined);
    if (args.length === 0) {
      lines.push(`    <signal name="${escapeAttribute(signal.name)}"/>`);
    } else {
      lines.push(`    <signal name="${escapeAttribute(signal.name)}">`, ...args, '    </signal>');
    }
  }

  lines.push('  </interface>');
  return lines;
}

/**
 * Build the introspection document of one object: the built-in interfaces,
 * the served ones and the names of child nodes.
 */
export function buildIntrospectionXml(
  registrations: readonly IntrospectedInterface[],
  childNodes: readonly string[] = []
): string {
  const lines = [DOCTYPE, '<node>'];
  for (const registration of [...BUILTIN_INTERFACES, ...registrations]) {
    lines.push(...interfaceLines(registration));
  }
  for (const child of childNodes) {
    lines.push(`  <node name="${escapeAttribute(child)}"/>`);
  }
  lines.push('</node>');
  return lines.join('\n') + '\n';
}
