/**
 * Wire naming: identifier conversion and the D-Bus name grammar.
 */

import { DeclarationError, InvalidNameError } from './errors.ts';

const MAX_NAME_LENGTH = 255;
const ELEMENT = /^[A-Za-z_][A-Za-z0-9_]*$/;
const BUS_NAME_ELEMENT = /^[A-Za-z_-][A-Za-z0-9_-]*$/;
const UNIQUE_NAME_ELEMENT = /^[A-Za-z0-9_-]+$/;
const OBJECT_PATH = /^\/$|^(\/[A-Za-z0-9_]+)+$/;

/**
 * Convert an identifier into the CapitalizedCamelCase used for wire member names.
 *
 * The first character is upper-cased; every underscore is removed and the
 * character after it upper-cased. Consecutive underscores collapse into one
 * boundary, a trailing underscore is dropped.
 *
 * @example
 * ```ts
 * toWireName('get_machine_id'); // 'GetMachineId'
 * toWireName('getMachineId');   // 'GetMachineId'
 * ```
 */
export function toWireName(identifier: string): string {
  if (identifier.length === 0) {
    throw new DeclarationError('Cannot derive a wire name from an empty identifier');
  }

  let result = '';
  let upperNext = true;
  for (const char of identifier) {
    if (char === '_') {
      upperNext = true;
      continue;
    }
    result += upperNext ? char.toUpperCase() : char;
    upperNext = false;
  }
  return result;
}

export function isInterfaceNameValid(name: string): boolean {
  if (name.length === 0 || name.length > MAX_NAME_LENGTH) return false;
  const elements = name.split('.');
  return elements.length >= 2 && elements.every((element) => ELEMENT.test(element));
}

export function isMemberNameValid(name: string): boolean {
  return name.length > 0 && name.length <= MAX_NAME_LENGTH && ELEMENT.test(name);
}

export function isObjectPathValid(path: string): boolean {
  return OBJECT_PATH.test(path);
}

/**
 * Unique (`:1.42`) or well-known (`org.example.Service`) bus name.
 */
export function isBusNameValid(name: string): boolean {
  if (name.length === 0 || name.length > MAX_NAME_LENGTH) return false;

  const unique = name.startsWith(':');
  const elements = (unique ? name.slice(1) : name).split('.');
  if (elements.length < 2) return false;

  const pattern = unique ? UNIQUE_NAME_ELEMENT : BUS_NAME_ELEMENT;
  return elements.every((element) => pattern.test(element));
}

export function assertInterfaceName(name: string): void {
  if (!isInterfaceNameValid(name)) throw new InvalidNameError('interface', name);
}

export function assertMemberName(kind: 'method' | 'property' | 'signal', name: string): void {
  if (!isMemberNameValid(name)) throw new InvalidNameError(kind, name);
}

export function assertObjectPath(path: string): void {
  if (!isObjectPathValid(path)) throw new InvalidNameError('object path', path);
}

export function assertBusName(name: string): void {
  if (!isBusNameValid(name)) throw new InvalidNameError('bus', name);
}
