/**
 * Payload validation using TypeBox.
 *
 * Each D-Bus signature is compiled once into a validator that checks a message
 * body (the list of positional values) before it is handed to the bus, and
 * after it arrives on the serving side.
 */

import { Type } from 'typebox';
import type { TSchema } from 'typebox';
import { Compile } from 'typebox/compile';
import { ValidationError } from './errors.ts';
import { parseSignature } from './signature.ts';
import type { BasicTypeCode, SignatureNode } from './signature.ts';

/**
 * Compiled validator for a signature.
 */
export interface SignatureValidator {
  /** The source signature */
  signature: string;
  /** Number of values a body carries */
  arity: number;
  /** Check if a body is valid */
  check: (body: readonly unknown[]) => boolean;
  /** Validate a body and throw on error */
  validate: (body: readonly unknown[]) => void;
}

const INTEGER_RANGES: Partial<Record<BasicTypeCode, [number, number]>> = {
  y: [0, 0xff],
  n: [-0x8000, 0x7fff],
  q: [0, 0xffff],
  i: [-0x80000000, 0x7fffffff],
  u: [0, 0xffffffff],
  h: [0, 0xffffffff],
};

const OBJECT_PATH_PATTERN = '^(/|(/[A-Za-z0-9_]+)+)$';

function basicSchema(code: BasicTypeCode): TSchema {
  const range = INTEGER_RANGES[code];
  if (range) {
    return Type.Integer({ minimum: range[0], maximum: range[1] });
  }

  switch (code) {
    case 'b':
      return Type.Boolean();
    case 'd':
      return Type.Number();
    case 'x':
    case 't':
      return Type.Union([Type.Integer(), Type.BigInt()]);
    case 'o':
      return Type.String({ pattern: OBJECT_PATH_PATTERN });
    default:
      return Type.String();
  }
}

/**
 * Convert one complete type into a TypeBox schema.
 */
export function nodeToSchema(node: SignatureNode): TSchema {
  switch (node.kind) {
    case 'basic':
      return basicSchema(node.code);
    case 'variant':
      return Type.Object({ signature: Type.String(), value: Type.Unknown() });
    case 'array':
      return Type.Array(nodeToSchema(node.element));
    case 'dict': {
      const numericKey = INTEGER_RANGES[node.key.code] !== undefined || node.key.code === 'd';
      return Type.Record(numericKey ? Type.Number() : Type.String(), nodeToSchema(node.value));
    }
    case 'struct':
      return Type.Tuple(node.fields.map(nodeToSchema));
  }
}

/**
 * TypeBox localized validation error type.
 */
interface LocalizedValidationError {
  keyword: string;
  schemaPath: string;
  instancePath: string;
  params: object;
  message: string;
}

/**
 * Format validation errors for display.
 */
function formatErrors(signature: string, errors: LocalizedValidationError[]): string {
  if (errors.length === 0) {
    return `body does not match signature "${signature}"`;
  }
  return errors.map((e) => `${e.instancePath || '/'}: ${e.message}`).join('; ');
}

const validatorCache = new Map<string, SignatureValidator>();

/**
 * Compile a signature into a body validator. Results are cached per signature.
 *
 * @throws InvalidSignatureError if the signature does not parse
 */
export function compileSignature(signature: string): SignatureValidator {
  const cached = validatorCache.get(signature);
  if (cached) return cached;

  const nodes = parseSignature(signature);
  const compiled = Compile(Type.Tuple(nodes.map(nodeToSchema)));

  const validator: SignatureValidator = {
    signature,
    arity: nodes.length,

    check: (body: readonly unknown[]): boolean => {
      return compiled.Check(body);
    },

    validate: (body: readonly unknown[]): void => {
      if (body.length !== nodes.length) {
        throw new ValidationError(
          `signature "${signature}" expects ${nodes.length} value(s), got ${body.length}`
        );
      }
      if (!compiled.Check(body)) {
        throw new ValidationError(formatErrors(signature, compiled.Errors(body)));
      }
    },
  };

  validatorCache.set(signature, validator);
  return validator;
}

/**
 * Validate a body against a signature without keeping the validator around.
 */
export function validateBody(signature: string, body: readonly unknown[]): void {
  compileSignature(signature).validate(body);
}

/**
 * Check if a body matches a signature.
 */
export function isBodyValid(signature: string, body: readonly unknown[]): boolean {
  return compileSignature(signature).check(body);
}
