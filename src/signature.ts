/**
 * D-Bus type signature parsing.
 *
 * A signature is a sequence of complete types. The parser turns it into a tree
 * used for arity computation and for compiling payload validators.
 */

import { InvalidSignatureError } from './errors.ts';

const BASIC_CODES = 'ybnqiuxtdhsog';
const MAX_SIGNATURE_LENGTH = 255;
const MAX_DEPTH = 32;

export type BasicTypeCode = 'y' | 'b' | 'n' | 'q' | 'i' | 'u' | 'x' | 't' | 'd' | 'h' | 's' | 'o' | 'g';

export type SignatureNode =
  | { kind: 'basic'; code: BasicTypeCode; signature: string }
  | { kind: 'variant'; signature: string }
  | { kind: 'array'; element: SignatureNode; signature: string }
  | { kind: 'dict'; key: SignatureNode & { kind: 'basic' }; value: SignatureNode; signature: string }
  | { kind: 'struct'; fields: SignatureNode[]; signature: string };

function isBasicCode(char: string | undefined): char is BasicTypeCode {
  return char !== undefined && char.length === 1 && BASIC_CODES.includes(char);
}

class SignatureParser {
  private readonly _source: string;
  private _pos = 0;

  constructor(source: string) {
    this._source = source;
  }

  parseAll(): SignatureNode[] {
    const nodes: SignatureNode[] = [];
    while (this._pos < this._source.length) {
      nodes.push(this._parseComplete(0, 0));
    }
    return nodes;
  }

  private _error(reason: string): InvalidSignatureError {
    return new InvalidSignatureError(this._source, `${reason} at offset ${this._pos}`);
  }

  private _parseComplete(arrayDepth: number, structDepth: number): SignatureNode {
    const start = this._pos;
    const char = this._source[this._pos];
    if (char === undefined) throw this._error('unexpected end');
    this._pos++;

    if (isBasicCode(char)) {
      return { kind: 'basic', code: char, signature: char };
    }

    switch (char) {
      case 'v':
        return { kind: 'variant', signature: 'v' };

      case 'a': {
        if (arrayDepth + 1 > MAX_DEPTH) throw this._error('arrays nested too deeply');
        if (this._source[this._pos] === '{') {
          this._pos++;
          const key = this._parseComplete(arrayDepth + 1, structDepth);
          if (key.kind !== 'basic') throw this._error('dict key must be a basic type');
          const value = this._parseComplete(arrayDepth + 1, structDepth);
          if (this._source[this._pos] !== '}') throw this._error('dict entry must hold exactly two types');
          this._pos++;
          return { kind: 'dict', key, value, signature: this._source.slice(start, this._pos) };
        }
        const element = this._parseComplete(arrayDepth + 1, structDepth);
        return { kind: 'array', element, signature: this._source.slice(start, this._pos) };
      }

      case '(': {
        if (structDepth + 1 > MAX_DEPTH) throw this._error('structs nested too deeply');
        const fields: SignatureNode[] = [];
        while (this._source[this._pos] !== ')') {
          if (this._pos >= this._source.length) throw this._error('unterminated struct');
          fields.push(this._parseComplete(arrayDepth, structDepth + 1));
        }
        if (fields.length === 0) throw this._error('empty struct');
        this._pos++;
        return { kind: 'struct', fields, signature: this._source.slice(start, this._pos) };
      }

      case '{':
        throw this._error('dict entry outside of an array');

      default:
        throw this._error(`unknown type code ${JSON.stringify(char)}`);
    }
  }
}

const parseCache = new Map<string, SignatureNode[]>();

/**
 * Parse a signature into its complete types.
 *
 * @throws InvalidSignatureError when the signature is malformed
 */
export function parseSignature(signature: string): SignatureNode[] {
  const cached = parseCache.get(signature);
  if (cached) return cached;

  if (signature.length > MAX_SIGNATURE_LENGTH) {
    throw new InvalidSignatureError(signature, `longer than ${MAX_SIGNATURE_LENGTH} characters`);
  }

  const nodes = new SignatureParser(signature).parseAll();
  parseCache.set(signature, nodes);
  return nodes;
}

/**
 * Number of complete types in a signature, i.e. how many values a body holds.
 */
export function countCompleteTypes(signature: string): number {
  return parseSignature(signature).length;
}

export function isSignatureValid(signature: string): boolean {
  try {
    parseSignature(signature);
    return true;
  } catch {
    return false;
  }
}
