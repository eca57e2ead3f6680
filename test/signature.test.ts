/**
 * Signature parser tests.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { countCompleteTypes, isSignatureValid, parseSignature } from '../src/signature.ts';
import { DeclarationError, InvalidSignatureError } from '../src/errors.ts';

describe('Signature', () => {
  describe('parseSignature', () => {
    it('should split a signature into complete types', () => {
      const nodes = parseSignature('ia{sv}(is)as');
      assert.deepStrictEqual(
        nodes.map((node) => node.signature),
        ['i', 'a{sv}', '(is)', 'as']
      );
      assert.deepStrictEqual(
        nodes.map((node) => node.kind),
        ['basic', 'dict', 'struct', 'array']
      );
    });

    it('should describe nested containers', () => {
      const [node] = parseSignature('a(sa{ov})');
      assert.ok(node && node.kind === 'array');
      assert.strictEqual(node.element.kind, 'struct');
      assert.ok(node.element.kind === 'struct');
      assert.deepStrictEqual(
        node.element.fields.map((field) => field.signature),
        ['s', 'a{ov}']
      );
    });

    it('should parse the empty signature', () => {
      assert.deepStrictEqual(parseSignature(''), []);
    });

    it('should reject malformed signatures', () => {
      assert.throws(() => parseSignature('()'), {
        name: 'InvalidSignatureError',
        message: 'Invalid signature "()": empty struct at offset 1',
      });
      assert.throws(() => parseSignature('(i'), InvalidSignatureError);
      assert.throws(() => parseSignature('{ss}'), /dict entry outside of an array/);
      assert.throws(() => parseSignature('a{vs}'), /dict key must be a basic type/);
      assert.throws(() => parseSignature('a{sss}'), /exactly two types/);
      assert.throws(() => parseSignature('z'), /unknown type code "z"/);
      assert.throws(() => parseSignature('a'), /unexpected end/);
    });

    it('should limit nesting depth', () => {
      assert.doesNotThrow(() => parseSignature(`${'a'.repeat(32)}i`));
      assert.throws(() => parseSignature(`${'a'.repeat(33)}i`), /nested too deeply/);
    });

    it('should limit signature length', () => {
      assert.throws(() => parseSignature('i'.repeat(256)), /longer than 255/);
    });

    it('should report parse failures as declaration errors', () => {
      assert.throws(() => parseSignature('?'), DeclarationError);
    });
  });

  describe('countCompleteTypes', () => {
    it('should count the values a body holds', () => {
      assert.strictEqual(countCompleteTypes(''), 0);
      assert.strictEqual(countCompleteTypes('s'), 1);
      assert.strictEqual(countCompleteTypes('ii'), 2);
      assert.strictEqual(countCompleteTypes('a{sv}'), 1);
      assert.strictEqual(countCompleteTypes('(is)as'), 2);
    });
  });

  describe('isSignatureValid', () => {
    it('should not throw', () => {
      assert.strictEqual(isSignatureValid('a{sv}'), true);
      assert.strictEqual(isSignatureValid('a{'), false);
    });
  });
});
