/**
 * Tests for SchemaDeriver
 */

import { describe, it, expect } from 'vitest';
import {
  createTool,
  deriveToolDescriptor,
  parseDocComment,
  resolveParameterType,
  type ToolSpec,
} from '../SchemaDeriver.js';
import { SchemaError } from '../ToolErrors.js';

const calculatorSpec: ToolSpec = {
  name: 'calculator',
  description: 'Apply an arithmetic operation to two numbers',
  parameters: [
    { name: 'operation', type: 'text', description: 'One of +, -, *, /' },
    { name: 'a', type: 'number', description: 'Left operand' },
    { name: 'b', type: 'number', description: 'Right operand' },
    { name: 'precision', type: 'integer', description: 'Decimal places', default: 2 },
  ],
};

function captureSchemaError(spec: ToolSpec): SchemaError {
  try {
    deriveToolDescriptor(spec);
  } catch (error) {
    if (error instanceof SchemaError) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected SchemaError');
}

describe('SchemaDeriver', () => {
  describe('deriveToolDescriptor', () => {
    it('should produce the function-calling shape', () => {
      expect(deriveToolDescriptor(calculatorSpec)).toEqual({
        name: 'calculator',
        description: 'Apply an arithmetic operation to two numbers',
        parameters: {
          type: 'object',
          properties: {
            operation: { type: 'string', description: 'One of +, -, *, /' },
            a: { type: 'number', description: 'Left operand' },
            b: { type: 'number', description: 'Right operand' },
            precision: { type: 'integer', description: 'Decimal places', default: 2 },
          },
          required: ['operation', 'a', 'b'],
        },
      });
    });

    it('should keep declaration order for properties', () => {
      const descriptor = deriveToolDescriptor(calculatorSpec);
      expect(Object.keys(descriptor.parameters.properties)).toEqual(['operation', 'a', 'b', 'precision']);
    });

    it('should be deterministic', () => {
      const first = JSON.stringify(deriveToolDescriptor(calculatorSpec));
      const second = JSON.stringify(deriveToolDescriptor(calculatorSpec));
      expect(first).toBe(second);
    });

    it('should deep-freeze the descriptor', () => {
      const descriptor = deriveToolDescriptor(calculatorSpec);
      expect(Object.isFrozen(descriptor)).toBe(true);
      expect(Object.isFrozen(descriptor.parameters)).toBe(true);
      expect(Object.isFrozen(descriptor.parameters.properties.a)).toBe(true);
      expect(Object.isFrozen(descriptor.parameters.required)).toBe(true);
    });

    it('should leave the declared defaults and enum values unfrozen', () => {
      const defaults = { depth: 2 };
      const mode = { strict: true };
      const spec: ToolSpec = {
        name: 'configure',
        description: 'Apply options',
        parameters: [
          { name: 'opts', type: 'record', default: defaults },
          { name: 'mode', type: 'record', enum: [mode], required: false },
        ],
      };

      const descriptor = deriveToolDescriptor(spec);

      expect(Object.isFrozen(defaults)).toBe(false);
      expect(Object.isFrozen(mode)).toBe(false);
      expect(descriptor.parameters.properties.opts?.default).toEqual({ depth: 2 });
      expect(Object.isFrozen(descriptor.parameters.properties.opts?.default)).toBe(true);
    });

    it('should map every category to its JSON type', () => {
      const descriptor = deriveToolDescriptor({
        name: 'categories',
        description: 'Exercise every category',
        parameters: [
          { name: 't', type: 'text' },
          { name: 'i', type: 'integer' },
          { name: 'n', type: 'number' },
          { name: 'f', type: 'boolean' },
          { name: 'l', type: 'list', items: 'text' },
          { name: 'r', type: 'record' },
          { name: 's', type: 'string' },
        ],
      });

      const props = descriptor.parameters.properties;
      expect(props.t).toEqual({ type: 'string' });
      expect(props.i).toEqual({ type: 'integer' });
      expect(props.n).toEqual({ type: 'number' });
      expect(props.f).toEqual({ type: 'boolean' });
      expect(props.l).toEqual({ type: 'array', items: { type: 'string' } });
      expect(props.r).toEqual({ type: 'object' });
      expect(props.s).toEqual({ type: 'string' });
      expect(descriptor.parameters.required).toEqual(['t', 'i', 'n', 'f', 'l', 'r', 's']);
    });

    it('should leave parameters with required: false out of the required list', () => {
      const descriptor = deriveToolDescriptor({
        name: 'search',
        description: 'Search',
        parameters: [
          { name: 'query', type: 'text' },
          { name: 'limit', type: 'integer', required: false },
        ],
      });
      expect(descriptor.parameters.required).toEqual(['query']);
    });

    it('should take parameter descriptions from parameterDescriptions', () => {
      const descriptor = deriveToolDescriptor({
        name: 'greet',
        description: 'Greet someone',
        parameters: [{ name: 'who', type: 'text' }],
        parameterDescriptions: { who: 'Name of the person' },
      });
      expect(descriptor.parameters.properties.who).toEqual({ type: 'string', description: 'Name of the person' });
    });

    it('should carry enum values', () => {
      const descriptor = deriveToolDescriptor({
        name: 'pick',
        description: 'Pick a colour',
        parameters: [{ name: 'colour', type: 'text', enum: ['red', 'green'] }],
      });
      expect(descriptor.parameters.properties.colour).toEqual({ type: 'string', enum: ['red', 'green'] });
    });

    it('should fail for a parameter without a type, naming it', () => {
      const error = captureSchemaError({
        name: 'broken',
        description: 'Broken tool',
        parameters: [{ name: 'mystery' }],
      });
      expect(error.parameterName).toBe('mystery');
      expect(error.message).toBe("Parameter 'mystery' of tool 'broken' has no type");
    });

    it('should fail for an unknown type name', () => {
      const error = captureSchemaError({
        name: 'broken',
        description: 'Broken tool',
        parameters: [{ name: 'x', type: 'float' as 'number' }],
      });
      expect(error.message).toBe("Parameter 'x' of tool 'broken' has unknown type 'float'");
    });

    it('should fail for a duplicated parameter', () => {
      const error = captureSchemaError({
        name: 'broken',
        description: 'Broken tool',
        parameters: [
          { name: 'x', type: 'text' },
          { name: 'x', type: 'number' },
        ],
      });
      expect(error.parameterName).toBe('x');
    });

    it('should fail when documentation names an undeclared parameter', () => {
      const error = captureSchemaError({
        name: 'broken',
        description: 'Broken tool',
        parameters: [{ name: 'x', type: 'text' }],
        parameterDescriptions: { x: 'Declared', y: 'Not declared' },
      });
      expect(error.parameterName).toBe('y');
    });

    it('should fail without a description', () => {
      expect(() => deriveToolDescriptor({ name: 'quiet', parameters: [] })).toThrow(SchemaError);
      expect(() => deriveToolDescriptor({ name: 'quiet', description: '   ' })).toThrow(SchemaError);
    });

    it('should fail for an invalid name', () => {
      expect(() => deriveToolDescriptor({ name: 'has spaces', description: 'Bad name' })).toThrow(SchemaError);
      expect(() => deriveToolDescriptor({ name: '', description: 'No name' })).toThrow(SchemaError);
    });

    it('should fail when a defaulted parameter is marked required', () => {
      const error = captureSchemaError({
        name: 'broken',
        description: 'Broken tool',
        parameters: [{ name: 'x', type: 'integer', default: 1, required: true }],
      });
      expect(error.parameterName).toBe('x');
    });

    it('should fail for item types on non-list parameters', () => {
      expect(() =>
        deriveToolDescriptor({
          name: 'broken',
          description: 'Broken tool',
          parameters: [{ name: 'x', type: 'text', items: 'text' }],
        })
      ).toThrow(SchemaError);
    });
  });

  describe('resolveParameterType', () => {
    it('should resolve categories and JSON types', () => {
      expect(resolveParameterType('list')).toBe('array');
      expect(resolveParameterType('object')).toBe('object');
    });

    it('should not resolve unknown or inherited names', () => {
      expect(resolveParameterType('float')).toBeUndefined();
      expect(resolveParameterType('toString')).toBeUndefined();
      expect(resolveParameterType(undefined)).toBeUndefined();
    });
  });

  describe('parseDocComment', () => {
    const doc = `/**
 * Add two numbers.
 *
 * Returns their sum.
 * @param a - First addend
 * @param {number} b Second addend,
 *   which may be negative
 * @returns The sum
 */`;

    it('should read the summary and parameter descriptions', () => {
      expect(parseDocComment(doc)).toEqual({
        description: 'Add two numbers. Returns their sum.',
        parameterDescriptions: {
          a: 'First addend',
          b: 'Second addend, which may be negative',
        },
      });
    });

    it('should drive derivation', () => {
      const descriptor = deriveToolDescriptor({
        name: 'add',
        ...parseDocComment(doc),
        parameters: [
          { name: 'a', type: 'number' },
          { name: 'b', type: 'number' },
        ],
      });
      expect(descriptor.description).toBe('Add two numbers. Returns their sum.');
      expect(descriptor.parameters.properties.a).toEqual({ type: 'number', description: 'First addend' });
    });

    it('should accept plain text without comment markers', () => {
      expect(parseDocComment('Echo the input back.')).toEqual({
        description: 'Echo the input back.',
        parameterDescriptions: {},
      });
    });
  });

  describe('createTool', () => {
    it('should pair the descriptor with the executor', () => {
      const execute = () => 'pong';
      const tool = createTool({ name: 'ping', description: 'Reply with pong' }, execute);

      expect(tool.descriptor.name).toBe('ping');
      expect(tool.descriptor.parameters).toEqual({ type: 'object', properties: {}, required: [] });
      expect(tool.execute).toBe(execute);
    });
  });
});
