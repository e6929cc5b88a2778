/**
 * SchemaDeriver - Builds tool descriptors from explicit declarations
 *
 * A tool is declared as an ordered list of parameter specs plus
 * documentation. The derived descriptor is the function-calling shape
 * shown to the model:
 *
 *   { name, description, parameters: { type: 'object', properties, required } }
 *
 * Property order follows declaration order, and the result is deep-frozen.
 * Derivation is pure: the same spec always serialises to the same JSON.
 */

import type {
  JsonValue,
  ParameterSchema,
  ParameterType,
  Tool,
  ToolDescriptor,
  ToolExecutor,
} from '../types/index.js';
import { validateToolName } from '../utils/namingValidation.js';
import { SchemaError } from './ToolErrors.js';

/**
 * Coarse value categories accepted in place of JSON schema type names
 */
export type ParameterCategory = 'text' | 'integer' | 'number' | 'boolean' | 'list' | 'record';

export interface ParameterSpec {
  name: string;
  type?: ParameterCategory | ParameterType;
  description?: string;
  /** Defaults to true unless a default is declared */
  required?: boolean;
  /** Documented only; never substituted when the model omits the argument */
  default?: JsonValue;
  /** Element type for list parameters */
  items?: ParameterCategory | ParameterType;
  enum?: JsonValue[];
}

export interface ToolSpec {
  name: string;
  description?: string;
  parameters?: ParameterSpec[];
  /** Per-parameter documentation, e.g. from parseDocComment() */
  parameterDescriptions?: Record<string, string>;
}

export interface ParsedDocComment {
  description: string;
  parameterDescriptions: Record<string, string>;
}

const TYPE_MAP: Readonly<Record<ParameterCategory | ParameterType, ParameterType>> = {
  text: 'string',
  integer: 'integer',
  number: 'number',
  boolean: 'boolean',
  list: 'array',
  record: 'object',
  string: 'string',
  array: 'array',
  object: 'object',
};

function isKnownType(type: string): type is ParameterCategory | ParameterType {
  return Object.prototype.hasOwnProperty.call(TYPE_MAP, type);
}

/**
 * Map a category or JSON type name to a JSON schema type
 *
 * @returns The JSON type, or undefined when the name is not recognised
 */
export function resolveParameterType(type: string | undefined): ParameterType | undefined {
  return type !== undefined && isKnownType(type) ? TYPE_MAP[type] : undefined;
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Derive a tool descriptor from a tool spec
 *
 * @throws SchemaError when the name or description is missing, a parameter
 *   has no resolvable type, a parameter name is repeated, or documentation
 *   names a parameter that is not declared
 */
export function deriveToolDescriptor(spec: ToolSpec): ToolDescriptor {
  const nameCheck = validateToolName(spec.name);
  if (!nameCheck.valid) {
    throw new SchemaError(nameCheck.error ?? 'Invalid tool name', spec.name);
  }
  const toolName = spec.name;

  const description = spec.description?.trim();
  if (!description) {
    throw new SchemaError(
      `Tool '${toolName}' has no description; the model needs one to know when to call it`,
      toolName
    );
  }

  const declared = spec.parameters ?? [];
  const documented = spec.parameterDescriptions ?? {};
  const properties: Record<string, ParameterSchema> = {};
  const required: string[] = [];
  const seen = new Set<string>();

  for (const param of declared) {
    if (!param.name) {
      throw new SchemaError(`Tool '${toolName}' declares a parameter without a name`, toolName);
    }
    if (seen.has(param.name)) {
      throw new SchemaError(
        `Parameter '${param.name}' is declared more than once in tool '${toolName}'`,
        toolName,
        param.name
      );
    }
    seen.add(param.name);

    const type = resolveParameterType(param.type);
    if (!type) {
      const got = param.type === undefined ? 'no type' : `unknown type '${param.type}'`;
      throw new SchemaError(
        `Parameter '${param.name}' of tool '${toolName}' has ${got}`,
        toolName,
        param.name
      );
    }

    const hasDefault = param.default !== undefined;
    if (hasDefault && param.required === true) {
      throw new SchemaError(
        `Parameter '${param.name}' of tool '${toolName}' is marked required but declares a default`,
        toolName,
        param.name
      );
    }

    const schema: ParameterSchema = { type };
    const paramDescription = param.description ?? documented[param.name];
    if (paramDescription !== undefined) {
      schema.description = paramDescription;
    }
    if (param.items !== undefined) {
      const itemType = resolveParameterType(param.items);
      if (type !== 'array' || !itemType) {
        throw new SchemaError(
          `Parameter '${param.name}' of tool '${toolName}' has an invalid item type`,
          toolName,
          param.name
        );
      }
      schema.items = { type: itemType };
    }
    if (param.enum !== undefined) {
      schema.enum = param.enum.map(option => structuredClone(option));
    }
    if (hasDefault) {
      schema.default = structuredClone(param.default);
    }
    properties[param.name] = schema;

    if (!hasDefault && param.required !== false) {
      required.push(param.name);
    }
  }

  for (const documentedName of Object.keys(documented)) {
    if (!seen.has(documentedName)) {
      throw new SchemaError(
        `Documentation for tool '${toolName}' describes parameter '${documentedName}', which is not declared`,
        toolName,
        documentedName
      );
    }
  }

  const descriptor: ToolDescriptor = {
    name: toolName,
    description,
    parameters: {
      type: 'object',
      properties,
      required,
    },
  };
  return deepFreeze(descriptor);
}

/**
 * Parse a JSDoc-style comment into a summary and parameter descriptions
 *
 * Understands `@param name - text` and `@param {type} name text`;
 * other tags end the current section and are ignored.
 *
 * @example
 * ```typescript
 * parseDocComment(`
 *   Add two numbers.
 *   @param a - First addend
 *   @param b - Second addend
 * `);
 * // { description: 'Add two numbers.', parameterDescriptions: { a: 'First addend', b: 'Second addend' } }
 * ```
 */
export function parseDocComment(text: string): ParsedDocComment {
  const lines = text
    .replace(/^\s*\/\*\*?/, '')
    .replace(/\*\/\s*$/, '')
    .split('\n')
    .map(line => line.replace(/^\s*\*?\s?/, '').trim());

  const summary: string[] = [];
  const parameterDescriptions: Record<string, string> = {};
  let current: string | null = null;
  let inTag = false;

  for (const line of lines) {
    const paramMatch = line.match(/^@param\s+(?:\{[^}]*\}\s+)?\[?([A-Za-z_$][\w$]*)[^\s]*\s*(?:-\s*)?(.*)$/);
    if (paramMatch) {
      const [, name = '', rest = ''] = paramMatch;
      current = name;
      inTag = true;
      parameterDescriptions[name] = rest.trim();
      continue;
    }
    if (line.startsWith('@')) {
      current = null;
      inTag = true;
      continue;
    }
    if (!line) {
      current = null;
      continue;
    }
    if (current !== null) {
      const previous = parameterDescriptions[current];
      parameterDescriptions[current] = previous ? `${previous} ${line}` : line;
    } else if (!inTag) {
      summary.push(line);
    }
  }

  return { description: summary.join(' '), parameterDescriptions };
}

/**
 * Pair a derived descriptor with its executor
 *
 * Local tools built here and provider tools built by MCPToolFactory have
 * the same shape, so the ToolManager treats them alike.
 */
export function createTool(spec: ToolSpec, executor: ToolExecutor): Tool {
  return Object.freeze({
    descriptor: deriveToolDescriptor(spec),
    execute: executor,
  });
}
