/**
 * ToolValidator - Validates tool arguments against descriptors
 *
 * Checks required parameters and the type category of every supplied
 * argument. Unknown arguments are passed through: provider tools may
 * accept keys their schema does not list.
 */

import type { JsonValue, ParameterSchema, ToolDescriptor } from '../types/index.js';

export interface ValidationResult {
  valid: boolean;
  error?: string;
  parameterName?: string;
  suggestion?: string;
}

export class ToolValidator {
  /**
   * Validate arguments against a tool descriptor
   *
   * @param descriptor - Descriptor of the tool being called
   * @param args - The arguments provided by the model
   */
  validateArguments(descriptor: ToolDescriptor, args: Record<string, JsonValue>): ValidationResult {
    const { properties, required } = descriptor.parameters;

    for (const requiredParam of required) {
      if (!Object.hasOwn(args, requiredParam) || args[requiredParam] === undefined) {
        return {
          valid: false,
          error: `Missing required parameter '${requiredParam}' for ${descriptor.name}`,
          parameterName: requiredParam,
          suggestion: `Example: ${this.generateExample(descriptor.name, properties, required)}`,
        };
      }
    }

    for (const [paramName, paramValue] of Object.entries(args)) {
      if (!Object.hasOwn(properties, paramName)) {
        continue;
      }
      const paramSchema = properties[paramName];

      const typeValid = this.validateType(paramValue, paramSchema);
      if (!typeValid.valid) {
        return {
          valid: false,
          error: `Invalid type for parameter '${paramName}' in ${descriptor.name}: ${typeValid.error}`,
          parameterName: paramName,
        };
      }
    }

    return { valid: true };
  }

  /**
   * Validate a value against a parameter schema
   */
  private validateType(value: JsonValue | undefined, schema: ParameterSchema): { valid: boolean; error?: string } {
    if (value === null || value === undefined) {
      // Only untyped parameters accept null
      return schema.type === undefined
        ? { valid: true }
        : { valid: false, error: `Expected ${schema.type}, got null` };
    }

    switch (schema.type) {
      case 'string':
        if (typeof value !== 'string') {
          return { valid: false, error: `Expected string, got ${describeValue(value)}` };
        }
        break;

      case 'number':
      case 'integer':
        if (typeof value !== 'number') {
          return { valid: false, error: `Expected ${schema.type}, got ${describeValue(value)}` };
        }
        if (schema.type === 'integer' && !Number.isInteger(value)) {
          return { valid: false, error: `Expected integer, got ${value}` };
        }
        break;

      case 'boolean':
        if (typeof value !== 'boolean') {
          return { valid: false, error: `Expected boolean, got ${describeValue(value)}` };
        }
        break;

      case 'array':
        if (!Array.isArray(value)) {
          return { valid: false, error: `Expected array, got ${describeValue(value)}` };
        }
        if (schema.items) {
          for (let i = 0; i < value.length; i++) {
            const itemValid = this.validateType(value[i], schema.items);
            if (!itemValid.valid) {
              return { valid: false, error: `Array item ${i}: ${itemValid.error}` };
            }
          }
        }
        break;

      case 'object':
        if (typeof value !== 'object' || Array.isArray(value)) {
          return { valid: false, error: `Expected object, got ${describeValue(value)}` };
        }
        break;

      default:
        // No type declared - accept anything
        break;
    }

    if (schema.enum && !schema.enum.some(option => JSON.stringify(option) === JSON.stringify(value))) {
      return {
        valid: false,
        error: `Expected one of ${schema.enum.map(option => JSON.stringify(option)).join(', ')}, got ${JSON.stringify(value)}`,
      };
    }

    return { valid: true };
  }

  /**
   * Generate an example call string for a tool
   */
  private generateExample(
    toolName: string,
    properties: Record<string, ParameterSchema>,
    required: string[]
  ): string {
    const exampleParams = required.map(paramName => {
      const schema = Object.hasOwn(properties, paramName) ? properties[paramName] : undefined;
      return `${paramName}=${this.getExampleValue(paramName, schema)}`;
    });
    return `${toolName}(${exampleParams.join(', ')})`;
  }

  private getExampleValue(paramName: string, schema: ParameterSchema | undefined): string {
    switch (schema?.type) {
      case 'string':
        return `"${paramName}_value"`;
      case 'number':
      case 'integer':
        return '0';
      case 'boolean':
        return 'false';
      case 'array':
        return '[]';
      case 'object':
        return '{}';
      default:
        return '"value"';
    }
  }
}

function describeValue(value: JsonValue): string {
  if (Array.isArray(value)) {
    return 'array';
  }
  return typeof value;
}
