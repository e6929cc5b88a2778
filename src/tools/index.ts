/**
 * Tool System Exports
 *
 * Central export point for all tool-related classes and utilities.
 */

export { ToolManager, stringifyToolResult } from './ToolManager.js';
export { ToolValidator } from './ToolValidator.js';
export type { ValidationResult } from './ToolValidator.js';
export { createTool, deriveToolDescriptor, parseDocComment, resolveParameterType } from './SchemaDeriver.js';
export type { ParameterCategory, ParameterSpec, ParsedDocComment, ToolSpec } from './SchemaDeriver.js';
export { DuplicateToolError, SchemaError, ToolArgumentError, ToolError, UnknownToolError } from './ToolErrors.js';
export type { ToolErrorCode } from './ToolErrors.js';
