/**
 * Tool error taxonomy
 *
 * SchemaError and DuplicateToolError are raised at setup time.
 * UnknownToolError and ToolArgumentError are rendered as tool-result
 * content by the ToolManager so the model can react to them.
 */

export type ToolErrorCode =
  | 'SCHEMA_ERROR'
  | 'DUPLICATE_TOOL'
  | 'UNKNOWN_TOOL'
  | 'INVALID_ARGUMENT'
  | 'EXECUTION_FAILED';

export class ToolError extends Error {
  constructor(
    message: string,
    public readonly code: ToolErrorCode,
    public readonly toolName?: string
  ) {
    super(message);
    this.name = 'ToolError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * A tool declaration cannot be turned into a descriptor
 */
export class SchemaError extends ToolError {
  constructor(message: string, toolName?: string, public readonly parameterName?: string) {
    super(message, 'SCHEMA_ERROR', toolName);
    this.name = 'SchemaError';
  }
}

export class DuplicateToolError extends ToolError {
  constructor(toolName: string) {
    super(`Tool '${toolName}' is already registered`, 'DUPLICATE_TOOL', toolName);
    this.name = 'DuplicateToolError';
  }
}

export class UnknownToolError extends ToolError {
  constructor(toolName: string, public readonly availableTools: string[]) {
    const available = availableTools.length > 0 ? availableTools.join(', ') : '(none)';
    super(`Unknown tool: ${toolName}. Available tools: ${available}`, 'UNKNOWN_TOOL', toolName);
    this.name = 'UnknownToolError';
  }
}

export class ToolArgumentError extends ToolError {
  constructor(message: string, toolName: string, public readonly parameterName?: string) {
    super(message, 'INVALID_ARGUMENT', toolName);
    this.name = 'ToolArgumentError';
  }
}
