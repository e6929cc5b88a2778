/**
 * Typed error classes for MCP operations
 */

export type MCPErrorCode =
  | 'CONFIG_NOT_FOUND'
  | 'CONFIG_INVALID'
  | 'SERVER_NOT_FOUND'
  | 'SERVER_DISABLED'
  | 'NOT_CONNECTED'
  | 'CONNECTION_CLOSED'
  | 'ALREADY_CONNECTED'
  | 'CONNECTION_FAILED'
  | 'TIMEOUT'
  | 'TOOL_CALL_FAILED'
  | 'PROTOCOL_ERROR';

export class MCPError extends Error {
  readonly code: MCPErrorCode;
  readonly serverName?: string;

  constructor(code: MCPErrorCode, message: string, serverName?: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = 'MCPError';
    this.code = code;
    this.serverName = serverName;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Handshake and connection-state failures. Fatal to the provider that
 * raised it; other providers and local tools keep working.
 */
export class ConnectionError extends MCPError {
  constructor(code: MCPErrorCode, message: string, serverName?: string, options?: { cause?: unknown }) {
    super(code, message, serverName, options);
    this.name = 'ConnectionError';
  }
}
