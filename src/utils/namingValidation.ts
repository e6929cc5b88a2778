/**
 * Naming validation for tool names
 *
 * Tool names are sent to the model endpoint as function names, so they are
 * limited to the characters and length function-calling APIs accept.
 */

/** Letters, digits, underscores and hyphens, 1 to 64 characters */
export const TOOL_NAME_PATTERN = /^[a-zA-Z0-9_-]{1,64}$/;

export interface ValidationResult {
  valid: boolean;
  error?: string;
}

/**
 * Validate a tool name
 *
 * @param name - Tool name to validate
 * @returns Validation result with error message if invalid
 */
export function validateToolName(name: unknown): ValidationResult {
  if (!name || typeof name !== 'string') {
    return { valid: false, error: 'Tool name is required and must be a string' };
  }

  if (!TOOL_NAME_PATTERN.test(name)) {
    return {
      valid: false,
      error: `Invalid tool name '${name}': use 1-64 letters, digits, underscores or hyphens. Examples: 'calculator', 'read_file'`,
    };
  }

  return { valid: true };
}
