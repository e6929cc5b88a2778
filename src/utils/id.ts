/**
 * ID generation utilities
 */

import { ID_GENERATION } from '../config/constants.js';

/**
 * Generate a prefixed, roughly sortable ID: {prefix}-{timestamp}-{7-char-random}
 */
export function generatePrefixedId(prefix: string): string {
  const random = Math.random()
    .toString(ID_GENERATION.RANDOM_STRING_RADIX)
    .substring(
      ID_GENERATION.RANDOM_STRING_SUBSTRING_START,
      ID_GENERATION.RANDOM_STRING_SUBSTRING_START + ID_GENERATION.RANDOM_STRING_LENGTH
    );
  return `${prefix}-${Date.now()}-${random}`;
}
