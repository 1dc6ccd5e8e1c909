/**
 * ID generation utilities
 */

import { randomBytes } from 'crypto';
import { ID_GENERATION } from '@config/constants.js';

/**
 * Generate a unique ID
 */
export function generateId(): string {
  return randomBytes(ID_GENERATION.ID_BYTES).toString('hex');
}
