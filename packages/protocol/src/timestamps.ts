// Timestamp rendering
// Manifest date-times are always written in UTC with millisecond precision.

import type { Timestamp } from './types/common.js';

/**
 * Render a date as `yyyy-MM-ddTHH:mm:ss.SSS+00:00`
 */
export function formatTimestamp(date: Date): Timestamp {
  return date.toISOString().replace(/Z$/, '+00:00');
}
