/**
 * Generate a unique instance identifier
 *
 * Used by the Redis bridge to recognise messages this process published itself.
 *
 * @returns A unique instance ID in the format `instance-{timestamp}-{random}`
 */
export function generateInstanceId(): string {
  return `instance-${Date.now()}-${Math.random().toString(36).slice(2, 9)}`;
}
