/**
 * Identifier helpers.
 *
 * Ids are prefixed by entity kind so logs and incident records stay readable.
 */

export function generateId(prefix: string): string {
  return `${prefix}_${Date.now()}_${Math.random().toString(36).substring(2, 11)}`;
}
