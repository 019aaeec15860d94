/**
 * ID generation for orders and gateway messages.
 */

let sequence = 0;

/**
 * Generate a unique order ID with type prefix.
 * Format: order-{type}-timestamp-sequence-randomSuffix
 * The per-process sequence keeps IDs distinct for orders created in the same millisecond
 * (order-set expansion creates several at once).
 */
export function generateOrderId(orderType: string): string {
  sequence = (sequence + 1) % 1_000_000;
  return `order-${orderType}-${Date.now()}-${sequence}-${Math.random().toString(36).slice(2, 6)}`;
}

/**
 * Generate a unique message/event ID.
 * Format: timestamp-randomSuffix
 */
export function generateId(): string {
  return `${Date.now()}-${Math.random().toString(36).slice(2, 8)}`;
}
