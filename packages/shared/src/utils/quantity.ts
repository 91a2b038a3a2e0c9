/**
 * Resource quantity parsing
 * @module @vnode/shared/utils/quantity
 *
 * Accepts the orchestrator's quantity notation: a plain or decimal number
 * with an optional milli, decimal (k M G T P E) or binary (Ki Mi Gi Ti Pi Ei)
 * suffix.
 */

const QUANTITY_PATTERN = /^(\d+(?:\.\d+)?|\.\d+)(m|k|M|G|T|P|E|Ki|Mi|Gi|Ti|Pi|Ei)?$/;

const SUFFIX_MULTIPLIERS: Record<string, number> = {
  m: 1e-3,
  k: 1e3,
  M: 1e6,
  G: 1e9,
  T: 1e12,
  P: 1e15,
  E: 1e18,
  Ki: 2 ** 10,
  Mi: 2 ** 20,
  Gi: 2 ** 30,
  Ti: 2 ** 40,
  Pi: 2 ** 50,
  Ei: 2 ** 60,
};

/**
 * Parse a quantity string into its value in base units.
 * Returns null when the string is not a valid quantity.
 *
 * @example
 * parseQuantity('100Gi') // 107374182400
 * parseQuantity('500m')  // 0.5
 */
export function parseQuantity(quantity: string): number | null {
  const match = QUANTITY_PATTERN.exec(quantity.trim());
  if (!match) {
    return null;
  }

  const [, amount, suffix] = match;
  const value = Number(amount);
  const multiplier = suffix ? SUFFIX_MULTIPLIERS[suffix] ?? 1 : 1;
  return value * multiplier;
}

/**
 * Check if a string is a valid quantity
 */
export function isQuantity(value: unknown): value is string {
  return typeof value === 'string' && parseQuantity(value) !== null;
}
