/**
 * Empty record without a prototype.
 *
 * Keys such as `__proto__` or `constructor` coming from a client become
 * ordinary own properties, and absent keys read as `undefined`.
 */
export function nullRecord<V>(): Record<string, V> {
	return Object.create(null);
}
