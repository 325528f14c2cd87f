import { nullRecord } from "./record";

/**
 * Ordered multi-value mapping.
 *
 * Keeps every `(key, value)` pair in insertion order, so repeated keys
 * (form fields, query parameters) are never collapsed. `get` returns the
 * first value for a key, `getAll` every value in order.
 */
export class MultiDict<V> implements Iterable<[string, V]> {
	private readonly items: Array<[string, V]> = [];

	constructor(init?: Iterable<readonly [string, V]>) {
		if (init) {
			for (const [key, value] of init) this.append(key, value);
		}
	}

	/** Key used for comparisons. Identity here; lower-cased by {@link CIMultiDict}. */
	protected normalize(key: string): string {
		return key;
	}

	get size(): number {
		return this.items.length;
	}

	/** First value stored under `key`. */
	get(key: string): V | undefined {
		const wanted = this.normalize(key);
		for (const [k, v] of this.items) {
			if (this.normalize(k) === wanted) return v;
		}
		return undefined;
	}

	/** Every value stored under `key`, in insertion order. */
	getAll(key: string): V[] {
		const wanted = this.normalize(key);
		return this.items.filter(([k]) => this.normalize(k) === wanted).map(([, v]) => v);
	}

	has(key: string): boolean {
		const wanted = this.normalize(key);
		return this.items.some(([k]) => this.normalize(k) === wanted);
	}

	append(key: string, value: V): void {
		this.items.push([key, value]);
	}

	/** Replace every value under `key` with a single one. */
	set(key: string, value: V): void {
		this.delete(key);
		this.append(key, value);
	}

	/** Remove every value under `key`. Returns whether anything was removed. */
	delete(key: string): boolean {
		const wanted = this.normalize(key);
		const before = this.items.length;
		for (let i = this.items.length - 1; i >= 0; i--) {
			const item = this.items[i];
			if (item && this.normalize(item[0]) === wanted) this.items.splice(i, 1);
		}
		return this.items.length !== before;
	}

	/** Distinct keys in first-seen order, with their original spelling. */
	keys(): string[] {
		const seen = new Set<string>();
		const keys: string[] = [];
		for (const [k] of this.items) {
			const normalized = this.normalize(k);
			if (seen.has(normalized)) continue;
			seen.add(normalized);
			keys.push(k);
		}
		return keys;
	}

	values(): V[] {
		return this.items.map(([, v]) => v);
	}

	entries(): Array<[string, V]> {
		return this.items.map(([k, v]) => [k, v]);
	}

	[Symbol.iterator](): Iterator<[string, V]> {
		return this.entries()[Symbol.iterator]();
	}

	/** Prototype-free object holding the first value of each key. */
	toObject(): Record<string, V> {
		const out = nullRecord<V>();
		for (const [k, v] of this.items) {
			const key = this.normalize(k);
			if (!Object.hasOwn(out, key)) out[key] = v;
		}
		return out;
	}
}

/** {@link MultiDict} whose keys compare case-insensitively, as header names do. */
export class CIMultiDict<V> extends MultiDict<V> {
	protected override normalize(key: string): string {
		return key.toLowerCase();
	}
}
