/**
 * Minimalistic caching utility.
 *
 * Computes on the first read and holds the result until {@link clear}. Arguments given to a read that
 * finds a held value are ignored. There is deliberately no setter: the only way in is `compute`.
 */
export class Cached<T, A extends unknown[] = []> {
	private cachedValue: T | undefined;

	constructor(private readonly compute: (...args: A) => T) {}

	get(...args: A): T {
		if (this.cachedValue === undefined) {	// More strict than truthy
			this.cachedValue = this.compute(...args);
		}
		return this.cachedValue;
	}

	get hasValue(): boolean {
		return this.cachedValue !== undefined;
	}

	clear() {
		this.cachedValue = undefined;
	}
}
