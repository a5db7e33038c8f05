// Bounded least-recently-used map: reading an entry with get() marks it
// as recently used, and set() evicts the stalest entries past capacity.

export class CacheMap<K, V> extends Map<K, V> {
	constructor(public readonly capacity: number, entries?: Iterable<[K, V]>) {
		super()

		for (const [key, value] of entries ?? []) {
			this.set(key, value)
		}
	}

	get(key: K): V | undefined {
		const value = super.get(key)
		if (value !== undefined) {
			super.delete(key)
			super.set(key, value)
		}

		return value
	}

	set(key: K, value: V) {
		super.delete(key)
		super.set(key, value)
		for (const key of this.keys()) {
			if (this.size > this.capacity) {
				this.delete(key)
			} else {
				break
			}
		}

		return this
	}
}
