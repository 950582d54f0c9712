import { prefixChainKey } from "./paths";
import type { PrefixChain } from "./types";

/**
 * Compute-once cache keyed by prefix chain.
 *
 * The pending promise is stored before the computation settles, so
 * concurrent callers for the same chain share one computation. Results are
 * kept for the lifetime of the cache; a failed computation is dropped so a
 * later call can try again.
 */
export class ResolutionCache<T> {
	private readonly entries = new Map<string, Promise<T>>();

	get size(): number {
		return this.entries.size;
	}

	has(chain: PrefixChain): boolean {
		return this.entries.has(prefixChainKey(chain));
	}

	get(chain: PrefixChain, compute: () => Promise<T>): Promise<T> {
		const key = prefixChainKey(chain);
		const cached = this.entries.get(key);
		if (cached) return cached;

		const pending = compute();
		this.entries.set(key, pending);
		pending.catch(() => {
			if (this.entries.get(key) === pending) {
				this.entries.delete(key);
			}
		});
		return pending;
	}
}
