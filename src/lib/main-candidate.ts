import { distance } from "fastest-levenshtein";

/**
 * Pick the file most likely to be a package's main script from an array
 * "main" declaration.
 *
 * Policy:
 * 1. A single candidate is returned as is.
 * 2. Only candidates ending in ".js" (any case) are kept, unless there are
 *    none, in which case all of them are.
 * 3. The candidate with the smallest Levenshtein distance to the package
 *    name (both lowercased) wins; on a tie the earlier candidate wins.
 *
 * @param candidates - Entries of the "main" array, in declaration order
 * @param packageName - The descriptor's "name" field
 * @returns One of the candidates, unchanged
 */
export function selectMainCandidate(
	candidates: readonly string[],
	packageName: string,
): string {
	if (candidates.length === 0) {
		throw new RangeError("Cannot select a main file from an empty list");
	}
	if (candidates.length === 1) {
		return candidates[0];
	}

	const scripts = candidates.filter((candidate) =>
		candidate.toLowerCase().endsWith(".js"),
	);
	const pool = scripts.length > 0 ? scripts : candidates;

	const name = packageName.toLowerCase();
	const distances = new Map<string, number>();
	const distanceTo = (candidate: string): number => {
		const key = candidate.toLowerCase();
		let cached = distances.get(key);
		if (cached === undefined) {
			cached = distance(name, key);
			distances.set(key, cached);
		}
		return cached;
	};

	let best = pool[0];
	let bestDistance = distanceTo(best);
	for (const candidate of pool.slice(1)) {
		const candidateDistance = distanceTo(candidate);
		if (candidateDistance < bestDistance) {
			best = candidate;
			bestDistance = candidateDistance;
		}
	}
	return best;
}
