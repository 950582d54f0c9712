import * as semver from "semver";

/**
 * Pick the version to use when a webjar is installed more than once.
 *
 * The highest valid semver version wins. When none of the versions is valid
 * semver (e.g., two-part versions like "1.2"), the last one in sort order
 * wins instead.
 *
 * @returns The chosen version, or null for an empty list
 */
export function pickInstalledVersion(
	versions: readonly string[],
): string | null {
	let highest: string | null = null;
	for (const version of versions) {
		if (!semver.valid(version)) continue;
		if (highest === null || semver.gt(version, highest)) {
			highest = version;
		}
	}
	if (highest !== null) return highest;

	return [...versions].sort().at(-1) ?? null;
}
