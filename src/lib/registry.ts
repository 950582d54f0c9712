/**
 * Package registry: the webjars found in a resource store.
 */

import { WEBJARS_PATH_PREFIX } from "./paths";
import type { ResourceStore } from "./resource-store";
import type { PackageRef } from "./types";
import { pickInstalledVersion } from "./version";

function byCodeUnit(a: string, b: string): number {
	return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * List installed webjars from `META-INF/resources/webjars/<id>/<version>/`,
 * ordered by id
 */
export async function listWebJars(store: ResourceStore): Promise<PackageRef[]> {
	const ids = (await store.listDirectories(WEBJARS_PATH_PREFIX)).sort(
		byCodeUnit,
	);

	const webJars: PackageRef[] = [];
	for (const id of ids) {
		const versions = await store.listDirectories(`${WEBJARS_PATH_PREFIX}/${id}`);
		const version = pickInstalledVersion(versions);
		if (version) {
			webJars.push({ id, version });
		}
	}
	return webJars;
}

/**
 * Ordered id -> version map of the given webjars
 */
export function toVersionMap(webJars: readonly PackageRef[]): Map<string, string> {
	return new Map(webJars.map((ref) => [ref.id, ref.version]));
}
