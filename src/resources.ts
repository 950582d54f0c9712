import { readdir, readFile, stat } from "node:fs/promises";
import { join, resolve } from "node:path";
import { ResourceRootError } from "./errors";
import type { ResourceStore } from "./lib/index";

function isMissing(error: unknown): boolean {
	const code =
		error instanceof Error && "code" in error ? error.code : undefined;
	return code === "ENOENT" || code === "ENOTDIR";
}

/**
 * Resource store over one or more directories, searched like a classpath:
 * the first root holding a file wins, and directory listings are merged.
 *
 * Each root is typically an extracted webjar or a build output directory
 * containing `META-INF/`.
 */
export class FileResourceStore implements ResourceStore {
	readonly roots: readonly string[];

	constructor(roots: readonly string[]) {
		this.roots = roots.map((root) => resolve(root));
	}

	/**
	 * Create a store after checking that every root is a directory
	 */
	static async open(roots: readonly string[]): Promise<FileResourceStore> {
		for (const root of roots) {
			try {
				const stats = await stat(root);
				if (!stats.isDirectory()) {
					throw new ResourceRootError(root, "is not a directory");
				}
			} catch (error) {
				if (isMissing(error)) {
					throw new ResourceRootError(root, "does not exist");
				}
				throw error;
			}
		}
		return new FileResourceStore(roots);
	}

	private locate(root: string, path: string): string {
		return join(root, ...path.split("/").filter(Boolean));
	}

	async exists(path: string): Promise<boolean> {
		for (const root of this.roots) {
			try {
				const stats = await stat(this.locate(root, path));
				if (stats.isFile()) return true;
			} catch (error) {
				if (!isMissing(error)) throw error;
			}
		}
		return false;
	}

	async readText(path: string): Promise<string | null> {
		for (const root of this.roots) {
			try {
				return await readFile(this.locate(root, path), "utf-8");
			} catch (error) {
				// Directories and missing files fall through to the next root
				if (!isMissing(error) && !isDirectoryError(error)) throw error;
			}
		}
		return null;
	}

	async listDirectories(path: string): Promise<string[]> {
		const names = new Set<string>();
		for (const root of this.roots) {
			try {
				const entries = await readdir(this.locate(root, path), {
					withFileTypes: true,
				});
				for (const entry of entries) {
					if (entry.isDirectory()) names.add(entry.name);
				}
			} catch (error) {
				if (!isMissing(error)) throw error;
			}
		}
		return [...names];
	}
}

function isDirectoryError(error: unknown): boolean {
	return error instanceof Error && "code" in error && error.code === "EISDIR";
}
