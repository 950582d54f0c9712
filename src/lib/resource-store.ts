/**
 * Read access to the resources webjars ship (descriptors, markers, scripts).
 * Paths are "/"-separated and relative to the store's root(s).
 */
export interface ResourceStore {
	/** Whether a file exists at the path */
	exists(path: string): Promise<boolean>;
	/** File contents as UTF-8 text, or null if there is no such file */
	readText(path: string): Promise<string | null>;
	/** Names of the directories directly under the path (empty if none) */
	listDirectories(path: string): Promise<string[]>;
}

function trimSlashes(path: string): string {
	return path.replace(/^\/+|\/+$/g, "");
}

/**
 * Resource store backed by an in-memory map of path -> contents
 */
export class MemoryResourceStore implements ResourceStore {
	private readonly files = new Map<string, string>();

	constructor(files: Record<string, string> = {}) {
		for (const [path, contents] of Object.entries(files)) {
			this.set(path, contents);
		}
	}

	set(path: string, contents: string): this {
		this.files.set(trimSlashes(path), contents);
		return this;
	}

	async exists(path: string): Promise<boolean> {
		return this.files.has(trimSlashes(path));
	}

	async readText(path: string): Promise<string | null> {
		return this.files.get(trimSlashes(path)) ?? null;
	}

	async listDirectories(path: string): Promise<string[]> {
		const base = trimSlashes(path);
		const prefix = base ? `${base}/` : "";
		const names = new Set<string>();

		for (const file of this.files.keys()) {
			if (!file.startsWith(prefix)) continue;
			const rest = file.slice(prefix.length);
			const slash = rest.indexOf("/");
			// A segment followed by more path is a directory
			if (slash > 0) {
				names.add(rest.slice(0, slash));
			}
		}

		return [...names];
	}
}
