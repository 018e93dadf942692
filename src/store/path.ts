import { KvError } from "./errors.js";

export const PATH_SEPARATOR = "/";

/**
 * Location in the secret tree. Immutable: `pushed` returns a new path and
 * leaves the receiver untouched. The root has no components.
 */
export class SecretPath {
	private readonly parts: readonly string[];

	private constructor(parts: readonly string[]) {
		this.parts = Object.freeze([...parts]);
	}

	static root(): SecretPath {
		return ROOT;
	}

	/**
	 * Parse `a/b/c`. Empty segments (leading, trailing or doubled separators) are dropped.
	 */
	static parse(raw: string): SecretPath {
		return new SecretPath(raw.split(PATH_SEPARATOR).filter((part) => part.length > 0));
	}

	get components(): readonly string[] {
		return this.parts;
	}

	get isRoot(): boolean {
		return this.parts.length === 0;
	}

	/** Last component, or null for the root. */
	get name(): string | null {
		return this.parts.at(-1) ?? null;
	}

	pushed(component: string): SecretPath {
		if (component.length === 0 || component.includes(PATH_SEPARATOR)) {
			throw new KvError("local", `Invalid path component: "${component}"`);
		}
		return new SecretPath([...this.parts, component]);
	}

	toString(): string {
		return this.parts.join(PATH_SEPARATOR);
	}
}

const ROOT = SecretPath.parse("");
