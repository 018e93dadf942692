import fs from "node:fs";
import os from "node:os";
import path from "node:path";

/**
 * Expand a leading `~` to the current user's home directory.
 */
export function expandHome(p: string): string {
	if (p === "~") return os.homedir();
	if (p.startsWith("~/")) return path.join(os.homedir(), p.slice(2));
	return p;
}

/**
 * Write a file atomically (temp file + rename) with owner-only permissions.
 */
export function writeFileAtomic(filePath: string, content: string): void {
	fs.mkdirSync(path.dirname(filePath), { recursive: true, mode: 0o700 });
	const tmpPath = `${filePath}.${process.pid}.tmp`;
	fs.writeFileSync(tmpPath, content, { encoding: "utf-8", mode: 0o600 });
	fs.renameSync(tmpPath, filePath);
}
