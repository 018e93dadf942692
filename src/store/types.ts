import { z } from "zod";
import { PATH_SEPARATOR } from "./path.js";

// ═══════════════════════════════════════════════════════════════════════════════
// Tree entries
// ═══════════════════════════════════════════════════════════════════════════════

export type TreeEntry = { kind: "key"; name: string } | { kind: "dir"; name: string };

/**
 * A listing reports sub-directories with a trailing separator; everything else is a key.
 */
export function parseTreeEntry(raw: string): TreeEntry {
	if (raw.endsWith(PATH_SEPARATOR)) {
		return { kind: "dir", name: raw.slice(0, -PATH_SEPARATOR.length) };
	}
	return { kind: "key", name: raw };
}

/** Field name → value payload stored at one leaf. */
export type SecretRecord = Record<string, string>;

/** Field revealed through the clipboard rather than printed. */
export const PASSWORD_FIELD = "Password";

// ═══════════════════════════════════════════════════════════════════════════════
// Session
// ═══════════════════════════════════════════════════════════════════════════════

export type SessionState =
	| { status: "unauthenticated" }
	| { status: "authenticated"; token: string; validated: boolean };

// ═══════════════════════════════════════════════════════════════════════════════
// Health
// ═══════════════════════════════════════════════════════════════════════════════

export const HealthStatusSchema = z.enum([
	"active",
	"standby",
	"recovery",
	"performance",
	"uninitialized",
	"sealed",
]);
export type HealthStatus = z.infer<typeof HealthStatusSchema>;

const HEALTH_STATUS_BY_CODE: ReadonlyMap<number, HealthStatus> = new Map<number, HealthStatus>([
	[200, "active"],
	[429, "standby"],
	[472, "recovery"],
	[473, "performance"],
	[501, "uninitialized"],
	[503, "sealed"],
]);

export function healthStatusFromCode(status: number): HealthStatus | null {
	return HEALTH_STATUS_BY_CODE.get(status) ?? null;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Response shapes
// ═══════════════════════════════════════════════════════════════════════════════

export const LoginResponseSchema = z.object({
	auth: z.object({
		client_token: z.string().min(1),
	}),
});

export const ListResponseSchema = z.object({
	data: z.object({
		keys: z.array(z.string()),
	}),
});

// The KV v2 read wraps the field map in two `data` envelopes.
export const SecretDataResponseSchema = z.object({
	data: z.object({
		data: z.record(z.string(), z.string()),
	}),
});
