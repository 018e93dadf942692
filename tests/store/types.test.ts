import { describe, expect, it } from "vitest";

import { healthStatusFromCode, parseTreeEntry } from "../../src/store/types.js";

describe("parseTreeEntry", () => {
	it("treats a trailing separator as a directory and strips it", () => {
		expect(parseTreeEntry("web/")).toEqual({ kind: "dir", name: "web" });
		expect(parseTreeEntry("Email")).toEqual({ kind: "key", name: "Email" });
	});

	it("partitions a listing without losing entries", () => {
		const raw = ["bank/", "Email", "social/", "wifi", "work/"];
		const entries = raw.map(parseTreeEntry);

		const dirs = entries.filter((entry) => entry.kind === "dir");
		const keys = entries.filter((entry) => entry.kind === "key");
		expect(dirs.length + keys.length).toBe(raw.length);
		expect(dirs.map((entry) => entry.name)).toEqual(["bank", "social", "work"]);
		expect(keys.map((entry) => entry.name)).toEqual(["Email", "wifi"]);
	});
});

describe("healthStatusFromCode", () => {
	it("maps the documented status codes", () => {
		expect(healthStatusFromCode(200)).toBe("active");
		expect(healthStatusFromCode(429)).toBe("standby");
		expect(healthStatusFromCode(472)).toBe("recovery");
		expect(healthStatusFromCode(473)).toBe("performance");
		expect(healthStatusFromCode(501)).toBe("uninitialized");
		expect(healthStatusFromCode(503)).toBe("sealed");
	});

	it("returns null for any other code", () => {
		expect(healthStatusFromCode(500)).toBeNull();
		expect(healthStatusFromCode(204)).toBeNull();
	});
});
