import { describe, expect, it } from "vitest";
import { parseVersion, satisfiesPin } from "./version.mjs";

describe("parseVersion", () => {
	it("drops trailing zero release components", () => {
		expect(parseVersion("0.110.0")).toEqual({ public: "0.110", local: null });
		expect(parseVersion("1.0.0")).toEqual({ public: "1", local: null });
	});

	it("normalizes pre, post and dev spellings", () => {
		expect(parseVersion("1.0.0-RC.1")?.public).toBe("1rc1");
		expect(parseVersion("2.0alpha")?.public).toBe("2a0");
		expect(parseVersion("1.4-2")?.public).toBe("1.4.post2");
		expect(parseVersion("1.4.rev3.dev1")?.public).toBe("1.4.post3.dev1");
		expect(parseVersion("1!2.0")?.public).toBe("1!2");
	});

	it("splits off the local segment", () => {
		expect(parseVersion("2.0.0+cu118")).toEqual({ public: "2", local: "cu118" });
		expect(parseVersion("1.0+ubuntu-1")?.local).toBe("ubuntu.1");
	});

	it("returns null for non PEP 440 versions", () => {
		expect(parseVersion("not-a-version")).toBeNull();
	});
});

describe("satisfiesPin", () => {
	it("accepts zero padded and differently spelled versions", () => {
		expect(satisfiesPin("0.110", "0.110.0")).toBe(true);
		expect(satisfiesPin("1.0rc1", "1.0.0-rc.1")).toBe(true);
	});

	it("ignores the installed local segment unless the pin names one", () => {
		expect(satisfiesPin("2.0.0", "2.0.0+cu118")).toBe(true);
		expect(satisfiesPin("2.0.0+cu118", "2.0.0+cu118")).toBe(true);
		expect(satisfiesPin("2.0.0+cu121", "2.0.0+cu118")).toBe(false);
	});

	it("rejects other releases", () => {
		expect(satisfiesPin("0.110.0", "0.110.3")).toBe(false);
		expect(satisfiesPin("1.0", "1.0.post1")).toBe(false);
	});
});
