import { describe, expect, it } from "vitest";
import { calculateIntegrity, hashKey, verifyIntegrity } from "./integrity";

const HELLO = new TextEncoder().encode("hello");
const HELLO_INTEGRITY = "sha256-LPJNul+wow4m6DsqxbninhsWHlwfp0JecwQzYpOLmCQ=";

describe("integrity", () => {
	it("should calculate a base64 sha256 integrity", () => {
		expect(calculateIntegrity(HELLO)).toBe(HELLO_INTEGRITY);
	});

	it("should verify matching content", () => {
		expect(verifyIntegrity(HELLO, HELLO_INTEGRITY)).toBe(true);
		expect(verifyIntegrity(new TextEncoder().encode("hello!"), HELLO_INTEGRITY)).toBe(false);
	});

	it("should not verify malformed integrity strings", () => {
		expect(verifyIntegrity(HELLO, "abc123")).toBe(false);
	});

	it("should hash keys to hex", () => {
		expect(hashKey("hello")).toBe(
			"2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824",
		);
	});
});
