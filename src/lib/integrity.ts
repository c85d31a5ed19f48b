import { createHash } from "node:crypto";

const INTEGRITY_PATTERN = /^sha256-([A-Za-z0-9+/]+={0,2})$/;

/**
 * Calculate integrity hash for module content.
 * Uses SHA-256 with base64 encoding, prefixed with "sha256-".
 *
 * @returns Integrity string (e.g., "sha256-abc123...")
 */
export function calculateIntegrity(data: Uint8Array): string {
	const hash = createHash("sha256").update(data).digest("base64");
	return `sha256-${hash}`;
}

/**
 * Verify that content matches an expected integrity hash.
 */
export function verifyIntegrity(
	data: Uint8Array,
	expectedIntegrity: string,
): boolean {
	if (!INTEGRITY_PATTERN.test(expectedIntegrity)) {
		return false;
	}
	return calculateIntegrity(data) === expectedIntegrity;
}

/**
 * Hex SHA-256 of a string, used to name cache files after their keys
 */
export function hashKey(key: string): string {
	return createHash("sha256").update(key).digest("hex");
}
