import { afterEach, beforeAll, beforeEach, vi } from "vitest";

/**
 * Global environment cleanup so each test sees the process.env it started with.
 */
let originalEnvSnapshot: Record<string, string | undefined>;

beforeAll(() => {
	originalEnvSnapshot = { ...process.env };
});

beforeEach(() => {
	// Delete keys added after the snapshot, then restore the original values
	for (const key of Object.keys(process.env)) {
		if (!(key in originalEnvSnapshot)) {
			delete process.env[key];
		}
	}
	for (const [key, value] of Object.entries(originalEnvSnapshot)) {
		if (value !== undefined) {
			process.env[key] = value;
		}
	}
});

afterEach(() => {
	vi.unstubAllEnvs();
});
