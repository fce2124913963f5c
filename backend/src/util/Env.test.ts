import { loadEnvFiles } from "./Env";
import { config as dotenvConfig } from "dotenv";
import { beforeEach, describe, expect, it, vi } from "vitest";

vi.mock("dotenv", () => ({
	config: vi.fn(),
}));

describe("Env", () => {
	beforeEach(() => {
		vi.mocked(dotenvConfig).mockClear();
	});

	it("loads .env.local before .env", () => {
		loadEnvFiles();

		expect(dotenvConfig).toHaveBeenNthCalledWith(1, { path: ".env.local", quiet: true });
		expect(dotenvConfig).toHaveBeenNthCalledWith(2, { path: ".env", quiet: true });
	});
});
