import { config } from "dotenv";

/**
 * Loads `.env.local` and then `.env` into process.env. dotenv never overrides a value that
 * is already set, so `.env.local` wins over `.env` and the real environment wins over both.
 */
export function loadEnvFiles(): void {
	config({ path: ".env.local", quiet: true });
	config({ path: ".env", quiet: true });
}

loadEnvFiles();
