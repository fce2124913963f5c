import { createEnv } from "@t3-oss/env-core";
import { z } from "zod";

const BooleanSchema = z
	.string()
	// only allow "true" or "false"
	.refine(s => s === "true" || s === "false")
	// transform to boolean
	.transform(s => s === "true")
	.default("false");

const configSchema = {
	server: {
		NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
		PORT: z.coerce.number().int().positive().default(3005),
		// Prefix every router is mounted under
		ROOT_PATH: z.string().default("/api"),
		// Domain tenant subdomains live under, e.g. "example.com" for acme.example.com
		BASE_DOMAIN: z.string().default("localhost"),

		// Central database holding the tenant directory
		CENTRAL_DATABASE_URL: z.string().url(),
		CENTRAL_POOL_MAX: z.coerce.number().int().positive().default(5),

		// Baseline connections per tenant pool
		TENANT_POOL_SIZE: z.coerce.number().int().positive().default(5),
		// Connections a tenant pool may open beyond the baseline under load
		TENANT_POOL_OVERFLOW: z.coerce.number().int().min(0).default(10),
		// Maximum number of tenant pools kept open at once
		TENANT_CONNECTION_MAX: z.coerce.number().int().positive().default(100),
		// Idle tenant pools older than this are closed (default: 30 minutes)
		TENANT_CONNECTION_TTL_MS: z.coerce.number().int().positive().default(1800000),
		// How often idle tenant pools are swept; 0 disables the sweep
		TENANT_EVICTION_INTERVAL_MS: z.coerce.number().int().min(0).default(60000),
		// Check that a tenant database is reachable before caching its pool
		TENANT_VERIFY_ON_CREATE: BooleanSchema.default("true"),

		POSTGRES_LOGGING: BooleanSchema,
	},
	runtimeEnv: process.env,
	/**
	 * Treat `PORT=` in a .env file as unset so defaults apply.
	 */
	emptyStringAsUndefined: true,
};

function createConfig() {
	return createEnv(configSchema);
}

export type Config = ReturnType<typeof createConfig>;

let currentConfig: Config | undefined;

/**
 * Gets the configuration, parsing and validating process.env on first use.
 * Throws when a required key is missing or a value fails validation.
 */
export function getConfig(): Config {
	if (!currentConfig) {
		currentConfig = createConfig();
	}
	return currentConfig;
}

/**
 * Drops the cached configuration so the next getConfig() re-reads process.env.
 */
export function resetConfig(): void {
	currentConfig = undefined;
}
