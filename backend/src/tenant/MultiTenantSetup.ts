import { getConfig } from "../config/Config";
import { getLog } from "../util/Logger";
import {
	createTenantConnectionCache,
	type TenantConnectionCache,
	type TenantConnectionCacheInternalConfig,
} from "./TenantConnectionCache";
import { createTenantDirectory, type TenantDirectory } from "./TenantDirectory";
import { createTenantMiddleware } from "./TenantMiddleware";
import { createCentralSequelize } from "./TenantSequelizeFactory";
import { createTenantSessionResolver, type TenantSessionResolver } from "./TenantSessionResolver";
import type { RequestHandler } from "express";
import type { Sequelize } from "sequelize";

const log = getLog(import.meta);

/**
 * Multi-tenant infrastructure components.
 */
export interface MultiTenantInfrastructure {
	/** Sequelize for the central database holding the tenant directory */
	centralSequelize: Sequelize;
	directory: TenantDirectory;
	/** Per-tenant pools with LRU and idle expiry */
	connectionCache: TenantConnectionCache;
	resolver: TenantSessionResolver;
	/** Express middleware resolving the tenant from the Host header */
	middleware: RequestHandler;
	/** Stops the eviction timer, closes every tenant pool and the central pool */
	shutdown: () => Promise<void>;
}

export interface MultiTenantSetupConfig {
	centralSequelize: Sequelize;
	baseDomain: string;
	cache: TenantConnectionCacheInternalConfig;
	/** How often idle pools are swept; 0 disables the sweep */
	evictionIntervalMs: number;
}

export function createMultiTenantInfrastructure(config: MultiTenantSetupConfig): MultiTenantInfrastructure {
	log.info("Initializing multi-tenant infrastructure for base domain %s", config.baseDomain);

	const { centralSequelize } = config;
	const directory = createTenantDirectory({ sequelize: centralSequelize });
	const connectionCache = createTenantConnectionCache(config.cache);
	const resolver = createTenantSessionResolver({
		baseDomain: config.baseDomain,
		directory,
		connectionCache,
	});
	const middleware = createTenantMiddleware({ resolver });

	let evictionTimer: NodeJS.Timeout | undefined;
	if (config.evictionIntervalMs > 0) {
		evictionTimer = setInterval(() => {
			connectionCache.evictExpired().catch(error => {
				log.error(error, "Failed to evict expired tenant pools");
			});
		}, config.evictionIntervalMs);
		evictionTimer.unref();
	}

	async function shutdown(): Promise<void> {
		log.info("Shutting down multi-tenant infrastructure");
		if (evictionTimer) {
			clearInterval(evictionTimer);
			evictionTimer = undefined;
		}
		await connectionCache.closeAll();
		await centralSequelize.close();
	}

	return {
		centralSequelize,
		directory,
		connectionCache,
		resolver,
		middleware,
		shutdown,
	};
}

/**
 * Creates multi-tenant infrastructure from the environment configuration.
 */
export function createMultiTenantFromEnv(): MultiTenantInfrastructure {
	const config = getConfig();
	const logging = config.POSTGRES_LOGGING;
	return createMultiTenantInfrastructure({
		centralSequelize: createCentralSequelize(config.CENTRAL_DATABASE_URL, config.CENTRAL_POOL_MAX, logging),
		baseDomain: config.BASE_DOMAIN,
		cache: {
			maxConnections: config.TENANT_CONNECTION_MAX,
			ttlMs: config.TENANT_CONNECTION_TTL_MS,
			poolSize: config.TENANT_POOL_SIZE,
			poolOverflow: config.TENANT_POOL_OVERFLOW,
			verifyOnCreate: config.TENANT_VERIFY_ON_CREATE,
			logging,
		},
		evictionIntervalMs: config.TENANT_EVICTION_INTERVAL_MS,
	});
}
