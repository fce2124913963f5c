/**
 * Factory functions for creating Sequelize instances for the central database and for
 * tenant databases. This module is excluded from unit test coverage as it requires real
 * database connections.
 */

import { getLog } from "../util/Logger";
import { describeConnectionTarget } from "../util/Sequelize";
import { Sequelize } from "sequelize";

const log = getLog(import.meta);

/**
 * Logging option type for Sequelize - can be boolean or a function that receives SQL strings.
 */
export type SequelizeLogging = boolean | ((sql: string, timing?: number) => void);

export interface TenantPoolOptions {
	/** Connections the pool is sized for under normal load */
	poolSize: number;
	/** Extra connections the pool may open beyond poolSize */
	poolOverflow: number;
	logging: SequelizeLogging;
}

/**
 * Create a Sequelize instance (pool plus transaction factory) for a tenant database.
 * Idle connections are released, so the pool shrinks back to zero between bursts.
 */
export function createTenantSequelize(connectionTarget: string, options: TenantPoolOptions): Sequelize {
	log.info("Creating Sequelize for tenant database: %s", describeConnectionTarget(connectionTarget));
	return new Sequelize(connectionTarget, {
		dialect: "postgres",
		logging: options.logging,
		pool: {
			max: options.poolSize + options.poolOverflow,
			min: 0,
		},
		define: { underscored: true },
	});
}

/**
 * Create a Sequelize instance for the central database that holds the tenant directory.
 */
export function createCentralSequelize(connectionUrl: string, poolMax: number, logging: SequelizeLogging): Sequelize {
	log.debug("Creating Sequelize for central database: %s", describeConnectionTarget(connectionUrl));
	return new Sequelize(connectionUrl, {
		dialect: "postgres",
		logging,
		pool: { max: poolMax },
	});
}
