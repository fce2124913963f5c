import { getLog } from "../util/Logger";
import type { CurrentTenantInfo } from "tenant-router-common";
import { QueryTypes, type Sequelize } from "sequelize";

const log = getLog(import.meta);

/**
 * Where a tenant's data lives.
 */
export interface TenantRoute {
	/** Connection URL of the tenant database */
	connectionTarget: string;
	name: string;
}

/**
 * Read-only view of the central tenant table used for request routing. Every call runs a
 * single query on the central pool, so the connection goes back to the pool as soon as the
 * query finishes.
 */
export interface TenantDirectory {
	/**
	 * Returns the route for an active tenant. Unknown and inactive subdomains both yield
	 * undefined; inactive ones are logged.
	 */
	lookup(subdomain: string): Promise<TenantRoute | undefined>;

	/**
	 * Public details of an active tenant, without its connection target.
	 */
	getCurrentTenantInfo(subdomain: string): Promise<CurrentTenantInfo | undefined>;
}

export interface TenantDirectoryConfig {
	/** Sequelize instance for the central database */
	sequelize: Sequelize;
}

interface RouteRow {
	name: string;
	db_url: string;
	status: string;
}

interface InfoRow {
	subdomain: string;
	name: string;
}

export function createTenantDirectory(config: TenantDirectoryConfig): TenantDirectory {
	const { sequelize } = config;

	async function lookup(subdomain: string): Promise<TenantRoute | undefined> {
		const rows = await sequelize.query<RouteRow>("SELECT name, db_url, status FROM tenants WHERE subdomain = $1", {
			bind: [subdomain],
			type: QueryTypes.SELECT,
		});
		const row = rows[0];
		if (!row) {
			log.debug("No tenant registered for subdomain: %s", subdomain);
			return;
		}

		if (row.status !== "active") {
			log.warn("Access attempt to inactive tenant: %s (status: %s)", subdomain, row.status);
			return;
		}

		return { connectionTarget: row.db_url, name: row.name };
	}

	async function getCurrentTenantInfo(subdomain: string): Promise<CurrentTenantInfo | undefined> {
		const rows = await sequelize.query<InfoRow>(
			"SELECT subdomain, name FROM tenants WHERE subdomain = $1 AND status = 'active'",
			{
				bind: [subdomain],
				type: QueryTypes.SELECT,
			},
		);
		const row = rows[0];
		return row ? { subdomain: row.subdomain, name: row.name } : undefined;
	}

	return {
		lookup,
		getCurrentTenantInfo,
	};
}
