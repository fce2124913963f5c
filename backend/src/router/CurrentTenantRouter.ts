import { requireTenantContext } from "../tenant/TenantContext";
import type { TenantDirectory } from "../tenant/TenantDirectory";
import { tenantHandler } from "../tenant/TenantMiddleware";
import express, { type Router } from "express";
import { QueryTypes } from "sequelize";

export interface CurrentTenantRouterConfig {
	directory: TenantDirectory;
}

/**
 * The tenant serving the request, as seen from inside its own database.
 */
export interface CurrentTenantResponse {
	subdomain: string;
	name: string;
	/** Database the tenant session is connected to */
	database: string;
}

interface CurrentDatabaseRow {
	database: string;
}

/**
 * Routes for the tenant resolved from the Host header. Mount behind the tenant middleware.
 */
export function createCurrentTenantRouter(config: CurrentTenantRouterConfig): Router {
	const router = express.Router();
	const { directory } = config;

	router.get(
		"/current",
		tenantHandler(async (session): Promise<CurrentTenantResponse> => {
			const rows = await session.sequelize.query<CurrentDatabaseRow>("SELECT current_database() AS database", {
				transaction: session.transaction,
				type: QueryTypes.SELECT,
			});
			// The tenant may have been deactivated since the request was resolved
			const info = await directory.getCurrentTenantInfo(session.subdomain);
			return {
				subdomain: session.subdomain,
				name: info ? info.name : requireTenantContext().tenant.name,
				database: rows.length > 0 ? rows[0].database : "",
			};
		}),
	);

	return router;
}
