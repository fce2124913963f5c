import type { TenantConnectionCache } from "../tenant/TenantConnectionCache";
import { getLog } from "../util/Logger";
import express, { type Router } from "express";
import type { Sequelize } from "sequelize";

const log = getLog(import.meta);

export interface StatusRouterOptions {
	/** Central database holding the tenant directory */
	centralSequelize: Sequelize;
	connectionCache: TenantConnectionCache;
}

export interface HealthResponse {
	status: "healthy" | "unhealthy";
	timestamp: string;
	/** Number of tenant pools currently open */
	tenantPools: number;
	message?: string;
}

export function createStatusRouter(options: StatusRouterOptions): Router {
	const router = express.Router();
	const { centralSequelize, connectionCache } = options;

	router.get("/check", (_req, res) => {
		res.send("OK");
	});

	/**
	 * Health endpoint for monitoring and load balancers.
	 * - 200 when the central database answers
	 * - 503 when it does not
	 */
	router.get("/health", async (_req, res) => {
		const timestamp = new Date().toISOString();
		const tenantPools = connectionCache.getCacheSize();
		try {
			await centralSequelize.authenticate();
			res.json({ status: "healthy", timestamp, tenantPools } satisfies HealthResponse);
		} catch (error) {
			log.warn(error, "Central database health check failed");
			res.status(503).json({
				status: "unhealthy",
				timestamp,
				tenantPools,
				message: "Central database unreachable",
			} satisfies HealthResponse);
		}
	});

	return router;
}
