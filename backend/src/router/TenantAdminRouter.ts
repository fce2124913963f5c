import { ListTenantsQuerySchema, TenantIdSchema } from "../schemas/TenantSchemas";
import type { TenantService } from "../services/TenantService";
import { getLog } from "../util/Logger";
import express, { type Router } from "express";

const log = getLog(import.meta);

export interface TenantAdminRouterConfig {
	tenantService: TenantService;
}

/**
 * Administration of tenant records. Validation failures (including an id that is not a UUID),
 * conflicts and unexpected errors are passed to the error handler.
 */
export function createTenantAdminRouter(config: TenantAdminRouterConfig): Router {
	const router = express.Router();
	const { tenantService } = config;

	router.post("/", async (req, res, next) => {
		try {
			const tenant = await tenantService.createTenant(req.body);
			log.info("Tenant %s created through the admin API", tenant.subdomain);
			res.status(201).json(tenant);
		} catch (error) {
			next(error);
		}
	});

	router.get("/", async (req, res, next) => {
		try {
			const { skip, limit } = ListTenantsQuerySchema.parse(req.query);
			res.json(await tenantService.listTenants(skip, limit));
		} catch (error) {
			next(error);
		}
	});

	router.get("/subdomain/:subdomain", async (req, res, next) => {
		try {
			const tenant = await tenantService.getTenantBySubdomain(req.params.subdomain);
			if (!tenant) {
				res.status(404).json({ error: "Tenant not found" });
				return;
			}
			res.json(tenant);
		} catch (error) {
			next(error);
		}
	});

	router.get("/:id", async (req, res, next) => {
		try {
			const tenant = await tenantService.getTenantById(TenantIdSchema.parse(req.params.id));
			if (!tenant) {
				res.status(404).json({ error: "Tenant not found" });
				return;
			}
			res.json(tenant);
		} catch (error) {
			next(error);
		}
	});

	router.patch("/:id", async (req, res, next) => {
		try {
			const tenant = await tenantService.updateTenant(TenantIdSchema.parse(req.params.id), req.body);
			if (!tenant) {
				res.status(404).json({ error: "Tenant not found" });
				return;
			}
			res.json(tenant);
		} catch (error) {
			next(error);
		}
	});

	// Soft delete
	router.delete("/:id", async (req, res, next) => {
		try {
			const tenant = await tenantService.suspendTenant(TenantIdSchema.parse(req.params.id));
			if (!tenant) {
				res.status(404).json({ error: "Tenant not found" });
				return;
			}
			log.info("Tenant %s suspended through the admin API", tenant.subdomain);
			res.status(204).end();
		} catch (error) {
			next(error);
		}
	});

	return router;
}
