import { getLog } from "../util/Logger";
import { getHostHeader } from "./DomainUtils";
import { requireTenantContext, runWithTenantContext } from "./TenantContext";
import { getPublicMessage } from "./TenantErrors";
import type { TenantSession, TenantSessionResolver } from "./TenantSessionResolver";
import type { NextFunction, Request, RequestHandler, Response } from "express";

const log = getLog(import.meta);

/**
 * Configuration for tenant middleware.
 */
export interface TenantMiddlewareConfig {
	resolver: TenantSessionResolver;
}

/**
 * Creates Express middleware that resolves the tenant from the Host header and runs the rest
 * of the request inside its TenantRequestContext.
 *
 * Error responses:
 * - 400: No subdomain in the Host header
 * - 404: Tenant not found or not active
 * - 500: Tenant database unreachable, or the central lookup failed. The body never names the
 *   database target.
 */
export function createTenantMiddleware(config: TenantMiddlewareConfig): RequestHandler {
	const { resolver } = config;

	return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
		try {
			const resolution = await resolver.resolve(getHostHeader(req));
			if (!resolution.ok) {
				const { error } = resolution;
				// the resolver has logged the detail of server-side failures
				res.status(error.status).json({ error: getPublicMessage(error) });
				return;
			}

			const { subdomain, tenant, session } = resolution;
			runWithTenantContext({ subdomain, tenant, session }, () => next());
		} catch (error) {
			log.error(error, "Error in tenant middleware");
			res.status(500).json({ error: "Internal server error" });
		}
	};
}

/**
 * Wraps a tenant-scoped route. The handler runs inside a session of the request's tenant and
 * its result is sent as JSON only after the session has committed; `undefined` is sent as
 * 204. Failures go to the error handler. If the client disconnects before the handler
 * settles, the session is rolled back.
 */
export function tenantHandler<T>(handler: (session: TenantSession, req: Request) => Promise<T>): RequestHandler {
	return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
		const controller = new AbortController();
		const onClose = (): void => {
			if (!res.writableFinished) {
				controller.abort(new Error("Client disconnected"));
			}
		};
		res.on("close", onClose);

		try {
			const { session } = requireTenantContext();
			const result = await session.run(tenantSession => handler(tenantSession, req), {
				signal: controller.signal,
			});
			if (result === undefined) {
				res.status(204).end();
			} else {
				res.json(result);
			}
		} catch (error) {
			next(error);
		} finally {
			res.off("close", onClose);
		}
	};
}
