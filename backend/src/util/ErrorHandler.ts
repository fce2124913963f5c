import { formatIssues } from "../schemas/TenantSchemas";
import { TenantConflictError } from "../services/TenantService";
import { getPublicMessage, isTenantError } from "../tenant/TenantErrors";
import { getLog } from "./Logger";
import type { ErrorRequestHandler } from "express";
import { ZodError } from "zod";

const log = getLog(import.meta);

/**
 * Final Express error handler. Known errors map to their status with `{ error: message }`;
 * anything else is logged and answered with a generic 500.
 */
export function createErrorHandler(): ErrorRequestHandler {
	return (error: unknown, req, res, next) => {
		if (res.headersSent) {
			next(error);
			return;
		}

		if (error instanceof ZodError) {
			res.status(400).json({ error: formatIssues(error) });
			return;
		}

		if (error instanceof TenantConflictError) {
			res.status(error.status).json({ error: error.message });
			return;
		}

		if (isTenantError(error)) {
			// session failures carry the database error as cause
			log.error(error, "%s %s failed: %s", req.method, req.originalUrl, error.kind);
			res.status(error.status).json({ error: getPublicMessage(error) });
			return;
		}

		log.error(error, "Unhandled error on %s %s", req.method, req.originalUrl);
		res.status(500).json({ error: "Internal server error" });
	};
}
