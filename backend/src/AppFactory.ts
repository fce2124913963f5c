import { getConfig } from "./config/Config";
import { createTenantDao } from "./dao/TenantDao";
import type { ExitHandler } from "./index";
import { createCurrentTenantRouter } from "./router/CurrentTenantRouter";
import { createStatusRouter } from "./router/StatusRouter";
import { createTenantAdminRouter } from "./router/TenantAdminRouter";
import { createTenantService, type TenantService } from "./services/TenantService";
import { createMultiTenantFromEnv, type MultiTenantInfrastructure } from "./tenant/MultiTenantSetup";
import { createErrorHandler } from "./util/ErrorHandler";
import { getLog } from "./util/Logger";
import type { Express } from "express";
import express from "express";

const log = getLog(import.meta);

/**
 * Check if a request path should bypass tenant middleware.
 * Status checks and tenant administration run against the central database only.
 */
export function shouldBypassTenantMiddleware(path: string): boolean {
	return isUnder(path, "/status") || isUnder(path, "/tenants");
}

function isUnder(path: string, prefix: string): boolean {
	return path === prefix || path.startsWith(`${prefix}/`);
}

export interface ExpressAppConfig {
	/** Prefix every router is mounted under, e.g. "/api" */
	rootPath: string;
	infrastructure: Pick<MultiTenantInfrastructure, "centralSequelize" | "connectionCache" | "directory" | "middleware">;
	tenantService: TenantService;
}

export function createExpressApp(config: ExpressAppConfig): Express {
	const { rootPath, infrastructure, tenantService } = config;
	log.info("Initializing Express app under %s", rootPath);

	const app = express();
	app.disable("x-powered-by");
	app.use(express.json({ limit: "1mb" }));

	// Resolve the tenant from the Host header for everything but the central routes
	app.use(rootPath, (req, res, next) => {
		if (shouldBypassTenantMiddleware(req.path)) {
			next();
			return;
		}
		infrastructure.middleware(req, res, next);
	});

	app.use(
		`${rootPath}/status`,
		createStatusRouter({
			centralSequelize: infrastructure.centralSequelize,
			connectionCache: infrastructure.connectionCache,
		}),
	);
	app.use(`${rootPath}/tenants`, createTenantAdminRouter({ tenantService }));
	app.use(`${rootPath}/tenant`, createCurrentTenantRouter({ directory: infrastructure.directory }));

	app.use(createErrorHandler());
	return app;
}

/**
 * Creates the infrastructure from the environment, makes sure the tenants table exists and
 * starts listening on PORT. SIGINT, SIGTERM and SIGHUP close the server and every pool.
 */
export async function createAndStartServer(): Promise<Express> {
	log.info("Starting up on Node %s", process.version);

	const Configs = getConfig();
	const infrastructure = createMultiTenantFromEnv();
	const tenantDao = createTenantDao(infrastructure.centralSequelize);
	await tenantDao.sync();

	const tenantService = createTenantService({
		tenantDao,
		connectionCache: infrastructure.connectionCache,
		centralDatabaseUrl: Configs.CENTRAL_DATABASE_URL,
	});
	const app = createExpressApp({ rootPath: Configs.ROOT_PATH, infrastructure, tenantService });

	const server = app.listen(Configs.PORT, () => log.info("ready on port %d", Configs.PORT));

	const shutdownHandlers: Array<ExitHandler> = [
		{
			stop: () =>
				new Promise<void>((resolve, reject) => {
					server.close(error => (error ? reject(error) : resolve()));
				}),
		},
		{ stop: () => infrastructure.shutdown() },
	];

	let stopping = false;
	const signalListener = (signal: NodeJS.Signals): void => {
		if (stopping) {
			return;
		}
		stopping = true;
		log.info("Exiting due to signal: %s", signal);
		runShutdownHandlers(shutdownHandlers).then(
			() => process.exit(0),
			error => {
				log.error(error, "Shutdown failed");
				process.exit(1);
			},
		);
	};

	for (const signal of ["SIGINT", "SIGTERM", "SIGHUP"] as const) {
		process.on(signal, signalListener);
	}

	return app;
}

/**
 * Runs every handler in order; a failing handler does not stop the ones after it.
 */
export async function runShutdownHandlers(handlers: Array<ExitHandler>): Promise<void> {
	const failures: Array<unknown> = [];
	for (const handler of handlers) {
		try {
			await handler.stop();
		} catch (error) {
			failures.push(error);
		}
	}
	if (failures.length > 0) {
		throw new AggregateError(failures, "Shutdown handlers failed");
	}
}
