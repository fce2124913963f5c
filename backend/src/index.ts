export * from "./tenant/TenantConnectionCache";
export * from "./tenant/TenantDirectory";
export * from "./tenant/TenantErrors";
export * from "./tenant/TenantSessionResolver";
export * from "./util/Sequelize";

/**
 * A callback for middleware when the server is shutting down.
 */
export interface ExitHandler {
	stop(code?: number): void | Promise<void>;
}
