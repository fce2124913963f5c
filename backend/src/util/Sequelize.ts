/**
 * Reads the driver error code (e.g. "ECONNREFUSED", "3D000") from a Sequelize error.
 */
export function getDriverErrorCode(error: unknown): string | undefined {
	if (error instanceof Error && "parent" in error) {
		const { parent } = error;
		if (parent instanceof Error && "code" in parent && typeof parent.code === "string") {
			return parent.code;
		}
	}
	return;
}

/**
 * Renders a connection URL as "host:port/database" so it can be logged without credentials.
 */
export function describeConnectionTarget(connectionUrl: string): string {
	try {
		const url = new URL(connectionUrl);
		const port = url.port ? `:${url.port}` : "";
		return `${url.hostname}${port}/${getDatabaseName(connectionUrl)}`;
	} catch {
		return "<invalid connection url>";
	}
}

/**
 * The database a connection URL points at, or "" when it names none.
 */
export function getDatabaseName(connectionUrl: string): string {
	return decodeURIComponent(new URL(connectionUrl).pathname.replace(/^\//, ""));
}

/**
 * Returns the same connection URL pointing at another database on the same server.
 */
export function withDatabaseName(connectionUrl: string, databaseName: string): string {
	const url = new URL(connectionUrl);
	url.pathname = `/${encodeURIComponent(databaseName)}`;
	return url.toString();
}

/**
 * Wraps a connection failure with the target (without credentials) and keeps the original as cause.
 */
export function formatConnectionError(error: unknown, connectionUrl: string): Error {
	const target = describeConnectionTarget(connectionUrl);
	const code = getDriverErrorCode(error);

	if (code === "ECONNREFUSED") {
		return new Error(`PostgreSQL connection refused at ${target}`, { cause: error });
	}
	if (code === "3D000") {
		return new Error(`PostgreSQL database does not exist: ${target}`, { cause: error });
	}

	const originalMessage = error instanceof Error ? error.message : String(error);
	return new Error(`Failed to connect to PostgreSQL at ${target}: ${originalMessage}`, { cause: error });
}
