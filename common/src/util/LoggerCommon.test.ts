import {
	createLog,
	createLoggingConfig,
	getModuleName,
	isLogLevel,
	type Logger,
	type LoggingConfig,
	parseModuleOverrides,
} from "./LoggerCommon";
import { describe, expect, it, vi } from "vitest";

function createFakeRoot(): { root: Logger; child: ReturnType<typeof vi.fn> } {
	const childLogger = { info: vi.fn() };
	const child = vi.fn().mockReturnValue(childLogger);
	return { root: { child } as unknown as Logger, child };
}

describe("LoggerCommon", () => {
	describe("parseModuleOverrides", () => {
		it("parses module:level pairs", () => {
			expect(parseModuleOverrides("TenantDirectory:debug, TenantConnectionCache : warn")).toEqual({
				TenantDirectory: "debug",
				TenantConnectionCache: "warn",
			});
		});

		it("drops pairs with unknown levels or missing parts", () => {
			expect(parseModuleOverrides("A:verbose,B,:info,C:error")).toEqual({ C: "error" });
		});

		it("returns an empty map for an empty string", () => {
			expect(parseModuleOverrides("")).toEqual({});
		});
	});

	describe("isLogLevel", () => {
		it("accepts pino levels only", () => {
			expect(isLogLevel("fatal")).toBe(true);
			expect(isLogLevel("silly")).toBe(false);
		});
	});

	describe("createLoggingConfig", () => {
		it("builds console and file transports in the given order", () => {
			const config = createLoggingConfig(true, "app", "warn", false, "console, file", "", "/tmp/logs");

			expect(config.transports).toEqual([
				{ type: "console", level: "warn", pretty: false },
				{
					type: "file",
					filenamePrefix: "app",
					fileDirectoryPath: "/tmp/logs",
					datePattern: "yyyy-MM-dd",
					maxFiles: 14,
					maxSize: "500m",
					level: "warn",
					pretty: false,
				},
			]);
		});

		it("ignores unknown transport names", () => {
			const config = createLoggingConfig(true, "app", "info", false, "syslog", "", "./logs");

			expect(config.transports).toEqual([]);
		});
	});

	describe("getModuleName", () => {
		it("strips the directory and extension from a module url", () => {
			expect(getModuleName("file:///srv/backend/src/tenant/TenantDirectory.ts")).toBe("TenantDirectory");
		});

		it("keeps inner dots", () => {
			expect(getModuleName("Tenant.mock.ts")).toBe("Tenant.mock");
		});

		it("returns names without extension unchanged", () => {
			expect(getModuleName("Startup")).toBe("Startup");
		});
	});

	describe("createLog", () => {
		it("returns the same disabled logger when logging is off", () => {
			const disabled: LoggingConfig = { enabled: false, level: "info", transports: [], moduleOverrides: {} };

			const first = createLog("A", () => disabled);
			const second = createLog("B", () => disabled);

			expect(first).toBe(second);
		});

		it("creates a module child logger at the default level", () => {
			const { root, child } = createFakeRoot();
			const provider = vi.fn().mockReturnValue(root);
			const config: LoggingConfig = { enabled: true, level: "info", transports: [], moduleOverrides: {} };

			createLog("file:///x/TenantDirectory.ts", () => config, provider);

			expect(provider).toHaveBeenCalledWith({ ...config, level: "info", transports: [] });
			expect(child).toHaveBeenCalledWith({ module: "TenantDirectory" }, { level: "info" });
		});

		it("lowers the root level when a module override is more verbose", () => {
			const { root, child } = createFakeRoot();
			const provider = vi.fn().mockReturnValue(root);
			const config: LoggingConfig = {
				enabled: true,
				level: "warn",
				transports: [{ type: "console", level: "warn", pretty: false }],
				moduleOverrides: { TenantDirectory: "debug" },
			};

			createLog("TenantDirectory.ts", () => config, provider);

			expect(provider).toHaveBeenCalledWith({
				...config,
				level: "debug",
				transports: [{ type: "console", level: "debug", pretty: false }],
			});
			expect(child).toHaveBeenCalledWith({ module: "TenantDirectory" }, { level: "debug" });
		});

		it("keeps the root level when a module override is quieter", () => {
			const { root, child } = createFakeRoot();
			const provider = vi.fn().mockReturnValue(root);
			const config: LoggingConfig = {
				enabled: true,
				level: "info",
				transports: [],
				moduleOverrides: { Noisy: "error" },
			};

			createLog("Noisy.ts", () => config, provider);

			expect(provider).toHaveBeenCalledWith({ ...config, level: "info", transports: [] });
			expect(child).toHaveBeenCalledWith({ module: "Noisy" }, { level: "error" });
		});
	});
});
