import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { existsSync, readFileSync } from "fs";
import { homedir } from "os";
import { dirname, join } from "path";
import { fileURLToPath } from "url";

// =============================================================================
// Package Detection
// =============================================================================

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

/**
 * Get the base directory of the installed package.
 * - For Node.js (dist/): walks up from dist/ to the package root
 * - For vitest/tsx (src/): walks up from src/ to the package root
 */
export function getPackageDir(): string {
	let dir = __dirname;
	while (dir !== dirname(dir)) {
		if (existsSync(join(dir, "package.json"))) {
			return dir;
		}
		dir = dirname(dir);
	}
	// Fallback (shouldn't happen)
	return __dirname;
}

/** Get path to package.json */
export function getPackageJsonPath(): string {
	return join(getPackageDir(), "package.json");
}

// =============================================================================
// App Config (from package.json threadlogConfig)
// =============================================================================

const PackageJsonSchema = Type.Object({
	threadlogConfig: Type.Optional(
		Type.Object({ name: Type.Optional(Type.String()), dataDir: Type.Optional(Type.String()) }),
	),
	version: Type.Optional(Type.String()),
});

type PackageJson = Static<typeof PackageJsonSchema>;

function loadPackageJson(): PackageJson {
	try {
		const packageJsonPath = getPackageJsonPath();
		if (!existsSync(packageJsonPath)) {
			console.error(`Warning: package.json not found at ${packageJsonPath}. Using default configuration.`);
			return {};
		}
		const parsed: unknown = JSON.parse(readFileSync(packageJsonPath, "utf-8"));
		return Value.Check(PackageJsonSchema, parsed) ? parsed : {};
	} catch (error) {
		console.error(`Warning: Failed to read package.json: ${error}. Using default configuration.`);
		return {};
	}
}

const pkg = loadPackageJson();

export const APP_NAME: string = pkg.threadlogConfig?.name || "threadlog";
export const DATA_DIR_NAME: string = pkg.threadlogConfig?.dataDir || "threadlog";
export const VERSION: string = pkg.version || "0.0.0";

// e.g., THREADLOG_DATA_DIR, THREADLOG_LOCK
const ENV_PREFIX = APP_NAME.toUpperCase().replace(/[^A-Z0-9]/g, "_");
export const ENV_DATA_DIR = `${ENV_PREFIX}_DATA_DIR`;
export const ENV_LOCK = `${ENV_PREFIX}_LOCK`;

// =============================================================================
// User Data Paths (~/.local/share/threadlog/*)
// =============================================================================

/** Get the data directory (e.g., ~/.local/share/threadlog/) */
export function getDataDir(): string {
	const override = process.env[ENV_DATA_DIR];
	if (override) return override;
	const xdgDataHome = process.env.XDG_DATA_HOME || join(homedir(), ".local", "share");
	return join(xdgDataHome, DATA_DIR_NAME);
}

/** Get the root directory holding one subdirectory per conversation */
export function getLogsDir(): string {
	return join(getDataDir(), "logs");
}

/**
 * Whether conversation directories are locked by default.
 * Set THREADLOG_LOCK=0 (or "false"/"off") where advisory locks are unavailable or unwanted.
 */
export function isLockingEnabled(): boolean {
	const value = process.env[ENV_LOCK]?.trim().toLowerCase();
	if (value === undefined || value === "") return true;
	return !["0", "false", "off", "no"].includes(value);
}
