import os from "node:os";
import path from "node:path";
import fs from "fs-extra";
import type { LayerKitConfig } from "../types/index.js";
import { DEFAULT_CONFIG, parseConfig } from "./config-schema.js";
import { LayerKitError } from "./errors.js";

export const CONFIG_FILE_NAME = "layerkit.json";

export interface LoadedConfig {
	config: LayerKitConfig;
	/** Absolute path of the file the config came from; undefined for defaults. */
	path?: string;
}

/**
 * Resolve the config file path using the following priority:
 * 1. --config <path> (explicit path, `~` expands to the home directory)
 * 2. <root>/layerkit.json
 */
export function resolveConfigPath(options: {
	configPath?: string;
	root: string;
}): string {
	if (options.configPath) {
		return options.configPath.startsWith("~")
			? path.join(os.homedir(), options.configPath.slice(1))
			: path.resolve(options.root, options.configPath);
	}
	return path.join(options.root, CONFIG_FILE_NAME);
}

/**
 * Load and validate the config. A missing default config falls back to
 * the built-in defaults; a missing explicit --config is an error.
 */
export async function loadConfig(options: {
	configPath?: string;
	root: string;
}): Promise<LoadedConfig> {
	const configPath = resolveConfigPath(options);

	if (!(await fs.pathExists(configPath))) {
		if (options.configPath) {
			throw new LayerKitError(
				"CONFIG_INVALID",
				`Config file not found: ${configPath}`,
				{ path: configPath },
			);
		}
		return { config: DEFAULT_CONFIG };
	}

	let raw: unknown;
	try {
		raw = await fs.readJson(configPath);
	} catch (error) {
		throw new LayerKitError(
			"CONFIG_INVALID",
			`Could not parse ${configPath}: ${error instanceof Error ? error.message : error}`,
			{ path: configPath },
		);
	}

	const result = parseConfig(raw);
	if (!result.success) {
		throw new LayerKitError(
			"CONFIG_INVALID",
			`Invalid config in ${configPath}:\n  ${result.issues.join("\n  ")}`,
			{ path: configPath, issues: result.issues },
		);
	}

	return { config: result.config, path: configPath };
}
