import path from "node:path";
import { confirm, select } from "@inquirer/prompts";
import { Command } from "commander";
import type { LayerKitConfig, Orm, ScaffoldResult } from "../types/index.js";
import {
	CONFIG_FILE_NAME,
	loadConfig,
} from "../utils/config-resolver.js";
import { parseConfig } from "../utils/config-schema.js";
import { LayerKitError, errorMessage } from "../utils/errors.js";
import { fileExists } from "../utils/fs.js";
import { log } from "../utils/logger.js";
import {
	AGENT_RULE_PATH,
	mergePackageJsonScripts,
	scaffoldProject,
} from "../utils/scaffold.js";
import { withSpinner } from "../utils/spinner.js";

export interface InitRequest {
	root: string;
	orm?: Orm;
	srcDir?: string;
	includeAgentRule: boolean;
	force: boolean;
}

export interface InitOutcome {
	config: LayerKitConfig;
	configCreated: boolean;
	files: ScaffoldResult;
	scriptsAdded: boolean;
}

/**
 * Next.js keeps the App Router under `src/app` or `app`; put the layers
 * beside it.
 */
export async function detectSrcDir(root: string): Promise<string> {
	if (await fileExists(path.join(root, "src", "app"))) return "src";
	if (await fileExists(path.join(root, "app"))) return ".";
	return "src";
}

export async function runInit(request: InitRequest): Promise<InitOutcome> {
	const { root, force } = request;

	if (!(await fileExists(root))) {
		throw new LayerKitError("NOT_A_PROJECT", `Directory not found: ${root}`, {
			path: root,
		});
	}

	const configPath = path.join(root, CONFIG_FILE_NAME);
	const hasConfig = await fileExists(configPath);

	let config: LayerKitConfig;
	if (hasConfig && !force) {
		({ config } = await loadConfig({ root }));
	} else {
		const result = parseConfig({
			srcDir: request.srcDir ?? (await detectSrcDir(root)),
			orm: request.orm ?? "drizzle",
		});
		if (!result.success) {
			throw new LayerKitError("CONFIG_INVALID", result.issues.join("; "), {
				issues: result.issues,
			});
		}
		config = result.config;
	}

	const files = await scaffoldProject({
		projectPath: root,
		config,
		skipExisting: !force,
		writeConfig: !hasConfig || force,
		includeAgentRule: request.includeAgentRule,
	});

	const scriptsAdded = await mergePackageJsonScripts(path.join(root, "package.json"));

	return { config, configCreated: !hasConfig || force, files, scriptsAdded };
}

interface InitOptions {
	path?: string;
	orm?: string;
	srcDir?: string;
	rules?: boolean;
	force?: boolean;
	yes?: boolean;
}

function isOrm(value: string): value is Orm {
	return value === "drizzle" || value === "prisma";
}

export const initCommand = new Command()
	.name("init")
	.description(
		"Set up layerkit: config, layer directories and the conventions document",
	)
	.option("--path <path>", "Project root (default: current directory)")
	.option("--orm <orm>", "ORM used by the data access layer (drizzle or prisma)")
	.option("--src-dir <dir>", "Directory that holds app/ and the layers")
	.option("--rules", `Also write ${AGENT_RULE_PATH} for coding agents`)
	.option("-f, --force", "Overwrite files layerkit already wrote")
	.option("-y, --yes", "Accept defaults without prompting")
	.action(async (options: InitOptions) => {
		try {
			const root = path.resolve(options.path ?? process.cwd());

			let orm: Orm | undefined;
			if (options.orm !== undefined) {
				if (!isOrm(options.orm)) {
					log.error(`Unknown ORM "${options.orm}". Use drizzle or prisma.`);
					process.exit(1);
				}
				orm = options.orm;
			}

			const hasConfig = await fileExists(path.join(root, CONFIG_FILE_NAME));

			if (!options.yes) {
				if (options.force && hasConfig) {
					const overwrite = await confirm({
						message: `Overwrite ${CONFIG_FILE_NAME} and the generated files?`,
						default: false,
					});
					if (!overwrite) {
						log.info("Nothing changed.");
						return;
					}
				}
				if (orm === undefined && (!hasConfig || options.force)) {
					orm = await select<Orm>({
						message: "Which ORM does the data access layer use?",
						choices: [
							{ name: "Drizzle", value: "drizzle" },
							{ name: "Prisma", value: "prisma" },
						],
					});
				}
			}

			log.blank();
			log.info(`Initializing layerkit in ${root}`);
			log.blank();

			const outcome = await withSpinner("Writing files", () =>
				runInit({
					root,
					orm,
					srcDir: options.srcDir,
					includeAgentRule: Boolean(options.rules),
					force: Boolean(options.force),
				}),
			);

			for (const file of outcome.files.written) {
				log.step(`wrote ${file}`);
			}
			for (const file of outcome.files.skipped) {
				log.detail(`kept existing ${file}`);
			}
			if (outcome.scriptsAdded) {
				log.step("added lint:layers and docs:layers scripts to package.json");
			}

			log.blank();
			log.success("Server layers are ready.");
			log.info(`Read ${outcome.config.docsPath}, then try:`);
			log.step('layerkit generate flow "update profile"');
			log.step("layerkit check");
			log.blank();
		} catch (error) {
			log.error(`Failed to initialize: ${errorMessage(error)}`);
			process.exit(1);
		}
	});
