import path from "node:path";
import { Command } from "commander";
import { generateConventionsDoc } from "../templates/index.js";
import type { LayerKitConfig } from "../types/index.js";
import { loadConfig } from "../utils/config-resolver.js";
import { errorMessage } from "../utils/errors.js";
import { fileExists, readText, writeFile } from "../utils/fs.js";
import { log } from "../utils/logger.js";

export type DocsStatus = "current" | "stale" | "missing";

/** Compare the conventions document on disk with the one the config produces. */
export async function docsStatus(
	root: string,
	config: LayerKitConfig,
): Promise<DocsStatus> {
	const docPath = path.join(root, config.docsPath);
	if (!(await fileExists(docPath))) return "missing";
	const current = await readText(docPath);
	return current === generateConventionsDoc(config) ? "current" : "stale";
}

export async function writeDocs(root: string, config: LayerKitConfig): Promise<string> {
	const docPath = path.join(root, config.docsPath);
	await writeFile(docPath, generateConventionsDoc(config));
	return docPath;
}

interface DocsOptions {
	write?: boolean;
	check?: boolean;
	path?: string;
	config?: string;
}

export const docsCommand = new Command()
	.name("docs")
	.description("Print, write or verify the server code conventions document")
	.option("--write", "Write the document to the configured docsPath")
	.option("--check", "Exit with an error when the written document is out of date")
	.option("--path <path>", "Project root (default: current directory)")
	.option("-c, --config <path>", "Path to layerkit.json")
	.action(async (options: DocsOptions) => {
		try {
			const root = path.resolve(options.path ?? process.cwd());
			const { config } = await loadConfig({ configPath: options.config, root });

			if (options.check) {
				const status = await docsStatus(root, config);
				if (status !== "current") {
					log.error(
						`${config.docsPath} is ${status === "missing" ? "missing" : "out of date"}. Run 'layerkit docs --write'.`,
					);
					process.exit(1);
				}
				log.success(`${config.docsPath} is up to date`);
				return;
			}

			if (options.write) {
				await writeDocs(root, config);
				log.success(`Wrote ${config.docsPath}`);
				return;
			}

			process.stdout.write(generateConventionsDoc(config));
		} catch (error) {
			log.error(`Failed to render docs: ${errorMessage(error)}`);
			process.exit(1);
		}
	});
