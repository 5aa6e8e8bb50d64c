import path from "node:path";
import { Command } from "commander";
import { checkProject } from "../analysis/checker.js";
import { formatJsonReport, formatTextReport } from "../analysis/reporter.js";
import type { CheckReport, LayerKitConfig } from "../types/index.js";
import { loadConfig } from "../utils/config-resolver.js";
import { errorMessage } from "../utils/errors.js";
import { listChangedFiles } from "../utils/exec.js";
import { log, setQuiet } from "../utils/logger.js";
import { withSpinner } from "../utils/spinner.js";

export interface CheckRequest {
	root: string;
	config: LayerKitConfig;
	/** Git ref to diff against; only changed and untracked files are checked. */
	changedSince?: string;
}

export async function runCheck(request: CheckRequest): Promise<CheckReport> {
	const files = request.changedSince
		? await listChangedFiles(request.root, request.changedSince)
		: undefined;
	return checkProject({ root: request.root, config: request.config, files });
}

export function shouldFail(report: CheckReport, strict: boolean): boolean {
	return report.errorCount > 0 || (strict && report.warningCount > 0);
}

interface CheckOptions {
	json?: boolean;
	strict?: boolean;
	changed?: string | boolean;
	path?: string;
	config?: string;
}

export const checkCommand = new Command()
	.name("check")
	.description("Check server code against the layer and naming conventions")
	.option("--json", "Output the report as JSON")
	.option("--strict", "Exit with an error on warnings too")
	.option(
		"--changed [base]",
		"Only check files changed since a git ref (default: HEAD)",
	)
	.option("--path <path>", "Project root (default: current directory)")
	.option("-c, --config <path>", "Path to layerkit.json")
	.action(async (options: CheckOptions) => {
		try {
			setQuiet(Boolean(options.json));
			const root = path.resolve(options.path ?? process.cwd());
			const { config } = await loadConfig({ configPath: options.config, root });
			const changedSince =
				typeof options.changed === "string"
					? options.changed
					: options.changed
						? "HEAD"
						: undefined;

			const report = options.json
				? await runCheck({ root, config, changedSince })
				: await withSpinner(
						"Checking server code",
						() => runCheck({ root, config, changedSince }),
					);

			if (options.json) {
				console.log(formatJsonReport(report));
			} else {
				log.blank();
				for (const line of formatTextReport(report)) {
					console.log(line);
				}
				log.blank();
			}

			if (shouldFail(report, Boolean(options.strict))) {
				process.exit(1);
			}
		} catch (error) {
			log.error(`Failed to check: ${errorMessage(error)}`);
			process.exit(1);
		} finally {
			setQuiet(false);
		}
	});
