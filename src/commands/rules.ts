import path from "node:path";
import { Command } from "commander";
import kleur from "kleur";
import { RULES, effectiveSeverity } from "../analysis/rules.js";
import type { LayerKitConfig, RuleId, Severity } from "../types/index.js";
import { loadConfig } from "../utils/config-resolver.js";
import { errorMessage } from "../utils/errors.js";
import { log } from "../utils/logger.js";

export interface RuleListing {
	id: RuleId;
	severity: Severity;
	scopes: string[];
	description: string;
}

export function listRules(config: LayerKitConfig): RuleListing[] {
	return RULES.map((rule) => ({
		id: rule.id,
		severity: effectiveSeverity(rule, config),
		scopes: [...rule.scopes],
		description: rule.description,
	}));
}

const SEVERITY_COLORS: Record<Severity, (text: string) => string> = {
	error: kleur.red,
	warn: kleur.yellow,
	off: kleur.dim,
};

interface RulesOptions {
	json?: boolean;
	path?: string;
	config?: string;
}

export const rulesCommand = new Command()
	.name("rules")
	.description("List the convention rules and their effective severity")
	.option("--json", "Output as JSON")
	.option("--path <path>", "Project root (default: current directory)")
	.option("-c, --config <path>", "Path to layerkit.json")
	.action(async (options: RulesOptions) => {
		try {
			const root = path.resolve(options.path ?? process.cwd());
			const { config } = await loadConfig({ configPath: options.config, root });
			const rules = listRules(config);

			if (options.json) {
				console.log(JSON.stringify(rules, null, 2));
				return;
			}

			const width = Math.max(...rules.map((rule) => rule.id.length));
			log.blank();
			for (const rule of rules) {
				const severity = SEVERITY_COLORS[rule.severity](rule.severity.padEnd(5));
				log.step(`${rule.id.padEnd(width)}  ${severity}  ${rule.description}`);
				log.detail(`applies to: ${rule.scopes.join(", ")}`);
			}
			log.blank();
		} catch (error) {
			log.error(`Failed to list rules: ${errorMessage(error)}`);
			process.exit(1);
		}
	});
