import path from "node:path";
import { isAppPath, layerForPath } from "../conventions/layers.js";
import type {
	CheckReport,
	LayerKitConfig,
	Violation,
} from "../types/index.js";
import { listFiles, readText } from "../utils/fs.js";
import { matchesAnyGlob } from "../utils/glob.js";
import { type RuleScope, RULES, baseNameOf, effectiveSeverity } from "./rules.js";
import { scanSource } from "./source-scanner.js";

const SOURCE_FILE = /\.tsx?$/;
const SKIPPED_FILE = /(\.d\.ts|\.(test|spec)\.tsx?)$/;

export interface CheckOptions {
	root: string;
	config: LayerKitConfig;
	/** Restrict the check to these project-relative paths. */
	files?: string[];
}

export function scopeOf(
	config: LayerKitConfig,
	file: string,
): RuleScope | undefined {
	const layer = layerForPath(config, file);
	if (layer) return layer;
	return isAppPath(config, file) ? "app" : undefined;
}

/** Run every enabled rule over one file's source. */
export function checkSource(
	config: LayerKitConfig,
	file: string,
	source: string,
): Violation[] {
	const scope = scopeOf(config, file);
	if (!scope) return [];

	const summary = scanSource(source);
	const ctx = { file, baseName: baseNameOf(file), scope, summary, config };
	const violations: Violation[] = [];

	for (const rule of RULES) {
		if (!rule.scopes.includes(scope)) continue;
		const severity = effectiveSeverity(rule, config);
		if (severity === "off") continue;

		for (const finding of rule.check(ctx)) {
			violations.push({
				ruleId: rule.id,
				severity,
				file,
				line: finding.line,
				message: finding.message,
			});
		}
	}

	return violations;
}

export async function discoverFiles(
	root: string,
	config: LayerKitConfig,
): Promise<string[]> {
	const files = await listFiles(root, config.srcDir);
	return files.filter(
		(file) =>
			SOURCE_FILE.test(file) &&
			!SKIPPED_FILE.test(file) &&
			!matchesAnyGlob(config.ignore, file) &&
			scopeOf(config, file) !== undefined,
	);
}

export async function checkProject(options: CheckOptions): Promise<CheckReport> {
	const { root, config } = options;
	let files = await discoverFiles(root, config);

	if (options.files) {
		const only = new Set(
			options.files.map((file) => path.posix.normalize(file.split(path.sep).join("/"))),
		);
		files = files.filter((file) => only.has(file));
	}

	const violations: Violation[] = [];
	for (const file of files) {
		const source = await readText(path.join(root, file));
		violations.push(...checkSource(config, file, source));
	}

	violations.sort((a, b) =>
		a.file === b.file ? a.line - b.line : a.file < b.file ? -1 : 1,
	);

	return {
		root,
		filesChecked: files.length,
		violations,
		errorCount: violations.filter((v) => v.severity === "error").length,
		warningCount: violations.filter((v) => v.severity === "warn").length,
	};
}
