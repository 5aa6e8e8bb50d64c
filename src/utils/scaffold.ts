import path from "node:path";
import fs from "fs-extra";
import { scanSource } from "../analysis/source-scanner.js";
import {
	LAYER_NAMES,
	layerDirectory,
	layerFileName,
	layerFunctionName,
} from "../conventions/layers.js";
import * as templates from "../templates/index.js";
import type {
	GeneratedFile,
	LayerKitConfig,
	LayerName,
	ModuleParts,
	OperationName,
	ScaffoldResult,
} from "../types/index.js";
import { CONFIG_FILE_NAME } from "./config-resolver.js";
import { LayerKitError } from "./errors.js";
import { ensureDir, fileExists, isEmptyDir, readText, writeFile } from "./fs.js";
import { mergeModule } from "./module-merge.js";

export interface LayerFilePlan {
	layer: LayerName;
	relativePath: string;
	functionName: string;
	parts: ModuleParts;
}

export interface PlanOptions {
	revalidatePath?: string;
}

export function planLayerFile(
	layer: LayerName,
	op: OperationName,
	config: LayerKitConfig,
	options: PlanOptions = {},
): LayerFilePlan {
	const parts =
		layer === "action"
			? templates.generateActionModule(op, config, {
					revalidatePath: options.revalidatePath,
				})
			: layer === "service"
				? templates.generateServiceModule(op, config)
				: templates.generateDataAccessModule(op, config);

	return {
		layer,
		relativePath: path.posix.join(
			layerDirectory(config, layer),
			layerFileName(layer, op, config),
		),
		functionName: layerFunctionName(layer, op, config),
		parts,
	};
}

export interface ApplyOptions {
	force?: boolean;
	dryRun?: boolean;
}

async function resolvePlan(
	root: string,
	plan: LayerFilePlan,
	force: boolean,
): Promise<GeneratedFile> {
	const fullPath = path.join(root, plan.relativePath);
	const base = {
		layer: plan.layer,
		relativePath: plan.relativePath,
		functionName: plan.functionName,
	};

	if (!(await fileExists(fullPath))) {
		return { ...base, status: "created", content: templates.renderModule(plan.parts) };
	}

	// Server Actions live one per file
	if (plan.layer === "action") {
		if (!force) {
			throw new LayerKitError(
				"FILE_EXISTS",
				`${plan.relativePath} already exists (use --force to overwrite)`,
				{ path: plan.relativePath },
			);
		}
		return { ...base, status: "overwritten", content: templates.renderModule(plan.parts) };
	}

	// Services and data access are grouped by entity: append to the file
	const existing = await readText(fullPath);
	const { exports } = scanSource(existing);
	if (exports.some((ref) => ref.name === plan.functionName)) {
		throw new LayerKitError(
			"EXPORT_EXISTS",
			`${plan.relativePath} already exports ${plan.functionName}`,
			{ path: plan.relativePath, name: plan.functionName },
		);
	}

	return { ...base, status: "updated", content: mergeModule(existing, plan.parts) };
}

/**
 * Resolve every plan before writing anything, so a conflict in one layer
 * leaves the project untouched.
 */
export async function applyPlans(
	root: string,
	plans: LayerFilePlan[],
	options: ApplyOptions = {},
): Promise<GeneratedFile[]> {
	const results: GeneratedFile[] = [];
	for (const plan of plans) {
		results.push(await resolvePlan(root, plan, options.force ?? false));
	}

	if (!options.dryRun) {
		for (const result of results) {
			await writeFile(path.join(root, result.relativePath), result.content);
		}
	}

	return results;
}

// Project scaffolding (init)

export interface ProjectScaffoldOptions {
	projectPath: string;
	config: LayerKitConfig;
	skipExisting: boolean;
	writeConfig: boolean;
	includeAgentRule: boolean;
}

interface FileEntry {
	relativePath: string;
	content: string;
}

export const AGENT_RULE_PATH = ".claude/rules/server-layers.md";

export async function scaffoldProject(
	options: ProjectScaffoldOptions,
): Promise<ScaffoldResult> {
	const { projectPath, config, skipExisting } = options;
	const result: ScaffoldResult = { written: [], skipped: [] };

	const files: FileEntry[] = [];
	if (options.writeConfig) {
		files.push({
			relativePath: CONFIG_FILE_NAME,
			content: templates.generateLayerKitJson(config),
		});
	}
	files.push({
		relativePath: config.docsPath,
		content: templates.generateConventionsDoc(config),
	});
	if (options.includeAgentRule) {
		files.push({
			relativePath: AGENT_RULE_PATH,
			content: templates.generateServerLayersRule(config),
		});
	}

	for (const layer of LAYER_NAMES) {
		const dir = layerDirectory(config, layer);
		if (await isEmptyDir(path.join(projectPath, dir))) {
			files.push({ relativePath: `${dir}/.gitkeep`, content: "" });
		}
	}

	for (const file of files) {
		const fullPath = path.join(projectPath, file.relativePath);

		if (skipExisting && (await fileExists(fullPath))) {
			result.skipped.push(file.relativePath);
			continue;
		}

		await ensureDir(path.dirname(fullPath));
		await writeFile(fullPath, file.content);
		result.written.push(file.relativePath);
	}

	return result;
}

export const LAYER_SCRIPTS: Record<string, string> = {
	"lint:layers": "layerkit check",
	"docs:layers": "layerkit docs --write",
};

/**
 * Add the layerkit scripts to package.json without replacing scripts the
 * project already defines. Returns false when there is no package.json or
 * nothing was added.
 */
export async function mergePackageJsonScripts(
	packageJsonPath: string,
): Promise<boolean> {
	if (!(await fileExists(packageJsonPath))) {
		return false;
	}

	const pkg: { scripts?: Record<string, string> } = await fs.readJson(packageJsonPath);
	const scripts = pkg.scripts ?? {};

	let added = false;
	for (const [key, value] of Object.entries(LAYER_SCRIPTS)) {
		if (!(key in scripts)) {
			scripts[key] = value;
			added = true;
		}
	}

	if (added) {
		pkg.scripts = scripts;
		await fs.writeJson(packageJsonPath, pkg, { spaces: 2 });
	}

	return added;
}
