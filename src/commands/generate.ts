import path from "node:path";
import { Command } from "commander";
import { layerDirectory, layerFileName } from "../conventions/layers.js";
import { parseOperationName } from "../conventions/naming.js";
import type {
	GeneratedFile,
	LayerKitConfig,
	LayerName,
	OperationName,
} from "../types/index.js";
import { loadConfig } from "../utils/config-resolver.js";
import { errorMessage } from "../utils/errors.js";
import { fileExists } from "../utils/fs.js";
import { log } from "../utils/logger.js";
import { type LayerFilePlan, applyPlans, planLayerFile } from "../utils/scaffold.js";

export type GenerateTarget = LayerName | "flow";

const TARGETS: readonly GenerateTarget[] = [
	"action",
	"service",
	"data-access",
	"flow",
];

// Leaves first, so a flow writes the modules each layer imports before the importer
const FLOW_ORDER: readonly LayerName[] = ["data-access", "service", "action"];

export interface GenerateRequest {
	root: string;
	config: LayerKitConfig;
	target: GenerateTarget;
	name: string;
	entity?: string;
	revalidatePath?: string;
	force?: boolean;
	dryRun?: boolean;
}

export interface GenerateOutcome {
	operation: OperationName;
	files: GeneratedFile[];
}

export function isGenerateTarget(value: string): value is GenerateTarget {
	return (TARGETS as readonly string[]).includes(value);
}

export async function runGenerate(request: GenerateRequest): Promise<GenerateOutcome> {
	const { root, config, target } = request;
	const operation = parseOperationName(request.name, request.entity);
	const layers = target === "flow" ? FLOW_ORDER : [target];

	const plans: LayerFilePlan[] = layers.map((layer) =>
		planLayerFile(layer, operation, config, {
			revalidatePath: request.revalidatePath,
		}),
	);

	const files = await applyPlans(root, plans, {
		force: request.force,
		dryRun: request.dryRun,
	});

	return { operation, files };
}

interface GenerateOptions {
	entity?: string;
	revalidate?: string;
	force?: boolean;
	dryRun?: boolean;
	path?: string;
	config?: string;
}

export const generateCommand = new Command()
	.name("generate")
	.alias("g")
	.description(
		"Scaffold a Server Action, service or data access function (or all three with 'flow')",
	)
	.argument("<layer>", `One of: ${TARGETS.join(", ")}`)
	.argument("<name...>", 'Operation name, verb first (e.g. "create post")')
	.option("--entity <entity>", "Entity the operation works on (default: inferred)")
	.option("--revalidate <path>", "Route a Server Action revalidates")
	.option("-f, --force", "Overwrite an existing Server Action file")
	.option("--dry-run", "Print the files instead of writing them")
	.option("--path <path>", "Project root (default: current directory)")
	.option("-c, --config <path>", "Path to layerkit.json")
	.action(async (layer: string, nameParts: string[], options: GenerateOptions) => {
		try {
			if (!isGenerateTarget(layer)) {
				log.error(`Unknown layer "${layer}". Use one of: ${TARGETS.join(", ")}`);
				process.exit(1);
			}

			const root = path.resolve(options.path ?? process.cwd());
			const { config } = await loadConfig({ configPath: options.config, root });

			const { operation, files } = await runGenerate({
				root,
				config,
				target: layer,
				name: nameParts.join(" "),
				entity: options.entity,
				revalidatePath: options.revalidate,
				force: options.force,
				dryRun: options.dryRun,
			});

			const generatesAction = layer === "action" || layer === "flow";
			if (
				generatesAction &&
				(operation.kind === "read-one" || operation.kind === "read-many")
			) {
				log.warn(
					"Server Actions are meant for mutations. Reads usually belong in a service called from a Server Component.",
				);
			}

			log.blank();
			for (const file of files) {
				if (options.dryRun) {
					log.step(`${file.relativePath} (${file.status}, dry run)`);
					console.log(file.content);
					continue;
				}
				log.success(`${file.status} ${file.relativePath} → ${file.functionName}`);
			}

			if (layer === "action") {
				const servicePath = path.join(
					root,
					layerDirectory(config, "service"),
					layerFileName("service", operation, config),
				);
				if (!(await fileExists(servicePath))) {
					log.info(
						`The service this action calls does not exist yet. Run: layerkit generate service "${operation.words.join(" ")}"`,
					);
				}
			}
			log.blank();
		} catch (error) {
			log.error(`Failed to generate: ${errorMessage(error)}`);
			process.exit(1);
		}
	});
