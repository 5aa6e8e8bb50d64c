import { RULES, effectiveSeverity } from "../../analysis/rules.js";
import {
	LAYER_TITLES,
	layerDirectory,
	layerFileName,
	layerFunctionName,
} from "../../conventions/layers.js";
import { parseOperationName } from "../../conventions/naming.js";
import type { LayerKitConfig, LayerName } from "../../types/index.js";
import { generateActionModule } from "../layers/action.js";
import { generateDataAccessModule } from "../layers/data-access.js";
import { generateServiceModule } from "../layers/service.js";
import { renderModule } from "../module.js";

// Operations used for the naming table and for the code examples
const NAMING_EXAMPLES: Record<LayerName, string> = {
	action: "create post",
	service: "update profile",
	"data-access": "get user by id",
};

const SNIPPET_EXAMPLES: Record<LayerName, string> = {
	action: "update profile",
	service: "update profile",
	"data-access": "get user by id",
};

function example(layer: LayerName, config: LayerKitConfig) {
	const op = parseOperationName(NAMING_EXAMPLES[layer]);
	return {
		file: layerFileName(layer, op, config),
		fn: layerFunctionName(layer, op, config),
	};
}

function directoryTree(config: LayerKitConfig): string {
	const root = config.srcDir === "." ? "./" : `${config.srcDir.replace(/\/+$/, "")}/`;
	const entries: Array<[string, string]> = [
		[`${config.appDir}/`, "Routes, layouts and pages (App Router)"],
		[
			`${config.layers.action.directory}/`,
			'Server Actions ("use server"), one action per file',
		],
		[
			`${config.layers.service.directory}/`,
			"Business logic: validation, authorization, orchestration",
		],
		[
			`${config.layers["data-access"].directory}/`,
			'Database queries only ("server-only")',
		],
	];
	const width = Math.max(...entries.map(([name]) => name.length)) + 2;

	const lines = entries.map(([name, comment], index) => {
		const branch = index === entries.length - 1 ? "└──" : "├──";
		return `${branch} ${name.padEnd(width)}# ${comment}`;
	});
	return [root, ...lines].join("\n");
}

function namingTable(config: LayerKitConfig): string {
	const row = (layer: LayerName, label: string) => {
		const settings = config.layers[layer];
		const subject = layer === "action" ? "verb-noun" : "entity";
		const file = settings.fileSuffix
			? `kebab-case ${subject} + \`${settings.fileSuffix}\``
			: `kebab-case ${subject}`;
		const fn = settings.functionSuffix
			? `camelCase verb-noun + \`${settings.functionSuffix}\``
			: "camelCase verb-noun";
		const { file: exampleFile, fn: exampleFn } = example(layer, config);
		return `| ${label} | \`${layerDirectory(config, layer)}/\` | ${file} | ${fn} | \`${exampleFile}\` → \`${exampleFn}\` |`;
	};

	return [
		"| Layer | Location | File name | Exported functions | Example |",
		"| --- | --- | --- | --- | --- |",
		row("action", "Server Action"),
		row("service", "Service"),
		row("data-access", "Data Access"),
		"| Types, classes, components | anywhere | — | PascalCase | `UserProfile` |",
	].join("\n");
}

function rulesTable(config: LayerKitConfig): string {
	return [
		"| Rule | Severity | Checks |",
		"| --- | --- | --- |",
		...RULES.map(
			(rule) =>
				`| \`${rule.id}\` | ${effectiveSeverity(rule, config)} | ${rule.description} |`,
		),
	].join("\n");
}

function snippet(layer: LayerName, config: LayerKitConfig): string {
	const op = parseOperationName(SNIPPET_EXAMPLES[layer]);
	const parts =
		layer === "action"
			? generateActionModule(op, config)
			: layer === "service"
				? generateServiceModule(op, config)
				: generateDataAccessModule(op, config);
	const file = `${layerDirectory(config, layer)}/${layerFileName(layer, op, config)}`;
	return `\`\`\`ts\n// ${file}\n${renderModule(parts)}\`\`\``;
}

/**
 * The server code conventions document: layout, call chain, naming table,
 * one example per layer and the rules `layerkit check` enforces.
 */
export function generateConventionsDoc(config: LayerKitConfig): string {
	const actions = layerDirectory(config, "action");
	const services = layerDirectory(config, "service");
	const dataAccess = layerDirectory(config, "data-access");
	const orm = config.orm === "prisma" ? "Prisma" : "Drizzle";
	const readExample = layerFunctionName(
		"service",
		parseOperationName("list posts"),
		config,
	);

	return `# Server Code Conventions

Server-side code in this Next.js (App Router) project is split into three
layers. Each layer has one job and one home.

## Directory Layout

\`\`\`
${directoryTree(config)}
\`\`\`

## Call Chain

\`\`\`
Form / component → Server Action → Service → Data Access → ${orm}
\`\`\`

- **${LAYER_TITLES.action}** (\`${actions}/\`) handle form submissions and mutations. They
  parse input, call one service function, revalidate the affected route
  and turn failures into a plain \`{ error }\` result.
- **${LAYER_TITLES.service}** (\`${services}/\`) hold business logic: validation,
  authorization checks and orchestration. They never touch the database
  client directly.
- **${LAYER_TITLES["data-access"]}** (\`${dataAccess}/\`) issue database queries and nothing else.
  Every file imports \`server-only\` so it can never reach a client bundle.

Imports only flow down the chain. A Server Action never imports data
access, a service never imports an action, and data access imports
neither.

Server Components read data by calling services, for example
\`await ${readExample}()\` in a page.

## Naming Conventions

${namingTable(config)}

- File and directory names use kebab-case.
- Exported functions use camelCase and start with a verb.
- Types, interfaces, classes and React components use PascalCase.
- Service and data access files are grouped by entity, so one file holds
  every function for that entity. Server Actions get one file each.

## Examples

### Data Access

${snippet("data-access", config)}

### Service

${snippet("service", config)}

### Server Action

${snippet("action", config)}

## Enforcement

Run \`layerkit check\` to verify a project against these conventions, or
\`layerkit generate flow "<verb> <entity>"\` to scaffold all three layers
at once.

${rulesTable(config)}
`;
}
