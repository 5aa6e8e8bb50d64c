import path from "node:path";
import {
	ALLOWED_IMPORTS,
	LAYER_TITLES,
	layerForImport,
} from "../conventions/layers.js";
import {
	isCamelCase,
	isConstantCase,
	isKebabCase,
	isPascalCase,
	toCamelCase,
	toKebabCase,
	toPascalCase,
} from "../conventions/naming.js";
import type {
	ExportRef,
	LayerKitConfig,
	LayerName,
	RuleId,
	Severity,
	SourceSummary,
} from "../types/index.js";

export type RuleScope = LayerName | "app";

export interface RuleContext {
	file: string; // project-relative POSIX path
	baseName: string; // file name without extension
	scope: RuleScope;
	summary: SourceSummary;
	config: LayerKitConfig;
}

export interface RuleFinding {
	line: number;
	message: string;
}

export interface Rule {
	id: RuleId;
	description: string;
	defaultSeverity: Exclude<Severity, "off">;
	scopes: readonly RuleScope[];
	check: (ctx: RuleContext) => RuleFinding[];
}

const ALL_LAYERS: readonly RuleScope[] = ["action", "service", "data-access"];

function describeExportProblem(ref: ExportRef): string | undefined {
	switch (ref.kind) {
		case "function":
			return isCamelCase(ref.name)
				? undefined
				: `Exported function "${ref.name}" should be camelCase ("${toCamelCase(ref.name)}")`;
		case "const":
			return isCamelCase(ref.name) || isConstantCase(ref.name)
				? undefined
				: `Exported constant "${ref.name}" should be camelCase or CONSTANT_CASE`;
		case "class":
		case "type":
		case "interface":
		case "enum":
			return isPascalCase(ref.name)
				? undefined
				: `Exported ${ref.kind} "${ref.name}" should be PascalCase ("${toPascalCase(ref.name)}")`;
		case "binding":
			return isCamelCase(ref.name) ||
				isPascalCase(ref.name) ||
				isConstantCase(ref.name)
				? undefined
				: `Exported name "${ref.name}" should be camelCase or PascalCase`;
	}
}

const isIndex = (ctx: RuleContext) => ctx.baseName === "index";

export const RULES: readonly Rule[] = [
	{
		id: "file-kebab-case",
		description: "Layer file names are kebab-case",
		defaultSeverity: "error",
		scopes: ALL_LAYERS,
		check: (ctx) =>
			isKebabCase(ctx.baseName)
				? []
				: [
						{
							line: 1,
							message: `File name "${ctx.baseName}" should be kebab-case ("${toKebabCase(ctx.baseName)}")`,
						},
					],
	},
	{
		id: "export-naming",
		description:
			"Exported functions are camelCase; types, classes and components are PascalCase",
		defaultSeverity: "error",
		scopes: ALL_LAYERS,
		check: (ctx) =>
			ctx.summary.exports.flatMap((ref) => {
				const message = describeExportProblem(ref);
				return message ? [{ line: ref.line, message }] : [];
			}),
	},
	{
		id: "action-directive",
		description: 'Server Action files start with "use server"',
		defaultSeverity: "error",
		scopes: ["action"],
		check: (ctx) =>
			ctx.summary.directives.includes("use server")
				? []
				: [{ line: 1, message: 'Server Action file is missing the "use server" directive' }],
	},
	{
		id: "action-export-matches-file",
		description: "A Server Action file exports the function its name describes",
		defaultSeverity: "warn",
		scopes: ["action"],
		check: (ctx) => {
			if (isIndex(ctx) || !isKebabCase(ctx.baseName)) return [];
			const expected = `${toCamelCase(ctx.baseName)}${ctx.config.layers.action.functionSuffix}`;
			const found = ctx.summary.exports.some(
				(ref) => ref.name === expected && ref.kind !== "type" && ref.kind !== "interface",
			);
			return found
				? []
				: [
						{
							line: 1,
							message: `Server Action file "${ctx.baseName}.ts" should export "${expected}"`,
						},
					];
		},
	},
	{
		id: "service-file-suffix",
		description: "Service file names end with the configured suffix",
		defaultSeverity: "warn",
		scopes: ["service"],
		check: (ctx) => {
			const suffix = ctx.config.layers.service.fileSuffix;
			if (!suffix || isIndex(ctx) || ctx.baseName.endsWith(suffix)) return [];
			return [
				{
					line: 1,
					message: `Service file "${ctx.baseName}" should end with "${suffix}"`,
				},
			];
		},
	},
	{
		id: "service-function-suffix",
		description: "Exported service functions end with the configured suffix",
		defaultSeverity: "warn",
		scopes: ["service"],
		check: (ctx) => {
			const suffix = ctx.config.layers.service.functionSuffix;
			if (!suffix) return [];
			return ctx.summary.exports
				.filter((ref) => ref.kind === "function" && !ref.name.endsWith(suffix))
				.map((ref) => ({
					line: ref.line,
					message: `Service function "${ref.name}" should end with "${suffix}" ("${ref.name}${suffix}")`,
				}));
		},
	},
	{
		id: "data-access-server-only",
		description: 'Data access files import "server-only"',
		defaultSeverity: "warn",
		scopes: ["data-access"],
		check: (ctx) =>
			ctx.summary.imports.some((ref) => ref.specifier === "server-only")
				? []
				: [{ line: 1, message: 'Data access file should import "server-only"' }],
	},
	{
		id: "no-client-directive",
		description: 'Server layers never carry "use client"',
		defaultSeverity: "error",
		scopes: ALL_LAYERS,
		check: (ctx) =>
			ctx.summary.directives.includes("use client")
				? [{ line: 1, message: '"use client" is not allowed in server code' }]
				: [],
	},
	{
		id: "layer-boundary",
		description: "Imports follow the call chain Action → Service → Data Access",
		defaultSeverity: "error",
		scopes: ALL_LAYERS,
		check: (ctx) => {
			if (ctx.scope === "app") return [];
			const allowed = ALLOWED_IMPORTS[ctx.scope];
			const from = LAYER_TITLES[ctx.scope];
			return ctx.summary.imports.flatMap((ref) => {
				if (ref.typeOnly) return [];
				const target = layerForImport(ctx.config, ctx.file, ref.specifier);
				if (target === undefined || allowed.includes(target)) return [];
				return [
					{
						line: ref.line,
						message: `${from} must not import from ${LAYER_TITLES[target]} ("${ref.specifier}")`,
					},
				];
			});
		},
	},
	{
		id: "app-data-access",
		description: "Routes and components reach data through services",
		defaultSeverity: "warn",
		scopes: ["app"],
		check: (ctx) =>
			ctx.summary.imports.flatMap((ref) =>
				!ref.typeOnly &&
				layerForImport(ctx.config, ctx.file, ref.specifier) === "data-access"
					? [
							{
								line: ref.line,
								message: `Route code should call a service instead of importing data access ("${ref.specifier}")`,
							},
						]
					: [],
			),
	},
];

export function effectiveSeverity(rule: Rule, config: LayerKitConfig): Severity {
	return config.rules[rule.id] ?? rule.defaultSeverity;
}

export function baseNameOf(file: string): string {
	return path.posix.basename(file).replace(/\.tsx?$/, "");
}
