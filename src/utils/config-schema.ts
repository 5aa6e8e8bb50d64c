import { z } from "zod";

const SeveritySchema = z.enum(["error", "warn", "off"]);

const RuleIdSchema = z.enum([
	"file-kebab-case",
	"export-naming",
	"action-directive",
	"action-export-matches-file",
	"service-file-suffix",
	"service-function-suffix",
	"data-access-server-only",
	"no-client-directive",
	"layer-boundary",
	"app-data-access",
]);

const directory = z
	.string()
	.min(1, "Directory cannot be empty")
	.refine((value) => !value.startsWith("/") && !value.includes(".."), {
		message: "Directory must be relative to the source root",
	});

function layerSettings(defaults: {
	directory: string;
	fileSuffix: string;
	functionSuffix: string;
}) {
	return z
		.object({
			directory: directory.default(defaults.directory),
			fileSuffix: z
				.string()
				.regex(/^(-[a-z0-9]+)*$/, "fileSuffix must be kebab-case, e.g. -service")
				.default(defaults.fileSuffix),
			functionSuffix: z
				.string()
				.regex(/^([A-Z][a-zA-Z0-9]*)?$/, "functionSuffix must be PascalCase")
				.default(defaults.functionSuffix),
		})
		.default({});
}

export const LayerKitConfigSchema = z
	.object({
		srcDir: z
			.string()
			.min(1)
			.refine((value) => !value.startsWith("/"), {
				message: "srcDir must be relative to the project root",
			})
			.default("src"),
		appDir: directory.default("app"),
		importAlias: z.string().default("@/"),
		orm: z.enum(["drizzle", "prisma"]).default("drizzle"),
		docsPath: z.string().min(1).default("docs/server-conventions.md"),
		db: z
			.object({
				clientModule: z.string().min(1).default("@/db"),
				schemaModule: z.string().min(1).default("@/db/schema"),
			})
			.default({}),
		layers: z
			.object({
				action: layerSettings({
					directory: "actions",
					fileSuffix: "",
					functionSuffix: "",
				}),
				service: layerSettings({
					directory: "services",
					fileSuffix: "-service",
					functionSuffix: "Logic",
				}),
				"data-access": layerSettings({
					directory: "data-access",
					fileSuffix: "",
					functionSuffix: "",
				}),
			})
			.default({}),
		ignore: z.array(z.string()).default([]),
		rules: z.record(RuleIdSchema, SeveritySchema).default({}),
	})
	.strict();

export type LayerKitConfig = z.infer<typeof LayerKitConfigSchema>;
export type LayerSettings = LayerKitConfig["layers"]["action"];

export const DEFAULT_CONFIG: LayerKitConfig = LayerKitConfigSchema.parse({});

/**
 * Parse and validate raw config input, filling in defaults.
 *
 * Issues are flattened into "path: message" strings so the caller can
 * report all of them at once.
 */
export function parseConfig(
	input: unknown,
): { success: true; config: LayerKitConfig } | { success: false; issues: string[] } {
	const result = LayerKitConfigSchema.safeParse(input);
	if (result.success) {
		return { success: true, config: result.data };
	}
	return {
		success: false,
		issues: result.error.issues.map((issue) =>
			issue.path.length > 0
				? `${issue.path.join(".")}: ${issue.message}`
				: issue.message,
		),
	};
}
