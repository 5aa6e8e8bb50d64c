import { describe, expect, it } from "vitest";
import { DEFAULT_CONFIG, parseConfig } from "./config-schema.js";

describe("config schema", () => {
	it("should fill in defaults", () => {
		expect(DEFAULT_CONFIG).toEqual({
			srcDir: "src",
			appDir: "app",
			importAlias: "@/",
			orm: "drizzle",
			docsPath: "docs/server-conventions.md",
			db: { clientModule: "@/db", schemaModule: "@/db/schema" },
			layers: {
				action: { directory: "actions", fileSuffix: "", functionSuffix: "" },
				service: { directory: "services", fileSuffix: "-service", functionSuffix: "Logic" },
				"data-access": { directory: "data-access", fileSuffix: "", functionSuffix: "" },
			},
			ignore: [],
			rules: {},
		});
	});

	it("should keep defaults for layer settings that are not given", () => {
		const result = parseConfig({ layers: { service: { functionSuffix: "Service" } } });

		expect(result.success).toBe(true);
		if (result.success) {
			expect(result.config.layers.service).toEqual({
				directory: "services",
				fileSuffix: "-service",
				functionSuffix: "Service",
			});
			expect(result.config.layers.action.directory).toBe("actions");
		}
	});

	it("should report every issue with its path", () => {
		const result = parseConfig({
			layers: { service: { fileSuffix: "Service", directory: "../services" } },
			rules: { "layer-boundary": "fatal" },
		});

		expect(result.success).toBe(false);
		if (!result.success) {
			expect(result.issues).toContain(
				"layers.service.fileSuffix: fileSuffix must be kebab-case, e.g. -service",
			);
			expect(result.issues).toContain(
				"layers.service.directory: Directory must be relative to the source root",
			);
			expect(result.issues.some((issue) => issue.startsWith("rules.layer-boundary:"))).toBe(
				true,
			);
		}
	});

	it("should reject unknown keys", () => {
		const result = parseConfig({ colour: "blue" });

		expect(result).toEqual({
			success: false,
			issues: ["Unrecognized key(s) in object: 'colour'"],
		});
	});
});
