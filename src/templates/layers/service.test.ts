import { describe, expect, it } from "vitest";
import { parseOperationName } from "../../conventions/naming.js";
import { DEFAULT_CONFIG, LayerKitConfigSchema } from "../../utils/config-schema.js";
import { renderModule } from "../module.js";
import { generateServiceModule } from "./service.js";

describe("service template", () => {
	it("should validate input with zod before an update", () => {
		const op = parseOperationName("update profile");

		expect(renderModule(generateServiceModule(op, DEFAULT_CONFIG))).toBe(
			[
				'import { z } from "zod";',
				'import { updateProfile } from "@/data-access/profile";',
				"",
				"export const updateProfileSchema = z.object({",
				"\t// Declare the accepted fields here",
				"}).partial();",
				"",
				"/**",
				" * Validate the changes, then persist them through the data access layer.",
				" */",
				"export async function updateProfileLogic(id: string, input: unknown) {",
				"\tconst data = updateProfileSchema.parse(input);",
				"\treturn updateProfile(id, data);",
				"}",
				"",
			].join("\n"),
		);
	});

	it("should throw when a single record is missing", () => {
		const parts = generateServiceModule(parseOperationName("get user by id"), DEFAULT_CONFIG);

		expect(parts.imports).toEqual([{ from: "@/data-access/user", named: ["getUserById"] }]);
		expect(parts.body).toContain("export async function getUserByIdLogic(id: string) {");
		expect(parts.body).toContain('throw new Error("User not found");');
	});

	it("should use the full schema for a create", () => {
		const parts = generateServiceModule(parseOperationName("create post"), DEFAULT_CONFIG);

		expect(parts.body).toContain("export const createPostSchema = z.object({");
		expect(parts.body).not.toContain(".partial()");
		expect(parts.body).toContain("\treturn createPost(data);");
	});

	it("should follow configured suffixes and aliases", () => {
		const config = LayerKitConfigSchema.parse({
			importAlias: "~/",
			layers: { service: { functionSuffix: "Service" } },
		});
		const parts = generateServiceModule(parseOperationName("delete comment"), config);

		expect(parts.imports).toEqual([{ from: "~/data-access/comment", named: ["deleteComment"] }]);
		expect(parts.body).toBe(
			"export async function deleteCommentService(id: string) {\n\tawait deleteComment(id);\n}",
		);
	});
});
