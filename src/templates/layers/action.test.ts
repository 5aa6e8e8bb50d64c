import { describe, expect, it } from "vitest";
import { parseOperationName } from "../../conventions/naming.js";
import { DEFAULT_CONFIG } from "../../utils/config-schema.js";
import { renderModule } from "../module.js";
import { failureMessage, generateActionModule } from "./action.js";

describe("Server Action template", () => {
	it("should render an update action that returns { error } on failure", () => {
		const op = parseOperationName("update profile");

		expect(renderModule(generateActionModule(op, DEFAULT_CONFIG))).toBe(
			[
				'"use server";',
				"",
				'import { revalidatePath } from "next/cache";',
				'import { updateProfileLogic } from "@/services/profile-service";',
				"",
				"/**",
				" * Server Action: update profile.",
				" */",
				"export async function updateProfile(formData: FormData) {",
				"\ttry {",
				"\t\tawait updateProfileLogic(",
				'\t\t\tString(formData.get("id")),',
				"\t\t\tObject.fromEntries(formData),",
				"\t\t);",
				'\t\trevalidatePath("/profile");',
				"\t\treturn { success: true };",
				"\t} catch (error) {",
				'\t\tconsole.error("updateProfile failed", error);',
				'\t\treturn { error: "Update failed" };',
				"\t}",
				"}",
				"",
			].join("\n"),
		);
	});

	it("should pass the whole form to a create service", () => {
		const parts = generateActionModule(parseOperationName("create post"), DEFAULT_CONFIG);

		expect(parts.body).toContain("export async function createPost(formData: FormData) {");
		expect(parts.body).toContain("\t\tawait createPostLogic(Object.fromEntries(formData));");
		expect(parts.body).toContain('return { error: "Create failed" };');
		expect(parts.imports[1]).toEqual({
			from: "@/services/post-service",
			named: ["createPostLogic"],
		});
	});

	it("should pass only the id for a delete", () => {
		const parts = generateActionModule(parseOperationName("delete comment"), DEFAULT_CONFIG);

		expect(parts.body).toContain('\t\tawait deleteCommentLogic(String(formData.get("id")));');
	});

	it("should drop the form parameter when the service takes no arguments", () => {
		const parts = generateActionModule(parseOperationName("publish post"), DEFAULT_CONFIG);

		expect(parts.body).toContain("export async function publishPost() {");
		expect(parts.body).toContain("\t\tawait publishPostLogic();");
	});

	it("should revalidate a custom route", () => {
		const parts = generateActionModule(parseOperationName("create post"), DEFAULT_CONFIG, {
			revalidatePath: "/dashboard/posts",
		});

		expect(parts.body).toContain('revalidatePath("/dashboard/posts");');
	});

	it("should name the failure after the verb", () => {
		expect(failureMessage(parseOperationName("archive post"))).toBe("Archive failed");
	});
});
