import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { checkProject } from "../../src/analysis/checker.js";
import { runGenerate } from "../../src/commands/generate.js";
import { runInit } from "../../src/commands/init.js";
import type { Orm } from "../../src/types/index.js";
import { LayerKitConfigSchema } from "../../src/utils/config-schema.js";
import {
	type TempDirectory,
	createTempDirectory,
	createTempProject,
} from "../helpers/temp-directory.js";

const OPERATIONS = [
	"update profile",
	"create post",
	"delete post",
	"get user by id",
	"list posts for author",
	"publish post",
];

describe("generated code passes the checker", () => {
	let tempDir: TempDirectory;

	beforeEach(async () => {
		tempDir = await createTempDirectory("layerkit-integration-");
	});

	afterEach(async () => {
		await tempDir.cleanup();
	});

	it.each<Orm>(["drizzle", "prisma"])(
		"should generate conventional %s flows",
		async (orm) => {
			const root = tempDir.path;
			const { config } = await runInit({
				root,
				orm,
				includeAgentRule: false,
				force: false,
			});

			for (const name of OPERATIONS) {
				await runGenerate({ root, config, target: "flow", name });
			}

			const report = await checkProject({ root, config });

			expect(report.violations).toEqual([]);
			// one action per operation, plus a service and a data access file for each of profile, post and user
			expect(report.filesChecked).toBe(OPERATIONS.length + 2 * 3);
		},
	);

	it("should keep a flat layout with custom suffixes clean", async () => {
		const root = tempDir.path;
		const config = LayerKitConfigSchema.parse({
			srcDir: ".",
			layers: { service: { fileSuffix: "-logic", functionSuffix: "Service" } },
		});

		for (const name of OPERATIONS) {
			await runGenerate({ root, config, target: "flow", name });
		}

		const report = await checkProject({ root, config });
		expect(report.violations).toEqual([]);
	});

	it("should flag hand-written code that skips a layer", async () => {
		const root = tempDir.path;
		const config = LayerKitConfigSchema.parse({});
		await runGenerate({ root, config, target: "flow", name: "update profile" });
		await createTempProject(root, {
			"src/actions/rename-profile.ts": [
				'"use server";',
				"",
				'import { updateProfile } from "@/data-access/profile";',
				"",
				"export async function renameProfile(formData: FormData) {",
				'\tawait updateProfile(String(formData.get("id")), Object.fromEntries(formData));',
				"}",
			].join("\n"),
			"src/app/profile/page.tsx": [
				'import { getProfile } from "../../data-access/profile";',
				"",
				"export default async function Page() {",
				'\treturn getProfile("1");',
				"}",
			].join("\n"),
		});

		const report = await checkProject({ root, config });

		expect(report.violations.map((v) => [v.file, v.line, v.ruleId, v.severity])).toEqual([
			["src/actions/rename-profile.ts", 3, "layer-boundary", "error"],
			["src/app/profile/page.tsx", 1, "app-data-access", "warn"],
		]);
		expect(report.errorCount).toBe(1);
		expect(report.warningCount).toBe(1);
	});
});
