import path from "node:path";
import fs from "fs-extra";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
	type TempDirectory,
	createTempDirectory,
	createTempFile,
} from "../../__tests__/helpers/temp-directory.js";
import { parseOperationName } from "../conventions/naming.js";
import { renderModule } from "../templates/module.js";
import { DEFAULT_CONFIG } from "./config-schema.js";
import { isLayerKitError } from "./errors.js";
import {
	applyPlans,
	mergePackageJsonScripts,
	planLayerFile,
	scaffoldProject,
} from "./scaffold.js";

const op = (name: string) => parseOperationName(name);

describe("scaffold", () => {
	let tempDir: TempDirectory;
	let root: string;

	beforeEach(async () => {
		tempDir = await createTempDirectory();
		root = tempDir.path;
	});

	afterEach(async () => {
		await tempDir.cleanup();
	});

	const read = (relativePath: string) =>
		fs.readFile(path.join(root, relativePath), "utf-8");

	describe("planLayerFile", () => {
		it("should place each layer under its directory", () => {
			const operation = op("update profile");

			expect(planLayerFile("action", operation, DEFAULT_CONFIG)).toMatchObject({
				relativePath: "src/actions/update-profile.ts",
				functionName: "updateProfile",
			});
			expect(planLayerFile("service", operation, DEFAULT_CONFIG)).toMatchObject({
				relativePath: "src/services/profile-service.ts",
				functionName: "updateProfileLogic",
			});
			expect(planLayerFile("data-access", operation, DEFAULT_CONFIG)).toMatchObject({
				relativePath: "src/data-access/profile.ts",
				functionName: "updateProfile",
			});
		});
	});

	describe("applyPlans", () => {
		it("should create missing files", async () => {
			const plan = planLayerFile("data-access", op("get user by id"), DEFAULT_CONFIG);
			const [file] = await applyPlans(root, [plan]);

			expect(file.status).toBe("created");
			expect(await read("src/data-access/user.ts")).toBe(renderModule(plan.parts));
		});

		it("should append to an entity file and reuse its imports", async () => {
			await applyPlans(root, [
				planLayerFile("data-access", op("get user by id"), DEFAULT_CONFIG),
			]);
			const [file] = await applyPlans(root, [
				planLayerFile("data-access", op("delete user"), DEFAULT_CONFIG),
			]);
			const content = await read("src/data-access/user.ts");

			expect(file.status).toBe("updated");
			expect(content).toContain("export async function getUserById(id: string) {");
			expect(content).toContain("export async function deleteUser(id: string) {");
			expect(content.match(/import "server-only";/g)).toHaveLength(1);
			expect(content.match(/from "drizzle-orm"/g)).toHaveLength(1);
		});

		it("should refuse to add a function the file already exports", async () => {
			const plan = planLayerFile("data-access", op("get user by id"), DEFAULT_CONFIG);
			await applyPlans(root, [plan]);

			await expect(applyPlans(root, [plan])).rejects.toThrow(
				"src/data-access/user.ts already exports getUserById",
			);
		});

		it("should refuse to replace a Server Action without force", async () => {
			const plan = planLayerFile("action", op("update profile"), DEFAULT_CONFIG);
			await createTempFile(root, "src/actions/update-profile.ts", "// mine\n");

			const error = await applyPlans(root, [plan]).catch((e: unknown) => e);

			expect(isLayerKitError(error, "FILE_EXISTS")).toBe(true);
			expect(String(error)).toContain(
				"src/actions/update-profile.ts already exists (use --force to overwrite)",
			);
			expect(await read("src/actions/update-profile.ts")).toBe("// mine\n");
		});

		it("should overwrite a Server Action with force", async () => {
			const plan = planLayerFile("action", op("update profile"), DEFAULT_CONFIG);
			await createTempFile(root, "src/actions/update-profile.ts", "// mine\n");

			const [file] = await applyPlans(root, [plan], { force: true });

			expect(file.status).toBe("overwritten");
			expect(await read("src/actions/update-profile.ts")).toBe(renderModule(plan.parts));
		});

		it("should write nothing when one plan conflicts", async () => {
			await createTempFile(root, "src/actions/update-profile.ts", "// mine\n");
			const plans = (["data-access", "service", "action"] as const).map((layer) =>
				planLayerFile(layer, op("update profile"), DEFAULT_CONFIG),
			);

			await expect(applyPlans(root, plans)).rejects.toThrow("already exists");
			expect(await fs.pathExists(path.join(root, "src/data-access/profile.ts"))).toBe(false);
			expect(await fs.pathExists(path.join(root, "src/services/profile-service.ts"))).toBe(
				false,
			);
		});

		it("should not write on a dry run", async () => {
			const plan = planLayerFile("service", op("create post"), DEFAULT_CONFIG);
			const [file] = await applyPlans(root, [plan], { dryRun: true });

			expect(file.status).toBe("created");
			expect(file.content).toBe(renderModule(plan.parts));
			expect(await fs.pathExists(path.join(root, "src/services/post-service.ts"))).toBe(false);
		});
	});

	describe("scaffoldProject", () => {
		const options = () => ({
			projectPath: root,
			config: DEFAULT_CONFIG,
			skipExisting: true,
			writeConfig: true,
			includeAgentRule: true,
		});

		it("should write config, docs, agent rule and layer directories", async () => {
			const result = await scaffoldProject(options());

			expect(result).toEqual({
				written: [
					"layerkit.json",
					"docs/server-conventions.md",
					".claude/rules/server-layers.md",
					"src/actions/.gitkeep",
					"src/services/.gitkeep",
					"src/data-access/.gitkeep",
				],
				skipped: [],
			});
		});

		it("should keep existing files", async () => {
			await scaffoldProject(options());
			const result = await scaffoldProject(options());

			expect(result).toEqual({
				written: [],
				skipped: [
					"layerkit.json",
					"docs/server-conventions.md",
					".claude/rules/server-layers.md",
				],
			});
		});

		it("should not add .gitkeep to a layer directory that has files", async () => {
			await createTempFile(root, "src/services/post-service.ts", "export {};\n");

			const result = await scaffoldProject({
				...options(),
				writeConfig: false,
				includeAgentRule: false,
			});

			expect(result.written).toEqual([
				"docs/server-conventions.md",
				"src/actions/.gitkeep",
				"src/data-access/.gitkeep",
			]);
		});
	});

	describe("mergePackageJsonScripts", () => {
		it("should do nothing without a package.json", async () => {
			expect(await mergePackageJsonScripts(path.join(root, "package.json"))).toBe(false);
		});

		it("should add missing scripts and keep existing ones", async () => {
			const pkgPath = await createTempFile(
				root,
				"package.json",
				JSON.stringify({ name: "app", scripts: { "lint:layers": "custom" } }),
			);

			expect(await mergePackageJsonScripts(pkgPath)).toBe(true);
			expect((await fs.readJson(pkgPath)).scripts).toEqual({
				"lint:layers": "custom",
				"docs:layers": "layerkit docs --write",
			});
			expect(await mergePackageJsonScripts(pkgPath)).toBe(false);
		});
	});
});
