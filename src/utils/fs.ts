import path from "node:path";
import fs from "fs-extra";

const SKIPPED_DIRS = new Set(["node_modules", "dist", "build", "coverage"]);

export async function ensureDir(dirPath: string): Promise<void> {
	await fs.ensureDir(dirPath);
}

export async function writeFile(
	filePath: string,
	content: string,
): Promise<void> {
	await fs.ensureDir(path.dirname(filePath));
	await fs.writeFile(filePath, content, "utf-8");
}

export async function readText(filePath: string): Promise<string> {
	return await fs.readFile(filePath, "utf-8");
}

export async function fileExists(filePath: string): Promise<boolean> {
	return await fs.pathExists(filePath);
}

export async function isEmptyDir(dirPath: string): Promise<boolean> {
	if (!(await fs.pathExists(dirPath))) return true;
	const entries = await fs.readdir(dirPath);
	return entries.length === 0;
}

/**
 * Recursively list files under `dir`, returned relative to `root` with
 * POSIX separators. Dependency, build output and dot directories are skipped.
 */
export async function listFiles(root: string, dir: string): Promise<string[]> {
	const start = path.resolve(root, dir);
	if (!(await fs.pathExists(start))) return [];

	const files: string[] = [];
	const walk = async (current: string): Promise<void> => {
		const entries = await fs.readdir(current, { withFileTypes: true });
		for (const entry of entries) {
			const fullPath = path.join(current, entry.name);
			if (entry.isDirectory()) {
				if (entry.name.startsWith(".") || SKIPPED_DIRS.has(entry.name)) continue;
				await walk(fullPath);
			} else if (entry.isFile()) {
				files.push(path.relative(root, fullPath).split(path.sep).join("/"));
			}
		}
	};

	await walk(start);
	return files.sort();
}
