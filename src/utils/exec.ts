import { type Options, execa } from "execa";

export async function execCommand(
	command: string,
	args: string[],
	options?: Options,
): Promise<{ stdout: string; stderr: string }> {
	const result = await execa(command, args, {
		stdio: "pipe",
		...options,
	});
	return {
		stdout: typeof result.stdout === "string" ? result.stdout : "",
		stderr: typeof result.stderr === "string" ? result.stderr : "",
	};
}

function splitLines(output: string): string[] {
	return output
		.split("\n")
		.map((line) => line.trim())
		.filter(Boolean);
}

/**
 * Files changed against `base` plus untracked files, relative to `cwd`.
 */
export async function listChangedFiles(
	cwd: string,
	base = "HEAD",
): Promise<string[]> {
	const diff = await execCommand(
		"git",
		["diff", "--name-only", "--relative", base],
		{ cwd },
	);
	const untracked = await execCommand(
		"git",
		["ls-files", "--others", "--exclude-standard"],
		{ cwd },
	);
	return [...new Set([...splitLines(diff.stdout), ...splitLines(untracked.stdout)])].sort();
}
