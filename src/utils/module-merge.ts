import { renderImport } from "../templates/module.js";
import type { ImportSpec, ModuleParts } from "../types/index.js";

const escapeRegExp = (value: string) =>
	value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

function namedImportPattern(spec: ImportSpec): RegExp {
	const type = spec.typeOnly ? "type\\s+" : "";
	return new RegExp(
		`^import\\s+${type}(?:([A-Za-z_$][\\w$]*)\\s*,\\s*)?\\{([^}]*)\\}\\s*from\\s*["']${escapeRegExp(spec.from)}["'];?\\s*$`,
	);
}

function hasSideEffectImport(lines: string[], from: string): boolean {
	const pattern = new RegExp(`^import\\s+["']${escapeRegExp(from)}["'];?\\s*$`);
	return lines.some((line) => pattern.test(line.trim()));
}

function hasDefaultImport(lines: string[], spec: ImportSpec): boolean {
	const pattern = new RegExp(
		`^import\\s+${escapeRegExp(spec.defaultName ?? "")}\\s*(?:,|from\\s*["']${escapeRegExp(spec.from)}["'])`,
	);
	return lines.some((line) => pattern.test(line.trim()));
}

/** Index after which new import lines go; -1 means the top of the file. */
function importInsertionIndex(lines: string[]): number {
	let last = -1;
	for (let i = 0; i < lines.length; i++) {
		if (/^import\b/.test(lines[i].trim())) last = i;
	}

	if (last === -1) {
		// Keep directives such as "use server" first
		let index = -1;
		for (let i = 0; i < lines.length; i++) {
			const line = lines[i].trim();
			if (line === "") continue;
			if (!/^(["'])use [a-z]+\1;?\s*(?:\/\/.*)?$/.test(line)) break;
			index = i;
		}
		return index;
	}

	// Step past the closing line of a multi-line import
	let end = last;
	while (end < lines.length - 1 && !/["'];?\s*$/.test(lines[end])) end++;
	return end;
}

/**
 * Add a generated function to an existing module: missing imports are
 * merged in (named imports from the same module are combined) and the
 * body is appended at the end.
 */
export function mergeModule(existing: string, parts: ModuleParts): string {
	const lines = existing.replace(/\s+$/, "").split("\n");
	const additions: string[] = [];

	for (const spec of parts.imports) {
		const named = spec.named ?? [];

		if (!spec.defaultName && named.length === 0) {
			if (!hasSideEffectImport(lines, spec.from)) additions.push(renderImport(spec));
			continue;
		}

		if (spec.defaultName && !hasDefaultImport(lines, spec)) {
			additions.push(renderImport({ ...spec, named: [] }));
		}
		if (named.length === 0) continue;

		const pattern = namedImportPattern(spec);
		const index = lines.findIndex((line) => pattern.test(line.trim()));
		if (index === -1) {
			additions.push(renderImport({ ...spec, defaultName: undefined }));
			continue;
		}

		const match = lines[index].trim().match(pattern);
		const present = (match?.[2] ?? "")
			.split(",")
			.map((name) => name.trim())
			.filter(Boolean);
		const missing = named.filter((name) => !present.includes(name));
		if (missing.length > 0) {
			lines[index] = renderImport({
				from: spec.from,
				defaultName: match?.[1],
				named: [...present, ...missing],
				typeOnly: spec.typeOnly,
			});
		}
	}

	if (additions.length > 0) {
		const at = importInsertionIndex(lines);
		const hasImports = lines.some((line) => /^import\b/.test(line.trim()));
		const block = hasImports ? additions : at === -1 ? [...additions, ""] : ["", ...additions];
		lines.splice(at + 1, 0, ...block);
	}

	return `${lines.join("\n")}\n\n${parts.body.trim()}\n`;
}
