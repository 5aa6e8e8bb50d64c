import type { ImportSpec, ModuleParts } from "../types/index.js";

export function renderImport(spec: ImportSpec): string {
	const named = spec.named ?? [];
	if (!spec.defaultName && named.length === 0) {
		return `import "${spec.from}";`;
	}

	const clauses: string[] = [];
	if (spec.defaultName) clauses.push(spec.defaultName);
	if (named.length > 0) clauses.push(`{ ${named.join(", ")} }`);

	return `import ${spec.typeOnly ? "type " : ""}${clauses.join(", ")} from "${spec.from}";`;
}

/** Render directives, imports and body as a complete module. */
export function renderModule(parts: ModuleParts): string {
	const sections: string[] = [];

	if (parts.directives.length > 0) {
		sections.push(parts.directives.map((d) => `"${d}";`).join("\n"));
	}
	if (parts.imports.length > 0) {
		sections.push(parts.imports.map(renderImport).join("\n"));
	}
	sections.push(parts.body.trim());

	return `${sections.join("\n\n")}\n`;
}
