import type {
	ExportKind,
	ExportRef,
	ImportRef,
	SourceSummary,
} from "../types/index.js";

const DIRECTIVE = /^(["'])(use [a-z]+)\1;?\s*(?:\/\/.*)?$/;

// Clause has no quotes or semicolons, so a side-effect import never swallows the next statement
const STATIC_IMPORT =
	/^[ \t]*import\s+(type\s+)?(?:([^;"'`]*?)\s*from\s*)?["']([^"']+)["']/gm;
const EXPORT_FROM =
	/^[ \t]*export\s+(type\s+)?(?:\*(?:\s+as\s+\w+)?|\{[^}]*\})\s*from\s*["']([^"']+)["']/gm;
const DYNAMIC_IMPORT = /\bimport\(\s*["']([^"']+)["']\s*\)/g;

const EXPORT_FUNCTION =
	/^[ \t]*export\s+(?:default\s+)?(?:async\s+)?function\s*\*?\s*([A-Za-z_$][\w$]*)/gm;
const EXPORT_VARIABLE =
	/^[ \t]*export\s+(?:const|let|var)\s+([A-Za-z_$][\w$]*)\s*(?::[^=]+)?=/gm;
const EXPORT_CLASS =
	/^[ \t]*export\s+(?:default\s+)?(?:abstract\s+)?class\s+([A-Za-z_$][\w$]*)/gm;
const EXPORT_DECLARATION =
	/^[ \t]*export\s+(?:declare\s+)?(?:const\s+)?(type|interface|enum)\s+([A-Za-z_$][\w$]*)/gm;
const EXPORT_LIST = /^[ \t]*export\s+(?:type\s+)?\{([^}]*)\}\s*(?!\s*from)(?:;|$)/gm;

const NAMED_FUNCTION_INITIALIZER = /^(?:function\b|[A-Za-z_$][\w$]*\s*=>)/;
const ARROW_AFTER_PARAMS = /^\s*(?::[^;]*?)?=>/;

/**
 * Blank out comments while keeping every newline, so match offsets still map
 * to the original line numbers. String and template literals are copied
 * through, so a `/*` or `//` inside quotes is left alone.
 */
export function stripComments(source: string): string {
	let output = "";
	let quote: string | undefined;
	let i = 0;

	while (i < source.length) {
		const char = source[i];
		const next = source[i + 1];

		if (quote) {
			output += char;
			if (char === "\\" && next !== undefined) {
				output += next;
				i += 2;
				continue;
			}
			// Plain strings cannot span lines; an unterminated one ends here
			if (char === quote || (char === "\n" && quote !== "`")) quote = undefined;
			i++;
			continue;
		}

		if (char === "/" && next === "/") {
			const end = source.indexOf("\n", i);
			const stop = end === -1 ? source.length : end;
			output += " ".repeat(stop - i);
			i = stop;
			continue;
		}

		if (char === "/" && next === "*") {
			const end = source.indexOf("*/", i + 2);
			const stop = end === -1 ? source.length : end + 2;
			output += source.slice(i, stop).replace(/[^\n]/g, " ");
			i = stop;
			continue;
		}

		if (char === '"' || char === "'" || char === "`") quote = char;
		output += char;
		i++;
	}

	return output;
}

/**
 * Whether the text after `=` starts a function: a function expression, or an
 * arrow whose parameter list may wrap over several lines.
 */
export function isFunctionInitializer(initializer: string): boolean {
	const head = initializer
		.trimStart()
		.replace(/^async\s+/, "")
		.replace(/^<[^>]*>\s*/, "");
	if (NAMED_FUNCTION_INITIALIZER.test(head)) return true;
	if (!head.startsWith("(")) return false;

	let depth = 0;
	for (let i = 0; i < head.length; i++) {
		if (head[i] === "(") {
			depth++;
		} else if (head[i] === ")") {
			depth--;
			if (depth === 0) return ARROW_AFTER_PARAMS.test(head.slice(i + 1));
		}
	}
	return false;
}

function lineAt(source: string, index: number): number {
	let line = 1;
	for (let i = 0; i < index; i++) {
		if (source.charCodeAt(i) === 10) line++;
	}
	return line;
}

function readDirectives(source: string): string[] {
	const directives: string[] = [];
	for (const raw of source.split("\n")) {
		const line = raw.trim();
		if (line === "") continue;
		const match = line.match(DIRECTIVE);
		if (!match) break;
		directives.push(match[2]);
	}
	return directives;
}

function readImports(source: string): ImportRef[] {
	const imports: ImportRef[] = [];

	for (const match of source.matchAll(STATIC_IMPORT)) {
		imports.push({
			specifier: match[3],
			line: lineAt(source, match.index ?? 0),
			typeOnly: Boolean(match[1]),
		});
	}

	for (const match of source.matchAll(EXPORT_FROM)) {
		imports.push({
			specifier: match[2],
			line: lineAt(source, match.index ?? 0),
			typeOnly: Boolean(match[1]),
		});
	}

	for (const match of source.matchAll(DYNAMIC_IMPORT)) {
		imports.push({
			specifier: match[1],
			line: lineAt(source, match.index ?? 0),
			typeOnly: false,
		});
	}

	return imports.sort((a, b) => a.line - b.line);
}

function readExports(source: string): ExportRef[] {
	const exports: ExportRef[] = [];
	const push = (name: string, kind: ExportKind, index: number | undefined) =>
		exports.push({ name, kind, line: lineAt(source, index ?? 0) });

	for (const match of source.matchAll(EXPORT_FUNCTION)) {
		push(match[1], "function", match.index);
	}

	for (const match of source.matchAll(EXPORT_VARIABLE)) {
		const start = (match.index ?? 0) + match[0].length;
		push(
			match[1],
			isFunctionInitializer(source.slice(start)) ? "function" : "const",
			match.index,
		);
	}

	for (const match of source.matchAll(EXPORT_CLASS)) {
		push(match[1], "class", match.index);
	}

	for (const match of source.matchAll(EXPORT_DECLARATION)) {
		const keyword = match[1];
		const kind: ExportKind =
			keyword === "interface" ? "interface" : keyword === "enum" ? "enum" : "type";
		push(match[2], kind, match.index);
	}

	for (const match of source.matchAll(EXPORT_LIST)) {
		for (const entry of match[1].split(",")) {
			// "local as exported" exports the right-hand name
			const parts = entry.trim().replace(/^type\s+/, "").split(/\s+as\s+/);
			const name = parts[parts.length - 1]?.trim();
			if (name && name !== "default") {
				push(name, "binding", match.index);
			}
		}
	}

	return exports.sort((a, b) => a.line - b.line);
}

/** Summarise the directives, imports and exports of a TypeScript module. */
export function scanSource(source: string): SourceSummary {
	const stripped = stripComments(source);
	return {
		directives: readDirectives(stripped),
		imports: readImports(stripped),
		exports: readExports(stripped),
	};
}
