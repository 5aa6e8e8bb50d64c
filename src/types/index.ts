export type { LayerKitConfig, LayerSettings } from "../utils/config-schema.js";

export type LayerName = "action" | "service" | "data-access";

export type Orm = "drizzle" | "prisma";

export type Severity = "error" | "warn" | "off";

export type RuleId =
	| "file-kebab-case"
	| "export-naming"
	| "action-directive"
	| "action-export-matches-file"
	| "service-file-suffix"
	| "service-function-suffix"
	| "data-access-server-only"
	| "no-client-directive"
	| "layer-boundary"
	| "app-data-access";

export type OperationKind =
	| "read-one"
	| "read-many"
	| "create"
	| "update"
	| "delete"
	| "custom";

export interface OperationName {
	input: string; // as typed, e.g. "get user by id"
	words: string[]; // ["get", "user", "by", "id"]
	verb: string;
	entityWords: string[]; // ["user"]
	kind: OperationKind;
}

// Source analysis

export type ExportKind =
	| "function"
	| "const"
	| "class"
	| "type"
	| "interface"
	| "enum"
	| "binding";

export interface ImportRef {
	specifier: string;
	line: number;
	typeOnly: boolean;
}

export interface ExportRef {
	name: string;
	kind: ExportKind;
	line: number;
}

export interface SourceSummary {
	directives: string[];
	imports: ImportRef[];
	exports: ExportRef[];
}

// Check results

export interface Violation {
	ruleId: RuleId;
	severity: Exclude<Severity, "off">;
	file: string; // project-relative, POSIX separators
	line: number;
	message: string;
}

export interface CheckReport {
	root: string;
	filesChecked: number;
	violations: Violation[];
	errorCount: number;
	warningCount: number;
}

// Scaffolding

export interface ImportSpec {
	from: string;
	named?: string[];
	defaultName?: string;
	typeOnly?: boolean;
}

export interface ModuleParts {
	directives: string[];
	imports: ImportSpec[];
	body: string;
}

export type GeneratedFileStatus = "created" | "updated" | "overwritten";

export interface GeneratedFile {
	layer: LayerName;
	relativePath: string;
	functionName: string;
	status: GeneratedFileStatus;
	content: string;
}

export interface ScaffoldResult {
	written: string[];
	skipped: string[];
}
