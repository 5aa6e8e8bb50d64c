import path from "node:path";
import type {
	LayerKitConfig,
	LayerName,
	OperationName,
} from "../types/index.js";
import { singularEntity, toCamelCase, toKebabCase } from "./naming.js";

export const LAYER_NAMES: readonly LayerName[] = [
	"action",
	"service",
	"data-access",
];

export const LAYER_TITLES: Record<LayerName, string> = {
	action: "Server Actions",
	service: "Services",
	"data-access": "Data Access",
};

/**
 * Which layers each layer may import from. The call chain only runs one
 * way: Action → Service → Data Access.
 */
export const ALLOWED_IMPORTS: Record<LayerName, readonly LayerName[]> = {
	action: ["service"],
	service: ["service", "data-access"],
	"data-access": ["data-access"],
};

const toPosix = (value: string) => value.split(path.sep).join(path.posix.sep);

function normalizeDir(value: string): string {
	const normalized = path.posix.normalize(toPosix(value)).replace(/\/+$/, "");
	return normalized === "." ? "" : normalized;
}

function joinDir(...parts: string[]): string {
	return normalizeDir(path.posix.join(...parts.map((part) => part || ".")));
}

function isWithin(relPath: string, dir: string): boolean {
	if (dir === "") return true;
	return relPath === dir || relPath.startsWith(`${dir}/`);
}

export function layerFunctionName(
	layer: LayerName,
	op: OperationName,
	config: LayerKitConfig,
): string {
	return `${toCamelCase(op.words)}${config.layers[layer].functionSuffix}`;
}

export function layerFileName(
	layer: LayerName,
	op: OperationName,
	config: LayerKitConfig,
): string {
	if (layer === "action") {
		return `${toKebabCase(op.words)}.ts`;
	}
	// "list posts" and "create post" share post-service.ts
	return `${toKebabCase(singularEntity(op.entityWords))}${config.layers[layer].fileSuffix}.ts`;
}

/** Project-relative POSIX directory of a layer, e.g. "src/actions". */
export function layerDirectory(config: LayerKitConfig, layer: LayerName): string {
	return joinDir(config.srcDir, config.layers[layer].directory);
}

export function appDirectory(config: LayerKitConfig): string {
	return joinDir(config.srcDir, config.appDir);
}

/** Import specifier other modules use for a layer file, e.g. "@/services/post-service". */
export function layerModuleSpecifier(
	config: LayerKitConfig,
	layer: LayerName,
	fileName: string,
): string {
	const dir = normalizeDir(config.layers[layer].directory);
	const base = fileName.replace(/\.tsx?$/, "");
	return `${config.importAlias}${dir ? `${dir}/` : ""}${base}`;
}

export function layerForPath(
	config: LayerKitConfig,
	relPath: string,
): LayerName | undefined {
	const normalized = normalizeDir(relPath);
	// Longest directory first so nested layer directories resolve correctly
	const candidates = [...LAYER_NAMES].sort(
		(a, b) => layerDirectory(config, b).length - layerDirectory(config, a).length,
	);
	return candidates.find((layer) =>
		isWithin(normalized, layerDirectory(config, layer)),
	);
}

export function isAppPath(config: LayerKitConfig, relPath: string): boolean {
	return isWithin(normalizeDir(relPath), appDirectory(config));
}

/**
 * Resolve an import specifier written in `fromFile` to a project-relative
 * path. Bare package imports resolve to undefined.
 */
export function resolveImportPath(
	config: LayerKitConfig,
	fromFile: string,
	specifier: string,
): string | undefined {
	if (config.importAlias && specifier.startsWith(config.importAlias)) {
		return joinDir(config.srcDir, specifier.slice(config.importAlias.length));
	}
	if (specifier.startsWith("./") || specifier.startsWith("../")) {
		return joinDir(path.posix.dirname(toPosix(fromFile)), specifier);
	}
	return undefined;
}

export function layerForImport(
	config: LayerKitConfig,
	fromFile: string,
	specifier: string,
): LayerName | undefined {
	const resolved = resolveImportPath(config, fromFile, specifier);
	return resolved === undefined ? undefined : layerForPath(config, resolved);
}
