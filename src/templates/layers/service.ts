import {
	layerFileName,
	layerFunctionName,
	layerModuleSpecifier,
} from "../../conventions/layers.js";
import { toCamelCase } from "../../conventions/naming.js";
import type {
	ImportSpec,
	LayerKitConfig,
	ModuleParts,
	OperationName,
} from "../../types/index.js";

function capitalize(text: string): string {
	return text.charAt(0).toUpperCase() + text.slice(1);
}

function schemaBlock(name: string, partial: boolean): string {
	return `export const ${name} = z.object({
	// Declare the accepted fields here
})${partial ? ".partial()" : ""};`;
}

function serviceBody(
	fn: string,
	dal: string,
	op: OperationName,
): { body: string; usesZod: boolean } {
	const schema = `${toCamelCase(op.words)}Schema`;

	switch (op.kind) {
		case "read-one":
			return {
				usesZod: false,
				body: `export async function ${fn}(id: string) {
	const record = await ${dal}(id);
	if (!record) {
		throw new Error("${capitalize(op.entityWords.join(" "))} not found");
	}
	return record;
}`,
			};
		case "read-many":
			return {
				usesZod: false,
				body: `export async function ${fn}() {
	return ${dal}();
}`,
			};
		case "create":
			return {
				usesZod: true,
				body: `${schemaBlock(schema, false)}

/**
 * Validate the input, then persist it through the data access layer.
 */
export async function ${fn}(input: unknown) {
	const data = ${schema}.parse(input);
	return ${dal}(data);
}`,
			};
		case "update":
			return {
				usesZod: true,
				body: `${schemaBlock(schema, true)}

/**
 * Validate the changes, then persist them through the data access layer.
 */
export async function ${fn}(id: string, input: unknown) {
	const data = ${schema}.parse(input);
	return ${dal}(id, data);
}`,
			};
		case "delete":
			return {
				usesZod: false,
				body: `export async function ${fn}(id: string) {
	await ${dal}(id);
}`,
			};
		case "custom":
			return {
				usesZod: false,
				body: `export async function ${fn}() {
	return ${dal}();
}`,
			};
	}
}

/**
 * Service module for one operation. It owns validation and business
 * rules and calls exactly one data access function.
 */
export function generateServiceModule(
	op: OperationName,
	config: LayerKitConfig,
): ModuleParts {
	const fn = layerFunctionName("service", op, config);
	const dal = layerFunctionName("data-access", op, config);
	const { body, usesZod } = serviceBody(fn, dal, op);

	const imports: ImportSpec[] = [];
	if (usesZod) imports.push({ from: "zod", named: ["z"] });
	imports.push({
		from: layerModuleSpecifier(
			config,
			"data-access",
			layerFileName("data-access", op, config),
		),
		named: [dal],
	});

	return { directives: [], imports, body };
}
