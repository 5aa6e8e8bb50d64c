import {
	layerFileName,
	layerFunctionName,
	layerModuleSpecifier,
} from "../../conventions/layers.js";
import { toKebabCase } from "../../conventions/naming.js";
import type {
	LayerKitConfig,
	ModuleParts,
	OperationName,
} from "../../types/index.js";

export interface ActionTemplateOptions {
	/** Route to revalidate after a successful call; defaults to "/<entity>". */
	revalidatePath?: string;
}

const ID_ARG = 'String(formData.get("id"))';
const INPUT_ARG = "Object.fromEntries(formData)";

function serviceArgs(op: OperationName): string[] {
	switch (op.kind) {
		case "create":
			return [INPUT_ARG];
		case "update":
			return [ID_ARG, INPUT_ARG];
		case "read-one":
		case "delete":
			return [ID_ARG];
		case "read-many":
		case "custom":
			return [];
	}
}

function formatCall(fn: string, args: string[]): string {
	if (args.length <= 1) return `${fn}(${args.join("")})`;
	return `${fn}(\n\t\t\t${args.join(",\n\t\t\t")},\n\t\t)`;
}

export function failureMessage(op: OperationName): string {
	return `${op.verb.charAt(0).toUpperCase()}${op.verb.slice(1)} failed`;
}

/**
 * Server Action module for one operation: parse the form, delegate to the
 * service, revalidate, and collapse any failure into `{ error }`.
 */
export function generateActionModule(
	op: OperationName,
	config: LayerKitConfig,
	options: ActionTemplateOptions = {},
): ModuleParts {
	const fn = layerFunctionName("action", op, config);
	const service = layerFunctionName("service", op, config);
	const args = serviceArgs(op);
	const route = options.revalidatePath ?? `/${toKebabCase(op.entityWords)}`;
	const params = args.length > 0 ? "formData: FormData" : "";

	const body = `/**
 * Server Action: ${op.words.join(" ")}.
 */
export async function ${fn}(${params}) {
	try {
		await ${formatCall(service, args)};
		revalidatePath(${JSON.stringify(route)});
		return { success: true };
	} catch (error) {
		console.error(${JSON.stringify(`${fn} failed`)}, error);
		return { error: ${JSON.stringify(failureMessage(op))} };
	}
}`;

	return {
		directives: ["use server"],
		imports: [
			{ from: "next/cache", named: ["revalidatePath"] },
			{
				from: layerModuleSpecifier(
					config,
					"service",
					layerFileName("service", op, config),
				),
				named: [service],
			},
		],
		body,
	};
}
