export type LayerKitErrorCode =
	| "CONFIG_INVALID"
	| "INVALID_NAME"
	| "FILE_EXISTS"
	| "EXPORT_EXISTS"
	| "NOT_A_PROJECT";

export class LayerKitError extends Error {
	readonly code: LayerKitErrorCode;
	readonly details?: Record<string, unknown>;

	constructor(
		code: LayerKitErrorCode,
		message: string,
		details?: Record<string, unknown>,
	) {
		super(message);
		this.name = "LayerKitError";
		this.code = code;
		if (details && typeof details === "object" && !Array.isArray(details)) {
			this.details = details;
		}
	}
}

export function isLayerKitError(
	error: unknown,
	code?: LayerKitErrorCode,
): error is LayerKitError {
	return (
		error instanceof LayerKitError && (code === undefined || error.code === code)
	);
}

export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}
