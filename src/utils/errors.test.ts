import { describe, expect, it } from "vitest";
import { LayerKitError, errorMessage, isLayerKitError } from "./errors.js";

describe("errors", () => {
	it("should carry a code and details", () => {
		const error = new LayerKitError("FILE_EXISTS", "exists", { path: "a.ts" });

		expect(error).toBeInstanceOf(Error);
		expect(error.name).toBe("LayerKitError");
		expect(error.code).toBe("FILE_EXISTS");
		expect(error.details).toEqual({ path: "a.ts" });
	});

	it("should narrow by code", () => {
		const error = new LayerKitError("INVALID_NAME", "bad");

		expect(isLayerKitError(error)).toBe(true);
		expect(isLayerKitError(error, "INVALID_NAME")).toBe(true);
		expect(isLayerKitError(error, "FILE_EXISTS")).toBe(false);
		expect(isLayerKitError(new Error("bad"))).toBe(false);
	});

	it("should describe unknown values", () => {
		expect(errorMessage(new Error("boom"))).toBe("boom");
		expect(errorMessage("plain")).toBe("plain");
	});
});
