import type { LayerKitConfig } from "../../types/index.js";

export function generateLayerKitJson(config: LayerKitConfig): string {
	return `${JSON.stringify(config, null, "\t")}\n`;
}
