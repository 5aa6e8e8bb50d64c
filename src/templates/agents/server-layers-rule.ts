import yaml from "yaml";
import { layerDirectory } from "../../conventions/layers.js";
import type { LayerKitConfig } from "../../types/index.js";

/**
 * Rule file for coding agents (`.claude/rules/server-layers.md`). The front
 * matter scopes it to the three layer directories.
 */
export function generateServerLayersRule(config: LayerKitConfig): string {
	const actions = layerDirectory(config, "action");
	const services = layerDirectory(config, "service");
	const dataAccess = layerDirectory(config, "data-access");
	const { service } = config.layers;

	const frontMatter = yaml.stringify({
		description: "Server code layering: Server Action → Service → Data Access",
		globs: [`${actions}/**`, `${services}/**`, `${dataAccess}/**`],
	});

	return `---
${frontMatter}---

## Layers

- \`${actions}/\`: Server Actions. Start every file with \`"use server"\`. One action per file, calling one service function.
- \`${services}/\`: business logic. Validate input here; call data access for persistence.
- \`${dataAccess}/\`: database queries only. Every file imports \`"server-only"\`.
- Imports flow down the chain only. Never import data access from an action.

## Naming

- Files are kebab-case: \`create-post.ts\`${service.fileSuffix ? `, \`post${service.fileSuffix}.ts\`` : ""}.
- Exported functions are camelCase and start with a verb${service.functionSuffix ? `; service functions end with \`${service.functionSuffix}\`` : ""}.
- Types and components are PascalCase.

## Workflow

- Scaffold new operations with \`npx layerkit generate flow "<verb> <entity>"\`.
- Run \`npx layerkit check\` before committing and fix every error it reports.
- The full guide lives in \`${config.docsPath}\`.
`;
}
