/**
 * Minimal glob matching for project-relative POSIX paths.
 * Supports `**` (any depth), `*` (within a segment) and `?` (one character).
 */
export function matchesGlob(pattern: string, filePath: string): boolean {
	const regexStr = pattern
		.replace(/[.+^${}()|[\]\\]/g, "\\$&")
		.replace(/\*\*\//g, "{{GLOBSTAR_DIR}}")
		.replace(/\*\*/g, "{{GLOBSTAR}}")
		.replace(/\?/g, "[^/]")
		.replace(/\*/g, "[^/]*")
		.replace(/{{GLOBSTAR_DIR}}/g, "(?:.*/)?")
		.replace(/{{GLOBSTAR}}/g, ".*");
	return new RegExp(`^${regexStr}$`).test(filePath);
}

export function matchesAnyGlob(patterns: string[], filePath: string): boolean {
	return patterns.some((pattern) => matchesGlob(pattern, filePath));
}
