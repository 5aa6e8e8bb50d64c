import kleur from "kleur";
import type { CheckReport, Violation } from "../types/index.js";

const plural = (count: number, word: string) =>
	`${count} ${word}${count === 1 ? "" : "s"}`;

function formatViolation(violation: Violation): string {
	const severity =
		violation.severity === "error"
			? kleur.red("error")
			: kleur.yellow("warn ");
	return `  ${String(violation.line).padStart(4)}  ${severity}  ${violation.message}  ${kleur.dim(violation.ruleId)}`;
}

/**
 * Render a report as lines grouped by file, followed by a one-line summary.
 */
export function formatTextReport(report: CheckReport): string[] {
	if (report.violations.length === 0) {
		return [
			kleur.green(
				`No convention problems in ${plural(report.filesChecked, "file")}`,
			),
		];
	}

	const lines: string[] = [];
	let currentFile: string | undefined;

	for (const violation of report.violations) {
		if (violation.file !== currentFile) {
			if (currentFile !== undefined) lines.push("");
			lines.push(kleur.underline(violation.file));
			currentFile = violation.file;
		}
		lines.push(formatViolation(violation));
	}

	const summary = `${plural(report.violations.length, "problem")} (${plural(report.errorCount, "error")}, ${plural(report.warningCount, "warning")})`;
	lines.push("");
	lines.push(report.errorCount > 0 ? kleur.red(summary) : kleur.yellow(summary));
	return lines;
}

export function formatJsonReport(report: CheckReport): string {
	return JSON.stringify(report, null, 2);
}
