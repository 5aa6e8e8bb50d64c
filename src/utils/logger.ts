import kleur from "kleur";

let quiet = false;

/**
 * Silence everything except errors, e.g. while a command prints JSON to
 * stdout. Errors always go to stderr.
 */
export function setQuiet(value: boolean): void {
	quiet = value;
}

function emit(prefix: string, msg: string): void {
	if (quiet) return;
	console.log(prefix, msg);
}

export const log = {
	info: (msg: string) => emit(kleur.cyan("info"), msg),
	success: (msg: string) => emit(kleur.green("success"), msg),
	warn: (msg: string) => emit(kleur.yellow("warn"), msg),
	error: (msg: string) => console.error(kleur.red("error"), msg),
	step: (msg: string) => emit(kleur.blue("->"), msg),
	detail: (msg: string) => {
		if (!quiet) console.log(kleur.dim(`   ${msg}`));
	},
	blank: () => {
		if (!quiet) console.log();
	},
};
