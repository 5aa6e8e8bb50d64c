#!/usr/bin/env node
import { Command } from "commander";
import { checkCommand } from "./commands/check.js";
import { docsCommand } from "./commands/docs.js";
import { generateCommand } from "./commands/generate.js";
import { initCommand } from "./commands/init.js";
import { rulesCommand } from "./commands/rules.js";

const program = new Command()
	.name("layerkit")
	.description(
		"Scaffold and check the Server Action → Service → Data Access layout of a Next.js app",
	)
	.version("0.1.0");

program.addCommand(initCommand);
program.addCommand(generateCommand);
program.addCommand(checkCommand);
program.addCommand(docsCommand);
program.addCommand(rulesCommand);

if (process.argv.length === 2) {
	program.help();
}

await program.parseAsync();
