#!/usr/bin/env node
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import chalk from "chalk";
import { runCommand } from "./commands/run";
import { checkCommand, disasmCommand } from "./commands/check";
import { initCommand } from "./commands/init";

function finish(task: Promise<number>) {
    task.then(
        (code) => {
            process.exitCode = code;
        },
        (e: unknown) => {
            console.error(chalk.red("Error:"), e instanceof Error ? e.message : String(e));
            process.exitCode = 1;
        },
    );
}

yargs(hideBin(process.argv))
    .scriptName("pgs")
    .usage("$0 <cmd> [args]")
    .command(
        "run <path>",
        "Run a .pgs file or a project directory",
        (yargs) =>
            yargs
                .positional("path", {
                    describe: "Script file, or directory holding pgs.yml",
                    type: "string",
                    demandOption: true,
                })
                .option("entry", {
                    describe: "Function to call",
                    type: "string",
                })
                .option("max-instructions", {
                    describe: "Abort after this many instructions",
                    type: "number",
                }),
        (argv) =>
            finish(
                runCommand({
                    path: argv.path,
                    entry: argv.entry,
                    maxInstructions: argv.maxInstructions,
                }),
            ),
    )
    .command(
        "check <path>",
        "Compile without running and report diagnostics",
        (yargs) =>
            yargs.positional("path", { type: "string", demandOption: true }),
        (argv) => finish(checkCommand(argv.path)),
    )
    .command(
        "disasm <path>",
        "Print the compiled bytecode",
        (yargs) =>
            yargs.positional("path", { type: "string", demandOption: true }),
        (argv) => finish(disasmCommand(argv.path)),
    )
    .command(
        "init <name>",
        "Create a new pgscript project",
        (yargs) =>
            yargs.positional("name", {
                describe: "Name of the new project directory",
                type: "string",
                demandOption: true,
            }),
        (argv) => finish(initCommand(argv.name)),
    )
    .demandCommand(1)
    .strict()
    .help()
    .parse();
