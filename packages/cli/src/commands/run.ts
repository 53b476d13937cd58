import chalk from "chalk";
import { Value, createStdRegistry, unify, OutputStream } from "@pgscript/library";
import { compile, run } from "@pgscript/core";
import { loadProject, toVmOptions } from "../config";
import { reportError } from "../report";

export interface RunOptions {
    path: string;
    entry?: string;
    maxInstructions?: number;
    /** Destination of script output, stdout by default */
    out?: OutputStream;
}

/**
 * An int result becomes the exit code, clamped to 0-255.
 */
export function exitCodeFor(value: Value): number {
    if (value.type !== "int") return 0;
    if (value.value < 0n) return 0;
    if (value.value > 255n) return 255;
    return Number(value.value);
}

export async function runCommand(options: RunOptions): Promise<number> {
    const project = await loadProject(options.path);
    const natives = createStdRegistry(options.out);

    const compiled = compile(project.source, { natives });
    if (!compiled.ok) {
        await reportError(compiled.error, project.sourcePath, project.dir);
        return 1;
    }

    const vmOptions = toVmOptions(project.config.limits);
    if (options.maxInstructions !== undefined) {
        vmOptions.maxInstructions = options.maxInstructions;
    }

    const entry = options.entry ?? project.config.entry;
    const result = run(compiled.value, entry, natives, vmOptions);
    if (!result.ok) {
        await reportError(result.error, project.sourcePath, project.dir);
        return 1;
    }

    console.log(chalk.green(`\n${entry} returned ${unify(result.value)}`));
    return exitCodeFor(result.value);
}
