import chalk from "chalk";
import { createStdRegistry } from "@pgscript/library";
import { compile, disassemble } from "@pgscript/core";
import { loadProject } from "../config";
import { reportError } from "../report";

export async function checkCommand(path: string): Promise<number> {
    const project = await loadProject(path);
    const compiled = compile(project.source, { natives: createStdRegistry() });
    if (!compiled.ok) {
        await reportError(compiled.error, project.sourcePath, project.dir);
        return 1;
    }
    console.log(
        chalk.green(`${project.sourcePath}: ${compiled.value.chunks.size} function(s), no errors`),
    );
    return 0;
}

export async function disasmCommand(path: string): Promise<number> {
    const project = await loadProject(path);
    const compiled = compile(project.source, { natives: createStdRegistry() });
    if (!compiled.ok) {
        await reportError(compiled.error, project.sourcePath, project.dir);
        return 1;
    }
    console.log(disassemble(compiled.value));
    return 0;
}
