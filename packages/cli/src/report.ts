import fs from "node:fs/promises";
import nodePath from "node:path";
import chalk from "chalk";
import { PgsError } from "@pgscript/core";

const ANSI_PATTERN = /\x1B\[[0-9;]*[a-zA-Z]/g;

export function stripAnsi(text: string): string {
    return text.replace(ANSI_PATTERN, "");
}

/**
 * Print a pipeline error; for projects, also keep a plain copy in
 * `.pgs/logs/latest.txt`.
 */
export async function reportError(
    error: PgsError,
    sourcePath: string,
    projectDir?: string,
) {
    console.error(error.message);
    console.error(chalk.red(`\n${error.name} in ${sourcePath}`));

    if (!projectDir) return;

    const log = `Date: ${new Date().toISOString()}\nFile: ${sourcePath}\n${stripAnsi(error.message)}\n`;
    const logDir = nodePath.join(projectDir, ".pgs", "logs");
    await fs.mkdir(logDir, { recursive: true });
    await fs.writeFile(nodePath.join(logDir, "latest.txt"), log, "utf-8");
}
