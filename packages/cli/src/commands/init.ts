import fs from "node:fs/promises";
import nodePath from "node:path";
import chalk from "chalk";
import { CONFIG_FILE } from "../config";

const DEFAULT_CONFIG = `entrypoint: "main.pgs"
entry: main
limits:
    maxFrames: 1024
`;

const DEFAULT_APP = `import std::println;

fn: main() ~ int {
    println("Hello from pgscript!");
    return 0;
}
`;

export async function initCommand(name: string): Promise<number> {
    const projectDir = nodePath.resolve(name);
    const configPath = nodePath.join(projectDir, CONFIG_FILE);

    const exists = await fs
        .access(configPath)
        .then(() => true)
        .catch(() => false);
    if (exists) {
        console.error(chalk.yellow(`${name}/${CONFIG_FILE} already exists, nothing to do`));
        return 1;
    }

    await fs.mkdir(projectDir, { recursive: true });
    console.log(chalk.green(`Created directory ${name}/`));

    await fs.writeFile(nodePath.join(projectDir, ".gitignore"), ".pgs\n");
    console.log(chalk.gray(`Created ${name}/.gitignore`));

    await fs.writeFile(configPath, DEFAULT_CONFIG);
    console.log(chalk.gray(`Created ${name}/${CONFIG_FILE}`));

    await fs.writeFile(nodePath.join(projectDir, "main.pgs"), DEFAULT_APP);
    console.log(chalk.gray(`Created ${name}/main.pgs`));

    console.log(chalk.green(`\nRun it with: pgs run ${name}`));
    return 0;
}
