import fs from "node:fs/promises";
import nodePath from "node:path";
import yaml from "js-yaml";
import { VmOptions } from "@pgscript/core";

export const CONFIG_FILE = "pgs.yml";

export interface ProjectLimits {
    maxStackSize?: number;
    maxFrames?: number;
    maxInstructions?: number;
}

export interface ProjectConfig {
    /** Script path, relative to the project directory */
    entrypoint: string;
    /** Function to call */
    entry: string;
    limits: ProjectLimits;
}

export interface Project {
    /** Directory holding `pgs.yml`; absent when running a lone file */
    dir?: string;
    config: ProjectConfig;
    sourcePath: string;
    source: string;
}

export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "ConfigError";
    }
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readLimit(limits: Record<string, unknown>, key: keyof ProjectLimits): number | undefined {
    const value = limits[key];
    if (value === undefined) return undefined;
    if (typeof value !== "number" || !Number.isInteger(value) || value <= 0) {
        throw new ConfigError(`limits.${key} must be a positive integer`);
    }
    return value;
}

export function parseConfig(text: string): ProjectConfig {
    const raw: unknown = yaml.load(text);
    if (!isRecord(raw)) {
        throw new ConfigError(`${CONFIG_FILE} must be a mapping`);
    }

    const { entrypoint, entry = "main", limits = {} } = raw;
    if (typeof entrypoint !== "string" || entrypoint.length === 0) {
        throw new ConfigError(`${CONFIG_FILE} must specify 'entrypoint'`);
    }
    if (typeof entry !== "string") {
        throw new ConfigError("'entry' must be a function name");
    }
    if (!isRecord(limits)) {
        throw new ConfigError("'limits' must be a mapping");
    }

    return {
        entrypoint,
        entry,
        limits: {
            maxStackSize: readLimit(limits, "maxStackSize"),
            maxFrames: readLimit(limits, "maxFrames"),
            maxInstructions: readLimit(limits, "maxInstructions"),
        },
    };
}

/**
 * `target` is either a `.pgs` file or a directory holding `pgs.yml`.
 */
export async function loadProject(target: string): Promise<Project> {
    const resolved = nodePath.resolve(target);
    const stat = await fs.stat(resolved);

    if (!stat.isDirectory()) {
        return {
            config: { entrypoint: nodePath.basename(resolved), entry: "main", limits: {} },
            sourcePath: resolved,
            source: await fs.readFile(resolved, "utf-8"),
        };
    }

    const configText = await fs.readFile(nodePath.join(resolved, CONFIG_FILE), "utf-8");
    const config = parseConfig(configText);
    const sourcePath = nodePath.join(resolved, config.entrypoint);
    return {
        dir: resolved,
        config,
        sourcePath,
        source: await fs.readFile(sourcePath, "utf-8"),
    };
}

export function toVmOptions(limits: ProjectLimits): VmOptions {
    const options: VmOptions = {};
    if (limits.maxStackSize !== undefined) options.maxStackSize = limits.maxStackSize;
    if (limits.maxFrames !== undefined) options.maxFrames = limits.maxFrames;
    if (limits.maxInstructions !== undefined) options.maxInstructions = limits.maxInstructions;
    return options;
}
