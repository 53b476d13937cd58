import { NativeFunction } from "./types";

/**
 * Maps stable names (`std::println`, `sqrt`) to native functions.
 *
 * The same registry, or one declaring the same signatures, is handed to the
 * resolver at compile time (for type checking) and to the virtual machine
 * at run time (for dispatch).
 */
export class NativeRegistry {
    private functions: Map<string, NativeFunction> = new Map();

    public register(name: string, fn: NativeFunction): this {
        if (this.functions.has(name)) {
            throw new Error(`Native function '${name}' is already registered`);
        }
        this.functions.set(name, fn);
        return this;
    }

    /**
     * Register every function of a package under `prefix::name`
     */
    public registerPackage(
        prefix: string,
        pkg: Record<string, NativeFunction>,
    ): this {
        for (const [name, fn] of Object.entries(pkg)) {
            this.register(`${prefix}::${name}`, fn);
        }
        return this;
    }

    public get(name: string): NativeFunction | undefined {
        return this.functions.get(name);
    }

    public has(name: string): boolean {
        return this.functions.has(name);
    }

    public names(): string[] {
        return [...this.functions.keys()].sort();
    }
}
