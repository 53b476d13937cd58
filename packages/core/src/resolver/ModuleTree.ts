import { NativeFunction } from "@pgscript/library";
import {
    ContainerDeclaration,
    FunctionDeclaration,
    ImplDeclaration,
    ImportDeclaration,
} from "../parser/declarations";
import { TypeDescriptor } from "../utils/typesystem";

export const ROOT_MODULE = "root";

export interface ContainerField {
    name: string;
    type: TypeDescriptor;
}

export interface ContainerSymbol {
    kind: "container";
    /** Fully-qualified, e.g. `root::geo::Vec2` */
    name: string;
    decl: ContainerDeclaration;
    module: ModuleNode;
    fields: ContainerField[];
    methods: Map<string, FunctionSymbol>;
}

export interface FunctionSymbol {
    kind: "function";
    name: string;
    decl: FunctionDeclaration;
    module: ModuleNode;
    /** Set for impl methods; `self` is then the first parameter */
    container?: ContainerSymbol;
    params: TypeDescriptor[];
    returnType: TypeDescriptor;
}

export interface ImportSymbol {
    kind: "import";
    decl: ImportDeclaration;
    module: ModuleNode;
    target?: ResolvedSymbol;
}

export interface ModuleSymbol {
    kind: "module";
    module: ModuleNode;
}

export interface NativeSymbol {
    kind: "native";
    name: string;
    fn: NativeFunction;
}

export type NamespaceEntry =
    | ModuleSymbol
    | ContainerSymbol
    | FunctionSymbol
    | ImportSymbol;

/** What a path finally designates, once import aliases are followed */
export type ResolvedSymbol =
    | ModuleSymbol
    | ContainerSymbol
    | FunctionSymbol
    | NativeSymbol;

export class ModuleNode {
    public readonly symbols: Map<string, NamespaceEntry> = new Map();
    public readonly impls: ImplDeclaration[] = [];

    constructor(
        public readonly name: string,
        public readonly parent?: ModuleNode,
    ) {}

    public get qualifiedName(): string {
        return this.parent
            ? `${this.parent.qualifiedName}::${this.name}`
            : this.name;
    }

    public qualify(name: string): string {
        return `${this.qualifiedName}::${name}`;
    }

    public get root(): ModuleNode {
        return this.parent ? this.parent.root : this;
    }

    /**
     * Look `name` up in this module, then each enclosing one.
     * `skip` lets an import avoid finding its own alias.
     */
    public lookup(name: string, skip?: NamespaceEntry): NamespaceEntry | undefined {
        const entry = this.symbols.get(name);
        if (entry && entry !== skip) return entry;
        return this.parent?.lookup(name, skip);
    }

    public children(): ModuleNode[] {
        const result: ModuleNode[] = [];
        for (const entry of this.symbols.values()) {
            if (entry.kind === "module") result.push(entry.module);
        }
        return result;
    }
}

export function describeSymbol(symbol: NamespaceEntry | ResolvedSymbol): string {
    switch (symbol.kind) {
        case "module":
            return `module '${symbol.module.qualifiedName}'`;
        case "container":
            return `container '${symbol.name}'`;
        case "function":
            return `function '${symbol.name}'`;
        case "native":
            return `native function '${symbol.name}'`;
        case "import":
            return `import '${symbol.decl.alias}'`;
    }
}
