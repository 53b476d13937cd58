import { NativeRegistry, StructLayout } from "@pgscript/library";
import { Program, SourceLocation, TypeAnnotation } from "../parser/types";
import { Declaration } from "../parser/declarations";
import {
    BinaryExpression,
    CallExpression,
    Expression,
    Identifier,
    MemberExpression,
    MethodCallExpression,
    StructLiteral,
} from "../parser/expressions";
import { BlockStatement, Statement } from "../parser/statements";
import { ResolveError, ResolveErrorKind } from "../utils/Error";
import {
    PRIMITIVE_TYPES,
    TypeDescriptor,
    fromValueKind,
    isNumeric,
    isPrimitiveName,
    named,
    typeToString,
    typesMatch,
} from "../utils/typesystem";
import {
    ContainerSymbol,
    FunctionSymbol,
    ImportSymbol,
    ModuleNode,
    NamespaceEntry,
    ROOT_MODULE,
    ResolvedSymbol,
    describeSymbol,
} from "./ModuleTree";
import { Scope, SlotAllocator } from "./Scope";
import {
    Binding,
    CallTarget,
    ForLoopSlots,
    ResolvedFunction,
    ResolvedProgram,
    StructConstruction,
} from "./types";

export interface ResolverOptions {
    /** Natives scripts may call; only their signatures are used here */
    natives?: NativeRegistry;
    source?: string;
}

const UNIT = PRIMITIVE_TYPES.unit;
const BOOL = PRIMITIVE_TYPES.bool;
const INT = PRIMITIVE_TYPES.int;

/**
 * Builds the module tree, binds every name and checks declared types.
 * Results are recorded in side tables keyed by AST node.
 */
export class Resolver {
    private root = new ModuleNode(ROOT_MODULE);
    private natives?: NativeRegistry;
    private source?: string;

    private functions: FunctionSymbol[] = [];
    private containers: ContainerSymbol[] = [];
    private containersByName: Map<string, ContainerSymbol> = new Map();
    private imports: ImportSymbol[] = [];
    private layouts: Map<string, StructLayout> = new Map();

    private types: ResolvedProgram["types"] = new Map();
    private bindings: Map<Identifier, Binding> = new Map();
    private declarations: ResolvedProgram["declarations"] = new Map();
    private loops: ResolvedProgram["loops"] = new Map();
    private calls: Map<CallExpression | MethodCallExpression, CallTarget> =
        new Map();
    private fields: Map<MemberExpression, number> = new Map();
    private structs: Map<StructLiteral, StructConstruction> = new Map();

    constructor(options: ResolverOptions = {}) {
        this.natives = options.natives;
        this.source = options.source;
    }

    public resolve(program: Program): ResolvedProgram {
        this.declareItems(program.items, this.root);
        this.bindImpls(this.root);
        for (const imported of this.imports) {
            this.resolveImport(imported, new Set());
        }
        for (const container of this.containers) {
            this.resolveFields(container);
        }
        for (const fn of this.functions) {
            this.resolveSignature(fn);
        }

        const functions = this.functions.map((fn) => this.checkFunction(fn));

        return {
            program,
            root: this.root,
            functions,
            containers: this.containers,
            layouts: this.layouts,
            types: this.types,
            bindings: this.bindings,
            declarations: this.declarations,
            loops: this.loops,
            calls: this.calls,
            fields: this.fields,
            structs: this.structs,
            source: this.source,
        };
    }

    // Module tree

    private declareItems(items: Declaration[], module: ModuleNode) {
        for (const item of items) {
            switch (item.kind) {
                case "ModuleDeclaration": {
                    const child = new ModuleNode(item.name, module);
                    this.define(module, item.name, { kind: "module", module: child }, item.loc);
                    this.declareItems(item.items, child);
                    break;
                }
                case "ContainerDeclaration": {
                    const symbol: ContainerSymbol = {
                        kind: "container",
                        name: module.qualify(item.name),
                        decl: item,
                        module,
                        fields: [],
                        methods: new Map(),
                    };
                    this.define(module, item.name, symbol, item.loc);
                    this.containers.push(symbol);
                    this.containersByName.set(symbol.name, symbol);
                    break;
                }
                case "FunctionDeclaration": {
                    const symbol: FunctionSymbol = {
                        kind: "function",
                        name: module.qualify(item.name),
                        decl: item,
                        module,
                        params: [],
                        returnType: UNIT,
                    };
                    this.define(module, item.name, symbol, item.loc);
                    this.functions.push(symbol);
                    break;
                }
                case "ImportDeclaration": {
                    const symbol: ImportSymbol = {
                        kind: "import",
                        decl: item,
                        module,
                    };
                    this.define(module, item.alias, symbol, item.loc);
                    this.imports.push(symbol);
                    break;
                }
                case "ImplDeclaration":
                    module.impls.push(item);
                    break;
            }
        }
    }

    private define(
        module: ModuleNode,
        name: string,
        entry: NamespaceEntry,
        loc: SourceLocation,
    ) {
        const existing = module.symbols.get(name);
        if (existing) {
            throw this.error(
                "DuplicateDefinition",
                `'${name}' is already defined in module '${module.qualifiedName}' as ${describeSymbol(existing)}`,
                loc,
                name,
            );
        }
        module.symbols.set(name, entry);
    }

    private bindImpls(module: ModuleNode) {
        for (const impl of module.impls) {
            const target = this.lookupPath(impl.target.path, module, impl.target.loc);
            if (target.kind !== "container") {
                throw this.error(
                    "TypeMismatch",
                    `impl target ${describeSymbol(target)} is not a container`,
                    impl.target.loc,
                    impl.target.path.join("::"),
                );
            }

            for (const method of impl.methods) {
                if (target.methods.has(method.name)) {
                    throw this.error(
                        "DuplicateDefinition",
                        `Method '${method.name}' is already defined for '${target.name}'`,
                        method.loc,
                        method.name,
                    );
                }
                const symbol: FunctionSymbol = {
                    kind: "function",
                    name: `${target.name}::${method.name}`,
                    decl: method,
                    module,
                    container: target,
                    params: [],
                    returnType: UNIT,
                };
                target.methods.set(method.name, symbol);
                this.functions.push(symbol);
            }
        }

        for (const child of module.children()) {
            this.bindImpls(child);
        }
    }

    private resolveImport(
        symbol: ImportSymbol,
        visiting: Set<ImportSymbol>,
    ): ResolvedSymbol {
        if (symbol.target) return symbol.target;
        if (visiting.has(symbol)) {
            throw this.error(
                "ImportCycle",
                `Import '${symbol.decl.path.join("::")}' refers back to itself`,
                symbol.decl.loc,
                symbol.decl.alias,
            );
        }
        visiting.add(symbol);
        symbol.target = this.lookupPath(
            symbol.decl.path,
            symbol.module,
            symbol.decl.loc,
            visiting,
            symbol,
        );
        return symbol.target;
    }

    private follow(
        entry: NamespaceEntry,
        visiting: Set<ImportSymbol>,
    ): ResolvedSymbol {
        return entry.kind === "import"
            ? this.resolveImport(entry, visiting)
            : entry;
    }

    /**
     * The first segment is `root` or found lexically from `from` outward;
     * the rest are looked up directly. Paths the tree does not hold fall
     * back to the native registry.
     */
    private lookupPath(
        path: string[],
        from: ModuleNode,
        loc: SourceLocation,
        visiting: Set<ImportSymbol> = new Set(),
        skip?: ImportSymbol,
    ): ResolvedSymbol {
        const found = this.walkPath(path, from, visiting, skip);
        if (found) return found;

        const joined = path.join("::");
        const fn = this.natives?.get(joined);
        if (fn) return { kind: "native", name: joined, fn };

        throw this.error(
            "UnknownSymbol",
            `Cannot find '${joined}' in this scope`,
            loc,
            joined,
            "declare it, import it, or qualify the path from 'root'",
        );
    }

    private walkPath(
        path: string[],
        from: ModuleNode,
        visiting: Set<ImportSymbol>,
        skip?: ImportSymbol,
    ): ResolvedSymbol | undefined {
        const [first, ...rest] = path;
        let current: ResolvedSymbol;
        if (first === ROOT_MODULE) {
            current = { kind: "module", module: from.root };
        } else {
            const entry = from.lookup(first, skip);
            if (!entry) return undefined;
            current = this.follow(entry, visiting);
        }

        for (const segment of rest) {
            if (current.kind === "module") {
                const entry = current.module.symbols.get(segment);
                if (!entry) return undefined;
                current = this.follow(entry, visiting);
            } else if (current.kind === "container") {
                const method = current.methods.get(segment);
                if (!method) return undefined;
                current = method;
            } else {
                return undefined;
            }
        }
        return current;
    }

    // Declarations

    private resolveType(annotation: TypeAnnotation, module: ModuleNode): TypeDescriptor {
        const [first] = annotation.path;
        if (annotation.path.length === 1 && isPrimitiveName(first)) {
            return PRIMITIVE_TYPES[first];
        }
        const symbol = this.lookupPath(annotation.path, module, annotation.loc);
        if (symbol.kind !== "container") {
            throw this.error(
                "TypeMismatch",
                `Expected a type, found ${describeSymbol(symbol)}`,
                annotation.loc,
                annotation.path.join("::"),
            );
        }
        return named(symbol.name);
    }

    private resolveFields(container: ContainerSymbol) {
        for (const field of container.decl.fields) {
            if (container.fields.some((f) => f.name === field.name)) {
                throw this.error(
                    "DuplicateDefinition",
                    `Field '${field.name}' is declared twice in '${container.name}'`,
                    field.loc,
                    field.name,
                );
            }
            container.fields.push({
                name: field.name,
                type: this.resolveType(field.type, container.module),
            });
        }
        this.layouts.set(container.name, {
            name: container.name,
            fields: container.fields.map((f) => f.name),
        });
    }

    private resolveSignature(fn: FunctionSymbol) {
        const params = fn.decl.params.map((p) => this.resolveType(p.type, fn.module));
        fn.params = fn.container ? [named(fn.container.name), ...params] : params;
        fn.returnType = fn.decl.returnType
            ? this.resolveType(fn.decl.returnType, fn.module)
            : UNIT;
    }

    // Bodies

    private checkFunction(fn: FunctionSymbol): ResolvedFunction {
        const allocator = new SlotAllocator();
        const scope = new Scope(allocator);
        const params: ResolvedFunction["params"] = [];

        const names = fn.container
            ? ["self", ...fn.decl.params.map((p) => p.name)]
            : fn.decl.params.map((p) => p.name);
        names.forEach((name, index) => {
            if (scope.hasOwn(name)) {
                throw this.error(
                    "DuplicateDefinition",
                    `Parameter '${name}' is declared twice`,
                    fn.decl.loc,
                    name,
                );
            }
            const type = fn.params[index];
            scope.declare(name, type);
            params.push({ name, type });
        });

        // the body shares the parameters' scope
        this.checkBlock(fn.decl.body, scope, fn);

        return {
            name: fn.name,
            decl: fn.decl,
            container: fn.container?.name,
            params,
            returnType: fn.returnType,
            slotCount: allocator.slotCount,
        };
    }

    private checkBlock(block: BlockStatement, scope: Scope, fn: FunctionSymbol) {
        for (const statement of block.statements) {
            this.checkStatement(statement, scope, fn);
        }
    }

    private checkStatement(stmt: Statement, scope: Scope, fn: FunctionSymbol) {
        switch (stmt.kind) {
            case "VarStatement": {
                const declared = this.resolveType(stmt.varType, fn.module);
                const actual = this.checkExpression(stmt.value, scope, fn);
                this.expectType(declared, actual, stmt.value.loc, `variable '${stmt.name}'`);
                if (scope.hasOwn(stmt.name)) {
                    throw this.error(
                        "DuplicateDefinition",
                        `Variable '${stmt.name}' is already declared in this scope`,
                        stmt.loc,
                        stmt.name,
                    );
                }
                this.declarations.set(stmt, scope.declare(stmt.name, declared).slot);
                return;
            }
            case "ReturnStatement": {
                const actual = stmt.value
                    ? this.checkExpression(stmt.value, scope, fn)
                    : UNIT;
                this.expectType(
                    fn.returnType,
                    actual,
                    stmt.value?.loc ?? stmt.loc,
                    `return value of '${fn.name}'`,
                );
                return;
            }
            case "IfStatement":
                this.checkCondition(stmt.condition, scope, fn);
                this.checkBlock(stmt.thenBranch, scope.child(), fn);
                if (stmt.elseBranch) {
                    this.checkBlock(stmt.elseBranch, scope.child(), fn);
                }
                return;
            case "WhileStatement":
                this.checkCondition(stmt.condition, scope, fn);
                this.checkBlock(stmt.body, scope.child(), fn);
                return;
            case "LoopStatement":
                this.checkBlock(stmt.body, scope.child(), fn);
                return;
            case "ForStatement": {
                const iterable = this.checkExpression(stmt.iterable, scope, fn);
                this.expectType(INT, iterable, stmt.iterable.loc, "for loop bound");
                const loopScope = scope.child();
                const slots: ForLoopSlots = {
                    variable: loopScope.declare(stmt.variable, INT).slot,
                    counter: loopScope.hidden(INT).slot,
                    limit: loopScope.hidden(INT).slot,
                };
                this.loops.set(stmt, slots);
                this.checkBlock(stmt.body, loopScope.child(), fn);
                return;
            }
            case "BreakStatement":
            case "ContinueStatement":
                return;
            case "ExpressionStatement":
                this.checkExpression(stmt.expression, scope, fn);
                return;
            case "BlockStatement":
                this.checkBlock(stmt, scope.child(), fn);
                return;
        }
    }

    private checkCondition(condition: Expression, scope: Scope, fn: FunctionSymbol) {
        const type = this.checkExpression(condition, scope, fn);
        this.expectType(BOOL, type, condition.loc, "condition");
    }

    private checkExpression(
        expr: Expression,
        scope: Scope,
        fn: FunctionSymbol,
    ): TypeDescriptor {
        const type = this.inferExpression(expr, scope, fn);
        this.types.set(expr, type);
        return type;
    }

    private inferExpression(
        expr: Expression,
        scope: Scope,
        fn: FunctionSymbol,
    ): TypeDescriptor {
        switch (expr.type) {
            case "IntLiteral":
                return INT;
            case "FloatLiteral":
                return PRIMITIVE_TYPES.float;
            case "StringLiteral":
                return PRIMITIVE_TYPES.string;
            case "BoolLiteral":
                return BOOL;
            case "Identifier":
                return this.checkIdentifier(expr, scope, fn);
            case "BinaryExpression":
                return this.checkBinary(expr, scope, fn);
            case "UnaryExpression": {
                const operand = this.checkExpression(expr.operand, scope, fn);
                const valid =
                    expr.operator === "!"
                        ? operand.kind === "bool"
                        : isNumeric(operand);
                if (!valid) {
                    throw this.error(
                        "TypeMismatch",
                        `Operator '${expr.operator}' cannot be applied to '${typeToString(operand)}'`,
                        expr.loc,
                    );
                }
                return operand;
            }
            case "CallExpression":
                return this.checkCall(expr, scope, fn);
            case "MethodCallExpression":
                return this.checkMethodCall(expr, scope, fn);
            case "MemberExpression":
                return this.checkMember(expr, scope, fn);
            case "AssignmentExpression": {
                const value = this.checkExpression(expr.value, scope, fn);
                const target = this.checkExpression(expr.target, scope, fn);
                this.expectType(target, value, expr.value.loc, "assignment");
                return target;
            }
            case "StructLiteral":
                return this.checkStructLiteral(expr, scope, fn);
        }
    }

    private checkIdentifier(
        expr: Identifier,
        scope: Scope,
        fn: FunctionSymbol,
    ): TypeDescriptor {
        if (expr.path.length === 1) {
            const [name] = expr.path;
            const local = scope.get(name);
            if (local) {
                this.bindings.set(expr, { kind: "local", slot: local.slot });
                return local.type;
            }
            const index = fn.container
                ? fn.container.fields.findIndex((f) => f.name === name)
                : -1;
            if (fn.container && index !== -1) {
                this.bindings.set(expr, { kind: "selfField", index });
                return fn.container.fields[index].type;
            }
        }

        const symbol = this.lookupPath(expr.path, fn.module, expr.loc);
        throw this.error(
            "TypeMismatch",
            `${describeSymbol(symbol)} cannot be used as a value`,
            expr.loc,
            expr.path.join("::"),
        );
    }

    private checkBinary(
        expr: BinaryExpression,
        scope: Scope,
        fn: FunctionSymbol,
    ): TypeDescriptor {
        const left = this.checkExpression(expr.left, scope, fn);
        const right = this.checkExpression(expr.right, scope, fn);
        const same = typesMatch(left, right);

        switch (expr.operator) {
            case "+":
                if (same && left.kind === "string") return left;
                if (same && isNumeric(left)) return left;
                break;
            case "-":
            case "*":
            case "/":
                if (same && isNumeric(left)) return left;
                break;
            case "<":
            case "<=":
            case ">":
            case ">=":
                if (same && isNumeric(left)) return BOOL;
                break;
            case "==":
            case "!=":
                if (same) return BOOL;
                break;
        }

        throw this.error(
            "TypeMismatch",
            `Operator '${expr.operator}' cannot be applied to '${typeToString(left)}' and '${typeToString(right)}'`,
            expr.loc,
        );
    }

    private checkCall(
        expr: CallExpression,
        scope: Scope,
        fn: FunctionSymbol,
    ): TypeDescriptor {
        const { callee } = expr;
        if (callee.path.length === 1 && scope.get(callee.path[0])) {
            throw this.error(
                "TypeMismatch",
                `'${callee.path[0]}' is a variable, not a function`,
                callee.loc,
                callee.path[0],
            );
        }

        const symbol = this.lookupPath(callee.path, fn.module, callee.loc);
        if (symbol.kind === "function") {
            this.checkArguments(symbol.name, symbol.params, expr.arguments, expr.loc, scope, fn);
            this.calls.set(expr, { kind: "function", name: symbol.name });
            return symbol.returnType;
        }
        if (symbol.kind === "native") {
            const { signature } = symbol.fn;
            this.checkArguments(
                symbol.name,
                signature.params.map((p) => fromValueKind(p.type)),
                expr.arguments,
                expr.loc,
                scope,
                fn,
            );
            this.calls.set(expr, { kind: "native", name: symbol.name, signature });
            this.types.set(callee, { kind: "native", signature });
            return fromValueKind(signature.returnType);
        }

        throw this.error(
            "TypeMismatch",
            `${describeSymbol(symbol)} is not callable`,
            callee.loc,
            callee.path.join("::"),
        );
    }

    private checkMethodCall(
        expr: MethodCallExpression,
        scope: Scope,
        fn: FunctionSymbol,
    ): TypeDescriptor {
        const receiver = this.checkExpression(expr.receiver, scope, fn);
        const container = this.containerOf(receiver, expr.loc, `call method '${expr.method}'`);
        const method = container.methods.get(expr.method);
        if (!method) {
            throw this.error(
                "UnknownSymbol",
                `No method '${expr.method}' on '${container.name}'`,
                expr.loc,
                expr.method,
            );
        }
        this.checkArguments(
            method.name,
            method.params.slice(1),
            expr.arguments,
            expr.loc,
            scope,
            fn,
        );
        this.calls.set(expr, { kind: "function", name: method.name });
        return method.returnType;
    }

    private checkArguments(
        name: string,
        params: TypeDescriptor[],
        args: Expression[],
        loc: SourceLocation,
        scope: Scope,
        fn: FunctionSymbol,
    ) {
        if (args.length !== params.length) {
            throw this.error(
                "TypeMismatch",
                `'${name}' expects ${params.length} argument(s), found ${args.length}`,
                loc,
                name,
            );
        }
        args.forEach((arg, index) => {
            const actual = this.checkExpression(arg, scope, fn);
            this.expectType(params[index], actual, arg.loc, `argument ${index + 1} of '${name}'`);
        });
    }

    private checkMember(
        expr: MemberExpression,
        scope: Scope,
        fn: FunctionSymbol,
    ): TypeDescriptor {
        const object = this.checkExpression(expr.object, scope, fn);
        const container = this.containerOf(object, expr.loc, `access field '${expr.property}'`);
        const index = container.fields.findIndex((f) => f.name === expr.property);
        if (index === -1) {
            throw this.error(
                "UnknownSymbol",
                `No field '${expr.property}' on '${container.name}'`,
                expr.loc,
                expr.property,
            );
        }
        this.fields.set(expr, index);
        return container.fields[index].type;
    }

    private checkStructLiteral(
        expr: StructLiteral,
        scope: Scope,
        fn: FunctionSymbol,
    ): TypeDescriptor {
        const symbol = this.lookupPath(expr.name.path, fn.module, expr.name.loc);
        if (symbol.kind !== "container") {
            throw this.error(
                "TypeMismatch",
                `${describeSymbol(symbol)} is not a container`,
                expr.name.loc,
                expr.name.path.join("::"),
            );
        }

        const given: Map<string, Expression> = new Map();
        for (const init of expr.fields) {
            if (given.has(init.name)) {
                throw this.error(
                    "DuplicateDefinition",
                    `Field '${init.name}' is given twice`,
                    init.loc,
                    init.name,
                );
            }
            const field = symbol.fields.find((f) => f.name === init.name);
            if (!field) {
                throw this.error(
                    "UnknownSymbol",
                    `No field '${init.name}' on '${symbol.name}'`,
                    init.loc,
                    init.name,
                );
            }
            const actual = this.checkExpression(init.value, scope, fn);
            this.expectType(field.type, actual, init.value.loc, `field '${init.name}'`);
            given.set(init.name, init.value);
        }

        const values: Expression[] = [];
        const missing: string[] = [];
        for (const field of symbol.fields) {
            const value = given.get(field.name);
            if (value) values.push(value);
            else missing.push(field.name);
        }
        if (missing.length > 0) {
            throw this.error(
                "TypeMismatch",
                `Missing field(s) ${missing.map((m) => `'${m}'`).join(", ")} in '${symbol.name}'`,
                expr.loc,
                symbol.name,
            );
        }

        const layout = this.layouts.get(symbol.name);
        if (!layout) {
            throw new Error(`No layout computed for '${symbol.name}'`);
        }
        this.structs.set(expr, { layout, values });
        return named(symbol.name);
    }

    private containerOf(
        type: TypeDescriptor,
        loc: SourceLocation,
        action: string,
    ): ContainerSymbol {
        const container =
            type.kind === "named"
                ? this.containersByName.get(type.container)
                : undefined;
        if (!container) {
            throw this.error(
                "TypeMismatch",
                `Cannot ${action} on a value of type '${typeToString(type)}'`,
                loc,
            );
        }
        return container;
    }

    private expectType(
        expected: TypeDescriptor,
        actual: TypeDescriptor,
        loc: SourceLocation,
        what: string,
    ) {
        if (!typesMatch(expected, actual)) {
            throw this.error(
                "TypeMismatch",
                `Type mismatch in ${what}: expected '${typeToString(expected)}', found '${typeToString(actual)}'`,
                loc,
            );
        }
    }

    private error(
        kind: ResolveErrorKind,
        message: string,
        loc: SourceLocation,
        symbol?: string,
        hint?: string,
    ): ResolveError {
        return new ResolveError(kind, message, loc, this.source, symbol, hint);
    }
}

export function resolve(
    program: Program,
    options?: ResolverOptions,
): ResolvedProgram {
    return new Resolver(options).resolve(program);
}
