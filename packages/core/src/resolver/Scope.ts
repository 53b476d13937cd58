import { TypeDescriptor } from "../utils/typesystem";

export interface LocalBinding {
    slot: number;
    type: TypeDescriptor;
}

/**
 * Lexical scope of a function body. Slots come from a counter shared by
 * every scope of the function and are never handed out twice.
 */
export class Scope {
    private variables: Map<string, LocalBinding> = new Map();

    constructor(
        private allocator: SlotAllocator,
        private parent?: Scope,
    ) {}

    public child(): Scope {
        return new Scope(this.allocator, this);
    }

    public hasOwn(name: string): boolean {
        return this.variables.has(name);
    }

    public declare(name: string, type: TypeDescriptor): LocalBinding {
        const binding = { slot: this.allocator.next(), type };
        this.variables.set(name, binding);
        return binding;
    }

    /** Reserve a slot no name can reach */
    public hidden(type: TypeDescriptor): LocalBinding {
        return { slot: this.allocator.next(), type };
    }

    public get(name: string): LocalBinding | undefined {
        return this.variables.get(name) ?? this.parent?.get(name);
    }
}

export class SlotAllocator {
    private count: number = 0;

    public next(): number {
        return this.count++;
    }

    public get slotCount(): number {
        return this.count;
    }
}
