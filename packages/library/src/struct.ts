import { Value } from "./types";

export interface StructLayout {
    /** Fully-qualified container name, e.g. `root::geo::Vec2` */
    name: string;
    fields: string[];
}

/**
 * A heap-resident container instance. The only value with reference
 * semantics: every holder of a struct value shares this object.
 *
 * `refCount` is maintained by the virtual machine that allocated it.
 */
export class StructInstance {
    public refCount: number = 0;
    public released: boolean = false;

    constructor(
        public readonly layout: StructLayout,
        public readonly fields: Value[],
    ) {}

    public fieldIndex(name: string): number {
        return this.layout.fields.indexOf(name);
    }

    public get(name: string): Value | undefined {
        const index = this.fieldIndex(name);
        return index === -1 ? undefined : this.fields[index];
    }
}
