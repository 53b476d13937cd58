import { StructInstance, StructLayout, Value } from "@pgscript/library";

/**
 * Reference counts for struct instances. Every stack slot and every
 * struct field holding an instance owns one reference.
 */
export class Heap {
    private owned: WeakSet<StructInstance> = new WeakSet();
    private live: number = 0;

    /**
     * The field values' references move into the instance; the caller
     * receives the instance with one reference.
     */
    public allocate(layout: StructLayout, fields: Value[]): StructInstance {
        const instance = new StructInstance(layout, fields);
        instance.refCount = 1;
        this.owned.add(instance);
        this.live++;
        return instance;
    }

    public retain(value: Value) {
        if (value.type === "struct") value.value.refCount++;
    }

    public release(value: Value) {
        const pending: Value[] = [value];
        let next: Value | undefined;
        while ((next = pending.pop())) {
            if (next.type !== "struct") continue;
            const instance = next.value;
            instance.refCount--;
            if (instance.refCount > 0 || instance.released) continue;

            instance.released = true;
            if (this.owned.has(instance)) this.live--;
            pending.push(...instance.fields);
        }
    }

    /** Instances allocated here and not yet released */
    public get liveStructs(): number {
        return this.live;
    }
}
