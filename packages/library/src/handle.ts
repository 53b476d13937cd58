/**
 * Opaque host object passed through scripts. Scripts can store and pass
 * handles around but never look inside them.
 */
export class NativeHandle<T = unknown> {
    constructor(
        public readonly tag: string,
        public readonly payload: T,
    ) {}
}
