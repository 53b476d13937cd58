import { Chunk } from "../compiler/Chunk";

export interface Frame {
    chunk: Chunk;
    ip: number;
    /** Stack index of slot 0 */
    base: number;
    /** Caller's stack height once the arguments are consumed */
    stackHeight: number;
}
