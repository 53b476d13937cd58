import { BinaryOperator, UnaryOperator } from "../parser/expressions";

export type Instruction =
    | { op: "PushConst"; index: number }
    | { op: "Pop" }
    | { op: "Dup" }
    /** Load and store leave the value on the stack */
    | { op: "LoadLocal"; slot: number }
    | { op: "StoreLocal"; slot: number }
    | { op: "LoadField"; index: number; name: string }
    /** [struct, value] -> [value] */
    | { op: "StoreField"; index: number; name: string }
    /** `index` points at the layout constant */
    | { op: "NewStruct"; index: number; count: number }
    | { op: "Binary"; operator: BinaryOperator }
    | { op: "Unary"; operator: UnaryOperator }
    | { op: "Jump"; target: number }
    /** pops the condition */
    | { op: "JumpIfFalse"; target: number }
    | { op: "Call"; target: string; argc: number }
    | { op: "CallNative"; name: string; argc: number }
    | { op: "Return" };

export type Opcode = Instruction["op"];
