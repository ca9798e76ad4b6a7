export type Primitive =
  | "bool"
  | "char"
  | "i8"
  | "u8"
  | "i16"
  | "u16"
  | "i32"
  | "u32"
  | "i64"
  | "u64"
  | "isize"
  | "usize"
  | "f32"
  | "f64";

export type TextEncoding = "utf8" | "utf16";

/** Exports of an instantiated native library */
export interface LibraryExports {
  readonly memory: { readonly buffer: ArrayBuffer };
  ffigen_alloc(size: number, align: number): number;
  ffigen_free(ptr: number, size: number, align: number): void;
  ffigen_write_create(capacity: number): number;
  ffigen_write_bytes(write: number): number;
  ffigen_write_len(write: number): number;
  ffigen_write_destroy(write: number): void;
  readonly [symbol: string]: unknown;
}

export declare const INTERNAL: unique symbol;
export declare const HANDLE: unique symbol;
export declare const RELEASE: unique symbol;
export declare const READ: unique symbol;
export declare const WRITE: unique symbol;
export declare const FLATTEN: unique symbol;

export declare function bindLibrary(exports: LibraryExports): void;
export declare function lib(): LibraryExports;

/** Error payload of a failed fallible call */
export declare class FfiError<E = unknown> extends Error {
  constructor(error: E);
  readonly error: E;
}

export declare function sizeOf(primitive: Primitive): number;
export declare function toLeaf(value: unknown, primitive: Primitive): number | bigint;
export declare function fromLeaf(raw: number | bigint, primitive: Primitive): unknown;
export declare function readScalar(ptr: number, primitive: Primitive): unknown;
export declare function writeScalar(ptr: number, primitive: Primitive, value: unknown): void;
export declare function readPointer(ptr: number): number;
export declare function readSlice(ptr: number, len: number, element: Primitive | TextEncoding): unknown;
export declare function readSliceAt(ptr: number, element: Primitive | TextEncoding, nullable?: boolean): unknown;
export declare function writeSliceAt(ptr: number, pair: readonly [number, number]): void;
export declare function readWrite(write: number): string;

export declare class Arena {
  alloc(size: number, align: number): number;
  encodeBuffer(values: ArrayLike<number | bigint>, primitive: Primitive, mutable: boolean): [number, number];
  encodeText(text: string, encoding: TextEncoding): [number, number];
  encodeStrings(list: readonly string[], encoding: TextEncoding): [number, number];
  store(type: unknown, value: unknown, size: number, align: number): number;
  createWrite(): number;
  free(): void;
}

export declare function handleOf(wrapper: unknown, type: abstract new (...args: never[]) => unknown, nullable?: boolean): number;
export declare function takeHandle(wrapper: unknown, type: abstract new (...args: never[]) => unknown, nullable?: boolean): number;
export declare function wrap<T>(type: new (...args: never[]) => T, ptr: number, owned: boolean, edges?: readonly unknown[]): T;
export declare function wrapOptional<T>(type: new (...args: never[]) => T, ptr: number, owned: boolean, edges?: readonly unknown[]): T | null;
