/**
 * Minimal WebAssembly binary writer for test fixtures. Covers the handful of sections and instructions the
 * fixtures need; not a general assembler.
 */

export type ValType = 'i32' | 'i64';

const VALTYPE: Record<ValType, number> = { i32: 0x7f, i64: 0x7e };

export function uleb(value: number): number[] {
  const bytes: number[] = [];
  let remaining = value >>> 0;

  do {
    let byte = remaining & 0x7f;
    remaining >>>= 7;
    if (remaining !== 0) {
      byte |= 0x80;
    }
    bytes.push(byte);
  } while (remaining !== 0);

  return bytes;
}

export function sleb(value: number): number[] {
  const bytes: number[] = [];
  let remaining = value | 0;

  for (;;) {
    const byte = remaining & 0x7f;
    remaining >>= 7;

    const signBitSet = (byte & 0x40) !== 0;
    if ((remaining === 0 && !signBitSet) || (remaining === -1 && signBitSet)) {
      bytes.push(byte);
      return bytes;
    }

    bytes.push(byte | 0x80);
  }
}

function name(text: string): number[] {
  const encoded = Array.from(new TextEncoder().encode(text));
  return [...uleb(encoded.length), ...encoded];
}

function vec(items: number[][]): number[] {
  return [...uleb(items.length), ...items.flat()];
}

function section(id: number, contents: number[]): number[] {
  return [id, ...uleb(contents.length), ...contents];
}

function limits(min: number, max: number | undefined): number[] {
  return max === undefined ? [0x00, ...uleb(min)] : [0x01, ...uleb(min), ...uleb(max)];
}

/**
 * Instruction encoders.
 */
export const op = {
  unreachable: [0x00],
  block: [0x02, 0x40],
  loop: [0x03, 0x40],
  if: [0x04, 0x40],
  else: [0x05],
  end: [0x0b],
  br: (depth: number): number[] => [0x0c, ...uleb(depth)],
  brIf: (depth: number): number[] => [0x0d, ...uleb(depth)],
  call: (index: number): number[] => [0x10, ...uleb(index)],
  drop: [0x1a],
  localGet: (index: number): number[] => [0x20, ...uleb(index)],
  localSet: (index: number): number[] => [0x21, ...uleb(index)],
  i32Load: (offset = 0): number[] => [0x28, 0x02, ...uleb(offset)],
  i32Store: (offset = 0): number[] => [0x36, 0x02, ...uleb(offset)],
  memoryGrow: [0x40, 0x00],
  i32Const: (value: number): number[] => [0x41, ...sleb(value)],
  i64Const: (value: number): number[] => [0x42, ...sleb(value)],
  i32Eqz: [0x45],
  i32Add: [0x6a],
  i32Sub: [0x6b],
};

interface FuncType {
  params: ValType[];
  results: ValType[];
}

type ImportEntry =
  | { module: string; name: string; kind: 'function'; typeIndex: number }
  | { module: string; name: string; kind: 'memory'; min: number };

interface FunctionEntry {
  typeIndex: number;
  locals: ValType[];
  body: number[];
}

export class WasmModuleBuilder {
  private readonly types: FuncType[] = [];
  private readonly imports: ImportEntry[] = [];
  private readonly functions: FunctionEntry[] = [];
  private readonly exports: Array<{ name: string; kind: number; index: number }> = [];
  private readonly dataSegments: Array<{ offset: number; bytes: number[] }> = [];
  private memoryLimits: { min: number; max: number | undefined } | undefined;

  private typeIndex(params: ValType[], results: ValType[]): number {
    const key = `${params.join(',')}->${results.join(',')}`;
    const existing = this.types.findIndex((type) => `${type.params.join(',')}->${type.results.join(',')}` === key);
    if (existing !== -1) {
      return existing;
    }

    this.types.push({ params, results });
    return this.types.length - 1;
  }

  private get importedFunctionCount(): number {
    return this.imports.filter((entry) => entry.kind === 'function').length;
  }

  /**
   * Imports must be declared before any function is added; returns the function index.
   */
  importFunction(module: string, field: string, params: ValType[], results: ValType[] = []): number {
    if (this.functions.length > 0) {
      throw new Error('declare imports before functions');
    }

    this.imports.push({ module, name: field, kind: 'function', typeIndex: this.typeIndex(params, results) });
    return this.importedFunctionCount - 1;
  }

  importMemory(module: string, field: string, min = 1): this {
    this.imports.push({ module, name: field, kind: 'memory', min });
    return this;
  }

  addFunction(body: number[], options: { params?: ValType[]; results?: ValType[]; locals?: ValType[]; exportAs?: string } = {}): number {
    this.functions.push({
      typeIndex: this.typeIndex(options.params ?? [], options.results ?? []),
      locals: options.locals ?? [],
      body,
    });

    const index = this.importedFunctionCount + this.functions.length - 1;
    if (options.exportAs !== undefined) {
      this.exports.push({ name: options.exportAs, kind: 0x00, index });
    }

    return index;
  }

  /**
   * Declares the module's own memory, exported under `exportAs` unless it is `null`.
   */
  memory(min = 1, max?: number, exportAs: string | null = 'memory'): this {
    this.memoryLimits = { min, max };
    if (exportAs !== null) {
      this.exports.push({ name: exportAs, kind: 0x02, index: 0 });
    }
    return this;
  }

  data(offset: number, content: string | number[]): this {
    const bytes = typeof content === 'string' ? Array.from(new TextEncoder().encode(content)) : content;
    this.dataSegments.push({ offset, bytes });
    return this;
  }

  build(): Uint8Array {
    const bytes: number[] = [0x00, 0x61, 0x73, 0x6d, 0x01, 0x00, 0x00, 0x00];

    if (this.types.length > 0) {
      bytes.push(
        ...section(
          1,
          vec(this.types.map((type) => [0x60, ...vec(type.params.map((t) => [VALTYPE[t]])), ...vec(type.results.map((t) => [VALTYPE[t]]))])),
        ),
      );
    }

    if (this.imports.length > 0) {
      bytes.push(
        ...section(
          2,
          vec(
            this.imports.map((entry) =>
              entry.kind === 'function'
                ? [...name(entry.module), ...name(entry.name), 0x00, ...uleb(entry.typeIndex)]
                : [...name(entry.module), ...name(entry.name), 0x02, ...limits(entry.min, undefined)],
            ),
          ),
        ),
      );
    }

    if (this.functions.length > 0) {
      bytes.push(...section(3, vec(this.functions.map((fn) => uleb(fn.typeIndex)))));
    }

    if (this.memoryLimits !== undefined) {
      bytes.push(...section(5, vec([limits(this.memoryLimits.min, this.memoryLimits.max)])));
    }

    if (this.exports.length > 0) {
      bytes.push(...section(7, vec(this.exports.map((entry) => [...name(entry.name), entry.kind, ...uleb(entry.index)]))));
    }

    if (this.functions.length > 0) {
      bytes.push(
        ...section(
          10,
          vec(
            this.functions.map((fn) => {
              const localGroups = fn.locals.map((local) => [0x01, VALTYPE[local]]);
              const body = [...vec(localGroups), ...fn.body, ...op.end];
              return [...uleb(body.length), ...body];
            }),
          ),
        ),
      );
    }

    if (this.dataSegments.length > 0) {
      bytes.push(
        ...section(
          11,
          vec(this.dataSegments.map((segment) => [0x00, ...op.i32Const(segment.offset), ...op.end, ...vec(segment.bytes.map((b) => [b]))])),
        ),
      );
    }

    return new Uint8Array(bytes);
  }
}
