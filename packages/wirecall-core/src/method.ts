// Method identity.
//
// A method is addressed by its 0-based declaration index and by its name.
// Positional codecs put only the index on the wire, named ones only the
// name, so the receiving side recovers a PartialMethodId and resolves it
// through the server's MethodTable.

export interface MethodId {
  readonly name: string;
  readonly index: number;
}

export function methodId(name: string, index: number): MethodId {
  if (!Number.isInteger(index) || index < 0) {
    throw new RangeError(`method index must be a non-negative integer, got ${index}`);
  }
  return Object.freeze({ name, index });
}

export type PartialMethodId = { kind: "name"; name: string } | { kind: "index"; index: number };

export const PartialMethodId = {
  byName(name: string): PartialMethodId {
    return { kind: "name", name };
  },
  byIndex(index: number): PartialMethodId {
    return { kind: "index", index };
  },
} as const;

export function formatPartialMethodId(id: PartialMethodId): string {
  return id.kind === "name" ? `"${id.name}"` : `#${id.index}`;
}

/** Resolves partial identifiers to dispatch indices for one server. */
export class MethodTable {
  private readonly byName = new Map<string, number>();
  private readonly size: number;

  constructor(methods: readonly MethodId[]) {
    methods.forEach((method, position) => {
      if (method.index !== position) {
        throw new Error(`Method ${method.name} has index ${method.index}, expected ${position}`);
      }
      if (this.byName.has(method.name)) {
        throw new Error(`Duplicate method name: ${method.name}`);
      }
      this.byName.set(method.name, method.index);
    });
    this.size = methods.length;
  }

  resolve(id: PartialMethodId): number | undefined {
    if (id.kind === "name") return this.byName.get(id.name);
    return Number.isInteger(id.index) && id.index >= 0 && id.index < this.size ? id.index : undefined;
  }
}
