/**
 * Typed access to the loosely shaped rows the backend returns.
 *
 * The backend encodes "no value" as `false` for every field type and
 * many-to-one references as `[id, label]` tuples. Nothing about a row's
 * shape is guaranteed, so every accessor takes the value to use when the
 * field is absent or of the wrong type.
 */

export type Relation =
  | { kind: "unset" }
  | { kind: "linked"; id: number; label: string };

export const UNSET: Relation = { kind: "unset" };

export function toRelation(value: unknown): Relation {
  if (!Array.isArray(value) || value.length < 2) return UNSET;
  const [id, label] = value;
  if (typeof id !== "number" || !Number.isFinite(id)) return UNSET;
  return { kind: "linked", id, label: typeof label === "string" ? label : "" };
}

export type RemoteFields = Readonly<Record<string, unknown>>;

export class RemoteRecord {
  private readonly fields: RemoteFields;

  constructor(fields: RemoteFields = {}) {
    this.fields = fields;
  }

  static fromUnknown(value: unknown): RemoteRecord | undefined {
    if (typeof value !== "object" || value === null || Array.isArray(value)) {
      return undefined;
    }
    return new RemoteRecord({ ...value });
  }

  has(field: string): boolean {
    return Object.prototype.hasOwnProperty.call(this.fields, field);
  }

  string(field: string, fallback: string): string {
    const value = this.fields[field];
    return typeof value === "string" ? value : fallback;
  }

  number(field: string, fallback: number): number {
    const value = this.fields[field];
    return typeof value === "number" && Number.isFinite(value)
      ? value
      : fallback;
  }

  relation(field: string): Relation {
    return toRelation(this.fields[field]);
  }

  /** One-to-many / many-to-many fields arrive as plain id arrays. */
  idList(field: string): number[] {
    const value = this.fields[field];
    if (!Array.isArray(value)) return [];
    return value.filter(
      (id): id is number => typeof id === "number" && Number.isInteger(id)
    );
  }

  with(field: string, value: unknown): RemoteRecord {
    return new RemoteRecord({ ...this.fields, [field]: value });
  }
}
