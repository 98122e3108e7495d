/**
 * TrustSQL Result Rows
 *
 * A thin read-only view over one driver row. `get()` gives every backend the
 * same text form; `value()` keeps the driver's own value.
 */

function toText(value: unknown): string {
  if (value instanceof Date) return value.toISOString();
  if (value instanceof Uint8Array) return Buffer.from(value).toString('hex');
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}

export class Row {
  private readonly record: Readonly<Record<string, unknown>>;

  constructor(record: Record<string, unknown>) {
    this.record = { ...record };
  }

  /**
   * Column value as text. `null` for SQL NULL, `undefined` when the row has no
   * such column.
   */
  get(column: string): string | null | undefined {
    if (!Object.hasOwn(this.record, column)) return undefined;
    const value = this.record[column];
    if (value === null || value === undefined) return null;
    return toText(value);
  }

  value(column: string): unknown {
    return this.record[column];
  }

  get columnCount(): number {
    return Object.keys(this.record).length;
  }

  columnNames(): string[] {
    return Object.keys(this.record);
  }

  toObject(): Record<string, unknown> {
    return { ...this.record };
  }
}
