export interface SqlStatement {
  text: string;
  values: unknown[];
}

/**
 * Builds `UPDATE ... SET` statements that touch only the columns that were
 * explicitly provided. `undefined` means "leave as is"; `null` is written.
 */
export class PartialUpdateBuilder {
  private readonly assignments: string[] = [];
  private readonly values: unknown[] = [];

  constructor(private readonly table: string) {}

  set(column: string, value: unknown, cast?: string): this {
    if (value === undefined) return this;
    this.values.push(value);
    const placeholder = `$${this.values.length}${cast ? `::${cast}` : ''}`;
    this.assignments.push(`${column} = ${placeholder}`);
    return this;
  }

  setJson(column: string, value: unknown): this {
    if (value === undefined) return this;
    return this.set(column, JSON.stringify(value), 'jsonb');
  }

  get isEmpty(): boolean {
    return this.assignments.length === 0;
  }

  build(id: string, options: { touchUpdatedAt?: boolean } = {}): SqlStatement | null {
    if (this.isEmpty) return null;

    const assignments = [...this.assignments];
    if (options.touchUpdatedAt) {
      assignments.push('updated_at = NOW()');
    }
    const values = [...this.values, id];

    return {
      text: `UPDATE ${this.table} SET ${assignments.join(', ')} WHERE id = $${values.length}`,
      values,
    };
  }
}
