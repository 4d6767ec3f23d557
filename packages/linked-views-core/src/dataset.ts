import { z } from 'zod';
import { InvalidDataset } from './errors';
import { logger } from './logger';
import { cellSchemas, columnDefSchema } from './schema';
import type {
  CellValue,
  ColumnDef,
  Row,
  RowKey,
  TabularSource,
} from './types';

export interface DatasetInit {
  name: string;
  columns: Array<ColumnDef>;
  rows: Array<Record<string, unknown>>;
}

/**
 * An immutable, named table shared by reference among every view in a group.
 *
 * Values are coerced per column type when the dataset is created. Row keys
 * come from the single `key` column if there is one, otherwise the row index.
 */
export class Dataset implements TabularSource {
  public readonly name: string;
  public readonly columns: ReadonlyArray<ColumnDef>;

  private readonly rows: ReadonlyArray<Row>;
  private readonly keys: ReadonlyArray<RowKey>;
  private readonly keyIndex: ReadonlyMap<RowKey, number>;
  private readonly rowKeys = new WeakMap<Row, RowKey>();
  private readonly columnIndex: ReadonlyMap<string, ColumnDef>;
  private readonly columnCache = new Map<string, ReadonlyArray<CellValue>>();
  private readonly keyColumn: string | null;

  private constructor(
    name: string,
    columns: ReadonlyArray<ColumnDef>,
    rows: ReadonlyArray<Row>,
  ) {
    this.name = name;
    this.columns = columns;
    this.rows = rows;
    this.columnIndex = new Map(columns.map((c) => [c.name, c]));

    const keyColumns = columns.filter((c) => c.type === 'key');
    if (keyColumns.length > 1) {
      throw new InvalidDataset(
        `[Dataset] "${name}" declares ${keyColumns.length} key columns; at most one is allowed.`,
      );
    }
    this.keyColumn = keyColumns[0]?.name ?? null;

    const keys: Array<RowKey> = [];
    const keyIndex = new Map<RowKey, number>();
    rows.forEach((row, index) => {
      const key = this.resolveKey(row, index);
      if (keyIndex.has(key)) {
        throw new InvalidDataset(
          `[Dataset] "${name}" has duplicate row key "${String(key)}".`,
        );
      }
      keyIndex.set(key, index);
      this.rowKeys.set(row, key);
      keys.push(key);
    });
    this.keys = keys;
    this.keyIndex = keyIndex;
  }

  /**
   * Validates the column definitions, coerces every row and freezes the result.
   */
  static from(init: DatasetInit): Dataset {
    const name = init.name.trim();
    if (name.length === 0) {
      throw new InvalidDataset('[Dataset] Dataset name cannot be empty.');
    }

    const columns = init.columns.map((col) => {
      const parsed = columnDefSchema.safeParse(col);
      if (!parsed.success) {
        throw new InvalidDataset(
          `[Dataset] "${name}" has an invalid column definition: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`,
          { cause: parsed.error },
        );
      }
      return Object.freeze(parsed.data);
    });

    const seen = new Set<string>();
    for (const col of columns) {
      if (seen.has(col.name)) {
        throw new InvalidDataset(
          `[Dataset] "${name}" declares column "${col.name}" twice.`,
        );
      }
      seen.add(col.name);
    }

    const rowSchema = z.object(
      Object.fromEntries(columns.map((c) => [c.name, cellSchemas[c.type]])),
    );

    const rows = init.rows.map((raw, index) => {
      const parsed = rowSchema.safeParse(raw);
      if (!parsed.success) {
        const issue = parsed.error.issues[0];
        throw new InvalidDataset(
          `[Dataset] "${name}" row ${index}, column "${String(issue?.path[0])}": ${issue?.message ?? 'invalid value'}`,
          { cause: parsed.error },
        );
      }
      const row: Record<string, CellValue> = {};
      for (const col of columns) {
        row[col.name] = parsed.data[col.name] ?? null;
      }
      return Object.freeze(row);
    });

    const dataset = new Dataset(
      name,
      Object.freeze(columns),
      Object.freeze(rows),
    );
    logger.debug('Core', `[Dataset] Loaded "${name}"`, {
      columns: columns.length,
      rows: rows.length,
    });
    return dataset;
  }

  getRows(): ReadonlyArray<Row> {
    return this.rows;
  }

  /**
   * Values of one column in row order. Cached per column.
   */
  getColumn(name: string): ReadonlyArray<CellValue> {
    const cached = this.columnCache.get(name);
    if (cached) {
      return cached;
    }
    if (!this.columnIndex.has(name)) {
      throw new InvalidDataset(
        `[Dataset] "${this.name}" has no column "${name}".`,
      );
    }
    const values = Object.freeze(this.rows.map((row) => row[name] ?? null));
    this.columnCache.set(name, values);
    return values;
  }

  getColumnDef(name: string): ColumnDef | undefined {
    return this.columnIndex.get(name);
  }

  rowCount(): number {
    return this.rows.length;
  }

  hasColumn(name: string): boolean {
    return this.columnIndex.has(name);
  }

  hasKey(key: RowKey): boolean {
    return this.keyIndex.has(key);
  }

  keyOf(row: Row): RowKey {
    const key = this.rowKeys.get(row);
    if (key === undefined) {
      throw new InvalidDataset(
        `[Dataset] Row does not belong to dataset "${this.name}".`,
      );
    }
    return key;
  }

  /**
   * All row keys in row order.
   */
  getKeys(): ReadonlyArray<RowKey> {
    return this.keys;
  }

  getRowByKey(key: RowKey): Row | undefined {
    const index = this.keyIndex.get(key);
    return index === undefined ? undefined : this.rows[index];
  }

  /**
   * A filtered projection sharing this dataset's rows.
   */
  subset(keys: ReadonlySet<RowKey>): FilteredDataset {
    return new FilteredDataset(this, keys);
  }

  private resolveKey(row: Row, index: number): RowKey {
    if (this.keyColumn === null) {
      return index;
    }
    const value = row[this.keyColumn];
    if (typeof value !== 'string' && typeof value !== 'number') {
      throw new InvalidDataset(
        `[Dataset] "${this.name}" row ${index} has no value for key column "${this.keyColumn}".`,
      );
    }
    return value;
  }
}

/**
 * A read-only projection of a dataset restricted to a key set.
 * Row order follows the parent dataset.
 */
export class FilteredDataset implements TabularSource {
  public readonly name: string;
  public readonly columns: ReadonlyArray<ColumnDef>;

  private readonly rows: ReadonlyArray<Row>;
  private readonly keys: ReadonlySet<RowKey>;

  constructor(
    private readonly parent: Dataset,
    keys: ReadonlySet<RowKey>,
  ) {
    this.name = parent.name;
    this.columns = parent.columns;
    this.keys = keys;
    this.rows = parent
      .getRows()
      .filter((row) => keys.has(parent.keyOf(row)));
  }

  getRows(): ReadonlyArray<Row> {
    return this.rows;
  }

  getColumn(name: string): ReadonlyArray<CellValue> {
    if (!this.parent.hasColumn(name)) {
      throw new InvalidDataset(
        `[Dataset] "${this.name}" has no column "${name}".`,
      );
    }
    return this.rows.map((row) => row[name] ?? null);
  }

  getColumnDef(name: string): ColumnDef | undefined {
    return this.parent.getColumnDef(name);
  }

  rowCount(): number {
    return this.rows.length;
  }

  hasColumn(name: string): boolean {
    return this.parent.hasColumn(name);
  }

  hasKey(key: RowKey): boolean {
    return this.keys.has(key) && this.parent.hasKey(key);
  }

  keyOf(row: Row): RowKey {
    return this.parent.keyOf(row);
  }
}
