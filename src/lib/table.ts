/**
 * Table Module
 * 不可變的記憶體資料表 - 所有操作都回傳新的資料表
 */

export interface Table<Row extends object> {
  /** 資料列數 */
  readonly size: number;
  /** 取得資料列（深層複製，修改不影響資料表） */
  rows(): Row[];
  filterRows(predicate: (row: Row) => boolean): Table<Row>;
  /** 依欄位遞增排序（穩定排序，null 排最後） */
  sortBy<K extends keyof Row>(column: K): Table<Row>;
  /** 不重複隨機抽樣 n 列 */
  sample(n: number, random?: () => number): Table<Row>;
  head(n: number): Table<Row>;
  project<K extends keyof Row>(columns: readonly K[]): Table<Partial<Row>>;
  map<Next extends object>(fn: (row: Row) => Next): Table<Next>;
}

/**
 * 比較兩個欄位值（數字、字串、日期）
 */
export function compareValues(a: unknown, b: unknown): number {
  const aMissing = a === null || a === undefined;
  const bMissing = b === null || b === undefined;
  if (aMissing || bMissing) {
    if (aMissing && bMissing) return 0;
    return aMissing ? 1 : -1;
  }

  const left = a instanceof Date ? a.getTime() : a;
  const right = b instanceof Date ? b.getTime() : b;

  if (typeof left === 'number' && typeof right === 'number') {
    return left - right;
  }

  const leftText = String(left);
  const rightText = String(right);
  if (leftText < rightText) return -1;
  if (leftText > rightText) return 1;
  return 0;
}

/**
 * 以陣列實作的資料表
 */
export class RowTable<Row extends object> implements Table<Row> {
  private readonly data: readonly Row[];

  constructor(rows: readonly Row[]) {
    this.data = rows;
  }

  get size(): number {
    return this.data.length;
  }

  rows(): Row[] {
    return this.data.map((row) => structuredClone(row));
  }

  filterRows(predicate: (row: Row) => boolean): RowTable<Row> {
    return new RowTable(this.data.filter((row) => predicate(row)));
  }

  sortBy<K extends keyof Row>(column: K): RowTable<Row> {
    const sorted = [...this.data].sort((a, b) => compareValues(a[column], b[column]));
    return new RowTable(sorted);
  }

  sample(n: number, random: () => number = Math.random): RowTable<Row> {
    const pool = [...this.data];
    const count = Math.min(Math.max(0, Math.floor(n)), pool.length);

    // 部分 Fisher-Yates 洗牌，只洗前 count 個位置
    for (let i = 0; i < count; i++) {
      const j = i + Math.floor(random() * (pool.length - i));
      const picked = pool[j];
      pool[j] = pool[i];
      pool[i] = picked;
    }

    return new RowTable(pool.slice(0, count));
  }

  head(n: number): RowTable<Row> {
    return new RowTable(this.data.slice(0, Math.max(0, n)));
  }

  project<K extends keyof Row>(columns: readonly K[]): RowTable<Partial<Row>> {
    return this.map((row) => {
      const projected: Partial<Row> = {};
      for (const column of columns) {
        projected[column] = row[column];
      }
      return projected;
    });
  }

  map<Next extends object>(fn: (row: Row) => Next): RowTable<Next> {
    return new RowTable(this.data.map((row) => fn(row)));
  }
}
