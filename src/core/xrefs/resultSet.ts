export interface CallRecord {
  name: string;
  callCount: number;
  /** Sorted ascending; duplicates kept. */
  callers: string[];
}

/**
 * Canonical name -> call record, in insertion order.
 *
 * Setting an existing name replaces its record but keeps its position.
 */
export class XrefResultSet {
  private readonly records = new Map<string, CallRecord>();

  /** Returns the record that was replaced, if any. */
  set(record: CallRecord): CallRecord | undefined {
    const previous = this.records.get(record.name);
    this.records.set(record.name, record);
    return previous;
  }

  get(name: string): CallRecord | undefined {
    return this.records.get(name);
  }

  has(name: string): boolean {
    return this.records.has(name);
  }

  get size(): number {
    return this.records.size;
  }

  names(): string[] {
    return Array.from(this.records.keys());
  }

  values(): IterableIterator<CallRecord> {
    return this.records.values();
  }

  [Symbol.iterator](): IterableIterator<CallRecord> {
    return this.records.values();
  }
}

export type ReadonlyXrefResultSet = Pick<XrefResultSet, 'get' | 'has' | 'size' | 'names' | 'values'> & Iterable<CallRecord>;
