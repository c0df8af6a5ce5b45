import { NotFoundError, ValidationError } from '../errors';

export interface RecordStoreOptions<TRecord, TInput, TPatch> {
  /** Resource name used in NotFound messages, e.g. "Book" */
  resource: string;
  validateInput: (input: unknown) => TInput;
  validatePatch: (patch: unknown) => TPatch;
  /** Assemble a stored record from a validated input, its id and creation timestamp */
  build: (id: number, input: TInput, createdAt: string) => TRecord;
  now?: () => Date;
}

export interface RejectedRecord {
  index: number;
  error: ValidationError;
}

export interface BulkLoadResult<TRecord> {
  loaded: TRecord[];
  rejected: RejectedRecord[];
}

/**
 * In-memory, insertion-ordered collection of records keyed by an integer id.
 *
 * Ids come from a counter that only moves forward: a deleted id is never
 * handed out again, and a rejected create does not consume one.
 * Callers always receive copies; the store owns the stored objects.
 */
export class RecordStore<TRecord extends { id: number }, TInput, TPatch extends object> {
  private records = new Map<number, TRecord>();
  private counter = 0;
  private readonly options: RecordStoreOptions<TRecord, TInput, TPatch>;

  constructor(options: RecordStoreOptions<TRecord, TInput, TPatch>) {
    this.options = options;
  }

  get resource(): string {
    return this.options.resource;
  }

  get size(): number {
    return this.records.size;
  }

  /** Highest id ever assigned (0 before the first create) */
  get lastId(): number {
    return this.counter;
  }

  create(input: unknown): TRecord {
    const validated = this.options.validateInput(input);
    const now = this.options.now ? this.options.now() : new Date();

    this.counter += 1;
    const record = this.options.build(this.counter, validated, now.toISOString());
    this.records.set(record.id, record);

    return { ...record };
  }

  get(id: number): TRecord {
    return { ...this.require(id) };
  }

  update(id: number, patch: unknown): TRecord {
    const current = this.require(id);
    const changes = this.options.validatePatch(patch);

    // Map.set on an existing key keeps its insertion position
    const updated: TRecord = { ...current, ...changes, id: current.id };
    this.records.set(id, updated);

    return { ...updated };
  }

  delete(id: number): TRecord {
    const removed = this.require(id);
    this.records.delete(id);
    return removed;
  }

  list(): TRecord[] {
    return Array.from(this.records.values(), (record) => ({ ...record }));
  }

  /**
   * Create every input in order. Invalid inputs are collected rather than
   * thrown, so one bad entry does not stop the rest from loading.
   */
  bulkLoad(inputs: unknown[]): BulkLoadResult<TRecord> {
    const loaded: TRecord[] = [];
    const rejected: RejectedRecord[] = [];

    inputs.forEach((input, index) => {
      try {
        loaded.push(this.create(input));
      } catch (error) {
        if (!(error instanceof ValidationError)) {
          throw error;
        }
        rejected.push({ index, error });
      }
    });

    return { loaded, rejected };
  }

  /** Remove every record. The id counter keeps its value. */
  clear(): void {
    this.records.clear();
  }

  private require(id: number): TRecord {
    const record = this.records.get(id);
    if (!record) {
      throw new NotFoundError(this.options.resource, id);
    }
    return record;
  }
}
