/**
 * In-process stand-in for the Mongoose models and connection used by the
 * services. Supports the query chains the services call, upserts, and
 * session transactions that roll back every collection when the work throws.
 *
 * Integration specs only: there is no isolation between sessions, a nested
 * transaction sees the uncommitted writes of the outer one.
 */

export type Doc = Record<string, unknown>;
type Filter = Record<string, unknown>;
type SortSpec = Record<string, 1 | -1>;

interface UpdateOptions {
  new?: boolean;
  upsert?: boolean;
  session?: unknown;
}

interface ModelOptions {
  defaults?: Doc;
  hidden?: string[];
  timestamps?: boolean;
}

let idCounter = 0;

function isDate(value: unknown): value is Date {
  return Object.prototype.toString.call(value) === '[object Date]';
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !isDate(value);
}

/**
 * Deep copy of stored values, Dates recreated in the current realm
 */
export function cloneValue<T>(value: T): T;
export function cloneValue(value: unknown): unknown {
  if (isDate(value)) {
    return new Date(value.valueOf());
  }
  if (Array.isArray(value)) {
    return value.map((item) => cloneValue(item));
  }
  if (isPlainObject(value)) {
    const copy: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      copy[key] = cloneValue(item);
    }
    return copy;
  }
  return value;
}

export function newObjectId(): string {
  idCounter += 1;
  return idCounter.toString(16).padStart(24, '0');
}

export class InMemoryStore {
  private collections = new Map<string, Doc[]>();

  collection(name: string): Doc[] {
    let docs = this.collections.get(name);
    if (!docs) {
      docs = [];
      this.collections.set(name, docs);
    }
    return docs;
  }

  snapshot(): Map<string, Doc[]> {
    return new Map([...this.collections].map(([name, docs]): [string, Doc[]] => [name, cloneValue(docs)]));
  }

  restore(snapshot: Map<string, Doc[]>): void {
    this.collections = new Map([...snapshot].map(([name, docs]): [string, Doc[]] => [name, cloneValue(docs)]));
  }
}

export class InMemorySession {
  constructor(private connection: InMemoryConnection) {}

  async withTransaction<T>(fn: () => Promise<T>): Promise<T> {
    const snapshot = this.connection.store.snapshot();
    try {
      const result = await fn();
      this.connection.committed += 1;
      return result;
    } catch (error) {
      this.connection.store.restore(snapshot);
      this.connection.aborted += 1;
      throw error;
    }
  }

  async endSession(): Promise<void> {
    this.connection.ended += 1;
  }
}

export class InMemoryConnection {
  readonly store = new InMemoryStore();
  readyState = 1;
  committed = 0;
  aborted = 0;
  ended = 0;

  async startSession(): Promise<InMemorySession> {
    return new InMemorySession(this);
  }
}

function isOperatorObject(value: unknown): value is Record<string, unknown> {
  return (
    isPlainObject(value) &&
    Object.keys(value).length > 0 &&
    Object.keys(value).every((key) => key.startsWith('$'))
  );
}

function comparable(value: unknown): unknown {
  return isDate(value) ? value.valueOf() : value;
}

function equals(actual: unknown, expected: unknown): boolean {
  if (expected === null) {
    return actual === null || actual === undefined;
  }
  return comparable(actual) === comparable(expected);
}

function compare(actual: unknown, expected: unknown): number | null {
  const a = comparable(actual);
  const b = comparable(expected);
  if (typeof a === 'number' && typeof b === 'number') {
    return a - b;
  }
  if (typeof a === 'string' && typeof b === 'string') {
    return a < b ? -1 : a > b ? 1 : 0;
  }
  return null;
}

function matchesCondition(actual: unknown, condition: unknown): boolean {
  if (!isOperatorObject(condition)) {
    return equals(actual, condition);
  }

  return Object.entries(condition).every(([operator, expected]) => {
    if (operator === '$ne') {
      return !equals(actual, expected);
    }
    if (operator === '$in') {
      return Array.isArray(expected) && expected.some((item) => equals(actual, item));
    }
    const diff = compare(actual, expected);
    if (diff === null) {
      return false;
    }
    switch (operator) {
      case '$gt':
        return diff > 0;
      case '$gte':
        return diff >= 0;
      case '$lt':
        return diff < 0;
      case '$lte':
        return diff <= 0;
      default:
        throw new Error(`Unsupported query operator ${operator}`);
    }
  });
}

function matches(doc: Doc, filter: Filter): boolean {
  return Object.entries(filter).every(([field, condition]) =>
    matchesCondition(doc[field], condition),
  );
}

export class InMemoryQuery<T> {
  private sortSpec: SortSpec | null = null;
  private limitCount: number | null = null;
  private selected: string[] = [];

  constructor(private readonly run: (query: InMemoryQuery<T>) => T) {}

  session(_session: unknown): this {
    return this;
  }

  select(fields: string): this {
    this.selected.push(
      ...fields
        .split(' ')
        .filter((field) => field.startsWith('+'))
        .map((field) => field.slice(1)),
    );
    return this;
  }

  sort(spec: SortSpec): this {
    this.sortSpec = spec;
    return this;
  }

  limit(count: number): this {
    this.limitCount = count;
    return this;
  }

  async exec(): Promise<T> {
    return this.run(this);
  }

  arrange(docs: Doc[]): Doc[] {
    let result = [...docs];
    const spec = this.sortSpec;
    if (spec) {
      result.sort((left, right) => {
        for (const [field, direction] of Object.entries(spec)) {
          const diff = compare(left[field], right[field]) ?? 0;
          if (diff !== 0) {
            return diff * direction;
          }
        }
        return 0;
      });
    }
    if (this.limitCount !== null) {
      result = result.slice(0, this.limitCount);
    }
    return result;
  }

  get includedHidden(): string[] {
    return this.selected;
  }
}

export class InMemoryModel {
  private readonly defaults: Doc;
  private readonly hidden: string[];
  private readonly timestamps: boolean;

  constructor(
    private readonly connection: InMemoryConnection,
    readonly collectionName: string,
    options: ModelOptions = {},
  ) {
    this.defaults = options.defaults ?? {};
    this.hidden = options.hidden ?? [];
    this.timestamps = options.timestamps ?? true;
  }

  private get docs(): Doc[] {
    return this.connection.store.collection(this.collectionName);
  }

  private project(doc: Doc, includeHidden: string[] = []): Doc {
    const copy = cloneValue(doc);
    for (const field of this.hidden) {
      if (!includeHidden.includes(field)) {
        delete copy[field];
      }
    }
    return copy;
  }

  /**
   * All stored documents, hidden fields included
   */
  all(): Doc[] {
    return cloneValue(this.docs);
  }

  findOne(filter: Filter = {}): InMemoryQuery<Doc | null> {
    return new InMemoryQuery<Doc | null>((query) => {
      const [found] = query.arrange(this.docs.filter((doc) => matches(doc, filter)));
      return found ? this.project(found, query.includedHidden) : null;
    });
  }

  findById(id: unknown): InMemoryQuery<Doc | null> {
    return this.findOne({ _id: String(id) });
  }

  find(filter: Filter = {}): InMemoryQuery<Doc[]> {
    return new InMemoryQuery<Doc[]>((query) =>
      query
        .arrange(this.docs.filter((doc) => matches(doc, filter)))
        .map((doc) => this.project(doc, query.includedHidden)),
    );
  }

  countDocuments(filter: Filter = {}): InMemoryQuery<number> {
    return new InMemoryQuery<number>(() => this.docs.filter((doc) => matches(doc, filter)).length);
  }

  findOneAndUpdate(
    filter: Filter,
    update: Doc,
    options: UpdateOptions = {},
  ): InMemoryQuery<Doc | null> {
    return new InMemoryQuery<Doc | null>(() => {
      let target = this.docs.find((doc) => matches(doc, filter));
      let inserted = false;

      if (!target) {
        if (!options.upsert) {
          return null;
        }
        target = this.seedFromFilter(filter);
        this.docs.push(target);
        inserted = true;
      }

      const before = this.project(target);
      this.applyUpdate(target, update, inserted);
      return options.new ? this.project(target) : inserted ? null : before;
    });
  }

  findByIdAndUpdate(
    id: unknown,
    update: Doc,
    options: UpdateOptions = {},
  ): InMemoryQuery<Doc | null> {
    return this.findOneAndUpdate({ _id: String(id) }, update, options);
  }

  deleteOne(filter: Filter, _options?: UpdateOptions): InMemoryQuery<{ deletedCount: number }> {
    return new InMemoryQuery<{ deletedCount: number }>(() => {
      const index = this.docs.findIndex((doc) => matches(doc, filter));
      if (index === -1) {
        return { deletedCount: 0 };
      }
      this.docs.splice(index, 1);
      return { deletedCount: 1 };
    });
  }

  async create(input: Doc): Promise<Doc>;
  async create(input: Doc[], options?: UpdateOptions): Promise<Doc[]>;
  async create(input: Doc | Doc[], _options?: UpdateOptions): Promise<Doc | Doc[]> {
    if (Array.isArray(input)) {
      return input.map((doc) => this.insert(doc));
    }
    return this.insert(input);
  }

  private insert(input: Doc): Doc {
    const now = new Date();
    const doc: Doc = {
      ...cloneValue(this.defaults),
      ...(this.timestamps ? { createdAt: now, updatedAt: now } : {}),
      ...cloneValue(input),
      _id: newObjectId(),
    };
    this.docs.push(doc);
    return this.project(doc);
  }

  private seedFromFilter(filter: Filter): Doc {
    const now = new Date();
    const doc: Doc = {
      ...cloneValue(this.defaults),
      ...(this.timestamps ? { createdAt: now, updatedAt: now } : {}),
      _id: newObjectId(),
    };
    for (const [field, condition] of Object.entries(filter)) {
      if (!isOperatorObject(condition)) {
        doc[field] = condition;
      }
    }
    return doc;
  }

  private applyUpdate(target: Doc, update: Doc, inserted: boolean): void {
    for (const [key, value] of Object.entries(update)) {
      if (!key.startsWith('$')) {
        target[key] = value;
        continue;
      }
      if (typeof value !== 'object' || value === null) {
        throw new Error(`Invalid ${key} update`);
      }
      for (const [field, operand] of Object.entries(value)) {
        switch (key) {
          case '$set':
            target[field] = operand;
            break;
          case '$setOnInsert':
            if (inserted) {
              target[field] = operand;
            }
            break;
          case '$inc': {
            const current = target[field];
            if (typeof operand !== 'number') {
              throw new Error(`$inc on ${field} needs a number`);
            }
            target[field] = (typeof current === 'number' ? current : 0) + operand;
            break;
          }
          default:
            throw new Error(`Unsupported update operator ${key}`);
        }
      }
    }
    if (this.timestamps) {
      target.updatedAt = new Date();
    }
  }
}
