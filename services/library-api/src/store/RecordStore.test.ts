import { NotFoundError, ValidationError } from '../errors';
import { makeBookInput } from '../__tests__/utils/fixtures';
import { createBookStore, createProductStore } from './index';

const fixedClock = (iso: string) => () => new Date(iso);

describe('RecordStore', () => {
  describe('create', () => {
    it('assigns sequential ids starting at 1 and the creation timestamp', () => {
      const store = createBookStore(fixedClock('2024-03-01T10:00:00.000Z'));

      const first = store.create(makeBookInput({ title: 'First' }));
      const second = store.create(makeBookInput({ title: 'Second' }));

      expect(first.id).toBe(1);
      expect(second.id).toBe(2);
      expect(first.added_at).toBe('2024-03-01T10:00:00.000Z');
    });

    it('defaults available to true and summary to null', () => {
      const store = createBookStore();
      const { available, summary, ...rest } = makeBookInput();

      const book = store.create(rest);

      expect(book.available).toBe(true);
      expect(book.summary).toBeNull();
    });

    it('rejects invalid input without storing anything or consuming an id', () => {
      const store = createBookStore();

      expect(() => store.create(makeBookInput({ pages: 0 }))).toThrow(ValidationError);
      expect(store.size).toBe(0);
      expect(store.lastId).toBe(0);

      expect(store.create(makeBookInput()).id).toBe(1);
    });

    it('names the offending field in the error', () => {
      const store = createBookStore();

      try {
        store.create(makeBookInput({ isbn: '123' }));
        throw new Error('expected create to fail');
      } catch (error) {
        expect(error).toBeInstanceOf(ValidationError);
        if (error instanceof ValidationError) {
          expect(error.issues.map((issue) => issue.field)).toEqual(['isbn']);
          expect(error.message.startsWith('isbn: ')).toBe(true);
        }
      }
    });

    it('ignores id and added_at supplied by the caller', () => {
      const store = createBookStore(fixedClock('2024-03-01T10:00:00.000Z'));

      const book = store.create({ ...makeBookInput(), id: 99, added_at: '1999-01-01T00:00:00.000Z' });

      expect(book.id).toBe(1);
      expect(book.added_at).toBe('2024-03-01T10:00:00.000Z');
    });
  });

  describe('get', () => {
    it('returns the stored record', () => {
      const store = createBookStore();
      const created = store.create(makeBookInput({ title: 'Lookup' }));

      expect(store.get(created.id)).toEqual(created);
    });

    it('throws NotFoundError for an unknown id', () => {
      const store = createBookStore();

      expect(() => store.get(42)).toThrow(NotFoundError);
      expect(() => store.get(42)).toThrow('Book is not found with id 42');
    });

    it('returns a copy that cannot change the stored record', () => {
      const store = createBookStore();
      const created = store.create(makeBookInput({ title: 'Original' }));

      const copy = store.get(created.id);
      copy.title = 'Changed outside';

      expect(store.get(created.id).title).toBe('Original');
    });
  });

  describe('update', () => {
    it('changes only the supplied fields', () => {
      const store = createBookStore(fixedClock('2024-03-01T10:00:00.000Z'));
      const before = store.create(makeBookInput({ title: 'Before', summary: 'Kept' }));

      const after = store.update(before.id, { title: 'After', available: false });

      expect(after).toEqual({ ...before, title: 'After', available: false });
      expect(after.id).toBe(before.id);
      expect(after.added_at).toBe(before.added_at);
      expect(after.summary).toBe('Kept');
    });

    it('applies a value equal to the default when it is sent explicitly', () => {
      const store = createBookStore();
      const book = store.create(makeBookInput({ available: false }));

      expect(store.update(book.id, { available: true }).available).toBe(true);
    });

    it('clears the summary when null is sent', () => {
      const store = createBookStore();
      const book = store.create(makeBookInput({ summary: 'Some text' }));

      expect(store.update(book.id, { summary: null }).summary).toBeNull();
    });

    it('treats undefined values as not supplied', () => {
      const store = createBookStore();
      const book = store.create(makeBookInput({ title: 'Stays' }));

      expect(store.update(book.id, { title: undefined }).title).toBe('Stays');
    });

    it('cannot change id or added_at', () => {
      const store = createBookStore(fixedClock('2024-03-01T10:00:00.000Z'));
      const book = store.create(makeBookInput());

      const updated = store.update(book.id, { id: 500, added_at: '1999-01-01T00:00:00.000Z' });

      expect(updated.id).toBe(book.id);
      expect(updated.added_at).toBe('2024-03-01T10:00:00.000Z');
      expect(() => store.get(500)).toThrow(NotFoundError);
    });

    it('rejects values that break a constraint and leaves the record unchanged', () => {
      const store = createBookStore();
      const book = store.create(makeBookInput({ published_year: 2000 }));

      expect(() => store.update(book.id, { published_year: 2101 })).toThrow(ValidationError);
      expect(store.get(book.id).published_year).toBe(2000);
    });

    it('throws NotFoundError for an unknown id', () => {
      const store = createBookStore();

      expect(() => store.update(7, { title: 'Nope' })).toThrow(NotFoundError);
    });

    it('keeps the original insertion position', () => {
      const store = createBookStore();
      const a = store.create(makeBookInput({ title: 'A' }));
      store.create(makeBookInput({ title: 'B' }));

      store.update(a.id, { title: 'A2' });

      expect(store.list().map((book) => book.title)).toEqual(['A2', 'B']);
    });
  });

  describe('delete', () => {
    it('removes and returns the record', () => {
      const store = createBookStore();
      const a = store.create(makeBookInput({ title: 'A' }));
      const b = store.create(makeBookInput({ title: 'B' }));

      expect(store.delete(a.id)).toEqual(a);
      expect(() => store.get(a.id)).toThrow(NotFoundError);
      expect(store.list()).toEqual([b]);
    });

    it('never reuses a deleted id', () => {
      const store = createBookStore();
      store.create(makeBookInput());
      const second = store.create(makeBookInput());

      store.delete(second.id);
      const third = store.create(makeBookInput());

      expect(third.id).toBe(3);
      expect(() => store.get(second.id)).toThrow(NotFoundError);
    });

    it('throws NotFoundError when deleting twice', () => {
      const store = createBookStore();
      const book = store.create(makeBookInput());

      store.delete(book.id);

      expect(() => store.delete(book.id)).toThrow(NotFoundError);
    });
  });

  it('keeps ids unique and increasing across creates and deletes', () => {
    const store = createBookStore();
    const assigned: number[] = [];

    for (let round = 0; round < 5; round++) {
      const a = store.create(makeBookInput());
      const b = store.create(makeBookInput());
      assigned.push(a.id, b.id);
      store.delete(a.id);
    }

    const liveIds = store.list().map((book) => book.id);
    expect(new Set(liveIds).size).toBe(liveIds.length);
    for (let i = 1; i < assigned.length; i++) {
      expect(assigned[i]).toBeGreaterThan(assigned[i - 1]);
    }
    expect(liveIds).toEqual([2, 4, 6, 8, 10]);
  });

  describe('bulkLoad', () => {
    it('loads valid inputs in order and reports rejected ones by index', () => {
      const store = createBookStore();

      const result = store.bulkLoad([
        makeBookInput({ title: 'Good 1' }),
        makeBookInput({ title: '' }),
        makeBookInput({ title: 'Good 2' }),
      ]);

      expect(result.loaded.map((book) => [book.id, book.title])).toEqual([
        [1, 'Good 1'],
        [2, 'Good 2'],
      ]);
      expect(result.rejected).toHaveLength(1);
      expect(result.rejected[0].index).toBe(1);
      expect(result.rejected[0].error.issues[0].field).toBe('title');
    });
  });

  describe('clear', () => {
    it('empties the store without resetting the id counter', () => {
      const store = createBookStore();
      store.create(makeBookInput());
      store.create(makeBookInput());

      store.clear();

      expect(store.list()).toEqual([]);
      expect(store.create(makeBookInput()).id).toBe(3);
    });
  });

  it('backs the product catalog with the same rules', () => {
    const store = createProductStore(fixedClock('2024-05-05T05:05:05.000Z'));

    const product = store.create({ name: 'Lamp', price: 20, category: 'Home' });

    expect(product).toEqual({
      id: 1,
      name: 'Lamp',
      price: 20,
      category: 'Home',
      in_stock: true,
      description: null,
      created_at: '2024-05-05T05:05:05.000Z',
    });
    expect(() => store.create({ name: 'Free', price: 0, category: 'Home' })).toThrow(ValidationError);
  });
});
