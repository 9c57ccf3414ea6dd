import { describe, it, expect } from 'vitest';
import type { FlatRecord } from '@periorecord/types';
import { InMemoryRecordStore } from '../../src/repositories/InMemoryRecordStore.js';

const record: FlatRecord = {
  mrn: '222',
  first: 'tom',
  last: 'wagar',
  birthday: '19830303',
  sex: 'male',
  _type: 'PeriodicExam',
  date: '20210101',
  asa: null,
  note: null,
};

describe('InMemoryRecordStore', () => {
  it('should start empty', () => {
    expect(new InMemoryRecordStore().read()).toEqual([]);
  });

  it('should return what was written', () => {
    const store = new InMemoryRecordStore();

    store.write([record]);

    expect(store.read()).toEqual([record]);
  });

  it('should not share records with callers', () => {
    const store = new InMemoryRecordStore([record]);
    const [first] = store.read();
    if (typeof first === 'object' && first !== null) {
      Reflect.set(first, 'mrn', '999');
    }

    expect(store.read()).toEqual([record]);
  });
});
