import { Model } from '../../../src/core/model/model';
import { Types } from '../../../src/core/property/field-type.registry';
import {
  collapseRow,
  decodeRow,
  isRow,
  normalizeDriverResult,
} from '../../../src/infrastructure/sql/row-decoder';

describe('row decoding', () => {
  describe('normalizeDriverResult', () => {
    it('should read rows and counts from pg results', () => {
      const raw = { rows: [{ id: 1 }], rowCount: 1 };

      expect(normalizeDriverResult('postgres', raw)).toEqual({
        affectedRows: 1,
        rows: [{ id: 1 }],
        raw,
      });
    });

    it('should read rows from mysql2 result sets', () => {
      const raw = [[{ id: 1 }, { id: 2 }], []];

      expect(normalizeDriverResult('mysql', raw)).toEqual({
        affectedRows: 2,
        rows: [{ id: 1 }, { id: 2 }],
        raw,
      });
    });

    it('should read counts and ids from mysql2 result headers', () => {
      expect(normalizeDriverResult('mysql', [{ affectedRows: 1, insertId: 9 }, undefined])).toMatchObject({
        affectedRows: 1,
        insertId: 9,
        rows: [],
      });
    });

    it('should leave out the mysql2 id of statements that generated none', () => {
      expect(
        normalizeDriverResult('mysql', [{ affectedRows: 3, insertId: 0 }, undefined]).insertId,
      ).toBeUndefined();
    });

    it('should read better-sqlite3 rows and run results', () => {
      expect(normalizeDriverResult('sqlite', [{ id: 1 }]).rows).toEqual([{ id: 1 }]);
      expect(normalizeDriverResult('sqlite', { changes: 2, lastInsertRowid: 5 })).toMatchObject({
        affectedRows: 2,
        insertId: 5,
      });
    });

    it('should fall back to an empty result for unknown shapes', () => {
      expect(normalizeDriverResult('postgres', undefined)).toEqual({
        affectedRows: 0,
        rows: [],
        raw: undefined,
      });
    });
  });

  it('should decode fields by column name in field order', () => {
    const model = new Model('Heffalump', {
      id: Types.Serial,
      numSpots: Types.Integer,
      'striped?': Types.Boolean,
    });
    const fields = [model.propertyNamed('striped'), model.propertyNamed('numSpots')];

    expect(decodeRow(fields, { id: 1, num_spots: '4', striped: 0 })).toEqual([false, 4]);
  });

  it('should map missing columns to null', () => {
    const model = new Model('Heffalump', { color: Types.String });

    expect(decodeRow([model.propertyNamed('color')], {})).toEqual([null]);
  });

  describe('collapseRow', () => {
    it('should return the bare value of a single column', () => {
      expect(collapseRow({ 'COUNT(*)': 3 })).toBe(3);
    });

    it('should underscore the keys of wider rows', () => {
      expect(collapseRow({ numSpots: 1, Color: 'red' })).toEqual({ num_spots: 1, color: 'red' });
    });
  });

  it('should tell rows from other values', () => {
    expect(isRow({ id: 1 })).toBe(true);
    expect(isRow([{ id: 1 }])).toBe(false);
    expect(isRow(Buffer.from('x'))).toBe(false);
    expect(isRow(null)).toBe(false);
  });
});
