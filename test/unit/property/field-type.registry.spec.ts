import { DefinitionException } from '../../../src/core/exceptions/custom-exceptions';
import { Model, property } from '../../../src/core/model/model';
import {
  FieldTypeRegistry,
  Types,
  decodePrimitive,
  defineCustomType,
  isCustomType,
} from '../../../src/core/property/field-type.registry';

const Csv = defineCustomType<string[]>({
  name: 'Csv',
  primitive: 'text',
  dump: (value) => value.join(','),
  load: (primitive) => String(primitive).split(','),
});

describe('FieldTypeRegistry', () => {
  it('should register the built-in types', () => {
    const registry = new FieldTypeRegistry();

    expect(registry.has('String')).toBe(true);
    expect(registry.get('Serial')).toBe(Types.Serial);
    expect(registry.all().map((type) => type.name)).toEqual([
      'String',
      'Text',
      'Integer',
      'Serial',
      'Float',
      'Decimal',
      'Boolean',
      'DateTime',
      'Date',
      'Time',
      'Json',
    ]);
  });

  it('should reject a second type with the same name', () => {
    const registry = new FieldTypeRegistry();

    expect(() => registry.register(Types.String)).toThrow(DefinitionException);
  });

  it('should resolve custom types registered by name', () => {
    const registry = new FieldTypeRegistry().register(Csv);
    const model = new Model('Heffalump', { nicknames: 'Csv' }, { types: registry });

    expect(model.propertyNamed('nicknames').type).toBe(Csv);
    expect(model.propertyNamed('nicknames').custom).toBe(true);
  });

  it('should flag the boolean capability on the type', () => {
    expect(Types.Boolean.isBoolean).toBe(true);
    expect(Types.Integer.isBoolean).toBe(false);
  });

  describe('custom types', () => {
    it('should dump and load through the type', () => {
      const model = new Model('Heffalump', { nicknames: property(Csv) });
      const nicknames = model.propertyNamed('nicknames');

      expect(isCustomType(Csv)).toBe(true);
      expect(isCustomType(Types.Text)).toBe(false);
      expect(nicknames.value(['heff', 'lump'])).toBe('heff,lump');
      expect(nicknames.decode('heff,lump')).toEqual(['heff', 'lump']);
    });

    it('should merge the type default options under the declared ones', () => {
      const Slug = defineCustomType<string>({
        name: 'Slug',
        primitive: 'string',
        bounded: true,
        defaultOptions: { length: 80, index: true },
        dump: (value) => value.toLowerCase(),
        load: (primitive) => String(primitive),
      });
      const model = new Model('Article', {
        slug: Slug,
        shortSlug: property(Slug, { length: 20 }),
      });

      expect(model.propertyNamed('slug').length).toBe(80);
      expect(model.propertyNamed('slug').index).toBe(true);
      expect(model.propertyNamed('shortSlug').length).toBe(20);
      expect(model.propertyNamed('shortSlug').value('Hello')).toBe('hello');
    });
  });

  describe('decodePrimitive', () => {
    it('should decode integers from numbers, strings and bigints', () => {
      expect(decodePrimitive('integer', 7)).toBe(7);
      expect(decodePrimitive('integer', '12')).toBe(12);
      expect(decodePrimitive('integer', BigInt(9))).toBe(9);
    });

    it('should keep decimals as strings', () => {
      expect(decodePrimitive('decimal', 1.5)).toBe('1.5');
    });

    it('should decode the truthy spellings of booleans', () => {
      expect(['t', 'true', '1', 1, true].map((raw) => decodePrimitive('boolean', raw))).toEqual([
        true,
        true,
        true,
        true,
        true,
      ]);
      expect(decodePrimitive('boolean', 'f')).toBe(false);
    });

    it('should decode dates from strings and epoch numbers', () => {
      expect(decodePrimitive('datetime', '2024-01-02T03:04:05.000Z')).toEqual(
        new Date('2024-01-02T03:04:05.000Z'),
      );
      expect(decodePrimitive('date', 0)).toEqual(new Date(0));
    });

    it('should decode text from buffers', () => {
      expect(decodePrimitive('text', Buffer.from('spotty', 'utf8'))).toBe('spotty');
    });

    it('should map missing values to null', () => {
      expect(decodePrimitive('string', undefined)).toBeNull();
      expect(decodePrimitive('integer', null)).toBeNull();
    });
  });
});
