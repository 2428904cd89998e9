import { Model } from '../../../src/core/model/model';
import { Types } from '../../../src/core/property/field-type.registry';
import { NamingConventions, underscore } from '../../../src/shared/utils/naming-helpers';

describe('NamingConventions', () => {
  it('should underscore property names', () => {
    expect(NamingConventions.underscored('numSpots')).toBe('num_spots');
  });

  it('should underscore and pluralize model names', () => {
    expect(NamingConventions.underscoredAndPluralized('HeffalumpSpot')).toBe('heffalump_spots');
    expect(NamingConventions.underscoredAndPluralized('Category')).toBe('categories');
  });

  it('should pluralize irregular nouns', () => {
    expect(NamingConventions.underscoredAndPluralized('Person')).toBe('people');
    expect(NamingConventions.underscoredAndPluralized('FieldMouse')).toBe('field_mice');
  });

  it('should name model tables by the convention', () => {
    expect(new Model('Person', { id: Types.Serial }).storageName()).toBe('people');
  });

  it('should underscore raw column names', () => {
    expect(underscore('COUNT(*)')).toBe('count');
  });
});
