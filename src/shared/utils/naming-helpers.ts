/**
 * Naming conventions mapping model and property names to names in the store
 */

import { snakeCase } from 'lodash';
import pluralize from 'pluralize';

export type NamingConvention = (name: string) => string;

export const NamingConventions = {
  /** `numSpots` -> `num_spots`, `HeffalumpSpot` -> `heffalump_spot` */
  underscored: ((name) => snakeCase(name)) satisfies NamingConvention,
  /** `HeffalumpSpot` -> `heffalump_spots` */
  underscoredAndPluralized: ((name) => pluralize.plural(snakeCase(name))) satisfies NamingConvention,
};

/**
 * Underscores a column name coming back from the store, as used for the keys
 * of raw query records
 *
 * @example
 * underscore('numSpots')  // 'num_spots'
 * underscore('COUNT(*)')  // 'count'
 */
export function underscore(columnName: string): string {
  return snakeCase(columnName);
}
