import { isPlainObject } from 'lodash';
import { UnknownPropertyException, UsageException } from '../exceptions/custom-exceptions';
import { Property } from '../property/property';
import type { PropertySet } from '../property/property-set';
import { Range } from './range';

export const COMPARISON_OPERATORS = [
  'eql',
  'in',
  'not',
  'like',
  'gt',
  'gte',
  'lt',
  'lte',
] as const;

export type ComparisonOperator = (typeof COMPARISON_OPERATORS)[number];
export type ConditionOperator = ComparisonOperator | 'raw';

export type Scalar = string | number | boolean | bigint | Date | Buffer;

export type Operand =
  | Scalar
  | null
  | readonly Scalar[]
  | Range<Scalar>
  | RegExp
  | Property;

export interface Comparison {
  readonly operator: ComparisonOperator;
  readonly subject: Property;
  readonly operand: Operand;
}

export interface RawCondition {
  readonly operator: 'raw';
  readonly statement: string;
  readonly binds?: readonly unknown[];
}

export type Condition = Comparison | RawCondition;

export type OperatorMap = Partial<Record<ComparisonOperator, Operand>>;

/**
 * Conditions keyed by property name: a bare operand compares for equality
 * (a `RegExp` matches), an operator map applies each operator in turn.
 *
 * @example
 * { color: 'red', numSpots: { not: [1, 3, 5, 7] }, name: /^he/ }
 */
export type WhereHash = Record<string, Operand | OperatorMap>;

export function isComparisonOperator(value: string): value is ComparisonOperator {
  return COMPARISON_OPERATORS.some((operator) => operator === value);
}

export function isRawCondition(condition: Condition): condition is RawCondition {
  return condition.operator === 'raw';
}

export function isRange(operand: Operand): operand is Range<Scalar> {
  return operand instanceof Range;
}

export function isOperandList(operand: Operand): operand is readonly Scalar[] {
  return Array.isArray(operand);
}

function isOperatorMap(value: Operand | OperatorMap): value is OperatorMap {
  return isPlainObject(value);
}

export function comparison(
  operator: ComparisonOperator,
  subject: Property,
  operand: Operand,
): Comparison {
  if (operator === 'eql' && operand instanceof RegExp) {
    return { operator: 'like', subject, operand };
  }
  return { operator, subject, operand };
}

export function raw(statement: string, ...binds: unknown[]): RawCondition {
  return { operator: 'raw', statement, binds };
}

/**
 * At most one row can satisfy the condition: equality against a unique
 * property with a single non-null value. Unique columns may hold many nulls.
 */
export function isUniqueMatch(condition: Condition): boolean {
  if (isRawCondition(condition)) return false;
  const { operator, subject, operand } = condition;
  return (
    (operator === 'eql' || operator === 'in') &&
    subject.unique &&
    operand !== null &&
    !isOperandList(operand) &&
    !isRange(operand) &&
    !(operand instanceof RegExp) &&
    !(operand instanceof Property)
  );
}

export function parseWhere(
  modelName: string,
  properties: PropertySet,
  where: WhereHash,
): Comparison[] {
  const conditions: Comparison[] = [];

  for (const [name, value] of Object.entries(where)) {
    const subject = properties.get(name);
    if (!subject) {
      throw new UnknownPropertyException(modelName, name);
    }

    if (!isOperatorMap(value)) {
      conditions.push(comparison('eql', subject, value));
      continue;
    }

    for (const [operator, operand] of Object.entries(value)) {
      if (!isComparisonOperator(operator)) {
        throw new UsageException(`Unknown operator '${operator}' for ${modelName}.${name}`, {
          operator,
        });
      }
      if (operand !== undefined) {
        conditions.push(comparison(operator, subject, operand));
      }
    }
  }

  return conditions;
}

export function isScalar(value: unknown): value is Scalar {
  switch (typeof value) {
    case 'string':
    case 'number':
    case 'boolean':
    case 'bigint':
      return true;
    case 'object':
      return value instanceof Date || Buffer.isBuffer(value);
    default:
      return false;
  }
}
