import { SchemaIncompatible } from '../engine/errors';
import {
  canonicalPhysical,
  formatUnscaled,
  isCanonicalPhysical,
  isWithinBounds,
  nearestSupported,
  rescale,
} from './decimal';
import type { Column, ColumnData, ColumnSchema, DecimalRewrite, DecimalType } from './types';

export type DecimalBounds = { precision: number; scale: number };

/** Decimal types of an existing table, keyed by column name. */
export type DecimalTargets = ReadonlyMap<string, DecimalBounds>;

export type NormalizeOptions = {
  targets?: DecimalTargets;
};

export type NormalizationPlan = {
  schema: ColumnSchema;
  rewrites: readonly DecimalRewrite[];
};

export type NormalizationResult = NormalizationPlan & {
  data: ColumnData;
};

const desiredBounds = (type: DecimalType, target: DecimalBounds | undefined): DecimalBounds => {
  const inBounds = isWithinBounds(type.precision, type.scale);

  if (target) {
    if (inBounds && type.scale === target.scale && type.precision <= target.precision) {
      return { precision: type.precision, scale: type.scale };
    }
    return target;
  }

  if (inBounds) {
    return { precision: type.precision, scale: type.scale };
  }
  return nearestSupported(type.precision, type.scale);
};

const planDecimal = (type: DecimalType, target: DecimalBounds | undefined): DecimalType => {
  const bounds = desiredBounds(type, target);
  const sameBounds = bounds.precision === type.precision && bounds.scale === type.scale;

  if (sameBounds && isCanonicalPhysical(type.precision, type.physical)) {
    return type;
  }
  return { kind: 'decimal', ...bounds, physical: canonicalPhysical(bounds.precision) };
};

const canLoseDigits = (from: DecimalType, to: DecimalType): boolean =>
  to.scale < from.scale || to.precision - to.scale < from.precision - from.scale;

/**
 * Decide, from the schema alone, which decimal columns must be rewritten and
 * to what. Non-decimal columns pass through untouched.
 */
export const planNormalization = (schema: ColumnSchema, options: NormalizeOptions = {}): NormalizationPlan => {
  const rewrites: DecimalRewrite[] = [];

  const normalized = schema.map((column): Column => {
    if (column.type.kind !== 'decimal') return column;

    const from = column.type;
    const to = planDecimal(from, options.targets?.get(column.name));
    if (to === from) return column;

    rewrites.push({ column: column.name, from, to, needsValueCheck: canLoseDigits(from, to) });
    return { ...column, type: to };
  });

  return { schema: normalized, rewrites };
};

/**
 * Rewrite decimal columns into catalog-compatible types and cast their values.
 *
 * `data` must hold the observed values of every rewrite with `needsValueCheck`;
 * values of other rewritten columns are rescaled when present. A value that
 * cannot be represented in the new type fails the whole file.
 */
export const normalize = (
  schema: ColumnSchema,
  data: ColumnData,
  options: NormalizeOptions = {}
): NormalizationResult => {
  const plan = planNormalization(schema, options);
  const normalizedData = new Map(data);

  for (const rewrite of plan.rewrites) {
    const values = data.get(rewrite.column);
    if (!values) {
      if (rewrite.needsValueCheck) {
        throw new Error(`Observed values for column '${rewrite.column}' are required to normalize it`);
      }
      continue;
    }

    const { from, to } = rewrite;
    const cast: bigint[] = [];
    for (const value of values) {
      const result = rescale(value, from.scale, to.precision, to.scale);
      if (!result.ok) {
        throw new SchemaIncompatible(
          `Column '${rewrite.column}': value ${formatUnscaled(value, from.scale)} cannot be stored as decimal(${to.precision},${to.scale}) (${result.reason})`,
          { column: rewrite.column, from: `${from.precision},${from.scale}`, to: `${to.precision},${to.scale}` }
        );
      }
      cast.push(result.value);
    }
    normalizedData.set(rewrite.column, cast);
  }

  return { ...plan, data: normalizedData };
};
