import fs from 'node:fs/promises';
import path from 'node:path';
import { DuckDBInstance, type DuckDBConnection } from '@duckdb/node-api';
import { z } from 'zod';
import { SchemaIncompatible } from '../engine/errors';
import { formatError } from '../engine/logger';
import { parseUnscaled } from '../schema/decimal';
import type { NormalizationPlan } from '../schema/normalize';
import type { ColumnSchema, DecimalType } from '../schema/types';
import { columnsFromSchemaElements, SchemaElementRow } from './parquet-schema';

/**
 * Reads what the loader needs from a Parquet file and writes normalized copies.
 */
export interface ParquetInspector {
  readSchema(filePath: string): Promise<ColumnSchema>;
  countRows(filePath: string): Promise<number>;
  /** Non-null values of a decimal column, unscaled at the column's scale */
  readDecimalValues(filePath: string, column: string, type: DecimalType): Promise<bigint[]>;
  /** Write a copy of `sourcePath` with the plan's decimal rewrites applied */
  writeNormalized(sourcePath: string, destinationPath: string, plan: NormalizationPlan): Promise<void>;
  close(): void;
}

export const quoteIdentifier = (name: string): string => `"${name.replace(/"/g, '""')}"`;

export const quoteLiteral = (value: string): string => `'${value.replace(/'/g, "''")}'`;

const CountRow = z.object({
  row_count: z.union([z.number(), z.bigint(), z.string()]).transform(Number),
});

const DescribeRow = z.object({
  column_name: z.string(),
  column_type: z.string(),
});

const ValueRow = z.object({
  value: z.string(),
});

const decimalSql = (type: { precision: number; scale: number }): string => `DECIMAL(${type.precision},${type.scale})`;

/**
 * Inspector backed by an in-memory DuckDB database. One instance serves a
 * whole run; queries go through a single connection.
 */
export class DuckDbInspector implements ParquetInspector {
  private constructor(
    readonly instance: DuckDBInstance,
    private readonly connection: DuckDBConnection
  ) {}

  static async create(): Promise<DuckDbInspector> {
    const instance = await DuckDBInstance.create(':memory:');
    const connection = await instance.connect();
    return new DuckDbInspector(instance, connection);
  }

  async readSchema(filePath: string): Promise<ColumnSchema> {
    const rows = await this.query(
      filePath,
      `SELECT name, type, type_length, repetition_type, num_children, converted_type, scale, precision, logical_type
         FROM parquet_schema(${quoteLiteral(filePath)})`
    );
    return columnsFromSchemaElements(rows.map((row) => SchemaElementRow.parse(row)));
  }

  async countRows(filePath: string): Promise<number> {
    const rows = await this.query(filePath, `SELECT count(*) AS row_count FROM read_parquet(${quoteLiteral(filePath)})`);
    const [row] = rows;
    return row ? CountRow.parse(row).row_count : 0;
  }

  async readDecimalValues(filePath: string, column: string, type: DecimalType): Promise<bigint[]> {
    await this.assertReadableAsDeclared(filePath, column, type);

    const name = quoteIdentifier(column);
    const rows = await this.query(
      filePath,
      `SELECT CAST(${name} AS VARCHAR) AS value FROM read_parquet(${quoteLiteral(filePath)}) WHERE ${name} IS NOT NULL`
    );

    return rows.map((row) => {
      const { value } = ValueRow.parse(row);
      const unscaled = parseUnscaled(value, type.scale);
      if (unscaled === undefined) {
        throw new SchemaIncompatible(`Column '${column}': cannot read value ${value} as decimal(${type.precision},${type.scale})`, {
          column,
        });
      }
      return unscaled;
    });
  }

  async writeNormalized(sourcePath: string, destinationPath: string, plan: NormalizationPlan): Promise<void> {
    const casts = new Map(plan.rewrites.map((rewrite) => [rewrite.column, rewrite]));
    for (const rewrite of plan.rewrites) {
      await this.assertReadableAsDeclared(sourcePath, rewrite.column, rewrite.from);
    }

    const selectList = plan.schema
      .map((column) => {
        const name = quoteIdentifier(column.name);
        const rewrite = casts.get(column.name);
        return rewrite ? `CAST(${name} AS ${decimalSql(rewrite.to)}) AS ${name}` : name;
      })
      .join(', ');

    const partial = `${destinationPath}.partial`;
    await fs.mkdir(path.dirname(destinationPath), { recursive: true });
    try {
      await this.connection.run(
        `COPY (SELECT ${selectList} FROM read_parquet(${quoteLiteral(sourcePath)})) TO ${quoteLiteral(partial)} (FORMAT PARQUET)`
      );
      await fs.rename(partial, destinationPath);
    } catch (err) {
      await fs.rm(partial, { force: true });
      throw new SchemaIncompatible(`Cannot write normalized copy of ${sourcePath}: ${formatError(err)}`, {
        file: sourcePath,
      });
    }
  }

  close(): void {
    this.connection.closeSync();
  }

  /**
   * DuckDB reads decimals wider than it supports as DOUBLE, which would lose
   * digits. Such columns cannot be normalized exactly.
   */
  private async assertReadableAsDeclared(filePath: string, column: string, type: DecimalType): Promise<void> {
    const rows = await this.query(filePath, `DESCRIBE SELECT * FROM read_parquet(${quoteLiteral(filePath)})`);
    const described = rows.map((row) => DescribeRow.parse(row)).find((row) => row.column_name === column);
    const expected = decimalSql(type);

    if (!described || described.column_type.replace(/\s/g, '') !== expected) {
      throw new SchemaIncompatible(
        `Column '${column}' is decimal(${type.precision},${type.scale}) and cannot be read without loss (read as ${described?.column_type ?? 'nothing'})`,
        { column }
      );
    }
  }

  private async query(filePath: string, sql: string): Promise<Record<string, unknown>[]> {
    try {
      const reader = await this.connection.runAndReadAll(sql);
      return reader.getRowObjectsJson();
    } catch (err) {
      throw new SchemaIncompatible(`Cannot read ${filePath} as parquet: ${formatError(err)}`, { file: filePath });
    }
  }
}
