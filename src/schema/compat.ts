import { isIngestError } from '../engine/errors';
import { formatIcebergType, toIcebergType, type IcebergType, type TableSchema } from '../catalog/iceberg-types';
import type { ColumnSchema } from './types';

const PROMOTIONS: Readonly<Record<string, readonly string[]>> = {
  long: ['int'],
  double: ['float'],
};

// Decimals are compared as stored, after normalization to the table's types.
const accepts = (table: IcebergType, file: IcebergType): boolean => {
  if (table.kind === 'decimal' && file.kind === 'decimal') {
    return file.scale === table.scale && file.precision <= table.precision;
  }
  if (table.kind === 'fixed' && file.kind === 'fixed') {
    return table.length === file.length;
  }
  if (table.kind === 'primitive' && file.kind === 'primitive') {
    return table.name === file.name || (PROMOTIONS[table.name] ?? []).includes(file.name);
  }
  return false;
};

/**
 * List every reason the file cannot be appended to the table as-is. An empty
 * list means the file's columns can be read through the table schema.
 */
export const checkCompatibility = (file: ColumnSchema, table: TableSchema): string[] => {
  const mismatches: string[] = [];
  const tableColumns = new Map(table.columns.map((column) => [column.name, column]));
  const seen = new Set<string>();

  for (const column of file) {
    if (seen.has(column.name)) {
      mismatches.push(`column '${column.name}' appears more than once`);
      continue;
    }
    seen.add(column.name);

    const tableColumn = tableColumns.get(column.name);
    if (!tableColumn) {
      mismatches.push(`column '${column.name}' is not in the table`);
      continue;
    }

    let fileType: IcebergType;
    try {
      fileType = toIcebergType(column);
    } catch (err) {
      if (!isIngestError(err)) throw err;
      mismatches.push(err.message);
      continue;
    }

    if (!accepts(tableColumn.type, fileType)) {
      mismatches.push(
        `column '${column.name}' is ${formatIcebergType(fileType)} in the file but ${formatIcebergType(tableColumn.type)} in the table`
      );
    }
    if (tableColumn.required && column.nullable) {
      mismatches.push(`column '${column.name}' is required in the table but nullable in the file`);
    }
  }

  for (const tableColumn of table.columns) {
    if (tableColumn.required && !seen.has(tableColumn.name)) {
      mismatches.push(`required column '${tableColumn.name}' is missing from the file`);
    }
  }

  return mismatches;
};
