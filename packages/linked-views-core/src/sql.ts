import * as mSql from '@uwdata/mosaic-sql';
import { logger } from './logger';
import { columnRefId } from './predicate';
import type { FilterExpr } from '@uwdata/mosaic-sql';
import type { CellValue, ColumnRef, FilterClause, Predicate } from './types';

type SqlColumnExpression =
  | ReturnType<typeof mSql.sql>
  | ReturnType<typeof mSql.column>;

/**
 * Builds a column reference, composing struct access for dotted paths.
 *
 * Input: "engine.cyl"
 * SQL Result: "engine"."cyl"
 */
export function createStructAccess(columnPath: string): SqlColumnExpression {
  const [head, ...rest] = columnPath.split('.');
  const base: SqlColumnExpression = mSql.column(head ?? columnPath);
  return rest.reduce<SqlColumnExpression>(
    (acc, part) => mSql.sql`${acc}.${mSql.column(part)}`,
    base,
  );
}

export function escapeSqlLikePattern(input: string): string {
  return input.replace(/\\/g, '\\\\').replace(/%/g, '\\%').replace(/_/g, '\\_');
}

/**
 * Translates a predicate into a Mosaic SQL filter expression.
 * Returns undefined for derived columns that have no SQL counterpart.
 */
export function toSqlFilter(predicate: Predicate): FilterExpr | undefined {
  const colExpr = sqlColumnFor(predicate.column);
  if (!colExpr) {
    logger.warn(
      'SQL',
      `[SqlExport] Derived column "${columnRefId(predicate.column)}" has no sqlColumn. Skipping.`,
    );
    return undefined;
  }

  switch (predicate.type) {
    case 'membership': {
      // IN never matches NULL, so a null value becomes its own IS NULL test
      const values = predicate.values.filter(isPresent);
      const matchesNull = values.length < predicate.values.length;
      if (values.length === 0) {
        return matchesNull ? mSql.isNull(colExpr) : mSql.literal(false);
      }
      const matches =
        values.length === 1
          ? eqOrNull(colExpr, values[0] ?? null)
          : mSql.isIn(
              colExpr,
              values.map((v) => mSql.literal(v)),
            );
      return matchesNull ? mSql.or(mSql.isNull(colExpr), matches) : matches;
    }

    case 'range': {
      const { min, max } = predicate;
      if (min !== null && max !== null) {
        return mSql.isBetween(colExpr, [mSql.literal(min), mSql.literal(max)]);
      }
      if (min !== null) {
        return mSql.gte(colExpr, mSql.literal(min));
      }
      if (max !== null) {
        return mSql.lte(colExpr, mSql.literal(max));
      }
      return undefined;
    }

    case 'equals':
      return eqOrNull(colExpr, predicate.value);

    case 'text': {
      const pattern = mSql.literal(`%${escapeSqlLikePattern(predicate.query)}%`);
      return predicate.caseSensitive
        ? mSql.sql`${colExpr} LIKE ${pattern}`
        : mSql.sql`${colExpr} ILIKE ${pattern}`;
    }
  }
}

/**
 * ANDs the SQL form of every filter clause. Undefined when none translate.
 */
export function combineSqlFilters(
  clauses: ReadonlyArray<FilterClause>,
): FilterExpr | undefined {
  const exprs: Array<FilterExpr> = [];
  for (const clause of clauses) {
    const expr = toSqlFilter(clause.predicate);
    if (expr !== undefined) {
      exprs.push(expr);
    }
  }
  if (exprs.length === 0) {
    return undefined;
  }
  const combined = exprs.length === 1 ? exprs[0] : mSql.and(...exprs);
  logger.debug('SQL', '[SqlExport] Filter expression', {
    sql: String(combined),
  });
  return combined;
}

function sqlColumnFor(ref: ColumnRef): SqlColumnExpression | undefined {
  if (typeof ref === 'string') {
    return createStructAccess(ref);
  }
  return ref.sqlColumn ? createStructAccess(ref.sqlColumn) : undefined;
}

function eqOrNull(colExpr: SqlColumnExpression, value: CellValue): FilterExpr {
  return value === null
    ? mSql.isNull(colExpr)
    : mSql.eq(colExpr, mSql.literal(value));
}

function isPresent(value: CellValue): value is Exclude<CellValue, null> {
  return value !== null;
}
