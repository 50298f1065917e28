/* eslint-disable unicorn/no-null -- null is required for db */

import {
  OperationNodeTransformer,
  type KyselyPlugin,
  type PluginTransformQueryArgs,
  type PluginTransformResultArgs,
  type PrimitiveValueListNode,
  type ValueNode,
} from 'kysely';

/**
 * Parameter conversion for SQLite, which binds neither Date nor undefined:
 * a Date becomes its ISO 8601 string (lexical order equals chronological order),
 * undefined becomes NULL.
 */
export function convertValueForSqlite(value: unknown): unknown {
  if (value === undefined) return null;
  if (value instanceof Date) return value.toISOString();
  return value;
}

/**
 * Applies `convertValueForSqlite` to every bound value, including the rows of
 * multi-row inserts.
 */
export class SqliteTypeAdapterPlugin implements KyselyPlugin {
  readonly #transformer = new SqliteValueTransformer();

  transformQuery(args: PluginTransformQueryArgs): PluginTransformQueryArgs['node'] {
    return this.#transformer.transformNode(args.node, args.queryId);
  }

  transformResult(args: PluginTransformResultArgs): Promise<PluginTransformResultArgs['result']> {
    return Promise.resolve(args.result);
  }
}

class SqliteValueTransformer extends OperationNodeTransformer {
  protected override transformValue(node: ValueNode): ValueNode {
    const transformed = super.transformValue(node);
    return { ...transformed, value: convertValueForSqlite(transformed.value) };
  }

  protected override transformPrimitiveValueList(node: PrimitiveValueListNode): PrimitiveValueListNode {
    const transformed = super.transformPrimitiveValueList(node);
    return { ...transformed, values: transformed.values.map(convertValueForSqlite) };
  }
}

export const sqliteTypeAdapterPlugin = new SqliteTypeAdapterPlugin();
