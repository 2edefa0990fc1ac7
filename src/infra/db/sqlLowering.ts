import type {
  ColumnRef,
  ParameterizedQuery,
  Projection,
  QueryParamValue,
  QuerySpec,
} from "../../core/entities/query";

const OUTPUT_NAME = /^[a-z_][a-z0-9_]*$/;

const quote = (identifier: string): string => `"${identifier.replace(/"/g, '""')}"`;

const column = (ref: ColumnRef): string => `${quote(ref.alias)}.${quote(ref.column)}`;

const outputName = (name: string): string => {
  if (!OUTPUT_NAME.test(name)) {
    throw new Error(`Invalid output column name '${name}'.`);
  }
  return quote(name);
};

const projection = (item: Projection): string =>
  item.type === "count"
    ? `COUNT(*) AS ${outputName(item.as)}`
    : `${column(item.ref)} AS ${outputName(item.as)}`;

/**
 * Lowers a structured query to Postgres text with `$n` placeholders, values in placeholder order.
 */
export const lowerQuery = (spec: QuerySpec): ParameterizedQuery => {
  const values: QueryParamValue[] = [];

  const parts = [
    `SELECT ${spec.projection.map(projection).join(", ")}`,
    `FROM ${quote(spec.table)} AS ${quote(spec.alias)}`,
  ];

  for (const join of spec.joins) {
    const keyword = join.type === "left" ? "LEFT JOIN" : "INNER JOIN";
    parts.push(
      `${keyword} ${quote(join.table)} AS ${quote(join.alias)} ON ${column(join.on.left)} = ${column(join.on.right)}`,
    );
  }

  if (spec.predicates.length > 0) {
    const conditions = spec.predicates.map((predicate) => {
      const value = spec.params[predicate.param];
      if (value === undefined) {
        throw new Error(`Missing value for query parameter '${predicate.param}'.`);
      }
      values.push(value);
      return `${column(predicate.ref)} ${predicate.op} $${values.length}`;
    });
    parts.push(`WHERE ${conditions.join(" AND ")}`);
  }

  if (spec.orderBy) {
    parts.push(
      `ORDER BY ${column(spec.orderBy.ref)} ${spec.orderBy.direction === "desc" ? "DESC" : "ASC"}`,
    );
  }

  if (spec.limit !== undefined) {
    if (!Number.isInteger(spec.limit) || spec.limit < 1) {
      throw new Error(`Invalid query limit '${spec.limit}'.`);
    }
    parts.push(`LIMIT ${spec.limit}`);
  }

  return { text: parts.join(" "), values };
};
