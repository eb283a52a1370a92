import type { Pool, QueryResultRow } from "pg";

import { runWithSpan } from "@actiontrail/telemetry";

import type { PostgresTelemetryContext } from "../telemetry.js";
import type { QueryExecutor, QueryResult } from "./query-executor.js";

export type PgQueryable = Pick<Pool, "query">;

export interface CreatePgQueryExecutorOptions {
  readonly telemetry?: PostgresTelemetryContext;
}

/** First keyword of the statement, lowercased: `insert`, `select`, `create`... */
export const statementOperation = (sql: string): string =>
  /^\s*([a-z]+)/i.exec(sql)?.[1]?.toLowerCase() ?? "query";

/** SQLSTATE of a driver error, when it carries one. */
const sqlState = (error: unknown): string | undefined =>
  error instanceof Error && "code" in error && typeof error.code === "string" ? error.code : undefined;

export const createPgQueryExecutor = (
  queryable: PgQueryable,
  options: CreatePgQueryExecutorOptions = {},
): QueryExecutor => {
  const run = async <Row extends QueryResultRow>(sql: string, values: unknown[]): Promise<QueryResult<Row>> => {
    const { rows } = await queryable.query<Row>(sql, values);
    return { rows };
  };

  const telemetry = options.telemetry;

  return {
    async query<Row extends QueryResultRow = QueryResultRow>(
      sql: string,
      params: ReadonlyArray<unknown> = [],
    ): Promise<QueryResult<Row>> {
      if (!telemetry) {
        return run<Row>(sql, [...params]);
      }

      const operation = statementOperation(sql);
      const start = performance.now();
      let outcome: "ok" | "error" = "error";

      try {
        const result = await runWithSpan(
          telemetry.tracer,
          `postgres.${operation}`,
          async (span) => {
            const queried = await run<Row>(sql, [...params]);
            span.setAttribute("db.rows_returned", queried.rows.length);
            return queried;
          },
          {
            attributes: { "db.system": "postgresql", "db.operation": operation, "db.statement": sql },
            onError: (error) => {
              telemetry.logger.error("postgres.query.failed", {
                operation,
                sqlState: sqlState(error),
                error: error instanceof Error ? error.message : String(error),
              });
            },
          },
        );
        outcome = "ok";
        return result;
      } finally {
        const durationMs = performance.now() - start;
        telemetry.metrics.queryCounter.add(1, { outcome, operation });
        telemetry.metrics.queryDuration.record(durationMs, { outcome, operation });
        telemetry.logger.debug("postgres.query.completed", { operation, outcome, durationMs });
      }
    },
  };
};
