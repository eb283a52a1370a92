/** Table names created by the bundled migrations. */
export const postgresTableNames = {
  auditEvents: "audit_events",
  migrations: "actiontrail_migrations",
} as const;

export type PostgresTableNames = typeof postgresTableNames;
