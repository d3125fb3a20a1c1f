/**
 * drizzle over a pg client whose `query` is replaced in process
 */

import { drizzle } from "drizzle-orm/node-postgres";
import { Client } from "pg";
import { schema, type Db } from "@perp-clearing/db";

export interface CapturedQuery {
  text: string;
  values: unknown[];
}

type QueryInput = string | { text: string; values?: unknown[] };

export function createFakeDb(options: { failWith?: Error } = {}): { db: Db; queries: CapturedQuery[] } {
  const queries: CapturedQuery[] = [];

  const client = Object.assign(new Client(), {
    query: async (input: QueryInput, values?: unknown[]) => {
      const text = typeof input === "string" ? input : input.text;
      const params = values ?? (typeof input === "string" ? [] : (input.values ?? []));
      queries.push({ text, values: params });
      if (options.failWith) throw options.failWith;
      return { command: "INSERT", rowCount: 0, oid: 0, rows: [], fields: [] };
    },
  });

  return { db: drizzle(client, { schema }), queries };
}
