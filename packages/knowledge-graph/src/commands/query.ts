import type { CypherExecutor, QueryRecord } from "@graphrag-demo/shared";
import { DEMO_QUERIES, type DemoQuery } from "../queries/demoQueries.js";

export type PrintFn = (line: string) => void;

export interface QueryCommandOptions {
  print: PrintFn;
  /** 1-based number of a single query to run. */
  only?: number | undefined;
  queries?: readonly DemoQuery[];
}

export interface QueryRunSummary {
  title: string;
  total: number;
  printed: number;
}

export function formatResults(records: QueryRecord[], maxItems: number): string[] {
  const lines: string[] = [];
  for (const [index, record] of records.slice(0, maxItems).entries()) {
    lines.push(`  ${index + 1}. ${JSON.stringify(record, null, 2)}`);
  }
  if (records.length > maxItems) {
    lines.push(`  ... and ${records.length - maxItems} more`);
  }
  return lines;
}

export function selectQueries(queries: readonly DemoQuery[], only?: number): readonly DemoQuery[] {
  if (only === undefined) {
    return queries;
  }
  const query = queries[only - 1];
  if (!Number.isInteger(only) || !query) {
    throw new RangeError(`Query number must be between 1 and ${queries.length}`);
  }
  return [query];
}

export async function runDemoQueries(
  executor: CypherExecutor,
  options: QueryCommandOptions
): Promise<QueryRunSummary[]> {
  const { print } = options;
  const selected = selectQueries(options.queries ?? DEMO_QUERIES, options.only);
  const summaries: QueryRunSummary[] = [];

  for (const query of selected) {
    print(`=== ${query.title} ===`);
    const records = await executor.runQuery(query.cypher);
    print(`${query.description}: ${records.length} result(s)`);
    for (const line of formatResults(records, query.maxItems)) {
      print(line);
    }
    print("");

    summaries.push({
      title: query.title,
      total: records.length,
      printed: Math.min(records.length, query.maxItems)
    });
  }

  return summaries;
}
