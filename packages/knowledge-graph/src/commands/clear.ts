import type { Logger } from "pino";
import type { AbstractKnowledgeGraphStore, GraphCounts, SchemaSummary } from "@graphrag-demo/shared";
import { logger as defaultLogger } from "../utils/logger.js";

export type ConfirmFn = (question: string) => Promise<boolean>;

export interface ClearOptions {
  confirm: ConfirmFn;
  skipConfirmation?: boolean;
  logger?: Logger;
}

export type ClearReport =
  | { outcome: "already_empty"; before: GraphCounts }
  | { outcome: "cancelled"; before: GraphCounts }
  | {
      outcome: "cleared";
      before: GraphCounts;
      after: GraphCounts;
      schema: SchemaSummary | null;
    };

export async function runClear(
  store: AbstractKnowledgeGraphStore,
  options: ClearOptions
): Promise<ClearReport> {
  const log = options.logger ?? defaultLogger;

  const connectionMessage = await store.testConnection();
  log.info({ message: connectionMessage }, "Neo4j connection test");

  const before = await store.countData();
  log.info(before, "Current graph contents");

  if (before.nodes === 0 && before.relationships === 0) {
    log.info("Database is already empty");
    return { outcome: "already_empty", before };
  }

  if (!options.skipConfirmation) {
    const question =
      `This will delete ${before.nodes} nodes and ${before.relationships} relationships. ` +
      "Continue? [y/N] ";
    if (!(await options.confirm(question))) {
      log.info("Clear cancelled");
      return { outcome: "cancelled", before };
    }
  }

  await store.clearAllData();
  const after = await store.countData();

  if (after.nodes === 0 && after.relationships === 0) {
    log.info("All nodes and relationships deleted");
  } else {
    log.warn(after, "Graph still has data after clearing");
  }

  let schema: SchemaSummary | null = null;
  try {
    schema = await store.getSchemaSummary();
    log.info(schema, "Schema preserved");
  } catch (error) {
    log.warn({ err: error }, "Could not read schema summary");
  }

  return { outcome: "cleared", before, after, schema };
}
