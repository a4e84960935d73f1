import type { Logger } from "pino";
import type { AbstractKnowledgeGraphStore, GraphCounts, LabelCounts } from "@graphrag-demo/shared";
import { CypherScriptRunner, type ScriptRunResult } from "../cypher/CypherScriptRunner.js";
import { POPULATE_SCRIPT, SCHEMA_SCRIPT } from "../cypher/scriptFiles.js";
import { NODE_LABELS } from "../graphSchema.js";
import { logger as defaultLogger } from "../utils/logger.js";

export interface SetupOptions {
  runner?: CypherScriptRunner;
  logger?: Logger;
  browserPort?: number;
}

export interface SetupReport {
  connectionMessage: string;
  scripts: ScriptRunResult[];
  labelCounts: LabelCounts | null;
  counts: GraphCounts | null;
  succeeded: boolean;
}

export async function runSetup(
  store: AbstractKnowledgeGraphStore,
  options: SetupOptions = {}
): Promise<SetupReport> {
  const log = options.logger ?? defaultLogger;
  const runner = options.runner ?? new CypherScriptRunner(store, { logger: log });

  const connectionMessage = await store.testConnection();
  log.info({ message: connectionMessage }, "Neo4j connection test");

  const scripts: ScriptRunResult[] = [];
  for (const fileName of [SCHEMA_SCRIPT, POPULATE_SCRIPT]) {
    const result = await runner.runFile(fileName);
    scripts.push(result);
    if (result.failure) {
      log.error({ file: fileName }, "Setup stopped: script did not complete");
      return { connectionMessage, scripts, labelCounts: null, counts: null, succeeded: false };
    }
  }

  const labelCounts = await countLabels(store);
  const counts = await store.countData();

  for (const label of NODE_LABELS) {
    log.info({ label, count: labelCounts[label] }, `${label} nodes`);
  }
  log.info({ relationships: counts.relationships, nodes: counts.nodes }, "Knowledge graph populated");

  if (options.browserPort !== undefined) {
    log.info(`Explore the graph in Neo4j Browser at http://localhost:${options.browserPort}`);
  }

  return { connectionMessage, scripts, labelCounts, counts, succeeded: true };
}

async function countLabels(store: AbstractKnowledgeGraphStore): Promise<LabelCounts> {
  const counts: LabelCounts = { Paper: 0, Author: 0, Institution: 0, Venue: 0, Topic: 0 };
  for (const label of NODE_LABELS) {
    counts[label] = await store.countByLabel(label);
  }
  return counts;
}
