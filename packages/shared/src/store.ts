import type { GraphCounts, NodeLabel, SchemaSummary } from "./types/graph.js";

export type QueryRecord = Record<string, unknown>;

export interface StatementFailure {
  index: number;
  statement: string;
  message: string;
}

export interface ConnectionStore {
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  healthCheck(): Promise<boolean>;
  testConnection(): Promise<string>;
}

export interface CypherExecutor {
  /** Runs statements in order and stops at the first failure, which it returns. */
  runStatements(statements: string[]): Promise<StatementFailure | null>;
  runQuery(cypher: string, params?: Record<string, unknown>): Promise<QueryRecord[]>;
}

export interface GraphInventoryStore {
  countByLabel(label: NodeLabel): Promise<number>;
  countData(): Promise<GraphCounts>;
  getSchemaSummary(): Promise<SchemaSummary>;
  clearAllData(): Promise<void>;
}

export interface AbstractKnowledgeGraphStore
  extends ConnectionStore,
    CypherExecutor,
    GraphInventoryStore {}
