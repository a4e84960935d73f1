import neo4j, { type Driver, type Session, type SessionConfig } from "neo4j-driver";
import type {
  AbstractKnowledgeGraphStore,
  GraphCounts,
  NodeLabel,
  QueryRecord,
  SchemaSummary,
  StatementFailure
} from "@graphrag-demo/shared";
import { appConfig, ConfigurationError } from "../config.js";
import { isNodeLabel } from "../graphSchema.js";
import { toNumber, toPlainRecord } from "./neo4jValues.js";

export interface Neo4jKnowledgeGraphStoreConfig {
  uri: string;
  user: string;
  password: string;
  database?: string;
}

type AccessMode = "READ" | "WRITE";

export class Neo4jKnowledgeGraphStore implements AbstractKnowledgeGraphStore {
  private driver: Driver | null = null;

  constructor(private readonly config: Neo4jKnowledgeGraphStoreConfig) {}

  static fromEnv(): Neo4jKnowledgeGraphStore {
    if (!appConfig.NEO4J_USER || !appConfig.NEO4J_PASSWORD) {
      throw new ConfigurationError("NEO4J_USER and NEO4J_PASSWORD environment variables must be set");
    }

    const config: Neo4jKnowledgeGraphStoreConfig = {
      uri: appConfig.NEO4J_URI,
      user: appConfig.NEO4J_USER,
      password: appConfig.NEO4J_PASSWORD
    };
    if (appConfig.NEO4J_DATABASE) {
      config.database = appConfig.NEO4J_DATABASE;
    }
    return new Neo4jKnowledgeGraphStore(config);
  }

  get uri(): string {
    return this.config.uri;
  }

  async connect(): Promise<void> {
    if (this.driver) {
      return;
    }

    this.driver = neo4j.driver(
      this.config.uri,
      neo4j.auth.basic(this.config.user, this.config.password)
    );

    try {
      await this.driver.verifyConnectivity();
    } catch (error) {
      await this.disconnect();
      throw error;
    }
  }

  async disconnect(): Promise<void> {
    if (!this.driver) {
      return;
    }

    await this.driver.close();
    this.driver = null;
  }

  async healthCheck(): Promise<boolean> {
    if (!this.driver) {
      return false;
    }

    try {
      await this.withSession("READ", async (session) => {
        await session.run("RETURN 1 AS ok");
      });
      return true;
    } catch {
      return false;
    }
  }

  async testConnection(): Promise<string> {
    return this.withSession("READ", async (session) => {
      const result = await session.run("RETURN 'Connection successful' AS message");
      const message: unknown = result.records[0]?.get("message");
      return typeof message === "string" ? message : "Connection successful";
    });
  }

  async runStatements(statements: string[]): Promise<StatementFailure | null> {
    return this.withSession("WRITE", async (session) => {
      for (const [offset, statement] of statements.entries()) {
        try {
          await session.run(statement);
        } catch (error) {
          return {
            index: offset + 1,
            statement,
            message: error instanceof Error ? error.message : String(error)
          };
        }
      }
      return null;
    });
  }

  async runQuery(cypher: string, params: Record<string, unknown> = {}): Promise<QueryRecord[]> {
    return this.withSession("READ", async (session) => {
      const result = await session.run(cypher, params);
      return result.records.map((record) => toPlainRecord(record.toObject()));
    });
  }

  async countByLabel(label: NodeLabel): Promise<number> {
    // Labels cannot be parameterised, so only known labels are interpolated.
    if (!isNodeLabel(label)) {
      throw new Error(`Unknown node label: ${String(label)}`);
    }

    return this.count(`MATCH (n:${label}) RETURN count(n) AS count`);
  }

  async countData(): Promise<GraphCounts> {
    const nodes = await this.count("MATCH (n) RETURN count(n) AS count");
    const relationships = await this.count("MATCH ()-[r]->() RETURN count(r) AS count");
    return { nodes, relationships };
  }

  async clearAllData(): Promise<void> {
    await this.withSession("WRITE", async (session) => {
      await session.run("MATCH ()-[r]->() DELETE r");
      await session.run("MATCH (n) DELETE n");
    });
  }

  async getSchemaSummary(): Promise<SchemaSummary> {
    return this.withSession("READ", async (session) => {
      const constraints = await session.run("SHOW CONSTRAINTS");
      const indexes = await session.run("SHOW INDEXES");
      return {
        constraints: constraints.records.length,
        indexes: indexes.records.length
      };
    });
  }

  private async count(cypher: string): Promise<number> {
    return this.withSession("READ", async (session) => {
      const result = await session.run(cypher);
      return toNumber(result.records[0]?.get("count"));
    });
  }

  private withSession<T>(accessMode: AccessMode, fn: (session: Session) => Promise<T>): Promise<T> {
    const sessionConfig: SessionConfig = {
      defaultAccessMode: accessMode === "READ" ? neo4j.session.READ : neo4j.session.WRITE
    };
    if (this.config.database) {
      sessionConfig.database = this.config.database;
    }

    const session = this.getDriver().session(sessionConfig);

    return fn(session).finally(async () => {
      await session.close();
    });
  }

  private getDriver(): Driver {
    if (!this.driver) {
      throw new Error("Neo4jKnowledgeGraphStore is not connected. Call connect() first.");
    }

    return this.driver;
  }
}
