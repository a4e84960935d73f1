import type { Logger } from "pino";
import type { CypherExecutor, StatementFailure } from "@graphrag-demo/shared";
import { logger as defaultLogger } from "../utils/logger.js";
import { CYPHER_DIR, loadCypherScript } from "./scriptFiles.js";
import { previewStatement } from "./splitStatements.js";

export interface ScriptRunResult {
  file: string;
  statementCount: number;
  executedCount: number;
  failure: StatementFailure | null;
}

interface CypherScriptRunnerOptions {
  cypherDir?: string;
  logger?: Logger;
}

export class CypherScriptRunner {
  private readonly cypherDir: string;
  private readonly logger: Logger;

  constructor(
    private readonly executor: CypherExecutor,
    options: CypherScriptRunnerOptions = {}
  ) {
    this.cypherDir = options.cypherDir ?? CYPHER_DIR;
    this.logger = options.logger ?? defaultLogger;
  }

  async runFile(fileName: string): Promise<ScriptRunResult> {
    this.logger.info({ file: fileName }, "Executing Cypher script");

    const statements = await loadCypherScript(fileName, this.cypherDir);
    const failure = await this.executor.runStatements(statements);

    if (failure) {
      this.logger.error(
        {
          file: fileName,
          statementIndex: failure.index,
          statement: previewStatement(failure.statement),
          reason: failure.message
        },
        `Error in statement ${failure.index}`
      );
    } else {
      this.logger.info({ file: fileName, statements: statements.length }, "Completed Cypher script");
    }

    return {
      file: fileName,
      statementCount: statements.length,
      executedCount: failure ? failure.index - 1 : statements.length,
      failure
    };
  }
}
