import { Command, InvalidArgumentError } from "commander";
import { runClear } from "./commands/clear.js";
import { runDemoQueries } from "./commands/query.js";
import { runSetup } from "./commands/setup.js";
import { appConfig, ConfigurationError } from "./config.js";
import { DEMO_QUERIES } from "./queries/demoQueries.js";
import { Neo4jKnowledgeGraphStore } from "./store/Neo4jKnowledgeGraphStore.js";
import { confirmOnTerminal } from "./utils/confirm.js";
import { logger } from "./utils/logger.js";

async function withStore(
  fn: (store: Neo4jKnowledgeGraphStore) => Promise<boolean>
): Promise<void> {
  let store: Neo4jKnowledgeGraphStore | null = null;
  try {
    store = Neo4jKnowledgeGraphStore.fromEnv();
    logger.info({ uri: store.uri }, "Connecting to Neo4j");
    await store.connect();
    if (!(await fn(store))) {
      process.exitCode = 1;
    }
  } catch (error) {
    if (error instanceof ConfigurationError) {
      logger.error(error.message);
      logger.info("Copy .env.example to .env and fill in the Neo4j credentials");
    } else {
      logger.error({ err: error }, "Command failed");
    }
    process.exitCode = 1;
  } finally {
    if (store) {
      await store.disconnect();
    }
  }
}

function parseQueryNumber(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1 || parsed > DEMO_QUERIES.length) {
    throw new InvalidArgumentError(`Expected a number between 1 and ${DEMO_QUERIES.length}.`);
  }
  return parsed;
}

const program = new Command();

program
  .name("knowledge-graph")
  .description("Create, clear and query the academic citation knowledge graph in Neo4j");

program
  .command("setup")
  .description("Create the schema and load the sample data")
  .action(async () => {
    await withStore(async (store) => {
      const report = await runSetup(store, { browserPort: appConfig.NEO4J_HTTP_PORT });
      return report.succeeded;
    });
  });

program
  .command("clear")
  .description("Delete all nodes and relationships, keeping constraints and indexes")
  .option("-y, --yes", "Skip the confirmation prompt")
  .action(async (options: { yes?: boolean }) => {
    await withStore(async (store) => {
      const report = await runClear(store, {
        confirm: confirmOnTerminal,
        skipConfirmation: options.yes === true
      });
      if (report.outcome !== "cleared") {
        return true;
      }
      return report.after.nodes === 0 && report.after.relationships === 0;
    });
  });

program
  .command("query")
  .description("Run the demonstration queries and print their results")
  .argument("[number]", `Run a single query (1-${DEMO_QUERIES.length})`, parseQueryNumber)
  .action(async (only: number | undefined) => {
    await withStore(async (store) => {
      await runDemoQueries(store, {
        only,
        print: (line) => {
          process.stdout.write(`${line}\n`);
        }
      });
      return true;
    });
  });

await program.parseAsync(process.argv);
