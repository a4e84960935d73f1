import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { splitStatements } from "./splitStatements.js";

export const CYPHER_DIR = fileURLToPath(new URL("../../cypher/", import.meta.url));

export const SCHEMA_SCRIPT = "01_create_schema.cypher";
export const POPULATE_SCRIPT = "02_populate_data.cypher";

export async function loadCypherScript(fileName: string, cypherDir = CYPHER_DIR): Promise<string[]> {
  const content = await readFile(join(cypherDir, fileName), "utf8");
  return splitStatements(content);
}
