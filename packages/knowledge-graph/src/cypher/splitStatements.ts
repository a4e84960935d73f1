type ScanState = "code" | "single" | "double" | "backtick" | "lineComment" | "blockComment";

const QUOTE_STATES: Record<string, ScanState> = {
  "'": "single",
  '"': "double",
  "`": "backtick"
};

const QUOTE_CLOSERS: Partial<Record<ScanState, string>> = {
  single: "'",
  double: '"',
  backtick: "`"
};

/**
 * Splits a Cypher script into statements on `;`. Semicolons inside string
 * literals, quoted identifiers and comments do not terminate a statement.
 * Comments are dropped, and statements left empty are skipped.
 */
export function splitStatements(script: string): string[] {
  const statements: string[] = [];
  let current = "";
  let state: ScanState = "code";

  const flush = (): void => {
    const statement = current.trim();
    if (statement.length > 0) {
      statements.push(statement);
    }
    current = "";
  };

  for (let i = 0; i < script.length; i += 1) {
    const char = script.charAt(i);
    const next = script.charAt(i + 1);

    switch (state) {
      case "lineComment":
        if (char === "\n") {
          state = "code";
          current += char;
        }
        break;
      case "blockComment":
        if (char === "*" && next === "/") {
          state = "code";
          i += 1;
        }
        break;
      case "single":
      case "double":
      case "backtick":
        current += char;
        if (char === "\\" && state !== "backtick" && next !== "") {
          current += next;
          i += 1;
        } else if (char === QUOTE_CLOSERS[state]) {
          state = "code";
        }
        break;
      case "code": {
        if (char === "/" && next === "/") {
          state = "lineComment";
          i += 1;
          break;
        }
        if (char === "/" && next === "*") {
          state = "blockComment";
          i += 1;
          break;
        }
        if (char === ";") {
          flush();
          break;
        }

        const quoteState = QUOTE_STATES[char];
        if (quoteState) {
          state = quoteState;
        }
        current += char;
        break;
      }
    }
  }

  flush();
  return statements;
}

export function previewStatement(statement: string, maxLength = 100): string {
  const singleLine = statement.replace(/\s+/g, " ");
  return singleLine.length > maxLength ? `${singleLine.slice(0, maxLength)}...` : singleLine;
}
