import { createInterface } from "node:readline/promises";

export interface ConfirmStreams {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
}

export function isConfirmation(answer: string): boolean {
  return answer.trim().toLowerCase() === "y";
}

/** Asks a yes/no question; end of input counts as no. */
export async function confirmOnTerminal(
  question: string,
  streams: ConfirmStreams = {}
): Promise<boolean> {
  const rl = createInterface({
    input: streams.input ?? process.stdin,
    output: streams.output ?? process.stdout
  });
  const closed = new Promise<boolean>((resolve) => {
    rl.once("close", () => resolve(false));
  });

  try {
    const answered = rl.question(question).then(isConfirmation, () => false);
    return await Promise.race([answered, closed]);
  } finally {
    rl.close();
  }
}
