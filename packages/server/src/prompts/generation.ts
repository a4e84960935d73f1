export function buildGenerationPrompt(prompt: string, context?: string): string {
  if (!context) {
    return prompt;
  }

  return `Context:\n${context}\n\nQuestion: ${prompt}`;
}
