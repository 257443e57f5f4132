/** Wrap a question in a step-by-step reasoning scaffold. */
export function buildChainPrompt(query: string): string {
  return [
    "Let's reason through this step by step.",
    "",
    `Question: ${query}`,
    "",
    "Step 1: [First idea]",
    "Step 2: [Next point]",
    "Step 3: [Clarify logic]",
    "Conclusion:",
  ].join("\n");
}
