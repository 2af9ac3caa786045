import type { PromptVariant } from "@regintel/shared";

const PERSONA =
  "You are RegIntel, an AI assistant specialized in regulatory intelligence and FDA compliance.";

const variantInstructions: Record<PromptVariant, string> = {
  news: `
You are analyzing regulatory news articles.
1. Answer from the news sources provided and cite the article title, feed and publication date.
2. Call out the companies, products, regulations and regulatory bodies involved.
3. If the articles do not cover the question, say so instead of guessing.
`,
  compliance: `
You are analyzing FDA warning letters.
1. Answer from the warning letters provided and name the company and letter date.
2. Explain the violations, the required corrective actions, any systemic issues and the regulatory consequences.
3. If the letters do not cover the question, say so instead of guessing.
`,
  general: `
Provide helpful, accurate information based on the sources provided.
If no relevant sources are available, clearly state that you cannot provide specific information on that topic.
`
};

export function buildChatSystemPrompt(variant: PromptVariant): string {
  return `${PERSONA}\n${variantInstructions[variant].trim()}`;
}

export function buildUserPrompt(message: string, context: string): string {
  return context.length > 0 ? `${message}\n\n${context}` : message;
}
