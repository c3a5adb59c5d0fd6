// src/services/prompt.ts
// What: Builds the grounded prompt sent to the language model.
// How: Joins the retrieved chunks (most similar first) with a blank line into one context block and substitutes
//      {context} and {question} into the instruction template in a single pass, so slot markers that happen to
//      appear inside chunk text or the question stay literal.

export const NOT_FOUND_ANSWER = 'Answer not found in provided documents.';

export const CONTEXT_SEPARATOR = '\n\n';

export function defaultInstructions(institution: string): string {
  return `You are an AI assistant for ${institution}.

Use only the given context to answer the question.
If the answer is not in the context, say exactly:
"${NOT_FOUND_ANSWER}"

Context:
{context}

Question:
{question}

Answer:
`;
}

export function assemblePrompt(chunks: readonly string[], question: string, instructions: string): string {
  const context = chunks.join(CONTEXT_SEPARATOR);
  return instructions.replace(/\{(context|question)\}/g, (_match, slot: string) =>
    slot === 'context' ? context : question,
  );
}
