import type { ChatMessage } from "../llm/llm";

export type WorkedExample = {
  input: string;
  context: string;
  output: string;
};

export const ANALYST_PERSONA = `You are a student migration data expert and analyst.
Your task is to answer user questions using information from a SQL database about global student migration patterns.
Base your answer only on the given context and provide insights when possible.

Guidelines:
- Be conversational and helpful
- Provide specific numbers when available
- Offer context about trends when relevant
- If data is limited, acknowledge it
- Use emojis sparingly but appropriately`;

export const CANADA_EXAMPLE: WorkedExample = {
  input: "How many students went to Canada?",
  context: "There are 120 students in the database who went to Canada.",
  output:
    "Based on the data, 120 students have migrated to Canada for higher studies. Canada continues to be a popular destination for international students!",
};

/** System persona plus exactly one worked example, then the question with its data context. */
export function buildAnswerPrompt(
  persona: string,
  example: WorkedExample,
  question: string,
  context: string,
): ChatMessage[] {
  const system = `${persona}

Example:
Input: ${example.input}
Context: ${example.context}
Output: ${example.output}
`;
  return [
    { role: "system", content: system },
    { role: "user", content: `Input:\n${question}\n\nContext:\n${context}\n\nOutput:\n` },
  ];
}

export function buildSqlPrompt(dialect: string, tableInfo: string, question: string, topK: number): ChatMessage[] {
  const system = `You translate natural language into a single **${dialect} SELECT** query over the tables described below.

Rules:
- Use ONLY the tables below and only the columns they list.
- Unless the question asks for a specific number of rows, query at most ${topK} rows using LIMIT.
- Never query all columns; select only the columns needed to answer the question.
- Wrap column names in double quotes when they are not plain lower-case identifiers.
- Single statement. No semicolons. Read-only.
- Output strictly JSON: {"sql":"..."} with no extra text.

Only use the following tables:
${tableInfo}`;
  return [
    { role: "system", content: system },
    { role: "user", content: `Question: ${question}` },
  ];
}

/** Turns the executed query and its rows into one factual sentence. */
export function buildResultPrompt(question: string, sql: string, rowsText: string): ChatMessage[] {
  const system = `You state the result of a SQL query in one or two plain sentences.
Report only what the SQL result shows. If the result is empty, say that no matching records were found.`;
  return [
    { role: "system", content: system },
    { role: "user", content: `Question: ${question}\nSQLQuery: ${sql}\nSQLResult:\n${rowsText}\n\nAnswer:` },
  ];
}
