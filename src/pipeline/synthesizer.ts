import { SynthesisError, errorMessage } from "../errors";
import type { LLM } from "../llm/llm";
import { err, ok, Result } from "../types";
import { ANALYST_PERSONA, buildAnswerPrompt, CANADA_EXAMPLE, WorkedExample } from "./prompts";

export interface Synthesizer {
  synthesize(question: string, queryResult: string): Promise<Result<string, SynthesisError>>;
}

export function apologize(error: SynthesisError): string {
  return `Sorry, I encountered an error while processing your question: ${error.message}`;
}

// The answer is only as grounded as the model's adherence to the prompt; nothing checks it against queryResult.
export class AnswerSynthesizer implements Synthesizer {
  constructor(
    private llm: LLM,
    private persona: string = ANALYST_PERSONA,
    private example: WorkedExample = CANADA_EXAMPLE,
    private temperature = 0,
  ) {}

  async synthesize(question: string, queryResult: string): Promise<Result<string, SynthesisError>> {
    const messages = buildAnswerPrompt(this.persona, this.example, question, queryResult);
    try {
      const answer = await this.llm.complete(messages, { temperature: this.temperature });
      if (!answer.trim()) return err(new SynthesisError("LLM returned an empty answer"));
      return ok(answer);
    } catch (e) {
      return err(new SynthesisError(errorMessage(e), e));
    }
  }
}
