import { describe, it, expect } from "vitest";
import { SynthesisError } from "../src/errors";
import { MockLLM } from "../src/llm/llm";
import { ANALYST_PERSONA, buildAnswerPrompt, CANADA_EXAMPLE } from "../src/pipeline/prompts";
import { AnswerSynthesizer, apologize } from "../src/pipeline/synthesizer";
import { ScriptedLLM } from "./fakes";

describe("buildAnswerPrompt", () => {
  it("builds a system turn with the persona and one example, then the question with its context", () => {
    const messages = buildAnswerPrompt(ANALYST_PERSONA, CANADA_EXAMPLE, "Which country has the most students?", "No rows returned.");

    expect(messages.map((m) => m.role)).toEqual(["system", "user"]);
    expect(messages[0].content.startsWith(ANALYST_PERSONA)).toBe(true);
    expect(messages[0].content).toContain(
      "Example:\nInput: How many students went to Canada?\nContext: There are 120 students in the database who went to Canada.\nOutput: Based on the data, 120 students",
    );
    expect(messages[0].content.match(/^Input:/gm)).toHaveLength(1);
    expect(messages[1].content).toBe(
      "Input:\nWhich country has the most students?\n\nContext:\nNo rows returned.\n\nOutput:\n",
    );
  });
});

describe("AnswerSynthesizer", () => {
  it("returns the completion verbatim", async () => {
    const llm = new ScriptedLLM(["Based on the data, Germany received 2 students. 🎓"]);
    const res = await new AnswerSynthesizer(llm).synthesize("How many went to Germany?", "count\n2");

    expect(res).toEqual({ ok: true, value: "Based on the data, Germany received 2 students. 🎓" });
    expect(llm.calls[0].options).toEqual({ temperature: 0 });
    expect(llm.calls[0].messages[1].content).toBe("Input:\nHow many went to Germany?\n\nContext:\ncount\n2\n\nOutput:\n");
  });

  it("answers the Canada question from its result", async () => {
    const res = await new AnswerSynthesizer(new MockLLM()).synthesize(
      "How many students went to Canada?",
      "There are 120 students in the database who went to Canada.",
    );
    expect(res.ok).toBe(true);
    if (!res.ok) return;
    expect(res.value).toContain("120");
    expect(res.value).toContain("Canada");
  });

  it("reports model failures as SynthesisError", async () => {
    const res = await new AnswerSynthesizer(new ScriptedLLM([new Error("LLM error: 429 rate limited")])).synthesize("q", "ctx");
    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.error).toBeInstanceOf(SynthesisError);
    expect(apologize(res.error)).toBe(
      "Sorry, I encountered an error while processing your question: LLM error: 429 rate limited",
    );
  });

  it("treats a blank completion as a failure", async () => {
    const res = await new AnswerSynthesizer(new ScriptedLLM(["   "])).synthesize("q", "ctx");
    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.error.message).toBe("LLM returned an empty answer");
  });
});
