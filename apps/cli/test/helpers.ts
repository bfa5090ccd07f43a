import type { Prompter } from "../src/prompts.js";

/** Answers prompts from a fixed script and records everything said. */
export function scriptedPrompter(answers: string[]) {
  const queue = [...answers];
  const questions: string[] = [];
  const output: string[] = [];
  let closed = false;

  const prompter: Prompter = {
    async ask(question) {
      questions.push(question);
      const next = queue.shift();
      if (next === undefined) throw new Error(`no scripted answer for ${JSON.stringify(question)}`);
      return next.trim();
    },
    say(line = "") {
      output.push(line);
    },
    close() {
      closed = true;
    },
  };

  return { prompter, questions, output, isClosed: () => closed };
}
