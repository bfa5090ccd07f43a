import test from "node:test";
import assert from "node:assert/strict";
import type { UploadedContext } from "@tubechat/contracts";
import { runChat } from "../src/chat.js";
import { scriptedPrompter } from "./helpers.js";

const docs: UploadedContext[] = [
  { name: "files/a", displayName: "Talk_a1.txt", uri: "u1", mimeType: "text/plain", state: "ready" },
  { name: "files/b", displayName: "", uri: "u2", mimeType: "text/plain", state: "ready" },
];

test("runChat answers questions, runs commands and stops on exit", async () => {
  const asked: string[] = [];
  const { prompter, output } = scriptedPrompter(["", "list", "What is covered?", "clear", "bye"]);

  await runChat({
    prompter,
    contexts: {
      async ask(question) {
        asked.push(question);
        return "Two talks about testing.";
      },
      uploaded: () => docs,
    },
  });

  assert.deepEqual(asked, ["What is covered?"]);
  assert.ok(output.includes("2 video transcript(s) loaded"));
  assert.ok(output.includes("  1. Talk_a1.txt"));
  assert.ok(output.includes("  2. files/b"));
  assert.ok(output.includes("Assistant: Two talks about testing."));
  assert.ok(output.includes("Conversation history cleared."));
  assert.equal(output[output.length - 1], "Thanks for chatting! Goodbye!");
});

test("runChat reports a failed answer and keeps going", async () => {
  let calls = 0;
  const { prompter, output } = scriptedPrompter(["first", "second", "quit"]);

  await runChat({
    prompter,
    contexts: {
      async ask(question) {
        calls++;
        if (calls === 1) throw new Error("Gemini API error 429: quota");
        return `answer to ${question}`;
      },
      uploaded: () => [],
    },
  });

  assert.ok(output.includes("Error: Gemini API error 429: quota"));
  assert.ok(output.includes("Assistant: answer to second"));
});
