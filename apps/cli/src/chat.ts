import { createChatSession, type ChatTurn, type ContextStore } from "@tubechat/core";
import type { Prompter } from "./prompts.js";

const RULE = "=".repeat(70);

const HELP_LINES = [
  "",
  "Example questions:",
  "  - What topics are covered in these videos?",
  "  - Summarize the main points from [video title]",
  "  - What did they say about [specific topic]?",
  "  - Which video talks about [subject]?",
  "",
  "Tips:",
  "  - Reference specific video titles if needed",
  "  - Each question is answered on its own; earlier answers are not sent back",
];

function printWelcome(p: Prompter, documents: number): void {
  p.say("");
  p.say(RULE);
  p.say("Chat with your YouTube video transcripts");
  p.say(RULE);
  p.say(`${documents} video transcript(s) loaded`);
  p.say("");
  p.say("Commands:");
  p.say("  help, ?      show example questions");
  p.say("  list         list uploaded files");
  p.say("  clear        clear the conversation history");
  p.say("  exit, quit   leave the chat");
  p.say(RULE);
}

/** Renders one turn; returns false once the user has asked to leave. */
export function renderTurn(p: Prompter, turn: ChatTurn): boolean {
  switch (turn.kind) {
    case "empty":
      return true;
    case "exit":
      p.say("");
      p.say("Thanks for chatting! Goodbye!");
      return false;
    case "help":
      for (const line of HELP_LINES) p.say(line);
      return true;
    case "list":
      p.say("");
      p.say("Uploaded files:");
      if (!turn.documents.length) p.say("  No files uploaded yet.");
      turn.documents.forEach((doc, i) => p.say(`  ${i + 1}. ${doc.displayName || doc.name}`));
      return true;
    case "cleared":
      p.say("Conversation history cleared.");
      return true;
    case "answer":
      p.say(`Assistant: ${turn.answer}`);
      return true;
    case "error":
      p.say(`Error: ${turn.message}`);
      p.say("Please try again.");
      return true;
  }
}

export async function runChat(opts: { prompter: Prompter; contexts: Pick<ContextStore, "ask" | "uploaded"> }): Promise<void> {
  const { prompter, contexts } = opts;
  const session = createChatSession({
    ask: (question) => contexts.ask(question),
    documents: () => contexts.uploaded(),
  });

  printWelcome(prompter, contexts.uploaded().length);
  for (;;) {
    const line = await prompter.ask("\nYou: ");
    const turn = await session.handle(line);
    if (!renderTurn(prompter, turn)) return;
  }
}
