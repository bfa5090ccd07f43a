import type { UploadedContext } from "@tubechat/contracts";
import { errorMessage } from "../errors";

export type ChatExchange = { question: string; answer: string };

export type ChatTurn =
  | { kind: "empty" }
  | { kind: "exit" }
  | { kind: "help" }
  | { kind: "list"; documents: ReadonlyArray<UploadedContext> }
  | { kind: "cleared" }
  | { kind: "answer"; question: string; answer: string }
  | { kind: "error"; question: string; message: string };

const EXIT_COMMANDS = new Set(["exit", "quit", "bye", "q"]);
const HELP_COMMANDS = new Set(["help", "?"]);

export type ChatSession = ReturnType<typeof createChatSession>;

/**
 * Turn handling for the interactive chat, without any console I/O. The Q/A history
 * is for display only; it is never sent back to the model.
 */
export function createChatSession(opts: {
  ask: (question: string) => Promise<string>;
  documents: () => ReadonlyArray<UploadedContext>;
}) {
  let exchanges: ChatExchange[] = [];

  return {
    async handle(line: string): Promise<ChatTurn> {
      const input = line.trim();
      if (!input) return { kind: "empty" };

      const command = input.toLowerCase();
      if (EXIT_COMMANDS.has(command)) return { kind: "exit" };
      if (HELP_COMMANDS.has(command)) return { kind: "help" };
      if (command === "list") return { kind: "list", documents: opts.documents() };
      if (command === "clear") {
        exchanges = [];
        return { kind: "cleared" };
      }

      try {
        const answer = await opts.ask(input);
        exchanges.push({ question: input, answer });
        return { kind: "answer", question: input, answer };
      } catch (err) {
        return { kind: "error", question: input, message: errorMessage(err) };
      }
    },

    history(): ReadonlyArray<ChatExchange> {
      return exchanges;
    },
  };
}
