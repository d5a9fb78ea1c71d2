import readline from "readline";

export interface Prompter {
  ask(question: string): Promise<string>;
  close(): void;
}

// Raised when stdin ends while a question is pending; the entry point treats it as "exit".
export class InputClosedError extends Error {
  constructor() {
    super("input closed");
    this.name = "InputClosedError";
  }
}

export function createPrompter(input: NodeJS.ReadableStream = process.stdin, output: NodeJS.WritableStream = process.stdout): Prompter {
  const rl = readline.createInterface({ input, output });
  let closed = false;
  rl.on("close", () => {
    closed = true;
  });
  return {
    ask(question: string) {
      if (closed) return Promise.reject(new InputClosedError());
      return new Promise<string>((resolve, reject) => {
        const onClose = () => reject(new InputClosedError());
        rl.once("close", onClose);
        rl.question(question, (answer) => {
          rl.off("close", onClose);
          resolve(answer);
        });
      });
    },
    close() {
      if (!closed) rl.close();
    },
  };
}
