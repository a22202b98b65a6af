import * as readline from "node:readline";
import { AbortedError } from "./exit-codes.js";

/** Asks a yes/no question; resolves with the answer. */
export type Confirm = (question: string, defaultYes: boolean) => Promise<boolean>;

export const terminalConfirm: Confirm = (question, defaultYes) => {
  const rl = readline.createInterface({ input: process.stdin, output: process.stderr });
  const hint = defaultYes ? "[Y/n]" : "[y/N]";
  return new Promise((resolve) => {
    rl.question(`${question} ${hint} `, (answer) => {
      rl.close();
      const normalized = answer.trim().toLowerCase();
      resolve(normalized === "" ? defaultYes : normalized === "y" || normalized === "yes");
    });
  });
};

/** Used for `--yes`. */
export const assumeYes: Confirm = () => Promise.resolve(true);

export async function confirmOrAbort(confirm: Confirm, question: string, defaultYes: boolean): Promise<void> {
  if (!(await confirm(question, defaultYes))) {
    throw new AbortedError();
  }
}
