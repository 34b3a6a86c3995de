import * as readline from "node:readline/promises";
import type { Readable, Writable } from "node:stream";
import { logger, LogCategory } from "@/infrastructure/utils/logger";

export interface ConsoleInterfaceOptions {
  input: Readable;
  output: Writable;
  /** When false, pause() returns immediately */
  pause: boolean;
  /** Name used when the prompt answer is blank */
  defaultName: string;
}

/**
 * Line-oriented console I/O for the simulation.
 */
export class ConsoleInterface {
  private readonly rl: readline.Interface;
  private readonly closed: Promise<void>;
  private isClosed = false;

  constructor(private readonly options: ConsoleInterfaceOptions) {
    this.rl = readline.createInterface({
      input: options.input,
      output: options.output,
      terminal: false,
    });
    this.closed = new Promise((resolve) => {
      this.rl.once("close", () => {
        this.isClosed = true;
        resolve();
      });
    });
  }

  /**
   * Resolves with the next line, or with an empty string once input has ended.
   */
  private async ask(prompt: string): Promise<string> {
    if (this.isClosed) return "";
    const answer = await Promise.race([
      this.rl.question(prompt).catch((error: unknown) => {
        // A question pending at close is aborted; treat it as end of input.
        if (this.isClosed) return "";
        throw error;
      }),
      this.closed.then(() => ""),
    ]);
    return answer;
  }

  public print(lines: string | string[]): void {
    const text = Array.isArray(lines) ? lines : [lines];
    for (const line of text) {
      this.options.output.write(`${line}\n`);
    }
  }

  /**
   * Asks for the rat's name. Only the first word of the answer is kept.
   */
  public async promptName(): Promise<string> {
    const answer = await this.ask("What is the rat's name? ");
    const name = answer.trim().split(/\s+/)[0];
    if (!name) {
      logger.debug(
        `Blank name, using ${this.options.defaultName}`,
        LogCategory.CLI,
      );
      return this.options.defaultName;
    }
    return name;
  }

  public async pause(): Promise<void> {
    if (!this.options.pause) return;
    this.print("Press enter to continue.");
    await this.ask("");
  }

  public close(): void {
    if (!this.isClosed) this.rl.close();
  }
}
