/**
 * LiveConsoleOutput — real terminal output with colors via picocolors.
 */

import pc from "picocolors";
import type { ConsoleOutput } from "./console.js";

function emit(stream: NodeJS.WriteStream, text: string, newline: boolean): void {
  stream.write(newline ? text + "\n" : text);
}

export class LiveConsoleOutput implements ConsoleOutput {
  write(text: string, newline = true): void {
    emit(process.stdout, text, newline);
  }

  // stdout, so errors interleave with the step they belong to
  error(text: string, newline = true): void {
    emit(process.stdout, pc.red(text), newline);
  }

  success(text: string, newline = true): void {
    emit(process.stdout, pc.green(text), newline);
  }

  warn(text: string, newline = true): void {
    emit(process.stdout, pc.yellow(text), newline);
  }

  info(text: string, newline = true): void {
    emit(process.stdout, pc.dim(text), newline);
  }

  heading(text: string, newline = true): void {
    emit(process.stdout, pc.bold(text), newline);
  }

  step(index: number, title: string): void {
    emit(process.stdout, pc.bold(pc.cyan(`${index}. ${title}`)), true);
  }
}
