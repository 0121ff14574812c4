import { createInterface, type Interface } from 'node:readline';
import type { IConsoleOutput, ILineSource } from '../../application/ports.js';

/**
 * 標準入出力アダプタ
 *
 * 入力は行単位で読み、パイプ入力でも端末入力でも同じように扱う
 */
export class NodeConsole implements IConsoleOutput, ILineSource {
  private readonly reader: Interface;
  private readonly lines: AsyncIterator<string>;

  constructor(
    input: NodeJS.ReadableStream = process.stdin,
    private readonly stdout: NodeJS.WritableStream = process.stdout,
    private readonly stderr: NodeJS.WritableStream = process.stderr
  ) {
    this.reader = createInterface({ input, terminal: false });
    this.lines = this.reader[Symbol.asyncIterator]();
  }

  write(text: string): void {
    this.stdout.write(text);
  }

  writeLine(line: string): void {
    this.stdout.write(`${line}\n`);
  }

  writeError(line: string): void {
    this.stderr.write(`${line}\n`);
  }

  async readLine(): Promise<string | null> {
    const next = await this.lines.next();
    return next.done ? null : next.value;
  }

  close(): void {
    this.reader.close();
  }
}
