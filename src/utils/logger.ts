import { appendFile, mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';

function nowIso(): string {
  return new Date().toISOString();
}

export interface HarvestLogger {
  info(message: string): Promise<void>;
  warn(message: string): Promise<void>;
  error(message: string): Promise<void>;
}

export class RunLogger implements HarvestLogger {
  constructor(
    private readonly filePath: string,
    private readonly runLabel = 'Harvest run',
    private readonly echo = false,
  ) {}

  async init(): Promise<void> {
    await mkdir(dirname(this.filePath), { recursive: true });
    await writeFile(this.filePath, '', 'utf8');
    await this.write(`=== ${this.runLabel} started ${nowIso()} ===`);
  }

  async info(message: string): Promise<void> {
    await this.write(`[INFO] ${message}`);
  }

  async warn(message: string): Promise<void> {
    await this.write(`[WARN] ${message}`);
  }

  async error(message: string): Promise<void> {
    await this.write(`[ERROR] ${message}`);
  }

  async close(): Promise<void> {
    await this.write(`=== ${this.runLabel} finished ${nowIso()} ===`);
  }

  private async write(message: string): Promise<void> {
    const line = `${nowIso()} ${message}`;
    if (this.echo) {
      console.error(line);
    }
    await appendFile(this.filePath, `${line}\n`, 'utf8');
  }
}

/** Keeps log lines in memory; used where no log file is wanted. */
export class MemoryLogger implements HarvestLogger {
  readonly lines: string[] = [];

  async info(message: string): Promise<void> {
    this.lines.push(`[INFO] ${message}`);
  }

  async warn(message: string): Promise<void> {
    this.lines.push(`[WARN] ${message}`);
  }

  async error(message: string): Promise<void> {
    this.lines.push(`[ERROR] ${message}`);
  }
}
