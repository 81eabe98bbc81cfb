import fs from 'fs/promises';
import path from 'path';
import { LedgerReadError, LedgerWriteError, describeError, hasErrorCode } from '../utils/errorHandler';
import { Result, ok, err } from '../utils/result';
import { logger } from '../utils/logger';

export interface AlertLedger {
  load(): Promise<Result<Set<string>, LedgerReadError>>;
  save(identifiers: ReadonlySet<string>): Promise<Result<void, LedgerWriteError>>;
}

/**
 * Ledger stored as a JSON array of identifiers in a single file.
 *
 * Saves go through a temporary sibling and a rename, so a load never observes a
 * half-written array. There is one writer per file (the poll scheduler).
 */
export class FileAlertLedger implements AlertLedger {
  private readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = path.resolve(filePath);
  }

  getFilePath(): string {
    return this.filePath;
  }

  async load(): Promise<Result<Set<string>, LedgerReadError>> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) {
        logger.debug(`No ledger at ${this.filePath}, starting empty`);
        return ok(new Set<string>());
      }
      return err(new LedgerReadError(`Could not read ledger: ${describeError(error)}`, this.filePath, error));
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      return err(new LedgerReadError(`Ledger is not valid JSON: ${describeError(error)}`, this.filePath, error));
    }

    if (!Array.isArray(parsed)) {
      return err(new LedgerReadError('Ledger must hold a JSON array of identifiers', this.filePath));
    }

    const identifiers = new Set<string>();
    for (const entry of parsed) {
      if (typeof entry !== 'string') {
        return err(new LedgerReadError(`Ledger entry is not a string: ${JSON.stringify(entry)}`, this.filePath));
      }
      identifiers.add(entry);
    }

    return ok(identifiers);
  }

  async save(identifiers: ReadonlySet<string>): Promise<Result<void, LedgerWriteError>> {
    const tmpPath = `${this.filePath}.${process.pid}.tmp`;
    const body = JSON.stringify([...identifiers].sort(), null, 2);

    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.writeFile(tmpPath, body, 'utf-8');
      await fs.rename(tmpPath, this.filePath);
    } catch (error) {
      await fs.rm(tmpPath, { force: true }).catch((cleanupError: unknown) => {
        logger.debug(`Could not remove ${tmpPath}: ${describeError(cleanupError)}`);
      });
      return err(new LedgerWriteError(`Could not write ledger: ${describeError(error)}`, this.filePath, error));
    }

    logger.debug(`Ledger saved with ${identifiers.size} identifiers`, { filePath: this.filePath });
    return ok(undefined);
  }
}
