/**
 * File Audit Log
 *
 * Persists audit events as JSON lines through a dedicated winston logger.
 * The logger writes to a stream this class owns, so a target that cannot be
 * opened or written surfaces as a failure instead of being dropped.
 */

import fs from 'node:fs';
import path from 'node:path';
import EventEmitter from 'eventemitter3';
import winston from 'winston';
import { toError } from '../errors.js';
import type { AuditEvent, AuditLog } from './types.js';

type FileAuditLogEvents = {
  error: [error: Error];
};

export class FileAuditLog extends EventEmitter<FileAuditLogEvents> implements AuditLog {
  private readonly stream: fs.WriteStream;
  private readonly writer: winston.Logger;
  private readonly transportFinished: Promise<void>;
  private failure: Error | null = null;

  constructor(filename: string) {
    super();

    try {
      fs.mkdirSync(path.dirname(filename), { recursive: true });
    } catch (error) {
      this.fail(toError(error));
    }

    this.stream = fs.createWriteStream(filename, { flags: 'a' });
    this.stream.on('error', (error) => this.fail(error));

    const transport = new winston.transports.Stream({ stream: this.stream });
    this.transportFinished = new Promise((resolve) => {
      transport.once('finish', () => resolve());
    });

    this.writer = winston.createLogger({
      level: 'info',
      format: winston.format.printf(({ message }) => String(message)),
      transports: [transport],
    });
  }

  /**
   * Throws once the file has failed; earlier events are reported through onFailure
   */
  record(event: AuditEvent): void {
    if (this.failure) {
      throw this.failure;
    }
    this.writer.info(JSON.stringify(event));
  }

  onFailure(listener: (error: Error) => void): void {
    this.on('error', listener);
  }

  /**
   * Flush pending writes before the process exits
   */
  async close(): Promise<void> {
    this.writer.end();
    await this.transportFinished;

    if (this.stream.destroyed) {
      return;
    }
    await new Promise<void>((resolve) => {
      this.stream.end(() => resolve());
    });
  }

  private fail(error: Error): void {
    if (this.failure) {
      return;
    }
    this.failure = error;
    this.emit('error', error);
  }
}
