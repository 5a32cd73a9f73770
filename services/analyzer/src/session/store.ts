import { randomUUID } from 'node:crypto';
import { promises as fs } from 'node:fs';
import path from 'node:path';

import type { StationId } from '@station-analyzer/pivot';

export type WizardSession = {
  token: string;
  stationId: StationId;
  originalFilename: string;
  filePath: string;
  createdAt: Date;
  expiresAt: Date;
};

export type DiscardReason = 'completed' | 'cancelled' | 'expired' | 'rejected' | 'replaced' | 'shutdown';

export interface WizardSessionStoreOptions {
  rootDir: string;
  ttlMs: number;
  now?: () => Date;
  onChange?: (event: { session: WizardSession; action: 'created' } | { session: WizardSession; action: 'discarded'; reason: DiscardReason }) => void;
}

export interface CreateSessionInput {
  stationId: StationId;
  originalFilename: string;
  contents: Buffer;
}

const TOKEN_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/;

/**
 * Holds the upload between the wizard steps. Files are stored under the
 * random session token, never under the name the client supplied.
 */
export class WizardSessionStore {
  private readonly rootDir: string;
  private readonly ttlMs: number;
  private readonly now: () => Date;
  private readonly onChange?: WizardSessionStoreOptions['onChange'];
  private readonly sessions = new Map<string, WizardSession>();

  constructor(options: WizardSessionStoreOptions) {
    this.rootDir = path.resolve(options.rootDir);
    this.ttlMs = options.ttlMs;
    this.now = options.now ?? (() => new Date());
    this.onChange = options.onChange;
  }

  get size(): number {
    return this.sessions.size;
  }

  async init(): Promise<void> {
    await fs.mkdir(this.rootDir, { recursive: true });
  }

  async create(input: CreateSessionInput): Promise<WizardSession> {
    const token = randomUUID();
    const extension = path.extname(input.originalFilename).toLowerCase();
    const createdAt = this.now();
    const session: WizardSession = {
      token,
      stationId: input.stationId,
      originalFilename: input.originalFilename,
      filePath: path.join(this.rootDir, `${token}${extension}`),
      createdAt,
      expiresAt: new Date(createdAt.getTime() + this.ttlMs)
    };

    await fs.writeFile(session.filePath, input.contents);
    this.sessions.set(token, session);
    this.onChange?.({ session, action: 'created' });
    return session;
  }

  async get(token: string): Promise<WizardSession | null> {
    if (!TOKEN_PATTERN.test(token)) {
      return null;
    }
    const session = this.sessions.get(token);
    if (!session) {
      return null;
    }
    if (session.expiresAt.getTime() <= this.now().getTime()) {
      await this.discard(token, 'expired');
      return null;
    }
    return session;
  }

  async readFile(session: WizardSession): Promise<Buffer> {
    return fs.readFile(session.filePath);
  }

  async discard(token: string, reason: DiscardReason): Promise<boolean> {
    const session = this.sessions.get(token);
    if (!session) {
      return false;
    }
    this.sessions.delete(token);
    await fs.rm(session.filePath, { force: true });
    this.onChange?.({ session, action: 'discarded', reason });
    return true;
  }

  async sweepExpired(): Promise<number> {
    const cutoff = this.now().getTime();
    const expired = Array.from(this.sessions.values()).filter((session) => session.expiresAt.getTime() <= cutoff);
    for (const session of expired) {
      await this.discard(session.token, 'expired');
    }
    return expired.length;
  }

  async close(): Promise<void> {
    for (const token of Array.from(this.sessions.keys())) {
      await this.discard(token, 'shutdown');
    }
  }
}
