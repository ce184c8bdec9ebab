import * as crypto from 'crypto';
import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { SessionInvalidError } from '../lib/errors.js';

// Shape of Playwright's storage state (cookies + per-origin local storage)
export const sessionStateSchema = z.object({
  cookies: z.array(
    z.object({
      name: z.string(),
      value: z.string(),
      domain: z.string(),
      path: z.string(),
      expires: z.number(),
      httpOnly: z.boolean(),
      secure: z.boolean(),
      sameSite: z.enum(['Strict', 'Lax', 'None']),
    })
  ),
  origins: z.array(
    z.object({
      origin: z.string(),
      localStorage: z.array(z.object({ name: z.string(), value: z.string() })),
    })
  ),
});

export type SessionState = z.infer<typeof sessionStateSchema>;

export interface SessionStore {
  readonly location: string;
  exists(): boolean;
  /** Throws SessionInvalidError when the state is missing or unreadable. */
  load(): SessionState;
  save(state: SessionState): void;
}

function encrypt(data: string, key: Buffer): string {
  const iv = crypto.randomBytes(16);
  const cipher = crypto.createCipheriv('aes-256-cbc', key, iv);
  let encrypted = cipher.update(data, 'utf8', 'hex');
  encrypted += cipher.final('hex');
  return iv.toString('hex') + ':' + encrypted;
}

function decrypt(data: string, key: Buffer): string {
  const [ivHex, encryptedHex] = data.trim().split(':');
  if (!ivHex || !encryptedHex) {
    throw new Error('Encrypted session is not in iv:payload form');
  }
  const iv = Buffer.from(ivHex, 'hex');
  const decipher = crypto.createDecipheriv('aes-256-cbc', key, iv);
  let decrypted = decipher.update(encryptedHex, 'hex', 'utf8');
  decrypted += decipher.final('utf8');
  return decrypted;
}

/**
 * Browser session state on disk, AES-256-CBC encrypted when a key is given.
 */
export class FileSessionStore implements SessionStore {
  private readonly key: Buffer | null;

  constructor(
    private readonly filePath: string,
    encryptionKeyHex?: string
  ) {
    this.key = encryptionKeyHex ? Buffer.from(encryptionKeyHex, 'hex') : null;
  }

  get location(): string {
    return path.resolve(this.filePath);
  }

  get encrypted(): boolean {
    return this.key !== null;
  }

  exists(): boolean {
    return fs.existsSync(this.filePath);
  }

  load(): SessionState {
    if (!this.exists()) {
      throw new SessionInvalidError(`No saved session at ${this.location}. Run "setup" to sign in first.`, {
        file: this.location,
      });
    }

    let json: string;
    try {
      const raw = fs.readFileSync(this.filePath, 'utf8');
      json = this.key ? decrypt(raw, this.key) : raw;
    } catch (err) {
      throw new SessionInvalidError(
        `Session file ${this.location} could not be read${this.key ? ' or decrypted' : ''}`,
        { file: this.location },
        err
      );
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(json);
    } catch (err) {
      throw new SessionInvalidError(`Session file ${this.location} is not valid JSON`, { file: this.location }, err);
    }

    const result = sessionStateSchema.safeParse(parsed);
    if (!result.success) {
      throw new SessionInvalidError(
        `Session file ${this.location} does not hold browser storage state`,
        { file: this.location, issues: result.error.issues.length },
        result.error
      );
    }
    return result.data;
  }

  save(state: SessionState): void {
    const json = JSON.stringify(state);
    fs.mkdirSync(path.dirname(this.location), { recursive: true });
    fs.writeFileSync(this.filePath, this.key ? encrypt(json, this.key) : json, 'utf8');
  }
}
