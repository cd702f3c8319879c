import { mkdir, readFile, rename, unlink, writeFile } from 'node:fs/promises';
import { dirname, join, resolve } from 'node:path';
import { randomBytes } from 'node:crypto';
import { z } from 'zod';
import type { TokenSet } from '../types/tokens.js';
import { CacheError, errorMessage } from './errors.js';

export const TOKEN_FILENAME = 'tokens.json';

/**
 * Where a TokenSet lives between runs. `load` resolves null when nothing is
 * cached and rejects with CacheError when the store exists but can't be used.
 */
export interface TokenCache {
  load(): Promise<TokenSet | null>;
  save(tokens: TokenSet): Promise<void>;
  clear(): Promise<void>;
}

export const tokenSetSchema = z.object({
  access_token: z.string().min(1),
  refresh_token: z.string().min(1),
  expires_at: z
    .string()
    .refine((value) => !Number.isNaN(Date.parse(value)), { message: 'Invalid date' }),
  token_type: z.literal('Bearer'),
});

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

// Writes to the same path are chained so two caches sharing a file never interleave.
const pendingWrites = new Map<string, Promise<void>>();

function serialize(path: string, task: () => Promise<void>): Promise<void> {
  const previous = pendingWrites.get(path) ?? Promise.resolve();
  const next = previous.catch(() => undefined).then(task);
  pendingWrites.set(path, next);
  const cleanup = (): void => {
    if (pendingWrites.get(path) === next) {
      pendingWrites.delete(path);
    }
  };
  void next.then(cleanup, cleanup);
  return next;
}

/**
 * Stores tokens as JSON in `<dir>/tokens.json` with 0o600 permissions.
 * Saves go to a temp file first and are renamed into place. The directory is
 * created with 0o700 on the first save.
 */
export class FileTokenCache implements TokenCache {
  public readonly path: string;

  constructor(configDir: string, filename: string = TOKEN_FILENAME) {
    this.path = resolve(join(configDir, filename));
  }

  async load(): Promise<TokenSet | null> {
    let raw: string;
    try {
      raw = await readFile(this.path, 'utf-8');
    } catch (err) {
      if (isMissingFile(err)) {
        return null;
      }
      throw new CacheError('read', this.path, `Unable to read token cache: ${errorMessage(err)}`, {
        cause: err,
      });
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw new CacheError('read', this.path, 'Token cache is not valid JSON', { cause: err });
    }

    const parsed = tokenSetSchema.safeParse(json);
    if (!parsed.success) {
      throw new CacheError(
        'read',
        this.path,
        `Token cache is malformed: ${parsed.error.issues.map((i) => i.path.join('.') || i.message).join(', ')}`,
      );
    }
    return parsed.data;
  }

  save(tokens: TokenSet): Promise<void> {
    return serialize(this.path, async () => {
      const tmpPath = `${this.path}.${process.pid}.${randomBytes(4).toString('hex')}.tmp`;
      try {
        await mkdir(dirname(this.path), { recursive: true, mode: 0o700 });
        await writeFile(tmpPath, JSON.stringify(tokens, null, 2), {
          mode: 0o600,
          encoding: 'utf-8',
        });
        await rename(tmpPath, this.path);
      } catch (err) {
        await unlink(tmpPath).catch(() => undefined);
        throw new CacheError(
          'write',
          this.path,
          `Unable to write token cache: ${errorMessage(err)}`,
          { cause: err },
        );
      }
    });
  }

  clear(): Promise<void> {
    return serialize(this.path, async () => {
      try {
        await unlink(this.path);
      } catch (err) {
        if (isMissingFile(err)) {
          return;
        }
        throw new CacheError(
          'delete',
          this.path,
          `Unable to delete token cache: ${errorMessage(err)}`,
          { cause: err },
        );
      }
    });
  }
}

/** Keeps the TokenSet in memory only. */
export class MemoryTokenCache implements TokenCache {
  private tokens: TokenSet | null;

  constructor(initial: TokenSet | null = null) {
    this.tokens = initial ? { ...initial } : null;
  }

  async load(): Promise<TokenSet | null> {
    return this.tokens ? { ...this.tokens } : null;
  }

  async save(tokens: TokenSet): Promise<void> {
    this.tokens = { ...tokens };
  }

  async clear(): Promise<void> {
    this.tokens = null;
  }
}
