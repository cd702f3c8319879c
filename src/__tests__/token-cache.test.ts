import { mkdtempSync, readdirSync, readFileSync, rmSync, statSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import type { TokenSet } from '../types/tokens.js';
import { CacheError } from '../lib/errors.js';
import { FileTokenCache, MemoryTokenCache } from '../lib/token-cache.js';

const sampleTokens: TokenSet = {
  access_token: 'access-abc-123',
  refresh_token: 'refresh-xyz-789',
  expires_at: '2026-01-01T01:00:00.000Z',
  token_type: 'Bearer',
};

describe('FileTokenCache', () => {
  let tmpDir: string;
  let cache: FileTokenCache;

  beforeEach(() => {
    tmpDir = mkdtempSync(join(tmpdir(), 'mal-mcp-test-'));
    cache = new FileTokenCache(tmpDir);
  });

  afterEach(() => {
    rmSync(tmpDir, { recursive: true, force: true });
  });

  it('stores tokens in tokens.json', () => {
    expect(cache.path).toBe(join(tmpDir, 'tokens.json'));
  });

  it('returns null when nothing is cached', async () => {
    await expect(cache.load()).resolves.toBeNull();
  });

  it('round-trips a token set', async () => {
    await cache.save(sampleTokens);
    await expect(cache.load()).resolves.toEqual(sampleTokens);
  });

  it('writes JSON readable by a second cache on the same directory', async () => {
    await cache.save(sampleTokens);
    const raw = readFileSync(join(tmpDir, 'tokens.json'), 'utf-8');
    expect(JSON.parse(raw)).toEqual(sampleTokens);
    await expect(new FileTokenCache(tmpDir).load()).resolves.toEqual(sampleTokens);
  });

  it('sets chmod 600 on tokens.json', async () => {
    await cache.save(sampleTokens);
    const mode = statSync(cache.path).mode & 0o777;
    expect(mode).toBe(0o600);
  });

  it('leaves no temp files behind', async () => {
    await cache.save(sampleTokens);
    await cache.save({ ...sampleTokens, access_token: 'access-2' });
    expect(readdirSync(tmpDir)).toEqual(['tokens.json']);
  });

  it('applies concurrent saves in call order', async () => {
    await Promise.all(
      ['a1', 'a2', 'a3', 'a4', 'a5'].map((token) =>
        cache.save({ ...sampleTokens, access_token: token }),
      ),
    );
    const loaded = await cache.load();
    expect(loaded?.access_token).toBe('a5');
  });

  it('rejects a cache that is not JSON', async () => {
    writeFileSync(cache.path, 'not-json!!!', 'utf-8');
    const load = cache.load();
    await expect(load).rejects.toBeInstanceOf(CacheError);
    await expect(load).rejects.toMatchObject({
      operation: 'read',
      path: cache.path,
      message: 'Token cache is not valid JSON',
    });
  });

  it('names the fields a malformed cache is missing', async () => {
    writeFileSync(cache.path, JSON.stringify({ access_token: 'a' }), 'utf-8');
    await expect(cache.load()).rejects.toThrow(
      'Token cache is malformed: refresh_token, expires_at, token_type',
    );
  });

  it('rejects an unparseable expiry date', async () => {
    writeFileSync(cache.path, JSON.stringify({ ...sampleTokens, expires_at: 'soon' }), 'utf-8');
    await expect(cache.load()).rejects.toThrow('Token cache is malformed: expires_at');
  });

  it('creates a missing directory with 0o700 on the first save', async () => {
    const dir = join(tmpDir, 'nested', 'mal');
    const nested = new FileTokenCache(dir);

    await nested.save(sampleTokens);

    expect(statSync(dir).mode & 0o777).toBe(0o700);
    await expect(nested.load()).resolves.toEqual(sampleTokens);
  });

  it('reports write failures as CacheError', async () => {
    const blocker = join(tmpDir, 'file');
    writeFileSync(blocker, 'not a directory');
    const blocked = new FileTokenCache(join(blocker, 'sub'));

    await expect(blocked.save(sampleTokens)).rejects.toMatchObject({
      name: 'CacheError',
      operation: 'write',
      path: join(blocker, 'sub', 'tokens.json'),
    });
  });

  it('clear removes the file', async () => {
    await cache.save(sampleTokens);
    await cache.clear();
    expect(readdirSync(tmpDir)).toEqual([]);
    await expect(cache.load()).resolves.toBeNull();
  });

  it('clear does not fail when nothing is cached', async () => {
    await expect(cache.clear()).resolves.toBeUndefined();
  });
});

describe('MemoryTokenCache', () => {
  it('starts empty', async () => {
    await expect(new MemoryTokenCache().load()).resolves.toBeNull();
  });

  it('returns what was saved', async () => {
    const cache = new MemoryTokenCache();
    await cache.save(sampleTokens);
    await expect(cache.load()).resolves.toEqual(sampleTokens);
  });

  it('keeps its own copy of the tokens', async () => {
    const tokens = { ...sampleTokens };
    const cache = new MemoryTokenCache(tokens);
    tokens.access_token = 'changed';
    const loaded = await cache.load();
    expect(loaded?.access_token).toBe('access-abc-123');
  });

  it('forgets tokens on clear', async () => {
    const cache = new MemoryTokenCache(sampleTokens);
    await cache.clear();
    await expect(cache.load()).resolves.toBeNull();
  });
});
