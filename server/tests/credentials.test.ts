import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { FileCredentialStore } from '../src/services/credentials.js';
import { CredentialNotFoundError } from '../src/services/errors.js';

describe('FileCredentialStore', () => {
  let dir: string;
  let file: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'scan-grabber-'));
    file = path.join(dir, 'credentials.json');
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('looks passwords up by MAC address, ignoring case', async () => {
    await fs.writeFile(file, JSON.stringify({ '00:11:e5:0a:1b:2c': { password: 'test-secret' } }));
    const store = new FileCredentialStore(file);

    expect(await store.resolve('00:11:E5:0A:1B:2C')).toBe('test-secret');
  });

  it('throws CredentialNotFound for an unknown device', async () => {
    await fs.writeFile(file, JSON.stringify({ '00:11:E5:0A:1B:2C': { password: 'test-secret' } }));
    const store = new FileCredentialStore(file);

    const lookup = store.resolve('00:11:E5:FF:FF:FF');

    await expect(lookup).rejects.toBeInstanceOf(CredentialNotFoundError);
    await expect(lookup).rejects.toMatchObject({ deviceId: '00:11:E5:FF:FF:FF', store: file });
  });

  it('skips entries without a string password', async () => {
    await fs.writeFile(file, JSON.stringify({ '00:11:E5:0A:1B:2C': { password: 1234 } }));
    const store = new FileCredentialStore(file);

    await expect(store.resolve('00:11:E5:0A:1B:2C')).rejects.toBeInstanceOf(CredentialNotFoundError);
  });

  it('treats a missing file as an empty store', async () => {
    const store = new FileCredentialStore(path.join(dir, 'absent.json'));

    await expect(store.resolve('00:11:E5:0A:1B:2C')).rejects.toBeInstanceOf(CredentialNotFoundError);
  });

  it('treats malformed JSON as an empty store', async () => {
    await fs.writeFile(file, '[section]\npassword = test-secret\n');
    const store = new FileCredentialStore(file);

    await expect(store.resolve('00:11:E5:0A:1B:2C')).rejects.toBeInstanceOf(CredentialNotFoundError);
  });

  it('reads the file once for concurrent lookups', async () => {
    await fs.writeFile(file, JSON.stringify({
      '00:11:E5:00:00:01': { password: 'test-secret-1' },
      '00:11:E5:00:00:02': { password: 'test-secret-2' },
    }));
    const readSpy = vi.spyOn(fs, 'readFile');
    const store = new FileCredentialStore(file);

    const secrets = await Promise.all([
      store.resolve('00:11:E5:00:00:01'),
      store.resolve('00:11:E5:00:00:02'),
      store.resolve('00:11:E5:00:00:01'),
    ]);

    expect(secrets).toEqual(['test-secret-1', 'test-secret-2', 'test-secret-1']);
    expect(readSpy).toHaveBeenCalledTimes(1);
  });
});
