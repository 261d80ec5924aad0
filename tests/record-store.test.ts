import fs from 'fs';
import os from 'os';
import path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { FileRecordStore } from '../src/repositories/record-store';
import { Catalog } from '../src/repositories/catalog.repository';
import { Role } from '../src/types/user.types';

describe('FileRecordStore', () => {
  let directory: string;

  beforeEach(() => {
    directory = fs.mkdtempSync(path.join(os.tmpdir(), 'record-store-'));
  });

  afterEach(() => {
    fs.rmSync(directory, { recursive: true, force: true });
  });

  it('treats a missing file as absent', () => {
    expect(new FileRecordStore(directory).read('users.txt')).toBeNull();
  });

  it('creates the data directory on first write', () => {
    const store = new FileRecordStore(path.join(directory, 'nested'));

    store.write('users.txt', '1,admin,adminpass,0\n');

    expect(fs.readFileSync(path.join(directory, 'nested', 'users.txt'), 'utf8')).toBe('1,admin,adminpass,0\n');
    expect(store.read('users.txt')).toBe('1,admin,adminpass,0\n');
  });

  it('lets a new catalog pick up where the last one saved', () => {
    const first = new Catalog(new FileRecordStore(directory));
    first.load();
    first.createUser({ username: 'admin', password: 'adminpass', role: Role.ADMIN });

    const second = new Catalog(new FileRecordStore(directory));
    second.load();

    expect(second.findUserByUsername('admin')?.id).toBe(1);
  });
});
