import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { CheckpointStore, ProcessedComuniLog } from '../../src/storage/checkpoint';

describe('CheckpointStore', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'checkpoint-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('saves and reloads the processed keys', async () => {
    const store = new CheckpointStore(path.join(dir, 'nested', 'out_checkpoint.json'));
    await store.save(['acme srl|terni|acme.it']);

    expect((await store.load())?.processed).toEqual(['acme srl|terni|acme.it']);
    expect(fs.existsSync(`${store.file}.tmp`)).toBe(false);
  });

  it('returns null for a missing or malformed checkpoint', async () => {
    const store = new CheckpointStore(path.join(dir, 'out_checkpoint.json'));
    expect(await store.load()).toBeNull();

    fs.writeFileSync(store.file, JSON.stringify({ processed: 'nope' }));
    expect(await store.load()).toBeNull();

    fs.writeFileSync(store.file, '{');
    expect(await store.load()).toBeNull();
  });
});

describe('ProcessedComuniLog', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'comuni-log-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('remembers completed searches across instances', async () => {
    const file = path.join(dir, 'comuni_elaborati.csv');
    const log = new ProcessedComuniLog(file);
    await log.mark('Terni', 'fotovoltaico');
    await log.mark('Narni', 'fotovoltaico');

    const reloaded = new ProcessedComuniLog(file);
    await reloaded.load();

    expect(reloaded.has('TERNI', 'fotovoltaico')).toBe(true);
    expect(reloaded.has('Narni', 'fotovoltaico')).toBe(true);
    expect(reloaded.has('Terni', 'domotica')).toBe(false);
    expect(fs.readFileSync(file, 'utf-8').split('\n')[0]).toBe('comune,keyword,timestamp');
  });
});
