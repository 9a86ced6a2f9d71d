import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import {
  COLLECTIONS_FILE,
  FileWorkspaceRepository,
  METADATA_FILE,
  MOD_IDS_FILE,
  WORKSHOP_IDS_FILE,
} from './FileWorkspaceRepository';
import { emptySnapshot, fromSnapshot, WorkspaceSnapshot } from './WorkspaceRepository';
import { WorkspaceState } from './WorkspaceState';
import { workshopItem } from '../testing/fixtures';
import { PersistenceError } from '../utils/errors';
import { workshopItemUrl } from '../utils/workshop-ids';

const PACK = workshopItemUrl('900');

function sampleSnapshot(): WorkspaceSnapshot {
  return {
    workshopIds: ['103', '101', '102'],
    modIds: ['mod103', 'mod101', 'mod102'],
    // Numeric keys come back from JSON in ascending order; list order lives in the ID files
    items: [workshopItem('101'), workshopItem('102', { isMap: true, mapFolders: ['Riverside'] }), workshopItem('103')],
    collections: [{ url: PACK, title: 'Server pack', items: ['101', '102'], added: ['101'] }],
  };
}

describe('FileWorkspaceRepository', () => {
  let dataDir: string;

  beforeEach(() => {
    dataDir = fs.mkdtempSync(path.join(os.tmpdir(), 'pzws-repo-'));
  });

  afterEach(() => {
    fs.rmSync(dataDir, { recursive: true, force: true });
  });

  const read = (name: string): string => fs.readFileSync(path.join(dataDir, name), 'utf-8');

  it('loads an empty workspace from an empty directory', async () => {
    const snapshot = await new FileWorkspaceRepository(path.join(dataDir, 'missing')).load();
    expect(snapshot).toEqual({ workshopIds: [], modIds: [], items: [], collections: [] });
  });

  it('round-trips lists, metadata and collections in order', async () => {
    const repository = new FileWorkspaceRepository(dataDir);
    await repository.save(sampleSnapshot());

    expect(read(WORKSHOP_IDS_FILE)).toBe('103;101;102\n');
    expect(read(MOD_IDS_FILE)).toBe('mod103;mod101;mod102\n');
    expect(await repository.load()).toEqual(sampleSnapshot());
  });

  it('writes metadata keyed by Workshop ID and collections keyed by URL', async () => {
    await new FileWorkspaceRepository(dataDir).save(sampleSnapshot());

    const metadata = JSON.parse(read(METADATA_FILE));
    expect(Object.keys(metadata)).toEqual(['101', '102', '103']);
    expect(metadata['102']).toEqual({
      modIds: ['mod102'],
      name: 'Item 102',
      buildTag: '42',
      tags: [],
      isMap: true,
      mapFolders: ['Riverside'],
      requires: [],
      link: workshopItemUrl('102'),
    });

    const collections = JSON.parse(read(COLLECTIONS_FILE));
    expect(collections[PACK]).toEqual({ url: PACK, title: 'Server pack', items: ['101', '102'], added: ['101'] });
  });

  it('reads older newline lists and legacy metadata keys', async () => {
    fs.writeFileSync(path.join(dataDir, WORKSHOP_IDS_FILE), '201\n202\n201\n');
    fs.writeFileSync(path.join(dataDir, MOD_IDS_FILE), 'OldMod;oldmod\n');
    fs.writeFileSync(
      path.join(dataDir, METADATA_FILE),
      JSON.stringify({
        '201': { title: 'Old Map', version: '41.78', url: 'https://example.test/201', mods: ['OldMod'], map_folders: ['Rosewood'], tags: ['Map'] },
        '202': 'not an object',
      })
    );
    fs.writeFileSync(
      path.join(dataDir, COLLECTIONS_FILE),
      JSON.stringify({ '900': { items: ['201', '202'], added: ['202', '999'] } })
    );

    const snapshot = await new FileWorkspaceRepository(dataDir).load();

    expect(snapshot.workshopIds).toEqual(['201', '202']);
    expect(snapshot.modIds).toEqual(['OldMod']);
    expect(snapshot.items).toEqual([
      {
        id: '201',
        modIds: ['OldMod'],
        name: 'Old Map',
        buildTag: '41.78',
        tags: ['Map'],
        isMap: true,
        mapFolders: ['Rosewood'],
        requires: [],
        link: 'https://example.test/201',
      },
    ]);
    expect(snapshot.collections).toEqual([{ url: PACK, title: 'Collection 900', items: ['201', '202'], added: ['202'] }]);
  });

  it('writes the collections file after the ID lists', async () => {
    const renamed: string[] = [];
    const rename = vi.spyOn(fs.promises, 'rename').mockImplementation(async (from, to) => {
      renamed.push(path.basename(String(to)));
      await fs.promises.copyFile(from, to);
      await fs.promises.rm(from);
    });

    try {
      await new FileWorkspaceRepository(dataDir).save(sampleSnapshot());
    } finally {
      rename.mockRestore();
    }

    expect(renamed).toEqual([WORKSHOP_IDS_FILE, MOD_IDS_FILE, METADATA_FILE, COLLECTIONS_FILE]);
  });

  it('drops collection ownership of IDs missing from the ID list', async () => {
    fs.writeFileSync(path.join(dataDir, WORKSHOP_IDS_FILE), '101\n');
    fs.writeFileSync(
      path.join(dataDir, COLLECTIONS_FILE),
      JSON.stringify({ [PACK]: { url: PACK, title: 'Server pack', items: ['101', '102'], added: ['101', '102'] } })
    );

    const snapshot = await new FileWorkspaceRepository(dataDir).load();

    expect(snapshot.collections).toEqual([{ url: PACK, title: 'Server pack', items: ['101', '102'], added: ['101'] }]);
  });

  it('treats a corrupt JSON file as empty', async () => {
    fs.writeFileSync(path.join(dataDir, WORKSHOP_IDS_FILE), '301\n');
    fs.writeFileSync(path.join(dataDir, METADATA_FILE), '{ "301": ');

    const snapshot = await new FileWorkspaceRepository(dataDir).load();

    expect(snapshot.workshopIds).toEqual(['301']);
    expect(snapshot.items).toEqual([]);
  });

  it('cleans up staged files when a write fails', async () => {
    fs.mkdirSync(path.join(dataDir, COLLECTIONS_FILE));

    await expect(new FileWorkspaceRepository(dataDir).save(sampleSnapshot())).rejects.toThrow();

    expect(fs.readdirSync(dataDir).filter((name) => name.includes('.tmp-'))).toEqual([]);
  });

  it('keeps the in-memory state when the directory cannot be written', async () => {
    const blocker = path.join(dataDir, 'blocker');
    fs.writeFileSync(blocker, 'a file where a directory should be');
    const state = new WorkspaceState(new FileWorkspaceRepository(path.join(blocker, 'data')), fromSnapshot(emptySnapshot()));

    await expect(state.transact('test write', (ledger) => ledger.insert(workshopItem('101')))).rejects.toBeInstanceOf(
      PersistenceError
    );
    expect(state.view.workshopIds.size).toBe(0);
  });
});
