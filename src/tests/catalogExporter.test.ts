import fs from 'fs-extra';
import path from 'path';
import { csvField, exportCatalogSnapshot, snapshotRow } from '../catalog/catalogExporter';
import { CatalogWalker } from '../catalog/CatalogWalker';
import { ServiceError } from '../utils/errors';
import { FileUtils } from '../utils/fileUtils';
import { buildCatalogs, descriptor, MemoryCatalogSource } from './helpers';
import { TestPaths } from './test-config';

describe('csvField', () => {
  it('should leave plain values alone', () => {
    expect(csvField('人教版')).toBe('人教版');
    expect(csvField(42)).toBe('42');
  });

  it('should quote values with separators, quotes or line breaks', () => {
    expect(csvField('Reading, grade 1')).toBe('"Reading, grade 1"');
    expect(csvField('The "Red" book')).toBe('"The ""Red"" book"');
    expect(csvField('two\nlines')).toBe('"two\nlines"');
  });
});

describe('snapshotRow', () => {
  it('should write the record fields in column order', () => {
    expect(
      snapshotRow({
        id: 'book-1',
        title: 'Maths, grade 2',
        publisher: '北师大版',
        catalogIndex: 0,
        position: 1,
        globalSequence: 2,
      })
    ).toBe('2,0,1,book-1,"Maths, grade 2",北师大版');
  });
});

describe('exportCatalogSnapshot', () => {
  const testDir = TestPaths.unit.exporter;
  const targetPath = path.join(testDir, 'nested', 'catalog.csv');

  beforeEach(async () => {
    await fs.ensureDir(testDir);
  });

  afterEach(async () => {
    await fs.remove(testDir);
  });

  it('should write a header and one row per record', async () => {
    const source = new MemoryCatalogSource([
      [[descriptor('a', 'First'), { id: 'broken' }], [descriptor('b', 'Second, revised')]],
      [[descriptor('c', 'Third', '统编版')]],
    ]);

    const rows = await exportCatalogSnapshot(new CatalogWalker(source), targetPath);

    expect(rows).toBe(3);
    expect(await fs.readFile(targetPath, 'utf8')).toBe(
      '\uFEFFglobal_sequence,catalog_index,position,id,title,publisher\r\n' +
        '1,0,0,a,First,人教版\r\n' +
        '3,0,2,b,"Second, revised",人教版\r\n' +
        '4,1,0,c,Third,统编版\r\n'
    );
    expect(await fs.readdir(path.dirname(targetPath))).toEqual(['catalog.csv']);
  });

  it('should leave no file behind when the walk fails', async () => {
    const source = new MemoryCatalogSource(buildCatalogs([2, 2])).failCatalog(1);

    await expect(exportCatalogSnapshot(new CatalogWalker(source), targetPath)).rejects.toThrow(
      ServiceError
    );
    expect(await fs.readdir(path.dirname(targetPath))).toEqual([]);
  });

  it('should reject when the snapshot file cannot be written', async () => {
    jest
      .spyOn(FileUtils, 'temporaryPathFor')
      .mockReturnValue(path.join(testDir, 'missing', 'catalog.csv.part'));
    const source = new MemoryCatalogSource(buildCatalogs([3]));

    await expect(exportCatalogSnapshot(new CatalogWalker(source), targetPath)).rejects.toMatchObject({
      code: 'ENOENT',
    });
    expect(await fs.pathExists(targetPath)).toBe(false);
  });
});
