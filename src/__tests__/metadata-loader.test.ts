import * as fs from 'fs';
import * as path from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import {
  ancestorChain,
  isFragmentFileName,
  loadBatch,
  parseHierarchyIndex,
  readSidecar
} from '../assembler/metadata-loader';
import { IncompleteHierarchyError, UsdFileSystemError, UsdSchemaError } from '../errors';
import { LoggerFactory } from '../utils/logger';
import { captureError, captureRejection, makeTempDir, removeDir } from './helpers';

const logger = LoggerFactory.forQuiet();

describe('isFragmentFileName', () => {
  it('accepts layer files and skips assembled documents', () => {
    expect(isFragmentFileName('Chair.usda')).toBe(true);
    expect(isFragmentFileName('Chair.usd')).toBe(true);
    expect(isFragmentFileName('Chair.usdc')).toBe(true);
    expect(isFragmentFileName('Kitchen_stage.usda')).toBe(false);
    expect(isFragmentFileName('scene.usda', 'scene.usda')).toBe(false);
    expect(isFragmentFileName('notes.txt')).toBe(false);
  });
});

describe('parseHierarchyIndex', () => {
  it('reads name|parent lines', () => {
    const parents = parseHierarchyIndex('# name|parent\nRoom|\n\nTable|Room\r\nbroken line\n');
    expect([...parents.entries()]).toEqual([
      ['Room', undefined],
      ['Table', 'Room'],
    ]);
  });
});

describe('ancestorChain', () => {
  it('lists ancestors outermost first', () => {
    const parents = new Map<string, string | undefined>([['Leg', 'Table'], ['Table', 'Room'], ['Room', undefined]]);
    expect(ancestorChain('Leg', parents)).toEqual(['Room', 'Table']);
    expect(ancestorChain('Room', parents)).toEqual([]);
  });

  it('rejects a cycle', () => {
    const parents = new Map<string, string | undefined>([['A', 'B'], ['B', 'A']]);
    expect(captureError(() => ancestorChain('A', parents))).toBeInstanceOf(IncompleteHierarchyError);
  });
});

describe('loadBatch', () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => {
    removeDir(dir);
  });

  const write = (name: string, content: string = ''): void => {
    const filePath = path.join(dir, name);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, content);
  };

  it('reads per-fragment sidecars', async () => {
    write('Chair.usda');
    write('Chair.meta.json', JSON.stringify({
      objectName: 'Chair_RENDER',
      file: 'Chair.usda',
      parentPath: ['Room'],
      properties: { kind: 'component' },
    }));
    write('Room.meta.json', JSON.stringify({ objectName: 'Room' }));

    const batch = await loadBatch(dir, { logger });

    expect(batch.source).toBe('sidecar');
    expect(batch.records).toEqual([
      {
        filePath: path.join(dir, 'Chair.usda'),
        objectName: 'Chair_RENDER',
        parentPath: ['Room'],
        propertyOverrides: { kind: 'component' },
      },
      { container: true, objectName: 'Room', parentPath: [] },
    ]);
  });

  it('rejects a sidecar that fails validation', async () => {
    write('Chair.meta.json', JSON.stringify({ objectName: '' }));
    const error = await captureRejection(loadBatch(dir, { logger }));

    expect(error).toBeInstanceOf(UsdSchemaError);
    if (error instanceof UsdSchemaError) {
      expect(error.getFormattedErrors()).toEqual(['objectName: Object name cannot be empty']);
      expect(error.message).toBe('Invalid fragment sidecar: objectName: Object name cannot be empty');
    }
  });

  it('reports a sidecar it cannot read as a file system error', async () => {
    const sidecarPath = path.join(dir, 'Chair.meta.json');
    fs.mkdirSync(sidecarPath);

    const error = await captureRejection(readSidecar(sidecarPath));

    expect(error).toBeInstanceOf(UsdFileSystemError);
    if (error instanceof UsdFileSystemError) {
      expect(error.filePath).toBe(sidecarPath);
      expect(error.operation).toBe('read');
      expect(error.message).toBe(`Could not read fragment sidecar: ${sidecarPath}`);
    }
  });

  it('rejects a sidecar that is not JSON', async () => {
    write('Chair.meta.json', '{ objectName: ');
    expect(await captureRejection(loadBatch(dir, { logger }))).toBeInstanceOf(UsdSchemaError);
  });

  it('rejects a sidecar whose fragment is missing', async () => {
    write('Ghost.meta.json', JSON.stringify({ objectName: 'Ghost', file: 'Ghost.usda' }));
    const error = await captureRejection(loadBatch(dir, { logger }));

    expect(error).toBeInstanceOf(UsdFileSystemError);
    if (error instanceof UsdFileSystemError) {
      expect(error.filePath).toBe(path.join(dir, 'Ghost.usda'));
    }
  });

  it('reads the hierarchy index', async () => {
    write('_hierarchy.txt', '# name|parent\nRoom|\nTable|Room\nLamp_PAYLOAD|Table\n');
    write('Table.usda');
    write('Lamp_PAYLOAD.usda');
    write('Set_stage.usda');

    const batch = await loadBatch(dir, { logger });

    expect(batch.source).toBe('hierarchy');
    expect(batch.records).toEqual([
      { container: true, objectName: 'Room', parentPath: [] },
      { filePath: path.join(dir, 'Table.usda'), objectName: 'Table', parentPath: ['Room'] },
      { filePath: path.join(dir, 'Lamp_PAYLOAD.usda'), objectName: 'Lamp_PAYLOAD', parentPath: ['Room', 'Table'] },
    ]);
  });

  it('places every fragment at the root without metadata', async () => {
    write('B.usda');
    write('A.usd');
    write('sub/C.usdc');
    write('Kitchen_stage.usda');
    write('notes.txt');

    const batch = await loadBatch(dir, { logger });

    expect(batch.source).toBe('flat');
    expect(batch.records.map(record => record.objectName)).toEqual(['A', 'B', 'C']);
    expect(batch.records.every(record => record.parentPath.length === 0)).toBe(true);
  });

  it('rejects a missing export directory', async () => {
    const error = await captureRejection(loadBatch(path.join(dir, 'missing'), { logger }));
    expect(error).toBeInstanceOf(UsdFileSystemError);
  });
});
