import * as fs from 'fs';
import * as path from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import {
  AmbiguousSiblingError,
  IncompleteHierarchyError,
  StageAssembler,
  UsdAssemblyError,
  UsdConfigError,
  UsdFileSystemError,
  defineAssembler
} from '../index';
import { writeFileAtomic } from '../utils/file-utils';
import { LoggerFactory } from '../utils/logger';
import { captureError, captureRejection, childNamed, makeTempDir, removeDir, wrappedFragment } from './helpers';

const logger = LoggerFactory.forQuiet();

describe('StageAssembler', () => {
  let tempDir: string;
  let exportDir: string;

  beforeEach(() => {
    tempDir = makeTempDir();
    exportDir = path.join(tempDir, 'Kitchen');
    fs.mkdirSync(exportDir);
  });

  afterEach(() => {
    removeDir(tempDir);
  });

  const write = (name: string, content: string): void => {
    fs.writeFileSync(path.join(exportDir, name), content);
  };

  const read = (name: string): string => fs.readFileSync(path.join(exportDir, name), 'utf8');

  const writeFragment = (objectName: string, parentPath: string[] = []): void => {
    write(`${objectName}.usda`, wrappedFragment('Geo'));
    write(`${objectName}.meta.json`, JSON.stringify({ objectName, file: `${objectName}.usda`, parentPath }));
  };

  it('assembles an export directory into one document', async () => {
    writeFragment('Chair_RENDER_VARIANT1');
    writeFragment('Chair_PROXY_VARIANT2');
    writeFragment('Table');

    const assembler = new StageAssembler({}, { logger });
    const result = await assembler.assemble(exportDir);

    expect(result.source).toBe('sidecar');
    expect(result.outputPath).toBe(path.join(exportDir, 'Kitchen_stage.usda'));
    expect(read('Kitchen_stage.usda')).toBe(result.document);
    expect(result.fragmentCount).toBe(3);
    expect(result.primCount).toBe(3);
    expect(result.warnings).toEqual([]);

    expect(result.tree.children.map(child => child.name)).toEqual(['Chair', 'Table']);
    expect(childNamed(result.tree, 'Chair').variantSet?.defaultSelection).toBe('1');
    expect(result.document).toContain('prepend references = @./Table.usda@');
    expect(result.document).toContain('prepend references = @./Chair_PROXY_VARIANT2.usda@');
  });

  it('rewrites every fragment it references', async () => {
    writeFragment('Table');

    await defineAssembler({}, { logger }).assemble(exportDir);

    expect(read('Table.usda')).toBe([
      '#usda 1.0',
      '(',
      '    defaultPrim = "Geo"',
      ')',
      '',
      'def Mesh "Geo"',
      '{',
      '}',
      '',
    ].join('\n'));
  });

  it('assembles twice to the same document', async () => {
    writeFragment('Chair_VARIANT1');
    writeFragment('Table');

    const assembler = new StageAssembler({}, { logger });
    const first = await assembler.assemble(exportDir);
    const second = await assembler.assemble(exportDir);

    expect(second.document).toBe(first.document);
    expect(second.warnings).toEqual([]);
  });

  it('reports fragments it could not rewrite without failing', async () => {
    write('Table.usda', '#usda 1.0\n\ndef Xform "Table"\n{\n}\n');
    write('Table.meta.json', JSON.stringify({ objectName: 'Table', file: 'Table.usda' }));

    const result = await new StageAssembler({}, { logger }).assemble(exportDir);

    expect(result.warnings).toEqual([{
      kind: 'WrapperShapeMismatch',
      subject: path.join(exportDir, 'Table.usda'),
      message: 'Left unchanged: no /root wrapper',
    }]);
    expect(read('Table.usda')).toBe('#usda 1.0\n\ndef Xform "Table"\n{\n}\n');
  });

  it('writes nothing when an ancestor is missing', async () => {
    writeFragment('Leg', ['Table']);

    const error = await captureRejection(new StageAssembler({}, { logger }).assemble(exportDir));

    expect(error).toBeInstanceOf(IncompleteHierarchyError);
    expect(fs.existsSync(path.join(exportDir, 'Kitchen_stage.usda'))).toBe(false);
    expect(read('Leg.usda')).toBe(wrappedFragment('Geo'));
  });

  it('keeps the previous document when assembly fails', async () => {
    write('Kitchen_stage.usda', 'previous');
    writeFragment('Prop');
    write('Prop2.usda', wrappedFragment('Geo'));
    write('Prop2.meta.json', JSON.stringify({ objectName: 'Prop', file: 'Prop2.usda' }));

    const error = await captureRejection(new StageAssembler({}, { logger }).assemble(exportDir));

    expect(error).toBeInstanceOf(AmbiguousSiblingError);
    expect(read('Kitchen_stage.usda')).toBe('previous');
  });

  it('writes to the configured file name and layer settings', async () => {
    writeFragment('Table');

    const assembler = new StageAssembler(
      { outputFileName: 'scene.usda', defaultPrim: 'Set', upAxis: 'Y', metersPerUnit: 1 },
      { logger }
    );
    const result = await assembler.assemble(exportDir);

    expect(result.outputPath).toBe(path.join(exportDir, 'scene.usda'));
    expect(result.document).toContain('    defaultPrim = "Set"\n    metersPerUnit = 1\n    upAxis = "Y"\n');
  });

  it('places bare fragments at the root', async () => {
    write('A.usda', wrappedFragment('Geo'));
    write('B.usda', wrappedFragment('Geo'));

    const result = await new StageAssembler({}, { logger }).assemble(exportDir);

    expect(result.source).toBe('flat');
    expect(result.tree.children.map(child => child.name)).toEqual(['A', 'B']);
  });

  it('rejects an export directory without fragments', async () => {
    const error = await captureRejection(new StageAssembler({}, { logger }).assemble(exportDir));
    expect(error).toBeInstanceOf(UsdAssemblyError);
  });

  it('rejects invalid configuration', () => {
    expect(captureError(() => new StageAssembler({ metersPerUnit: -1 }, { logger }))).toBeInstanceOf(UsdConfigError);
    expect(captureError(() => new StageAssembler({ variantSetName: 'bad name' }, { logger }))).toBeInstanceOf(UsdConfigError);
    expect(captureError(() => new StageAssembler({ outputFileName: 'out/scene.usda' }, { logger }))).toBeInstanceOf(UsdConfigError);
  });

  it('fills configuration defaults', () => {
    expect(new StageAssembler({}, { logger }).getConfig()).toEqual({
      debug: false,
      defaultPrim: 'World',
      stripRoot: true,
      nestMaterials: true,
      variantSetName: 'modelVariant',
      upAxis: 'Z',
      metersPerUnit: 0.01,
      relativePaths: true,
    });
  });
});

describe('writeFileAtomic', () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => {
    removeDir(dir);
  });

  it('replaces the target in one step', async () => {
    const target = path.join(dir, 'stage.usda');
    fs.writeFileSync(target, 'old');

    await writeFileAtomic(target, 'new');

    expect(fs.readFileSync(target, 'utf8')).toBe('new');
    expect(fs.readdirSync(dir)).toEqual(['stage.usda']);
  });

  it('cleans up after a failed rename', async () => {
    const target = path.join(dir, 'stage.usda');
    fs.mkdirSync(target);

    const error = await captureRejection(writeFileAtomic(target, 'new'));

    expect(error).toBeInstanceOf(UsdFileSystemError);
    expect(fs.readdirSync(dir)).toEqual(['stage.usda']);
  });
});
